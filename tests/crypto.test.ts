import { describe, it, expect } from 'vitest';
import {
  generateKeypair,
  generateId,
  blake2b256,
  canonicalize,
  signObject,
  verifyObjectSignature,
  toBase64url,
  fromBase64url,
  encodeCompact,
  decodeCompact,
} from '../src/core/crypto.js';

describe('Crypto Utilities', () => {
  describe('base64url', () => {
    it('should round-trip encode/decode', () => {
      const original = new Uint8Array([0, 1, 2, 255, 254, 253]);
      expect(fromBase64url(toBase64url(original))).toEqual(original);
    });

    it('should produce URL-safe characters (no +, /, =)', () => {
      const bytes = new Uint8Array(32);
      for (let i = 0; i < 32; i++) bytes[i] = i * 8;
      expect(toBase64url(bytes)).not.toMatch(/[+/=]/);
    });
  });

  describe('generateKeypair', () => {
    it('should produce unique keypairs', () => {
      expect(generateKeypair().principal.id).not.toBe(generateKeypair().principal.id);
    });

    it('should set name only when provided', () => {
      expect(generateKeypair('alice').principal.name).toBe('alice');
      expect(generateKeypair().principal.name).toBeUndefined();
    });

    it('should use the 32-byte public key as the principal id', () => {
      const kp = generateKeypair();
      expect(kp.privateKey.length).toBe(32);
      expect(fromBase64url(kp.principal.id).length).toBe(32);
    });
  });

  describe('generateId', () => {
    it('should prefix a random hex suffix', () => {
      expect(generateId('neg')).toMatch(/^neg_[0-9a-f]{12}$/);
      expect(generateId('msg', 8)).toMatch(/^msg_[0-9a-f]{16}$/);
      expect(generateId('tp')).not.toBe(generateId('tp'));
    });
  });

  describe('blake2b256', () => {
    it('should produce a 32-byte deterministic digest', () => {
      const data = new TextEncoder().encode('dataspace');
      expect(blake2b256(data).length).toBe(32);
      expect(blake2b256(data)).toEqual(blake2b256(data));
      expect(blake2b256(data)).not.toEqual(blake2b256(new TextEncoder().encode('dataspaces')));
    });
  });

  describe('canonicalize', () => {
    it('should sort keys recursively', () => {
      expect(canonicalize({ b: 1, a: { d: true, c: 'x' } })).toBe('{"a":{"c":"x","d":true},"b":1}');
    });

    it('should drop undefined properties', () => {
      expect(canonicalize({ a: 1, b: undefined })).toBe('{"a":1}');
    });
  });

  describe('signObject / verifyObjectSignature', () => {
    it('should verify regardless of key order', () => {
      const kp = generateKeypair();
      const sig = signObject(kp.privateKey, { assetId: 'asset-1', policy: { purpose: 'research' } });
      expect(verifyObjectSignature(kp.principal.id, { policy: { purpose: 'research' }, assetId: 'asset-1' }, sig)).toBe(true);
    });

    it('should reject a modified object', () => {
      const kp = generateKeypair();
      const sig = signObject(kp.privateKey, { assetId: 'asset-1' });
      expect(verifyObjectSignature(kp.principal.id, { assetId: 'asset-2' }, sig)).toBe(false);
    });

    it('should reject another signer', () => {
      const signer = generateKeypair();
      const other = generateKeypair();
      const sig = signObject(signer.privateKey, { assetId: 'asset-1' });
      expect(verifyObjectSignature(other.principal.id, { assetId: 'asset-1' }, sig)).toBe(false);
    });

    it('should reject malformed keys and signatures', () => {
      const kp = generateKeypair();
      const sig = signObject(kp.privateKey, { a: 1 });
      expect(verifyObjectSignature('short', { a: 1 }, sig)).toBe(false);
      expect(verifyObjectSignature(kp.principal.id, { a: 1 }, 'short')).toBe(false);
    });
  });

  describe('compact encoding', () => {
    it('should decode what it encodes', () => {
      const kp = generateKeypair();
      const value = encodeCompact(kp.privateKey, { pid: 'tp_1', dir: 'PULL' });
      const decoded = decodeCompact(value);
      expect(decoded?.payload).toEqual({ dir: 'PULL', pid: 'tp_1' });
      expect(decoded && verifyObjectSignature(kp.principal.id, decoded.payload, decoded.signature)).toBe(true);
    });

    it('should return null for values that are not two base64url parts', () => {
      expect(decodeCompact('no-dot')).toBeNull();
      expect(decodeCompact('a.b.c')).toBeNull();
      expect(decodeCompact('.sig')).toBeNull();
      expect(decodeCompact(`${toBase64url(new TextEncoder().encode('{not json'))}.sig`)).toBeNull();
    });
  });
});
