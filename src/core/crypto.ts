/**
 * Cryptographic utilities.
 * Uses @noble/ed25519 for signing and blakejs for hashing.
 */

import * as ed from '@noble/ed25519';
import blake from 'blakejs';
import canonicalizeJson from 'canonicalize';
import { sha512 } from '@noble/hashes/sha2.js';
import { randomBytes } from 'node:crypto';
import type { Keypair, Principal } from './types.js';

// ed25519 v2 requires setting the sha512 hash
ed.etc.sha512Sync = (...m: Uint8Array[]) => {
  const h = sha512.create();
  for (const msg of m) h.update(msg);
  return h.digest();
};

/** Base64url encode (no padding) */
export function toBase64url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/** Base64url decode */
export function fromBase64url(str: string): Uint8Array {
  return new Uint8Array(Buffer.from(str, 'base64url'));
}

/** Generate an Ed25519 keypair */
export function generateKeypair(name?: string): Keypair {
  const privateKey = ed.utils.randomPrivateKey();
  const publicKey = ed.getPublicKey(privateKey);
  const principal: Principal = {
    id: toBase64url(publicKey),
    ...(name ? { name } : {}),
  };
  return { principal, privateKey };
}

/** Random prefixed identifier, e.g. `neg_3f9a0c1b2d4e` */
export function generateId(prefix: string, bytes = 6): string {
  return `${prefix}_${randomBytes(bytes).toString('hex')}`;
}

/** BLAKE2b-256 hash */
export function blake2b256(data: Uint8Array): Uint8Array {
  return blake.blake2b(data, undefined, 32);
}

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

function verifyRaw(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  try {
    return ed.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** Sign a canonical JSON object: canonicalize → BLAKE2b → Ed25519 sign */
export function signObject(privateKey: Uint8Array, obj: unknown): string {
  const payload = new TextEncoder().encode(canonicalize(obj));
  return toBase64url(ed.sign(blake2b256(payload), privateKey));
}

/** Verify signature over a canonical JSON object */
export function verifyObjectSignature(publicKeyB64: string, obj: unknown, signatureB64: string): boolean {
  const publicKey = fromBase64url(publicKeyB64);
  const signature = fromBase64url(signatureB64);
  if (publicKey.length !== 32 || signature.length !== 64) return false;
  const payload = new TextEncoder().encode(canonicalize(obj));
  return verifyRaw(publicKey, blake2b256(payload), signature);
}

/** Encode a signed object as `base64url(canonical json).base64url(signature)` */
export function encodeCompact(privateKey: Uint8Array, payload: object): string {
  const body = toBase64url(new TextEncoder().encode(canonicalize(payload)));
  return `${body}.${signObject(privateKey, payload)}`;
}

/**
 * Split a compact value into its decoded payload and signature.
 * The signature is not checked here; pass the result to {@link verifyObjectSignature}.
 */
export function decodeCompact(value: string): { payload: unknown; signature: string } | null {
  const parts = value.split('.');
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  try {
    const payload: unknown = JSON.parse(new TextDecoder().decode(fromBase64url(parts[0])));
    return { payload, signature: parts[1] };
  } catch {
    return null;
  }
}
