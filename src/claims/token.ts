/**
 * Access tokens — compact signed capabilities bound to one transfer process.
 */

import type { AccessToken, Keypair, Result, TokenPayload, TransferType } from '../core/types.js';
import { decodeCompact, encodeCompact, generateId, verifyObjectSignature } from '../core/crypto.js';

export function mintToken(
  issuer: Keypair,
  processId: string,
  direction: TransferType,
  ttlMs: number,
  now: Date = new Date(),
): AccessToken {
  const payload: TokenPayload = {
    jti: generateId('tok', 12),
    iss: issuer.principal.id,
    pid: processId,
    dir: direction,
    iat: now.toISOString(),
    exp: new Date(now.getTime() + ttlMs).toISOString(),
  };
  return {
    id: payload.jti,
    processId,
    direction,
    issuer: payload.iss,
    issuedAt: payload.iat,
    expiresAt: payload.exp,
    revoked: false,
    value: encodeCompact(issuer.privateKey, payload),
  };
}

function isTokenPayload(value: unknown): value is TokenPayload {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return typeof v.jti === 'string'
    && typeof v.iss === 'string'
    && typeof v.pid === 'string'
    && (v.dir === 'PUSH' || v.dir === 'PULL')
    && typeof v.iat === 'string'
    && typeof v.exp === 'string';
}

/** Decode a token value and check its signature against the embedded issuer. */
export function decodeToken(value: string): Result<TokenPayload, string> {
  const decoded = decodeCompact(value);
  if (!decoded) return { ok: false, error: 'Malformed token' };
  if (!isTokenPayload(decoded.payload)) return { ok: false, error: 'Malformed token payload' };
  const payload = decoded.payload;
  if (!verifyObjectSignature(payload.iss, payload, decoded.signature)) {
    return { ok: false, error: 'Invalid token signature' };
  }
  return { ok: true, value: payload };
}
