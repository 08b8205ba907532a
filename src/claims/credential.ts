/**
 * Credentials & Presentations — creation and signature checks.
 */

import type {
  ClaimSet,
  Credential,
  CredentialPresentation,
  Keypair,
} from '../core/types.js';
import { generateId, signObject, verifyObjectSignature } from '../core/crypto.js';

/**
 * Create a credential signed by `issuer`.
 * @param ttlMs - Lifetime from `now`
 */
export function createCredential(
  issuer: Keypair,
  subjectId: string,
  claims: ClaimSet,
  ttlMs: number,
  now: Date = new Date(),
): Credential {
  const credential: Credential = {
    id: generateId('vc'),
    issuer: issuer.principal.id,
    subject: subjectId,
    claims,
    issuedAt: now.toISOString(),
    expiresAt: new Date(now.getTime() + ttlMs).toISOString(),
    signature: '',
  };

  const { signature: _, ...toSign } = credential;
  credential.signature = signObject(issuer.privateKey, toSign);
  return credential;
}

export function verifyCredentialSignature(credential: Credential): boolean {
  const { signature, ...toVerify } = credential;
  return verifyObjectSignature(credential.issuer, toVerify, signature);
}

/**
 * Wrap credentials in a presentation signed by their holder.
 * @param audience - Participant the presentation is meant for, if any
 */
export function createPresentation(
  holder: Keypair,
  credentials: Credential[],
  audience?: string,
  now: Date = new Date(),
): CredentialPresentation {
  const presentation: CredentialPresentation = {
    kind: 'credentials',
    holder: holder.principal.id,
    ...(audience ? { audience } : {}),
    issuedAt: now.toISOString(),
    credentials,
    signature: '',
  };

  const { signature: _, ...toSign } = presentation;
  presentation.signature = signObject(holder.privateKey, toSign);
  return presentation;
}

export function verifyPresentationSignature(presentation: CredentialPresentation): boolean {
  const { signature, ...toVerify } = presentation;
  return verifyObjectSignature(presentation.holder, toVerify, signature);
}
