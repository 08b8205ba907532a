/**
 * Contract agreements — creation, signing, verification.
 */

import type { ContractAgreement, Keypair, Result, UsagePolicy } from '../core/types.js';
import { generateId, signObject, verifyObjectSignature, canonicalize } from '../core/crypto.js';

export interface AgreementTerms {
  negotiationId: string;
  providerId: string;
  consumerId: string;
  assetId: string;
  policy: UsagePolicy;
  /** 0 means the agreement does not expire */
  ttlMs: number;
}

type Unsigned = Omit<ContractAgreement, 'signatures'>;

function unsigned(agreement: ContractAgreement): Unsigned {
  const { signatures: _, ...rest } = agreement;
  return rest;
}

/**
 * Create an agreement carrying the provider's signature only.
 * @param provider - Keypair of the provider; its id must match `terms.providerId`
 */
export function createAgreement(provider: Keypair, terms: AgreementTerms, now: Date = new Date()): ContractAgreement {
  const body: Unsigned = {
    id: generateId('agr'),
    negotiationId: terms.negotiationId,
    providerId: terms.providerId,
    consumerId: terms.consumerId,
    assetId: terms.assetId,
    policy: terms.policy,
    agreedAt: now.toISOString(),
    ...(terms.ttlMs > 0 ? { expiresAt: new Date(now.getTime() + terms.ttlMs).toISOString() } : {}),
  };
  return { ...body, signatures: { provider: signObject(provider.privateKey, body) } };
}

/** Add the consumer's signature. */
export function countersignAgreement(consumer: Keypair, agreement: ContractAgreement): ContractAgreement {
  return {
    ...agreement,
    signatures: { ...agreement.signatures, consumer: signObject(consumer.privateKey, unsigned(agreement)) },
  };
}

export function verifyAgreementSignature(agreement: ContractAgreement, party: 'provider' | 'consumer'): boolean {
  const signature = agreement.signatures[party];
  if (!signature) return false;
  const signer = party === 'provider' ? agreement.providerId : agreement.consumerId;
  return verifyObjectSignature(signer, unsigned(agreement), signature);
}

/** Both signatures present and valid. */
export function isAgreementComplete(agreement: ContractAgreement): boolean {
  return verifyAgreementSignature(agreement, 'provider') && verifyAgreementSignature(agreement, 'consumer');
}

/** Whether `a` and `b` carry identical terms, ignoring signatures. */
export function sameTerms(a: ContractAgreement, b: ContractAgreement): boolean {
  return canonicalize(unsigned(a)) === canonicalize(unsigned(b));
}

export function isAgreementExpired(agreement: ContractAgreement, now: Date = new Date()): boolean {
  return agreement.expiresAt !== undefined && new Date(agreement.expiresAt).getTime() <= now.getTime();
}

/**
 * Check an agreement received from the provider of negotiation `providerPid`.
 */
export function checkOfferedAgreement(
  agreement: ContractAgreement,
  expected: { providerId: string; consumerId: string; providerPid: string; assetId: string },
): Result<ContractAgreement, string> {
  if (agreement.providerId !== expected.providerId) return { ok: false, error: 'Agreement names another provider' };
  if (agreement.consumerId !== expected.consumerId) return { ok: false, error: 'Agreement names another consumer' };
  if (agreement.negotiationId !== expected.providerPid) return { ok: false, error: 'Agreement belongs to another negotiation' };
  if (agreement.assetId !== expected.assetId) return { ok: false, error: 'Agreement covers another asset' };
  if (!verifyAgreementSignature(agreement, 'provider')) return { ok: false, error: 'Provider signature is invalid' };
  return { ok: true, value: agreement };
}
