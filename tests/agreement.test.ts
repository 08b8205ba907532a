import { describe, it, expect } from 'vitest';
import {
  createAgreement,
  countersignAgreement,
  verifyAgreementSignature,
  isAgreementComplete,
  isAgreementExpired,
  sameTerms,
  checkOfferedAgreement,
  type AgreementTerms,
} from '../src/negotiation/agreement.js';
import { RulePolicyEngine } from '../src/negotiation/policy.js';
import { generateKeypair } from '../src/core/crypto.js';

const provider = generateKeypair('provider');
const consumer = generateKeypair('consumer');
const NOW = new Date('2026-03-01T12:00:00.000Z');

const terms: AgreementTerms = {
  negotiationId: 'neg_provider',
  providerId: provider.principal.id,
  consumerId: consumer.principal.id,
  assetId: 'asset-1',
  policy: { purpose: 'research' },
  ttlMs: 60_000,
};

const expected = {
  providerId: provider.principal.id,
  consumerId: consumer.principal.id,
  providerPid: 'neg_provider',
  assetId: 'asset-1',
};

describe('Contract agreements', () => {
  it('is created with the provider signature and an expiry', () => {
    const agreement = createAgreement(provider, terms, NOW);

    expect(agreement.id).toMatch(/^agr_[0-9a-f]{12}$/);
    expect(agreement.agreedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(agreement.expiresAt).toBe('2026-03-01T12:01:00.000Z');
    expect(verifyAgreementSignature(agreement, 'provider')).toBe(true);
    expect(verifyAgreementSignature(agreement, 'consumer')).toBe(false);
    expect(isAgreementComplete(agreement)).toBe(false);
  });

  it('has no expiry with a zero ttl', () => {
    const agreement = createAgreement(provider, { ...terms, ttlMs: 0 }, NOW);
    expect(agreement).not.toHaveProperty('expiresAt');
    expect(isAgreementExpired(agreement, new Date('2100-01-01T00:00:00.000Z'))).toBe(false);
  });

  it('is complete once countersigned by the consumer', () => {
    const signed = countersignAgreement(consumer, createAgreement(provider, terms, NOW));
    expect(isAgreementComplete(signed)).toBe(true);
  });

  it('fails verification when countersigned by someone else', () => {
    const signed = countersignAgreement(generateKeypair(), createAgreement(provider, terms, NOW));
    expect(verifyAgreementSignature(signed, 'consumer')).toBe(false);
  });

  it('expires at its expiry instant', () => {
    const agreement = createAgreement(provider, terms, NOW);
    expect(isAgreementExpired(agreement, new Date('2026-03-01T12:00:59.999Z'))).toBe(false);
    expect(isAgreementExpired(agreement, new Date('2026-03-01T12:01:00.000Z'))).toBe(true);
  });

  it('compares terms without signatures', () => {
    const agreement = createAgreement(provider, terms, NOW);
    expect(sameTerms(agreement, countersignAgreement(consumer, agreement))).toBe(true);
    expect(sameTerms(agreement, { ...agreement, policy: { purpose: 'marketing' } })).toBe(false);
  });

  describe('checkOfferedAgreement', () => {
    it('accepts an agreement that matches the negotiation', () => {
      const agreement = createAgreement(provider, terms, NOW);
      expect(checkOfferedAgreement(agreement, expected)).toEqual({ ok: true, value: agreement });
    });

    it.each([
      [{ providerId: consumer.principal.id }, 'Agreement names another provider'],
      [{ consumerId: provider.principal.id }, 'Agreement names another consumer'],
      [{ providerPid: 'neg_other' }, 'Agreement belongs to another negotiation'],
      [{ assetId: 'asset-2' }, 'Agreement covers another asset'],
    ])('rejects a mismatch in %j', (override, error) => {
      const agreement = createAgreement(provider, terms, NOW);
      expect(checkOfferedAgreement(agreement, { ...expected, ...override })).toEqual({ ok: false, error });
    });

    it('rejects terms changed after signing', () => {
      const agreement = createAgreement(provider, terms, NOW);
      expect(checkOfferedAgreement({ ...agreement, policy: { purpose: 'marketing' } }, expected))
        .toEqual({ ok: false, error: 'Provider signature is invalid' });
    });
  });
});

describe('RulePolicyEngine', () => {
  it('allows when every required claim matches', () => {
    const policy = new RulePolicyEngine({ 'asset-1': { membership: 'gold', level: 3 } });
    expect(policy.evaluate({ membership: 'gold', level: 3, country: 'NL' }, 'asset-1')).toBe('allow');
    expect(policy.evaluate({ membership: 'gold', level: '3' }, 'asset-1')).toBe('deny');
    expect(policy.evaluate({ membership: 'silver', level: 3 }, 'asset-1')).toBe('deny');
  });

  it('falls back to the wildcard rule and then to the default decision', () => {
    const policy = new RulePolicyEngine({}, { defaultDecision: 'allow' }).require('*', { active: true });
    expect(policy.evaluate({ active: true }, 'asset-9')).toBe('allow');
    expect(policy.evaluate({}, 'asset-9')).toBe('deny');
    expect(new RulePolicyEngine({}, { defaultDecision: 'allow' }).evaluate({}, 'asset-9')).toBe('allow');
    expect(new RulePolicyEngine().evaluate({ membership: 'gold' }, 'asset-1')).toBe('deny');
  });

  it('grants an asset with an empty rule to anyone', () => {
    expect(new RulePolicyEngine().require('open-data', {}).evaluate({}, 'open-data')).toBe('allow');
  });
});
