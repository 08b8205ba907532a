/**
 * Contract negotiation between two participants over the in-memory network.
 */

import { describe, it, expect } from 'vitest';
import { isAgreementComplete } from '../../src/negotiation/agreement.js';
import { ASSET, POLICY, createDataspace, negotiate, settle } from '../helpers.js';

describe('Contract negotiation', () => {
  it('runs from request to FINALIZED on both sides', async () => {
    const space = await createDataspace();
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    expect(requested.state).toBe('REQUESTED');
    expect(requested.version).toBe(1);

    await settle(consumer, provider);

    const mine = await consumer.negotiations.get(requested.id);
    expect(mine?.state).toBe('FINALIZED');
    expect(mine?.history.map(h => h.to)).toEqual([
      'REQUESTED', 'OFFERED', 'ACCEPTED', 'AGREED', 'VERIFIED', 'FINALIZED',
    ]);

    const [theirs] = await provider.negotiations.listByState('FINALIZED');
    expect(theirs.counterpartyPid).toBe(requested.id);
    expect(theirs.history.map(h => h.to)).toEqual([
      'REQUESTED', 'OFFERED', 'ACCEPTED', 'AGREED', 'VERIFIED', 'FINALIZED',
    ]);
    expect(mine?.counterpartyPid).toBe(theirs.id);
  });

  it('produces one agreement signed by both parties', async () => {
    const space = await createDataspace();
    const agreementId = await negotiate(space);

    const consumerSide = await space.consumer.negotiations.findByAgreement(agreementId);
    const providerSide = await space.provider.negotiations.findByAgreement(agreementId);
    expect(consumerSide?.agreement?.policy).toEqual(POLICY);
    expect(providerSide?.agreement).toEqual(consumerSide?.agreement);
    expect(providerSide?.agreement && isAgreementComplete(providerSide.agreement)).toBe(true);
    expect(providerSide?.agreement?.providerId).toBe(space.provider.id);
    expect(providerSide?.agreement?.consumerId).toBe(space.consumer.id);
  });

  it('leaves a one-sided acceptance non-terminal without an agreement', async () => {
    const space = await createDataspace({ onOffer: () => undefined });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    const offered = await consumer.negotiations.get(requested.id);
    expect(offered?.state).toBe('OFFERED');
    expect(offered?.agreement).toBeUndefined();
    const [providerSide] = await provider.negotiations.listByState('OFFERED');
    expect(providerSide.agreement).toBeUndefined();
  });

  it('accepts explicitly when no decision hook is installed', async () => {
    const space = await createDataspace({ onOffer: () => undefined });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);
    const accepted = await consumer.negotiations.accept(requested.id);
    expect(accepted.state).toBe('ACCEPTED');

    await settle(consumer, provider);
    expect((await consumer.negotiations.get(requested.id))?.state).toBe('FINALIZED');
  });

  it('terminates both sides with PolicyDenied when the consumer lacks the claim', async () => {
    const space = await createDataspace({ consumerClaims: { membership: 'silver' } });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    const mine = await consumer.negotiations.get(requested.id);
    expect(mine?.state).toBe('TERMINATED');
    expect(mine?.reason).toEqual({ code: 'PolicyDenied', detail: `Access to ${ASSET} denied` });

    const [theirs] = await provider.negotiations.listByState('TERMINATED');
    expect(theirs.reason?.code).toBe('PolicyDenied');
    expect(theirs.offerCount).toBe(0);
  });

  it('ends as Declined when the consumer declines without a counter-offer', async () => {
    const space = await createDataspace({ onOffer: () => ({ action: 'decline' }) });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    expect((await consumer.negotiations.get(requested.id))?.reason).toEqual({ code: 'Declined' });
    const [theirs] = await provider.negotiations.listByState('TERMINATED');
    expect(theirs.reason).toEqual({ code: 'Declined' });
  });

  it('reaches an agreement on the counter-offered policy', async () => {
    let round = 0;
    const space = await createDataspace({
      onOffer: () => (round++ === 0
        ? { action: 'decline', counterPolicy: { purpose: 'teaching' } }
        : { action: 'accept' }),
    });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    const mine = await consumer.negotiations.get(requested.id);
    expect(mine?.state).toBe('FINALIZED');
    expect(mine?.offerCount).toBe(2);
    expect(mine?.agreement?.policy).toEqual({ purpose: 'teaching' });
    expect(mine?.history.map(h => h.to)).toEqual([
      'REQUESTED', 'OFFERED', 'DECLINED', 'OFFERED', 'ACCEPTED', 'AGREED', 'VERIFIED', 'FINALIZED',
    ]);
  });

  it('terminates with OfferLimitExceeded when the offer cycle runs past the maximum', async () => {
    const space = await createDataspace({
      providerConfig: { maxOffers: 2 },
      consumerConfig: { maxOffers: 2 },
      onOffer: () => ({ action: 'decline', counterPolicy: { purpose: 'again' } }),
    });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    const [theirs] = await provider.negotiations.listByState('TERMINATED');
    expect(theirs.reason).toEqual({ code: 'OfferLimitExceeded', detail: 'More than 2 offers' });
    expect(theirs.offerCount).toBe(2);

    const mine = await consumer.negotiations.get(requested.id);
    expect(mine?.state).toBe('TERMINATED');
    expect(mine?.reason?.code).toBe('OfferLimitExceeded');
    expect(await consumer.negotiations.listByState('OFFERED')).toEqual([]);
  });

  it('enforces the limit on the consumer side as well', async () => {
    const space = await createDataspace({
      consumerConfig: { maxOffers: 1 },
      onOffer: () => ({ action: 'decline', counterPolicy: { purpose: 'again' } }),
    });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    const mine = await consumer.negotiations.get(requested.id);
    expect(mine?.reason).toEqual({ code: 'OfferLimitExceeded' });
    expect(mine?.offerCount).toBe(1);

    const [theirs] = await provider.negotiations.listByState('TERMINATED');
    expect(theirs.reason).toEqual({ code: 'OfferLimitExceeded' });
  });

  it('propagates a manual termination as CounterpartyTerminated', async () => {
    const space = await createDataspace({ onOffer: () => undefined });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);
    const ended = await consumer.negotiations.terminate(requested.id);
    expect(ended.reason).toEqual({ code: 'Manual' });
    await settle(consumer, provider);

    const [theirs] = await provider.negotiations.listByState('TERMINATED');
    expect(theirs.reason).toEqual({ code: 'CounterpartyTerminated' });

    const again = await consumer.negotiations.terminate(requested.id);
    expect(again.version).toBe(ended.version);
  });

  it('refuses to terminate a FINALIZED negotiation', async () => {
    const space = await createDataspace();
    const agreementId = await negotiate(space);
    const finalized = await space.consumer.negotiations.findByAgreement(agreementId);

    await expect(space.consumer.negotiations.terminate(finalized?.id ?? ''))
      .rejects.toMatchObject({ kind: 'InvalidStateTransition', state: 'FINALIZED' });
  });

  it('expires negotiations idle past the timeout', async () => {
    const space = await createDataspace({
      onOffer: () => undefined,
      consumerConfig: { negotiationTimeoutMs: 60_000 },
    });
    const { consumer, provider } = space;

    const requested = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
    await settle(consumer, provider);

    expect(await consumer.negotiations.expireStale(new Date())).toEqual([]);
    const expired = await consumer.negotiations.expireStale(new Date(Date.now() + 120_000));
    expect(expired.map(p => p.id)).toEqual([requested.id]);
    expect(expired[0].reason).toEqual({ code: 'Timeout' });
  });
});
