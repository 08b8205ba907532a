import { MetricsCollector } from '../src/core/metrics.js';
import type { ConfigOverrides } from '../src/config.js';
import type { StorageAdapter, TransferType, UsagePolicy } from '../src/core/types.js';
import { InMemoryNetwork } from '../src/transport/memory.js';
import { InMemoryDataPlane } from '../src/signaling/memory-data-plane.js';
import { RulePolicyEngine } from '../src/negotiation/policy.js';
import type { OfferHook } from '../src/negotiation/engine.js';
import { createParticipant, type Participant } from '../src/participant.js';

export const FAST_RETRY = { maxRetries: 2, baseDelayMs: 5, maxDelayMs: 20, attemptTimeoutMs: 1_000 };

export const QUIET: ConfigOverrides = { logLevel: 'SILENT', retry: FAST_RETRY };

export const ASSET = 'asset-1';
export const POLICY: UsagePolicy = { purpose: 'research' };

export interface Dataspace {
  network: InMemoryNetwork;
  metrics: MetricsCollector;
  provider: Participant;
  consumer: Participant;
  providerPlane: InMemoryDataPlane;
}

export interface DataspaceOptions {
  providerConfig?: ConfigOverrides;
  consumerConfig?: ConfigOverrides;
  onOffer?: OfferHook;
  /** Claims the consumer obtains from the provider before anything else */
  consumerClaims?: Record<string, string>;
  /** Called once per participant; memory storage when omitted */
  storage?: () => StorageAdapter;
}

/**
 * A provider that grants `asset-1` to gold members and a consumer holding a
 * gold membership credential issued by the provider.
 */
export async function createDataspace(options: DataspaceOptions = {}): Promise<Dataspace> {
  const network = new InMemoryNetwork();
  const metrics = new MetricsCollector();
  const providerPlane = new InMemoryDataPlane();

  const provider = createParticipant({
    name: 'provider',
    network,
    ...(options.storage ? { storage: options.storage() } : {}),
    metrics,
    dataPlane: providerPlane,
    policyEngine: new RulePolicyEngine({ [ASSET]: { membership: 'gold' } }),
    config: { ...QUIET, ...options.providerConfig },
  });
  const consumer = createParticipant({
    name: 'consumer',
    network,
    ...(options.storage ? { storage: options.storage() } : {}),
    metrics,
    onOffer: options.onOffer ?? (() => ({ action: 'accept' })),
    config: { ...QUIET, ...options.consumerConfig },
  });

  await consumer.requestCredential(provider.id, options.consumerClaims ?? { membership: 'gold' });
  return { network, metrics, provider, consumer, providerPlane };
}

/** Wait until no participant has a follow-up step pending. */
export async function settle(...participants: Participant[]): Promise<void> {
  for (let round = 0; round < 100; round++) {
    await Promise.all(participants.map(p => p.idle()));
    await new Promise<void>(resolve => setImmediate(resolve));
    if (participants.every(p => p.pendingTasks === 0)) return;
  }
  throw new Error('Participants did not settle');
}

/** Run a negotiation for `asset-1` to the end and return the agreement id. */
export async function negotiate(space: Dataspace): Promise<string> {
  const { consumer, provider } = space;
  const started = await consumer.negotiations.requestContract(provider.id, ASSET, POLICY);
  await settle(consumer, provider);

  const finished = await consumer.negotiations.get(started.id);
  if (finished?.state !== 'FINALIZED' || !finished.agreement) {
    throw new Error(`Negotiation ended in ${finished?.state ?? 'nothing'}`);
  }
  return finished.agreement.id;
}

/** Negotiate, then open a provider-initiated transfer. */
export async function startTransfer(space: Dataspace, type: TransferType = 'PULL') {
  const agreementId = await negotiate(space);
  const result = await space.provider.transfers.requestTransfer(agreementId, type, type === 'PUSH'
    ? { dataAddress: { type: 'HttpData', endpoint: 'https://consumer.test/inbox' } }
    : {});
  await settle(space.consumer, space.provider);
  return { agreementId, ...result };
}
