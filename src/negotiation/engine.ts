/**
 * Negotiation Engine — one participant's side of contract negotiation.
 *
 * Consumer and provider each hold their own NegotiationProcess and move it
 * only through messages. Inbound handlers persist the inbound transition and
 * return; the reply step (offer, agreement, countersignature, finalization)
 * runs afterwards as a tracked task.
 */

import type {
  ClaimSet,
  ContractAgreement,
  Keypair,
  NegotiationProcess,
  NegotiationState,
  Offer,
  PolicyEngine,
  Role,
  TerminationCode,
  TerminationReason,
  UsagePolicy,
} from '../core/types.js';
import type {
  ContractAgreementMessage,
  ContractAgreementVerificationMessage,
  ContractNegotiationEventMessage,
  ContractNegotiationTerminationMessage,
  ContractOfferMessage,
  ContractRequestMessage,
  InboundContext,
  MessageBody,
  NegotiationMessage,
} from '../transport/types.js';
import { DataspaceError, isDataspaceError, type ErrorKind } from '../core/errors.js';
import { canonicalize, generateId } from '../core/crypto.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import type { TaskTracker } from '../core/tasks.js';
import type { MessageDispatcher } from '../transport/dispatcher.js';
import type { ProcessStore } from '../storage/process-store.js';
import { remoteReason } from '../signaling/triggers.js';
import { negotiationMachine } from './machine.js';
import {
  checkOfferedAgreement,
  countersignAgreement,
  createAgreement,
  isAgreementComplete,
  sameTerms,
} from './agreement.js';

export type OfferDecision =
  | { action: 'accept' }
  | { action: 'decline'; counterPolicy?: UsagePolicy };

/** Decides on an incoming offer; undefined leaves the decision to the caller */
export type OfferHook = (
  process: NegotiationProcess,
  offer: Offer,
) => OfferDecision | undefined | Promise<OfferDecision | undefined>;

export interface NegotiationSettings {
  maxOffers: number;
  negotiationTimeoutMs: number;
  /** 0 means agreements do not expire */
  agreementTtlMs: number;
}

export interface NegotiationEngineOptions {
  keypair: Keypair;
  store: ProcessStore;
  dispatcher: MessageDispatcher;
  policyEngine: PolicyEngine;
  tasks: TaskTracker;
  settings?: Partial<NegotiationSettings>;
  onOffer?: OfferHook;
  metrics?: MetricsCollector;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_SETTINGS: NegotiationSettings = {
  maxOffers: 5,
  negotiationTimeoutMs: 24 * 60 * 60 * 1000,
  agreementTtlMs: 0,
};

/** Remembered message ids per process */
const MESSAGE_MEMORY = 64;

/** Delivery failures that end the negotiation instead of leaving it unchanged */
const TERMINAL_DELIVERY: Partial<Record<ErrorKind, TerminationCode>> = {
  CounterpartyUnreachable: 'CounterpartyUnreachable',
  VerificationFailed: 'VerificationFailed',
  PolicyDenied: 'PolicyDenied',
};

const AT_OR_AFTER_ACCEPTED: readonly NegotiationState[] = ['ACCEPTED', 'AGREED', 'VERIFIED', 'FINALIZED'];

interface Outcome {
  next?: NegotiationProcess;
  followUp?: { label: string; run: (processId: string) => Promise<unknown> };
}

export class NegotiationEngine {
  private readonly keypair: Keypair;
  private readonly store: ProcessStore;
  private readonly dispatcher: MessageDispatcher;
  private readonly policyEngine: PolicyEngine;
  private readonly tasks: TaskTracker;
  private readonly settings: NegotiationSettings;
  private readonly onOffer?: OfferHook;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: NegotiationEngineOptions) {
    this.keypair = options.keypair;
    this.store = options.store;
    this.dispatcher = options.dispatcher;
    this.policyEngine = options.policyEngine;
    this.tasks = options.tasks;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.onOffer = options.onOffer;
    this.metrics = options.metrics ?? globalMetrics;
    this.logger = options.logger ?? createLogger('NegotiationEngine');
    this.now = options.now ?? (() => new Date());
  }

  private get selfId(): string {
    return this.keypair.principal.id;
  }

  private get repo() {
    return this.store.negotiations;
  }

  // ── Queries ──

  async get(processId: string): Promise<NegotiationProcess | null> {
    return this.repo.load(processId);
  }

  async listByState(state: NegotiationState): Promise<NegotiationProcess[]> {
    return this.repo.listByState(state);
  }

  async findByAgreement(agreementId: string): Promise<NegotiationProcess | null> {
    const found = await this.store.storage.listNegotiations({ agreementId });
    return found[0] ?? null;
  }

  // ── Consumer operations ──

  /** Open a negotiation with `providerId`. Resolves once the provider has acknowledged. */
  async requestContract(providerId: string, assetId: string, policy: UsagePolicy): Promise<NegotiationProcess> {
    const at = this.now();
    const process: NegotiationProcess = {
      id: generateId('neg'),
      state: 'REQUESTED',
      version: 0,
      createdAt: at.toISOString(),
      updatedAt: at.toISOString(),
      history: [{ from: null, to: 'REQUESTED', at: at.toISOString() }],
      role: 'CONSUMER',
      counterpartyId: providerId,
      assetId,
      offers: [this.offer('CONSUMER', assetId, policy)],
      offerCount: 0,
      processedMessageIds: [],
    };

    return this.repo.withLease(process.id, async () => {
      const saved = await this.persist(process, null);
      await this.deliver(saved, { type: 'ContractRequest', consumerPid: saved.id, assetId, policy });
      return saved;
    });
  }

  async accept(processId: string): Promise<NegotiationProcess> {
    return this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      this.assertRole(process, 'CONSUMER');
      negotiationMachine.assertTransition(process.state, 'ACCEPTED', processId);

      await this.deliver(process, {
        type: 'ContractNegotiationEvent',
        consumerPid: process.id,
        providerPid: this.peer(process),
        event: 'ACCEPTED',
      });
      return this.persist(this.move(process, 'ACCEPTED'), process.state);
    });
  }

  /**
   * Decline the current offer. With `counterPolicy` the negotiation continues
   * with a counter-request; without, it ends as Declined.
   */
  async decline(processId: string, counterPolicy?: UsagePolicy): Promise<NegotiationProcess> {
    if (!counterPolicy) return this.terminate(processId, { code: 'Declined' });

    return this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      this.assertRole(process, 'CONSUMER');
      negotiationMachine.assertTransition(process.state, 'DECLINED', processId);

      await this.deliver(process, {
        type: 'ContractRequest',
        consumerPid: process.id,
        providerPid: this.peer(process),
        assetId: process.assetId,
        policy: counterPolicy,
      });
      const declined = this.move(process, 'DECLINED');
      return this.persist(
        { ...declined, offers: [...declined.offers, this.offer('CONSUMER', process.assetId, counterPolicy)] },
        process.state,
      );
    });
  }

  // ── Either side ──

  /**
   * Terminate from any state before FINALIZED. Pending deliveries for the
   * process are abandoned first. Terminating twice succeeds.
   */
  async terminate(processId: string, reason: TerminationReason = { code: 'Manual' }): Promise<NegotiationProcess> {
    this.dispatcher.cancel(processId);
    return this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state === 'TERMINATED') return process;
      return this.terminateHeld(process, reason);
    });
  }

  /** Terminate every non-terminal negotiation idle for longer than the timeout. */
  async expireStale(now: Date = this.now()): Promise<NegotiationProcess[]> {
    const cutoff = now.getTime() - this.settings.negotiationTimeoutMs;
    const all = await this.store.storage.listNegotiations();
    const stale = all.filter(p => !negotiationMachine.isTerminal(p.state) && new Date(p.updatedAt).getTime() < cutoff);

    const expired: NegotiationProcess[] = [];
    for (const process of stale) {
      expired.push(await this.terminate(process.id, { code: 'Timeout' }));
    }
    if (expired.length > 0) this.logger.info('Expired stale negotiations', { count: expired.length });
    return expired;
  }

  // ── Inbound ──

  async handleMessage(message: NegotiationMessage, ctx: InboundContext): Promise<void> {
    switch (message.type) {
      case 'ContractRequest':
        return message.providerPid
          ? this.inbound(message, ctx, p => this.onCounterRequest(p, message, ctx))
          : this.onInitialRequest(message, ctx);
      case 'ContractOffer':
        return this.inbound(message, ctx, p => this.onOfferReceived(p, message));
      case 'ContractNegotiationEvent':
        return this.inbound(message, ctx, p => this.onEvent(p, message));
      case 'ContractAgreement':
        return this.inbound(message, ctx, p => this.onAgreement(p, message));
      case 'ContractAgreementVerification':
        return this.inbound(message, ctx, p => this.onVerification(p, message));
      case 'ContractNegotiationTermination':
        return this.inbound(message, ctx, p => this.onTermination(p, message));
    }
  }

  /**
   * A message naming one of our negotiations arrived without a valid
   * presentation: end that negotiation.
   */
  async onVerificationFailure(message: NegotiationMessage, senderId: string, detail: string): Promise<void> {
    const process = await this.locate(message, senderId);
    if (!process || negotiationMachine.isTerminal(process.state)) return;
    this.tasks.run('terminate-unverified', async () => {
      await this.terminate(process.id, { code: 'VerificationFailed', detail });
    });
  }

  private async onInitialRequest(message: ContractRequestMessage, ctx: InboundContext): Promise<void> {
    await this.repo.withLease(`request:${ctx.senderId}:${message.consumerPid}`, async () => {
      const known = await this.store.storage.listNegotiations({
        counterpartyId: ctx.senderId,
        counterpartyPid: message.consumerPid,
      });
      if (known.length > 0) return;

      const at = this.now();
      const process: NegotiationProcess = {
        id: generateId('neg'),
        state: 'REQUESTED',
        version: 0,
        createdAt: at.toISOString(),
        updatedAt: at.toISOString(),
        history: [{ from: null, to: 'REQUESTED', at: at.toISOString() }],
        role: 'PROVIDER',
        counterpartyId: ctx.senderId,
        counterpartyPid: message.consumerPid,
        assetId: message.assetId,
        offers: [this.offer('CONSUMER', message.assetId, message.policy)],
        offerCount: 0,
        processedMessageIds: [ctx.messageId],
      };
      const saved = await this.persist(process, null);
      this.schedule('offer', saved.id, id => this.makeOffer(id, ctx.claims));
    });
  }

  private async onCounterRequest(
    process: NegotiationProcess,
    message: ContractRequestMessage,
    ctx: InboundContext,
  ): Promise<Outcome> {
    this.assertRole(process, 'PROVIDER');
    if (process.state === 'DECLINED' || process.state === 'REQUESTED') return {};
    negotiationMachine.assertTransition(process.state, 'DECLINED', process.id);

    const declined = this.move(process, 'DECLINED', 'counter-request');
    return {
      next: { ...declined, offers: [...declined.offers, this.offer('CONSUMER', process.assetId, message.policy)] },
      followUp: { label: 'offer', run: id => this.makeOffer(id, ctx.claims) },
    };
  }

  private async onOfferReceived(process: NegotiationProcess, message: ContractOfferMessage): Promise<Outcome> {
    this.assertRole(process, 'CONSUMER');
    if (process.offers.some(o => o.id === message.offer.id)) return {};
    negotiationMachine.assertTransition(process.state, 'OFFERED', process.id);
    if (message.offer.proposedBy !== 'PROVIDER' || message.offer.assetId !== process.assetId) {
      throw new DataspaceError('MalformedMessage', 'Offer does not match the negotiated asset', {
        processId: process.id, state: process.state,
      });
    }

    if (process.offerCount + 1 > this.settings.maxOffers) {
      return { next: this.terminated(process, { code: 'OfferLimitExceeded' }), followUp: this.noticeFollowUp() };
    }

    const offered = this.move(process, 'OFFERED');
    return {
      next: {
        ...offered,
        counterpartyPid: message.providerPid,
        offers: [...offered.offers, message.offer],
        offerCount: process.offerCount + 1,
      },
      followUp: { label: 'decide-offer', run: id => this.decide(id) },
    };
  }

  private async onEvent(process: NegotiationProcess, message: ContractNegotiationEventMessage): Promise<Outcome> {
    if (message.event === 'ACCEPTED') {
      this.assertRole(process, 'PROVIDER');
      if (AT_OR_AFTER_ACCEPTED.includes(process.state)) return {};
      negotiationMachine.assertTransition(process.state, 'ACCEPTED', process.id);
      return {
        next: this.move(process, 'ACCEPTED'),
        followUp: { label: 'send-agreement', run: id => this.sendAgreement(id) },
      };
    }

    this.assertRole(process, 'CONSUMER');
    if (process.state === 'FINALIZED') return {};
    if (!process.agreement || !isAgreementComplete(process.agreement)) {
      throw new DataspaceError('InvalidStateTransition', 'Cannot finalize without a countersigned agreement', {
        processId: process.id, state: process.state,
      });
    }
    const verified = process.state === 'AGREED' ? this.move(process, 'VERIFIED') : process;
    return { next: this.move(verified, 'FINALIZED') };
  }

  private async onAgreement(process: NegotiationProcess, message: ContractAgreementMessage): Promise<Outcome> {
    this.assertRole(process, 'CONSUMER');
    if (process.agreement) return {};
    if (process.state !== 'ACCEPTED') {
      throw new DataspaceError('InvalidStateTransition', `Agreement received in state ${process.state}`, {
        processId: process.id, state: process.state,
      });
    }

    const checked = checkOfferedAgreement(message.agreement, {
      providerId: process.counterpartyId,
      consumerId: this.selfId,
      providerPid: message.providerPid,
      assetId: process.assetId,
    });
    const lastOffer = process.offers[process.offers.length - 1];
    const error = !checked.ok
      ? checked.error
      : lastOffer && canonicalize(lastOffer.policy) !== canonicalize(message.agreement.policy)
        ? 'Agreement policy differs from the accepted offer'
        : undefined;
    if (error) {
      this.rejectAndTerminate(process.id, error);
      throw new DataspaceError('VerificationFailed', error, { processId: process.id, state: process.state });
    }

    return {
      next: { ...process, agreement: message.agreement },
      followUp: { label: 'countersign', run: id => this.countersign(id) },
    };
  }

  private async onVerification(
    process: NegotiationProcess,
    message: ContractAgreementVerificationMessage,
  ): Promise<Outcome> {
    this.assertRole(process, 'PROVIDER');
    if (process.state === 'VERIFIED' || process.state === 'FINALIZED') return {};
    if (process.state !== 'ACCEPTED' || !process.agreement) {
      throw new DataspaceError('InvalidStateTransition', `Verification received in state ${process.state}`, {
        processId: process.id, state: process.state,
      });
    }
    if (!sameTerms(process.agreement, message.agreement) || !isAgreementComplete(message.agreement)) {
      const detail = 'Countersigned agreement does not verify';
      this.rejectAndTerminate(process.id, detail);
      throw new DataspaceError('VerificationFailed', detail, { processId: process.id, state: process.state });
    }

    const agreed = this.move({ ...process, agreement: message.agreement }, 'AGREED');
    return {
      next: this.move(agreed, 'VERIFIED'),
      followUp: { label: 'finalize', run: id => this.finalize(id) },
    };
  }

  private async onTermination(
    process: NegotiationProcess,
    message: ContractNegotiationTerminationMessage,
  ): Promise<Outcome> {
    if (process.state === 'TERMINATED') return {};
    negotiationMachine.assertTransition(process.state, 'TERMINATED', process.id);
    return { next: this.terminated(process, remoteReason(message.reason)) };
  }

  // ── Follow-up steps ──

  private async decide(processId: string): Promise<void> {
    if (!this.onOffer) return;
    const process = await this.repo.require(processId);
    const offer = process.offers[process.offers.length - 1];
    if (process.state !== 'OFFERED' || !offer) return;

    const decision = await this.onOffer(process, offer);
    if (!decision) return;
    if (decision.action === 'accept') {
      await this.accept(processId);
    } else {
      await this.decline(processId, decision.counterPolicy);
    }
  }

  private async makeOffer(processId: string, claims: ClaimSet): Promise<void> {
    await this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state !== 'REQUESTED' && process.state !== 'DECLINED') return;

      const decision = await this.policyEngine.evaluate(claims, process.assetId);
      if (decision === 'deny') {
        await this.terminateHeld(process, { code: 'PolicyDenied', detail: `Access to ${process.assetId} denied` });
        return;
      }
      if (process.offerCount + 1 > this.settings.maxOffers) {
        await this.terminateHeld(process, {
          code: 'OfferLimitExceeded',
          detail: `More than ${this.settings.maxOffers} offers`,
        });
        return;
      }

      const requested = process.offers[process.offers.length - 1];
      const offer = this.offer('PROVIDER', process.assetId, requested?.policy ?? {});
      await this.deliver(process, {
        type: 'ContractOffer',
        consumerPid: this.peer(process),
        providerPid: process.id,
        offer,
      });
      const offered = this.move(process, 'OFFERED');
      await this.persist(
        { ...offered, offers: [...offered.offers, offer], offerCount: process.offerCount + 1 },
        process.state,
      );
    });
  }

  private async sendAgreement(processId: string): Promise<void> {
    await this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state !== 'ACCEPTED' || process.agreement) return;

      const accepted = process.offers[process.offers.length - 1];
      const agreement = createAgreement(this.keypair, {
        negotiationId: process.id,
        providerId: this.selfId,
        consumerId: process.counterpartyId,
        assetId: process.assetId,
        policy: accepted?.policy ?? {},
        ttlMs: this.settings.agreementTtlMs,
      }, this.now());

      await this.deliver(process, {
        type: 'ContractAgreement',
        consumerPid: this.peer(process),
        providerPid: process.id,
        agreement,
      });
      await this.persist({ ...process, agreement, updatedAt: this.now().toISOString() }, process.state);
    });
  }

  private async countersign(processId: string): Promise<void> {
    await this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state !== 'ACCEPTED' || !process.agreement || process.agreement.signatures.consumer) return;

      const agreement: ContractAgreement = countersignAgreement(this.keypair, process.agreement);
      const agreed = this.move({ ...process, agreement }, 'AGREED');
      await this.deliver(process, {
        type: 'ContractAgreementVerification',
        consumerPid: process.id,
        providerPid: this.peer(process),
        agreement,
      });
      await this.persist(this.move(agreed, 'VERIFIED'), process.state);
    });
  }

  private async finalize(processId: string): Promise<void> {
    await this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state !== 'VERIFIED') return;

      await this.deliver(process, {
        type: 'ContractNegotiationEvent',
        consumerPid: this.peer(process),
        providerPid: process.id,
        event: 'FINALIZED',
      });
      await this.persist(this.move(process, 'FINALIZED'), process.state);
    });
  }

  // ── Internals ──

  /**
   * Apply an inbound message to the negotiation it names, under its lease.
   * A message id seen before is acknowledged without effect.
   */
  private async inbound(
    message: NegotiationMessage,
    ctx: InboundContext,
    apply: (process: NegotiationProcess) => Promise<Outcome>,
  ): Promise<void> {
    const located = await this.locate(message, ctx.senderId);
    if (!located) {
      throw new DataspaceError('ProcessNotFound', `No negotiation matches ${message.type} from ${ctx.senderId}`);
    }

    const followUp = await this.repo.withLease(located.id, async () => {
      const process = await this.repo.require(located.id);
      if (process.processedMessageIds.includes(ctx.messageId)) {
        this.metrics.counter('negotiation.duplicates', { type: message.type });
        return undefined;
      }
      const outcome = await apply(process);
      if (outcome.next) {
        const ids = [...process.processedMessageIds, ctx.messageId].slice(-MESSAGE_MEMORY);
        await this.persist({ ...outcome.next, processedMessageIds: ids }, process.state);
      } else {
        this.metrics.counter('negotiation.duplicates', { type: message.type });
      }
      return outcome.followUp;
    });

    if (followUp) this.schedule(followUp.label, located.id, followUp.run);
  }

  private async locate(message: NegotiationMessage, senderId: string): Promise<NegotiationProcess | null> {
    const consumerPid = 'consumerPid' in message ? message.consumerPid : undefined;
    const providerPid = 'providerPid' in message ? message.providerPid : undefined;

    const candidates: [string | undefined, Role, string | undefined][] = [
      [consumerPid, 'CONSUMER', providerPid],
      [providerPid, 'PROVIDER', consumerPid],
    ];
    for (const [ownPid, role] of candidates) {
      if (!ownPid) continue;
      const found = await this.repo.load(ownPid);
      if (found && found.role === role && found.counterpartyId === senderId) return found;
    }
    for (const [, role, peerPid] of candidates) {
      if (!peerPid) continue;
      const [found] = await this.store.storage.listNegotiations({
        role,
        counterpartyId: senderId,
        counterpartyPid: peerPid,
      });
      if (found) return found;
    }
    return null;
  }

  private async terminateHeld(process: NegotiationProcess, reason: TerminationReason): Promise<NegotiationProcess> {
    negotiationMachine.assertTransition(process.state, 'TERMINATED', process.id);
    const saved = await this.persist(this.terminated(process, reason), process.state);
    this.sendTerminationNotice(saved);
    return saved;
  }

  private noticeFollowUp(): Outcome['followUp'] {
    return {
      label: 'termination-notice',
      run: async id => {
        const process = await this.repo.require(id);
        this.sendTerminationNotice(process);
      },
    };
  }

  private sendTerminationNotice(process: NegotiationProcess): void {
    const body: ContractNegotiationTerminationMessage = {
      type: 'ContractNegotiationTermination',
      ...(process.role === 'CONSUMER'
        ? { consumerPid: process.id, providerPid: process.counterpartyPid }
        : { consumerPid: process.counterpartyPid, providerPid: process.id }),
      reason: process.reason ?? { code: 'Manual' },
    };
    this.tasks.run('termination-notice', async () => {
      try {
        await this.dispatcher.send(process.counterpartyId, body);
      } catch (err) {
        this.logger.warn('Termination notice not delivered', {
          processId: process.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    });
  }

  private rejectAndTerminate(processId: string, detail: string): void {
    this.tasks.run('terminate-unverified', async () => {
      await this.terminate(processId, { code: 'VerificationFailed', detail });
    });
  }

  /**
   * Send `body` for `process`. A definitive failure terminates the process
   * before the error is rethrown; when the counterparty answered with a
   * rejection it is told about the termination. A cancelled delivery is
   * rethrown as is.
   */
  private async deliver(process: NegotiationProcess, body: MessageBody): Promise<void> {
    try {
      await this.dispatcher.send(process.counterpartyId, body, { processId: process.id });
    } catch (err) {
      if (isDataspaceError(err, 'Aborted')) throw err;
      const code = (isDataspaceError(err) ? TERMINAL_DELIVERY[err.kind] : undefined) ?? 'SystemError';
      const saved = await this.persist(
        this.terminated(process, { code, detail: err instanceof Error ? err.message : String(err) }),
        process.state,
      );
      if (!isDataspaceError(err, 'CounterpartyUnreachable')) this.sendTerminationNotice(saved);
      throw err;
    }
  }

  private schedule(label: string, processId: string, run: (processId: string) => Promise<unknown>): void {
    this.tasks.run(`${label}:${processId}`, async () => {
      await run(processId);
    });
  }

  private move(process: NegotiationProcess, to: NegotiationState, reason?: string): NegotiationProcess {
    return negotiationMachine.transition(process, to, reason, this.now());
  }

  private terminated(process: NegotiationProcess, reason: TerminationReason): NegotiationProcess {
    return { ...this.move(process, 'TERMINATED', reason.code), reason };
  }

  private offer(proposedBy: Role, assetId: string, policy: UsagePolicy): Offer {
    return { id: generateId('off'), assetId, policy, proposedBy, proposedAt: this.now().toISOString() };
  }

  private peer(process: NegotiationProcess): string {
    if (!process.counterpartyPid) {
      throw new DataspaceError('InvalidStateTransition', 'Counterparty process id is not known yet', {
        processId: process.id, state: process.state,
      });
    }
    return process.counterpartyPid;
  }

  private assertRole(process: NegotiationProcess, role: Role): void {
    if (process.role !== role) {
      throw new DataspaceError('InvalidStateTransition', `Only the ${role.toLowerCase()} may do this`, {
        processId: process.id, state: process.state,
      });
    }
  }

  private async persist(process: NegotiationProcess, from: NegotiationState | null): Promise<NegotiationProcess> {
    const saved = await this.repo.save(process);
    if (from !== saved.state) {
      this.metrics.counter('negotiation.transitions', { role: saved.role, to: saved.state });
      this.logger.info('Negotiation transition', {
        processId: saved.id,
        role: saved.role,
        from,
        to: saved.state,
        ...(saved.reason ? { reason: saved.reason.code } : {}),
      });
    }
    return saved;
  }
}
