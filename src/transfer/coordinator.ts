/**
 * Transfer Coordinator — transfer processes over finalized agreements.
 *
 * The provider's process supervises the local data flow and mirrors its
 * state; the consumer holds a mirror fed by the provider's messages.
 */

import type {
  ContractAgreement,
  DataAddress,
  EndpointDataReference,
  NegotiationProcess,
  Role,
  TerminationCode,
  TerminationReason,
  TransferProcess,
  TransferState,
  TransferType,
} from '../core/types.js';
import type {
  InboundContext,
  MessageBody,
  TransferMessage,
  TransferRequestMessage,
  TransferStartMessage,
  TransferSuspensionMessage,
  TransferTerminationMessage,
  TransferCompletionMessage,
} from '../transport/types.js';
import { DataspaceError, isDataspaceError, type ErrorKind } from '../core/errors.js';
import { generateId } from '../core/crypto.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import type { TaskTracker } from '../core/tasks.js';
import type { MessageDispatcher } from '../transport/dispatcher.js';
import type { ProcessStore } from '../storage/process-store.js';
import type { NegotiationEngine } from '../negotiation/engine.js';
import { isAgreementExpired } from '../negotiation/agreement.js';
import type { SignalingController } from '../signaling/controller.js';
import { remoteReason, resolveTrigger, type Trigger } from '../signaling/triggers.js';
import { transferMachine } from './machine.js';

export interface RequestTransferOptions {
  /** PULL: where the data is served from. PUSH: the consumer's destination. */
  dataAddress?: DataAddress;
  /** The consumer's mirror, when the consumer asked for the transfer */
  consumerPid?: string;
  /** Expected counterparty; must match the agreement */
  counterpartyId?: string;
}

export interface InitiateTransferOptions {
  /** Destination, required for PUSH */
  dataAddress?: DataAddress;
}

export interface TransferResult {
  process: TransferProcess;
  /** PULL only */
  edr?: EndpointDataReference;
}

export interface TransferCoordinatorOptions {
  store: ProcessStore;
  negotiations: NegotiationEngine;
  signaling: SignalingController;
  dispatcher: MessageDispatcher;
  tasks: TaskTracker;
  metrics?: MetricsCollector;
  logger?: Logger;
  now?: () => Date;
}

const MESSAGE_MEMORY = 64;

type FinalizedNegotiation = NegotiationProcess & { agreement: ContractAgreement };

const DELIVERY_FAILURE: Partial<Record<ErrorKind, TerminationCode>> = {
  CounterpartyUnreachable: 'CounterpartyUnreachable',
  VerificationFailed: 'VerificationFailed',
  PolicyDenied: 'PolicyDenied',
  ContractNotAgreed: 'PolicyViolation',
};

export class TransferCoordinator {
  private readonly store: ProcessStore;
  private readonly negotiations: NegotiationEngine;
  private readonly signaling: SignalingController;
  private readonly dispatcher: MessageDispatcher;
  private readonly tasks: TaskTracker;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private pendingRequests = new Set<string>();

  constructor(options: TransferCoordinatorOptions) {
    this.store = options.store;
    this.negotiations = options.negotiations;
    this.signaling = options.signaling;
    this.dispatcher = options.dispatcher;
    this.tasks = options.tasks;
    this.metrics = options.metrics ?? globalMetrics;
    this.logger = options.logger ?? createLogger('TransferCoordinator');
    this.now = options.now ?? (() => new Date());
  }

  private get repo() {
    return this.store.transfers;
  }

  async get(processId: string): Promise<TransferProcess | null> {
    return this.repo.load(processId);
  }

  async listByState(state: TransferState): Promise<TransferProcess[]> {
    return this.repo.listByState(state);
  }

  // ── Provider ──

  /**
   * Open a transfer on a finalized agreement and start its data flow.
   * Fails with ContractNotAgreed, creating nothing, unless the agreement's
   * negotiation is FINALIZED and the agreement has not expired.
   */
  async requestTransfer(
    agreementId: string,
    type: TransferType,
    options: RequestTransferOptions = {},
  ): Promise<TransferResult> {
    const negotiation = await this.finalizedAgreement(agreementId, 'PROVIDER');
    if (options.counterpartyId && options.counterpartyId !== negotiation.counterpartyId) {
      throw new DataspaceError('VerificationFailed', `Agreement ${agreementId} was not made with ${options.counterpartyId}`);
    }
    if (type === 'PUSH' && !options.dataAddress) {
      throw new DataspaceError('MalformedMessage', 'A PUSH transfer needs a destination address');
    }
    const address: DataAddress = options.dataAddress ?? {
      type: 'HttpData',
      properties: { assetId: negotiation.assetId },
    };

    const created = this.newProcess('PROVIDER', negotiation, type, {
      dataAddress: address,
      ...(options.consumerPid ? { counterpartyPid: options.consumerPid } : {}),
    });

    return this.repo.withLease(created.id, async () => {
      let process = await this.persist(created, null);

      let edr: EndpointDataReference | undefined;
      try {
        ({ edr } = await this.signaling.start({ processId: process.id, type, address, agreementId }));
      } catch (err) {
        await this.persist(
          this.terminated(process, { code: 'SystemError', detail: err instanceof Error ? err.message : String(err) }),
          process.state,
        );
        throw err;
      }
      process = await this.persist(this.move(process, 'PROVISIONED'), 'REQUESTED');

      await this.deliver(process, {
        type: 'TransferStart',
        ...(process.counterpartyPid ? { consumerPid: process.counterpartyPid } : {}),
        providerPid: process.id,
        agreementId,
        transferType: type,
        ...(edr ? { edr } : {}),
      });
      process = await this.persist(this.move(process, 'STARTED'), 'PROVISIONED');
      return { process, ...(edr ? { edr } : {}) };
    });
  }

  // ── Consumer ──

  /**
   * Ask the provider to open a transfer. The mirror returned is REQUESTED; it
   * moves to STARTED when the provider's TransferStart arrives.
   */
  async initiate(
    agreementId: string,
    type: TransferType,
    options: InitiateTransferOptions = {},
  ): Promise<TransferProcess> {
    const negotiation = await this.finalizedAgreement(agreementId, 'CONSUMER');
    if (type === 'PUSH' && !options.dataAddress) {
      throw new DataspaceError('MalformedMessage', 'A PUSH transfer needs a destination address');
    }
    const process = this.newProcess('CONSUMER', negotiation, type, {
      ...(options.dataAddress ? { dataAddress: options.dataAddress } : {}),
    });

    return this.repo.withLease(process.id, async () => {
      const saved = await this.persist(process, null);
      await this.deliver(saved, {
        type: 'TransferRequest',
        consumerPid: saved.id,
        agreementId,
        transferType: type,
        ...(options.dataAddress ? { dataAddress: options.dataAddress } : {}),
      });
      return saved;
    });
  }

  // ── Either side ──

  async suspend(processId: string, reason?: TerminationReason): Promise<TransferProcess> {
    return this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state === 'SUSPENDED') return process;
      transferMachine.assertTransition(process.state, 'SUSPENDED', processId);

      if (process.role === 'PROVIDER') await this.signaling.suspend(processId, reason);
      await this.deliver(process, {
        type: 'TransferSuspension',
        ...this.pids(process),
        ...(reason ? { reason } : {}),
      });
      return this.persist(this.suspended(process, reason), process.state);
    });
  }

  /**
   * Resume a suspended transfer. The provider restarts its data flow with a
   * new token and sends the new EDR; a consumer asks the provider to do so,
   * and its mirror moves to STARTED when the provider answers.
   */
  async resume(processId: string): Promise<TransferResult> {
    return this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (process.state === 'STARTED') {
        const edr = process.role === 'PROVIDER' ? (await this.signaling.resume(processId)).edr : process.edr;
        return { process, ...(edr ? { edr } : {}) };
      }
      transferMachine.assertTransition(process.state, 'STARTED', processId);

      const start: TransferStartMessage = {
        type: 'TransferStart',
        ...this.pids(process),
        providerPid: process.role === 'PROVIDER' ? process.id : this.peer(process),
        agreementId: process.agreementId,
        transferType: process.type,
      };
      if (process.role === 'CONSUMER') {
        await this.deliver(process, start);
        return { process };
      }

      const { edr } = await this.signaling.resume(processId);
      await this.deliver(process, { ...start, ...(edr ? { edr } : {}) });
      const started = await this.persist(this.started(process), process.state);
      return { process: started, ...(edr ? { edr } : {}) };
    });
  }

  /**
   * End the transfer. A `Completed` reason lands in COMPLETED, anything else
   * in TERMINATED. Pending deliveries for the process are abandoned first.
   */
  async terminate(processId: string, reason: TerminationReason = { code: 'Manual' }): Promise<TransferProcess> {
    return this.stop(processId, { source: 'ManualInvocation', processId, action: 'terminate', reason });
  }

  async complete(processId: string): Promise<TransferProcess> {
    return this.terminate(processId, { code: 'Completed' });
  }

  /** Route a trigger to suspend or terminate. */
  async applyTrigger(trigger: Trigger): Promise<TransferProcess> {
    const { action, reason } = resolveTrigger(trigger);
    return action === 'suspend' ? this.suspend(trigger.processId, reason) : this.stop(trigger.processId, trigger);
  }

  /**
   * Terminate every running transfer whose agreement has expired.
   * @returns the processes terminated by this sweep
   */
  async enforcePolicies(now: Date = this.now()): Promise<TransferProcess[]> {
    const running = [
      ...await this.repo.listByState('STARTED'),
      ...await this.repo.listByState('SUSPENDED'),
    ];
    const ended: TransferProcess[] = [];
    for (const process of running) {
      const negotiation = await this.negotiations.findByAgreement(process.agreementId);
      const agreement = negotiation?.agreement;
      if (agreement && !isAgreementExpired(agreement, now)) continue;
      ended.push(await this.stop(process.id, {
        source: 'PolicyMonitor',
        processId: process.id,
        action: 'terminate',
        reason: { code: 'AgreementExpired', detail: `Agreement ${process.agreementId} is no longer valid` },
      }));
    }
    if (ended.length > 0) this.logger.info('Policy sweep terminated transfers', { count: ended.length });
    return ended;
  }

  // ── Inbound ──

  async handleMessage(message: TransferMessage, ctx: InboundContext): Promise<void> {
    switch (message.type) {
      case 'TransferRequest':
        return this.onRequest(message, ctx);
      case 'TransferStart':
        return this.onStart(message, ctx);
      case 'TransferSuspension':
        return this.inbound(message, ctx, p => this.onSuspension(p, message), { interrupt: true });
      case 'TransferTermination':
      case 'TransferCompletion':
        return this.inbound(message, ctx, p => this.onStop(p, message), { interrupt: true });
    }
  }

  /** End the transfer named by a message whose presentation did not verify. */
  async onVerificationFailure(message: TransferMessage, senderId: string, detail: string): Promise<void> {
    const process = await this.locate(message, senderId);
    if (!process || transferMachine.isTerminal(process.state)) return;
    this.tasks.run(`terminate-unverified:${process.id}`, async () => {
      await this.terminate(process.id, { code: 'VerificationFailed', detail });
    });
  }

  private async onRequest(message: TransferRequestMessage, ctx: InboundContext): Promise<void> {
    const negotiation = await this.finalizedAgreement(message.agreementId, 'PROVIDER');
    if (negotiation.counterpartyId !== ctx.senderId) {
      throw new DataspaceError('VerificationFailed', `Agreement ${message.agreementId} was not made with the sender`);
    }
    const key = `${ctx.senderId}:${message.consumerPid}`;
    const existing = await this.findByPeer(message.consumerPid, 'PROVIDER', ctx.senderId);
    if (existing || this.pendingRequests.has(key)) {
      this.metrics.counter('transfer.duplicates', { type: message.type });
      return;
    }

    this.pendingRequests.add(key);
    this.tasks.run(`start-transfer:${message.consumerPid}`, async () => {
      try {
        await this.requestTransfer(message.agreementId, message.transferType, {
          consumerPid: message.consumerPid,
          counterpartyId: ctx.senderId,
          ...(message.dataAddress ? { dataAddress: message.dataAddress } : {}),
        });
      } finally {
        this.pendingRequests.delete(key);
      }
    });
  }

  private async onStart(message: TransferStartMessage, ctx: InboundContext): Promise<void> {
    const own = await this.repo.load(message.providerPid);
    if (own && own.role === 'PROVIDER' && own.counterpartyId === ctx.senderId) {
      return this.inbound(message, ctx, p => this.onResumeRequest(p));
    }

    const mirror = await this.locate(message, ctx.senderId);
    if (mirror) return this.inbound(message, ctx, p => this.onProviderStart(p, message));
    if (message.consumerPid) {
      throw new DataspaceError('ProcessNotFound', `No transfer ${message.consumerPid}`, { processId: message.consumerPid });
    }

    // Provider-initiated: open a mirror for it
    const negotiation = await this.finalizedAgreement(message.agreementId, 'CONSUMER');
    if (negotiation.counterpartyId !== ctx.senderId) {
      throw new DataspaceError('VerificationFailed', `Agreement ${message.agreementId} was not made with the sender`);
    }
    const created = this.newProcess('CONSUMER', negotiation, message.transferType, {
      counterpartyPid: message.providerPid,
    });
    await this.repo.withLease(created.id, async () => {
      const outcome = this.onProviderStart(created, message);
      await this.persist(this.remember(outcome, ctx.messageId, created), null);
    });
  }

  private onResumeRequest(process: TransferProcess): TransferProcess | null {
    if (process.state === 'STARTED') return null;
    transferMachine.assertTransition(process.state, 'STARTED', process.id);
    this.tasks.run(`resume:${process.id}`, async () => {
      await this.resume(process.id);
    });
    return null;
  }

  private onProviderStart(process: TransferProcess, message: TransferStartMessage): TransferProcess {
    const base: TransferProcess = {
      ...process,
      counterpartyPid: message.providerPid,
      ...(message.edr ? { edr: message.edr } : {}),
    };
    switch (process.state) {
      case 'REQUESTED':
        return this.move(this.move(base, 'PROVISIONED'), 'STARTED');
      case 'SUSPENDED':
        return this.started(base);
      case 'STARTED':
        return { ...base, updatedAt: this.now().toISOString() };
      default:
        throw new DataspaceError('InvalidStateTransition', `Transfer ${process.id} is ${process.state}`, {
          processId: process.id, state: process.state,
        });
    }
  }

  private async onSuspension(process: TransferProcess, message: TransferSuspensionMessage): Promise<TransferProcess | null> {
    if (process.state === 'SUSPENDED') return null;
    transferMachine.assertTransition(process.state, 'SUSPENDED', process.id);
    if (process.role === 'PROVIDER') {
      await this.signaling.applyTrigger({
        source: 'RemoteMessage',
        processId: process.id,
        message: 'TransferSuspension',
        ...(message.reason ? { reason: message.reason } : {}),
      });
    }
    return this.suspended(process, message.reason);
  }

  private async onStop(
    process: TransferProcess,
    message: TransferTerminationMessage | TransferCompletionMessage,
  ): Promise<TransferProcess | null> {
    if (transferMachine.isTerminal(process.state)) return null;
    const trigger: Trigger = message.type === 'TransferCompletion'
      ? { source: 'RemoteMessage', processId: process.id, message: 'TransferCompletion' }
      : { source: 'RemoteMessage', processId: process.id, message: 'TransferTermination', reason: remoteReason(message.reason) };
    const { reason } = resolveTrigger(trigger);
    const finished = this.finished(process, reason ?? { code: 'CounterpartyTerminated' });

    if (process.role === 'PROVIDER' && await this.signaling.get(process.id)) {
      await this.signaling.applyTrigger(trigger);
    }
    return finished;
  }

  // ── Internals ──

  /**
   * Stop a transfer through `trigger`: cancel its deliveries, end the data
   * flow on the provider side, persist, then notify the counterparty.
   */
  private async stop(processId: string, trigger: Trigger): Promise<TransferProcess> {
    this.dispatcher.cancel(processId);
    const { reason = { code: 'Manual' } } = resolveTrigger(trigger);

    return this.repo.withLease(processId, async () => {
      const process = await this.repo.require(processId);
      if (transferMachine.isTerminal(process.state)) return process;
      const finished = this.finished(process, reason);

      if (process.role === 'PROVIDER' && await this.signaling.get(processId)) {
        await this.signaling.applyTrigger(trigger);
      }
      const saved = await this.persist(finished, process.state);
      this.notifyStop(saved);
      return saved;
    });
  }

  private notifyStop(process: TransferProcess): void {
    const body: MessageBody = process.state === 'COMPLETED'
      ? { type: 'TransferCompletion', ...this.pids(process) }
      : { type: 'TransferTermination', ...this.pids(process), reason: process.reason ?? { code: 'Manual' } };
    this.tasks.run(`stop-notice:${process.id}`, async () => {
      try {
        await this.dispatcher.send(process.counterpartyId, body);
      } catch (err) {
        this.logger.warn('Stop notice not delivered', {
          processId: process.id,
          type: body.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    });
  }

  /**
   * Apply an inbound message to the transfer it names, under its lease.
   * `apply` returns the record to persist, or null for no change. With
   * `interrupt`, deliveries still pending for the transfer are abandoned
   * before waiting for the lease.
   */
  private async inbound(
    message: TransferMessage,
    ctx: InboundContext,
    apply: (process: TransferProcess) => TransferProcess | null | Promise<TransferProcess | null>,
    { interrupt = false }: { interrupt?: boolean } = {},
  ): Promise<void> {
    const located = await this.locate(message, ctx.senderId);
    if (!located) {
      throw new DataspaceError('ProcessNotFound', `No transfer matches ${message.type} from ${ctx.senderId}`);
    }
    if (interrupt && !transferMachine.isTerminal(located.state)) {
      this.dispatcher.cancel(located.id, `${message.type} received`);
    }
    await this.repo.withLease(located.id, async () => {
      const process = await this.repo.require(located.id);
      if (process.processedMessageIds.includes(ctx.messageId)) {
        this.metrics.counter('transfer.duplicates', { type: message.type });
        return;
      }
      const next = await apply(process);
      if (!next) return;
      await this.persist(this.remember(next, ctx.messageId, process), process.state);
    });
  }

  private remember(next: TransferProcess, messageId: string, previous: TransferProcess): TransferProcess {
    return { ...next, processedMessageIds: [...previous.processedMessageIds, messageId].slice(-MESSAGE_MEMORY) };
  }

  private async locate(message: TransferMessage, senderId: string): Promise<TransferProcess | null> {
    const consumerPid = 'consumerPid' in message ? message.consumerPid : undefined;
    const providerPid = 'providerPid' in message ? message.providerPid : undefined;

    const own: [string | undefined, Role][] = [[providerPid, 'PROVIDER'], [consumerPid, 'CONSUMER']];
    for (const [pid, role] of own) {
      if (!pid) continue;
      const found = await this.repo.load(pid);
      if (found && found.role === role && found.counterpartyId === senderId) return found;
    }
    if (consumerPid) {
      const found = await this.findByPeer(consumerPid, 'PROVIDER', senderId);
      if (found) return found;
    }
    if (providerPid) return this.findByPeer(providerPid, 'CONSUMER', senderId);
    return null;
  }

  private async findByPeer(peerPid: string, role: Role, senderId: string): Promise<TransferProcess | null> {
    const found = await this.store.storage.listTransfers({ counterpartyPid: peerPid });
    return found.find(p => p.role === role && p.counterpartyId === senderId) ?? null;
  }

  private async finalizedAgreement(agreementId: string, role: Role): Promise<FinalizedNegotiation> {
    const negotiation = await this.negotiations.findByAgreement(agreementId);
    if (!negotiation || negotiation.state !== 'FINALIZED' || !negotiation.agreement) {
      throw new DataspaceError('ContractNotAgreed', `Agreement ${agreementId} is not finalized`, {
        ...(negotiation ? { processId: negotiation.id, state: negotiation.state } : {}),
      });
    }
    if (isAgreementExpired(negotiation.agreement, this.now())) {
      throw new DataspaceError('ContractNotAgreed', `Agreement ${agreementId} has expired`, {
        processId: negotiation.id, state: negotiation.state,
      });
    }
    if (negotiation.role !== role) {
      throw new DataspaceError(
        'InvalidStateTransition',
        `Agreement ${agreementId} was made in the ${negotiation.role.toLowerCase()} role`,
        { processId: negotiation.id, state: negotiation.state },
      );
    }
    return { ...negotiation, agreement: negotiation.agreement };
  }

  /**
   * Send `body` for `process`. A definitive failure terminates the process,
   * and its data flow on the provider side, before the error is rethrown;
   * a counterparty that rejected the message is told about the termination.
   * A cancelled delivery is rethrown as is.
   */
  private async deliver(process: TransferProcess, body: MessageBody): Promise<void> {
    try {
      await this.dispatcher.send(process.counterpartyId, body, { processId: process.id });
    } catch (err) {
      if (isDataspaceError(err, 'Aborted')) throw err;
      const code = (isDataspaceError(err) ? DELIVERY_FAILURE[err.kind] : undefined) ?? 'SystemError';
      const reason: TerminationReason = { code, detail: err instanceof Error ? err.message : String(err) };
      if (process.role === 'PROVIDER' && await this.signaling.get(process.id)) {
        await this.signaling.terminate(process.id, reason);
      }
      const saved = await this.persist(this.terminated(process, reason), process.state);
      if (!isDataspaceError(err, 'CounterpartyUnreachable')) this.notifyStop(saved);
      throw err;
    }
  }

  private newProcess(
    role: Role,
    negotiation: FinalizedNegotiation,
    type: TransferType,
    extra: Partial<Pick<TransferProcess, 'dataAddress' | 'counterpartyPid'>>,
  ): TransferProcess {
    const at = this.now().toISOString();
    return {
      id: generateId('tp'),
      state: 'REQUESTED',
      version: 0,
      createdAt: at,
      updatedAt: at,
      history: [{ from: null, to: 'REQUESTED', at }],
      role,
      agreementId: negotiation.agreement.id,
      negotiationId: negotiation.id,
      counterpartyId: negotiation.counterpartyId,
      type,
      processedMessageIds: [],
      ...extra,
    };
  }

  private pids(process: TransferProcess): { consumerPid?: string; providerPid?: string } {
    const peer = process.counterpartyPid;
    return process.role === 'PROVIDER'
      ? { providerPid: process.id, ...(peer ? { consumerPid: peer } : {}) }
      : { consumerPid: process.id, ...(peer ? { providerPid: peer } : {}) };
  }

  private peer(process: TransferProcess): string {
    if (!process.counterpartyPid) {
      throw new DataspaceError('InvalidStateTransition', 'Counterparty process id is not known yet', {
        processId: process.id, state: process.state,
      });
    }
    return process.counterpartyPid;
  }

  private move(process: TransferProcess, to: TransferState, reason?: string): TransferProcess {
    return transferMachine.transition(process, to, reason, this.now());
  }

  private started(process: TransferProcess): TransferProcess {
    const { reason: _, ...rest } = this.move(process, 'STARTED', 'resumed');
    return rest;
  }

  private suspended(process: TransferProcess, reason?: TerminationReason): TransferProcess {
    const { edr: _, ...rest } = this.move(process, 'SUSPENDED', reason?.code);
    return { ...rest, ...(reason ? { reason } : {}) };
  }

  private terminated(process: TransferProcess, reason: TerminationReason): TransferProcess {
    const { edr: _, ...rest } = this.move(process, 'TERMINATED', reason.code);
    return { ...rest, reason };
  }

  /** COMPLETED for a `Completed` reason, TERMINATED otherwise. */
  private finished(process: TransferProcess, reason: TerminationReason): TransferProcess {
    if (reason.code !== 'Completed') return this.terminated(process, reason);
    const { edr: _, ...rest } = this.move(process, 'COMPLETED', reason.code);
    return { ...rest, reason };
  }

  private async persist(process: TransferProcess, from: TransferState | null): Promise<TransferProcess> {
    const saved = await this.repo.save(process);
    if (from !== saved.state) {
      this.metrics.counter('transfer.transitions', { role: saved.role, to: saved.state });
      this.logger.info('Transfer transition', {
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
