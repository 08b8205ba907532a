/**
 * Participant — one organization's engines wired to one transport endpoint.
 *
 * Inbound messages are schema-checked, their sender's presentation is
 * verified, and they are routed to the engine that owns the message type.
 * Claims requests (DCP) are answered inline through the acknowledgement.
 */

import type {
  ClaimSet,
  Credential,
  CredentialPresentation,
  DataPlane,
  EntitlementCheck,
  Keypair,
  NegotiationProcess,
  PolicyEngine,
  StatusResolver,
  StorageAdapter,
  TransferProcess,
  VerifiedPresentation,
} from './core/types.js';
import type { Ack, InboundContext, MessageBody, ProtocolMessage, Transport } from './transport/types.js';
import { resolveConfig, type ConfigOverrides, type DataspaceConfig } from './config.js';
import { generateKeypair } from './core/crypto.js';
import { DataspaceError, isDataspaceError, toError, type ErrorKind } from './core/errors.js';
import { createLogger, parseLogLevel, type Logger } from './core/logger.js';
import { globalMetrics, type MetricsCollector } from './core/metrics.js';
import { CircuitBreakerPool } from './core/circuit-breaker.js';
import { TaskTracker } from './core/tasks.js';
import { ClaimsAuthority } from './claims/authority.js';
import { createPresentation, verifyCredentialSignature } from './claims/credential.js';
import { MemoryStorageAdapter } from './storage/memory.js';
import { ProcessStore } from './storage/process-store.js';
import { MessageDispatcher } from './transport/dispatcher.js';
import type { InMemoryNetwork } from './transport/memory.js';
import { describeErrors, validateMessage } from './transport/schemas.js';
import { NegotiationEngine, type OfferHook } from './negotiation/engine.js';
import { RulePolicyEngine } from './negotiation/policy.js';
import { SignalingController } from './signaling/controller.js';
import { InMemoryDataPlane } from './signaling/memory-data-plane.js';
import { TransferCoordinator } from './transfer/coordinator.js';

export interface ParticipantOptions {
  /** Identity; generated when omitted */
  keypair?: Keypair;
  /** Display name for a generated keypair and for log lines */
  name?: string;
  /** Endpoint to send and receive on */
  transport?: Transport;
  /** Used for an endpoint when `transport` is omitted */
  network?: InMemoryNetwork;
  storage?: StorageAdapter;
  dataPlane?: DataPlane;
  /** Defaults to a rule engine that denies everything */
  policyEngine?: PolicyEngine;
  config?: ConfigOverrides;
  onOffer?: OfferHook;
  entitlementCheck?: EntitlementCheck;
  metrics?: MetricsCollector;
  now?: () => Date;
}

export interface MaintenanceReport {
  expiredNegotiations: NegotiationProcess[];
  endedTransfers: TransferProcess[];
}

function rejected(kind: ErrorKind, message: string): Ack {
  return { status: 'rejected', error: { kind, message } };
}

export class Participant {
  readonly keypair: Keypair;
  readonly config: DataspaceConfig;
  readonly storage: StorageAdapter;
  readonly store: ProcessStore;
  readonly claims: ClaimsAuthority;
  readonly dispatcher: MessageDispatcher;
  readonly negotiations: NegotiationEngine;
  readonly signaling: SignalingController;
  readonly transfers: TransferCoordinator;
  readonly dataPlane: DataPlane;
  private readonly tasks: TaskTracker;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private credentials: Credential[] = [];

  constructor(options: ParticipantOptions) {
    this.keypair = options.keypair ?? generateKeypair(options.name);
    this.config = resolveConfig(options.config);
    this.storage = options.storage ?? new MemoryStorageAdapter();
    this.dataPlane = options.dataPlane ?? new InMemoryDataPlane();
    this.metrics = options.metrics ?? globalMetrics;
    this.now = options.now ?? (() => new Date());

    const level = parseLogLevel(this.config.logLevel);
    const bindings = { participant: options.name ?? this.id };
    const log = (module: string) => createLogger(module, level).child(bindings);
    this.logger = log('Participant');

    const transport = options.transport ?? options.network?.endpoint(this.id);
    if (!transport) {
      throw new Error('A participant needs a transport or a network to join');
    }

    this.store = new ProcessStore(this.storage, { leaseTimeoutMs: this.config.leaseTimeoutMs });
    this.tasks = new TaskTracker(log('TaskTracker'));
    this.claims = new ClaimsAuthority({
      keypair: this.keypair,
      storage: this.storage,
      tokenTtlMs: this.config.tokenTtlMs,
      credentialTtlMs: this.config.credentialTtlMs,
      leases: this.store.leases,
      metrics: this.metrics,
      logger: log('ClaimsAuthority'),
      now: this.now,
      ...(options.entitlementCheck ? { entitlementCheck: options.entitlementCheck } : {}),
    });
    this.dispatcher = new MessageDispatcher({
      selfId: this.id,
      transport,
      presenter: audience => this.present(audience),
      retry: this.config.retry,
      breakers: new CircuitBreakerPool(this.config.circuitBreaker),
      metrics: this.metrics,
      logger: log('MessageDispatcher'),
    });
    this.negotiations = new NegotiationEngine({
      keypair: this.keypair,
      store: this.store,
      dispatcher: this.dispatcher,
      policyEngine: options.policyEngine ?? new RulePolicyEngine(),
      tasks: this.tasks,
      settings: {
        maxOffers: this.config.maxOffers,
        negotiationTimeoutMs: this.config.negotiationTimeoutMs,
        agreementTtlMs: this.config.agreementTtlMs,
      },
      metrics: this.metrics,
      logger: log('NegotiationEngine'),
      now: this.now,
      ...(options.onOffer ? { onOffer: options.onOffer } : {}),
    });
    this.signaling = new SignalingController({
      store: this.store,
      claims: this.claims,
      dataPlane: this.dataPlane,
      metrics: this.metrics,
      logger: log('SignalingController'),
      now: this.now,
    });
    this.transfers = new TransferCoordinator({
      store: this.store,
      negotiations: this.negotiations,
      signaling: this.signaling,
      dispatcher: this.dispatcher,
      tasks: this.tasks,
      metrics: this.metrics,
      logger: log('TransferCoordinator'),
      now: this.now,
    });

    transport.onMessage(message => this.receive(message));
  }

  get id(): string {
    return this.keypair.principal.id;
  }

  /** Credentials held by this participant and presented on every message */
  get wallet(): readonly Credential[] {
    return this.credentials;
  }

  // ── Claims (DCP) ──

  /** Add a credential issued to this participant. */
  addCredential(credential: Credential): void {
    if (credential.subject !== this.id) {
      throw new DataspaceError('VerificationFailed', `Credential ${credential.id} was issued to someone else`);
    }
    if (!verifyCredentialSignature(credential)) {
      throw new DataspaceError('VerificationFailed', `Credential ${credential.id} has an invalid signature`);
    }
    this.credentials = [...this.credentials.filter(c => c.id !== credential.id), credential];
  }

  /** Ask `issuerId` for a credential carrying `claims` and keep it. */
  async requestCredential(issuerId: string, claims: ClaimSet): Promise<Credential> {
    const reply = await this.dispatcher.send(issuerId, { type: 'CredentialRequest', claims });
    if (reply?.type !== 'CredentialOffer') {
      throw new DataspaceError('MalformedMessage', `Expected a CredentialOffer from ${issuerId}`);
    }
    if (reply.credential.issuer !== issuerId) {
      throw new DataspaceError('VerificationFailed', `Credential ${reply.credential.id} names another issuer`);
    }
    this.addCredential(reply.credential);
    await this.storage.saveCredential(reply.credential);
    this.logger.info('Credential received', { credentialId: reply.credential.id, issuer: issuerId });
    return reply.credential;
  }

  /** Ask `counterpartyId` for a presentation and verify it. */
  async queryPresentation(counterpartyId: string): Promise<VerifiedPresentation> {
    const reply = await this.dispatcher.send(counterpartyId, { type: 'PresentationQuery' });
    if (reply?.type !== 'PresentationResponse') {
      throw new DataspaceError('MalformedMessage', `Expected a PresentationResponse from ${counterpartyId}`);
    }
    if (reply.presentation.holder !== counterpartyId) {
      throw new DataspaceError('VerificationFailed', 'Presentation holder is not the queried participant');
    }
    return this.claims.verifyPresentation(reply.presentation, { audience: this.id });
  }

  /**
   * Accept credentials issued by `issuerId`. Without a resolver, revocation
   * status is asked of the issuer with a RevocationCheck.
   */
  trustIssuer(issuerId: string, resolver?: StatusResolver): void {
    this.claims.trustIssuer(issuerId, resolver ?? (credentialId => this.askRevocation(issuerId, credentialId)));
  }

  // ── Lifecycle ──

  /** Resolve once no follow-up step is pending. */
  async idle(): Promise<void> {
    await this.tasks.idle();
  }

  get pendingTasks(): number {
    return this.tasks.size;
  }

  /** Expire stale negotiations and end transfers whose agreement ran out. */
  async runMaintenance(now: Date = this.now()): Promise<MaintenanceReport> {
    const expiredNegotiations = await this.negotiations.expireStale(now);
    const endedTransfers = await this.transfers.enforcePolicies(now);
    return { expiredNegotiations, endedTransfers };
  }

  // ── Inbound ──

  /** Entry point for every message the transport delivers. */
  async receive(raw: unknown): Promise<Ack> {
    if (!validateMessage(raw)) {
      this.metrics.counter('inbound.rejected', { kind: 'MalformedMessage' });
      return rejected('MalformedMessage', describeErrors(validateMessage));
    }
    const message = raw;

    let claims: ClaimSet;
    try {
      claims = await this.verifySender(message);
    } catch (err) {
      const detail = toError(err).message;
      this.metrics.counter('inbound.rejected', { kind: 'VerificationFailed' });
      this.logger.warn('Inbound message failed verification', {
        type: message.type, from: message.senderId, error: detail,
      });
      await this.onUnverified(message, detail);
      return rejected('VerificationFailed', detail);
    }

    const ctx: InboundContext = { messageId: message.messageId, senderId: message.senderId, claims };
    try {
      const reply = await this.route(message, ctx);
      this.metrics.counter('inbound.accepted', { type: message.type });
      return reply ? { status: 'ok', reply } : { status: 'ok' };
    } catch (err) {
      if (isDataspaceError(err)) {
        this.metrics.counter('inbound.rejected', { kind: err.kind });
        this.logger.info('Inbound message rejected', {
          type: message.type, from: message.senderId, kind: err.kind, error: err.message,
        });
        return rejected(err.kind, err.message);
      }
      const error = toError(err);
      this.logger.error('Inbound handler failed', { type: message.type, error: error.message });
      return rejected('DeliveryFailed', error.message);
    }
  }

  private async route(message: ProtocolMessage, ctx: InboundContext): Promise<MessageBody | undefined> {
    switch (message.type) {
      case 'ContractRequest':
      case 'ContractOffer':
      case 'ContractNegotiationEvent':
      case 'ContractAgreement':
      case 'ContractAgreementVerification':
      case 'ContractNegotiationTermination':
        await this.negotiations.handleMessage(message, ctx);
        return undefined;
      case 'TransferRequest':
      case 'TransferStart':
      case 'TransferSuspension':
      case 'TransferTermination':
      case 'TransferCompletion':
        await this.transfers.handleMessage(message, ctx);
        return undefined;
      case 'CredentialRequest': {
        const credential = await this.claims.issueCredential(ctx.senderId, message.claims);
        return { type: 'CredentialOffer', credential };
      }
      case 'PresentationQuery':
        return { type: 'PresentationResponse', presentation: this.present(ctx.senderId) };
      case 'RevocationCheck': {
        const { revoked } = await this.claims.checkRevocation(message.credentialId);
        return { type: 'RevocationStatus', credentialId: message.credentialId, revoked };
      }
      case 'CredentialOffer':
      case 'PresentationResponse':
      case 'RevocationStatus':
        throw new DataspaceError('MalformedMessage', `${message.type} is only valid as a reply`);
    }
  }

  private async verifySender(message: ProtocolMessage): Promise<ClaimSet> {
    const { presentation } = message;
    if (!presentation) {
      throw new DataspaceError('VerificationFailed', 'Message carries no presentation');
    }
    if (presentation.holder !== message.senderId) {
      throw new DataspaceError('VerificationFailed', 'Presentation holder is not the sender');
    }
    if (presentation.audience !== this.id) {
      throw new DataspaceError('VerificationFailed', 'Presentation is not addressed to this participant');
    }
    const verified = await this.claims.verifyPresentation(presentation, { audience: this.id });
    return verified.claims;
  }

  /** End the process an unverified message addressed, if any. */
  private async onUnverified(message: ProtocolMessage, detail: string): Promise<void> {
    try {
      switch (message.type) {
        case 'ContractRequest':
        case 'ContractOffer':
        case 'ContractNegotiationEvent':
        case 'ContractAgreement':
        case 'ContractAgreementVerification':
        case 'ContractNegotiationTermination':
          await this.negotiations.onVerificationFailure(message, message.senderId, detail);
          return;
        case 'TransferRequest':
        case 'TransferStart':
        case 'TransferSuspension':
        case 'TransferTermination':
        case 'TransferCompletion':
          await this.transfers.onVerificationFailure(message, message.senderId, detail);
          return;
        default:
          return;
      }
    } catch (err) {
      this.logger.error('Could not end process after failed verification', {
        type: message.type, error: toError(err).message,
      });
    }
  }

  private present(audience: string): CredentialPresentation {
    return createPresentation(this.keypair, this.credentials, audience, this.now());
  }

  private async askRevocation(issuerId: string, credentialId: string): Promise<boolean> {
    const reply = await this.dispatcher.send(issuerId, { type: 'RevocationCheck', credentialId });
    if (reply?.type !== 'RevocationStatus' || reply.credentialId !== credentialId) {
      throw new DataspaceError('MalformedMessage', `Expected the revocation status of ${credentialId}`);
    }
    return reply.revoked;
  }
}

/** Create a participant; see {@link ParticipantOptions}. */
export function createParticipant(options: ParticipantOptions = {}): Participant {
  return new Participant(options);
}
