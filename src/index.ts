/**
 * Dataspace signaling — contract negotiation, transfer coordination,
 * data-plane signaling and claims for one dataspace participant.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  Principal,
  Keypair,
  Role,
  TransferType,
  TransitionRecord,
  VersionedRecord,
  TerminationCode,
  TerminationReason,
  ClaimSet,
  Credential,
  CredentialStatus,
  CredentialPresentation,
  TokenPresentation,
  Presentation,
  VerifiedPresentation,
  AccessToken,
  TokenPayload,
  RevocationEntry,
  UsagePolicy,
  Offer,
  ContractAgreement,
  NegotiationState,
  NegotiationProcess,
  TransferState,
  DataAddress,
  EndpointDataReference,
  TransferProcess,
  DataFlowState,
  DataFlow,
  NegotiationFilter,
  TransferFilter,
  DataFlowFilter,
  StorageAdapter,
  ProvisionResult,
  DataPlane,
  PolicyDecision,
  PolicyEngine,
  EntitlementCheck,
  StatusResolver,
} from './core/types.js';

// ── Crypto ──
export {
  generateKeypair,
  generateId,
  blake2b256,
  canonicalize,
  signObject,
  verifyObjectSignature,
  toBase64url,
  fromBase64url,
} from './core/crypto.js';

// ── Errors ──
export { DataspaceError, ERROR_KINDS, isDataspaceError, toError } from './core/errors.js';
export type { ErrorKind, ErrorContext, ErrorReport } from './core/errors.js';

// ── Logging ──
export {
  LogLevel,
  createLogger,
  parseLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';

// ── Metrics ──
export { MetricsCollector, globalMetrics } from './core/metrics.js';
export type { Tags, MetricsSnapshot, MetricsAdapter } from './core/metrics.js';

// ── Concurrency & Delivery ──
export { LeaseManager } from './core/lease.js';
export type { Lease, AcquireOptions } from './core/lease.js';
export { CircuitBreaker, CircuitBreakerPool, CircuitOpenError } from './core/circuit-breaker.js';
export type { CircuitState, CircuitBreakerConfig } from './core/circuit-breaker.js';
export { retryWithBackoff, backoffDelay, sleep, withTimeout, DEFAULT_RETRY } from './core/retry.js';
export type { RetryConfig, RetryOptions } from './core/retry.js';
export { TaskTracker } from './core/tasks.js';
export { StateMachine } from './core/state-machine.js';
export type { TransitionTable } from './core/state-machine.js';

// ── Configuration ──
export { DEFAULT_CONFIG, resolveConfig, configFromEnv, validateConfig } from './config.js';
export type { DataspaceConfig, ConfigOverrides, LogLevelName } from './config.js';

// ── Claims (DCP) ──
export { ClaimsAuthority } from './claims/authority.js';
export type { ClaimsAuthorityOptions, VerifyOptions } from './claims/authority.js';
export {
  createCredential,
  verifyCredentialSignature,
  createPresentation,
  verifyPresentationSignature,
} from './claims/credential.js';
export { mintToken, decodeToken } from './claims/token.js';
export { RevocationRegistry, createRevocationEntry, verifyRevocationEntry } from './claims/revocation.js';

// ── Storage ──
export { MemoryStorageAdapter } from './storage/memory.js';
export { SqliteStorageAdapter } from './storage/sqlite.js';
export { ProcessStore, Repository } from './storage/process-store.js';
export type { ProcessStoreOptions } from './storage/process-store.js';

// ── Transport ──
export { MessageDispatcher } from './transport/dispatcher.js';
export type { DispatcherOptions, SendOptions, Presenter } from './transport/dispatcher.js';
export { InMemoryNetwork } from './transport/memory.js';
export type { NetworkOptions, DeliveryRecord } from './transport/memory.js';
export { validateMessage, validateAck, describeErrors } from './transport/schemas.js';
export type {
  Ack,
  Envelope,
  InboundContext,
  MessageBody,
  MessageHandler,
  MessageType,
  NegotiationMessage,
  ProtocolMessage,
  TransferMessage,
  ClaimsMessage,
  Transport,
} from './transport/types.js';

// ── Negotiation (DSP) ──
export { NegotiationEngine } from './negotiation/engine.js';
export type {
  NegotiationEngineOptions,
  NegotiationSettings,
  OfferDecision,
  OfferHook,
} from './negotiation/engine.js';
export { negotiationMachine } from './negotiation/machine.js';
export { RulePolicyEngine } from './negotiation/policy.js';
export type { RulePolicyOptions } from './negotiation/policy.js';
export {
  createAgreement,
  countersignAgreement,
  verifyAgreementSignature,
  isAgreementComplete,
  isAgreementExpired,
  sameTerms,
  checkOfferedAgreement,
} from './negotiation/agreement.js';
export type { AgreementTerms } from './negotiation/agreement.js';

// ── Signaling (DPS) ──
export { SignalingController } from './signaling/controller.js';
export type { SignalingControllerOptions, StartRequest, StartResult } from './signaling/controller.js';
export { dataFlowMachine } from './signaling/machine.js';
export { InMemoryDataPlane } from './signaling/memory-data-plane.js';
export { resolveTrigger, remoteReason } from './signaling/triggers.js';
export type {
  Trigger,
  TriggerAction,
  TriggerResolution,
  PolicyMonitorTrigger,
  RemoteMessageTrigger,
  ManualInvocationTrigger,
  SystemErrorTrigger,
} from './signaling/triggers.js';

// ── Transfer (DSP) ──
export { TransferCoordinator } from './transfer/coordinator.js';
export type {
  TransferCoordinatorOptions,
  RequestTransferOptions,
  InitiateTransferOptions,
  TransferResult,
} from './transfer/coordinator.js';
export { transferMachine } from './transfer/machine.js';

// ── Participant ──
export { Participant, createParticipant } from './participant.js';
export type { ParticipantOptions, MaintenanceReport } from './participant.js';
