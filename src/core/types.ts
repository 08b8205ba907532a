/**
 * Dataspace Signaling Core Types
 * Single source of truth for all shared types and interfaces.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Cryptographic Primitives ──

/** A participant identified by an Ed25519 public key */
export interface Principal {
  /** Base64url-encoded Ed25519 public key (32 bytes → 43 chars, no padding) */
  id: string;
  name?: string;
}

/** Ed25519 keypair */
export interface Keypair {
  principal: Principal;
  privateKey: Uint8Array;
}

// ── Shared Enumerations ──

export type Role = 'CONSUMER' | 'PROVIDER';

export type TransferType = 'PUSH' | 'PULL';

/** Audit entry appended on every state change */
export interface TransitionRecord<S extends string> {
  from: S | null;
  to: S;
  at: string;
  reason?: string;
}

/** Fields every persisted process carries */
export interface VersionedRecord<S extends string> {
  id: string;
  state: S;
  version: number;
  createdAt: string;
  updatedAt: string;
  history: TransitionRecord<S>[];
}

// ── Termination Reasons ──

export type TerminationCode =
  | 'PolicyDenied'
  | 'VerificationFailed'
  | 'IssuanceDenied'
  | 'OfferLimitExceeded'
  | 'CounterpartyUnreachable'
  | 'CounterpartyTerminated'
  | 'Declined'
  | 'Timeout'
  | 'AgreementExpired'
  | 'PolicyViolation'
  | 'Manual'
  | 'SystemError'
  | 'Completed';

export interface TerminationReason {
  code: TerminationCode;
  detail?: string;
}

// ── Claims (DCP) ──

export type ClaimSet = Record<string, string | number | boolean>;

export interface Credential {
  id: string;
  issuer: string;
  subject: string;
  claims: ClaimSet;
  issuedAt: string;
  expiresAt: string;
  signature: string;
}

export type CredentialStatus = 'valid' | 'revoked' | 'expired';

export interface CredentialPresentation {
  kind: 'credentials';
  holder: string;
  audience?: string;
  issuedAt: string;
  credentials: Credential[];
  signature: string;
}

export interface TokenPresentation {
  kind: 'token';
  token: string;
}

export type Presentation = CredentialPresentation | TokenPresentation;

export interface VerifiedPresentation {
  valid: true;
  /** Holder id for credential presentations, process id for tokens */
  subject: string;
  claims: ClaimSet;
}

export interface AccessToken {
  id: string;
  processId: string;
  direction: TransferType;
  issuer: string;
  issuedAt: string;
  expiresAt: string;
  revoked: boolean;
  /** Compact form handed to consumers: base64url(payload).base64url(signature) */
  value: string;
}

/** Claims carried inside a token value */
export interface TokenPayload {
  jti: string;
  iss: string;
  pid: string;
  dir: TransferType;
  iat: string;
  exp: string;
}

export interface RevocationEntry {
  revocationId: string;
  revokedBy: string;
  revokedAt: string;
  scope: 'token' | 'credential';
  signature: string;
}

// ── Contracts ──

export type UsagePolicy = Record<string, string | number | boolean>;

export interface Offer {
  id: string;
  assetId: string;
  policy: UsagePolicy;
  /** Who proposed these terms */
  proposedBy: Role;
  proposedAt: string;
}

export interface ContractAgreement {
  id: string;
  negotiationId: string;
  providerId: string;
  consumerId: string;
  assetId: string;
  policy: UsagePolicy;
  agreedAt: string;
  expiresAt?: string;
  signatures: {
    provider?: string;
    consumer?: string;
  };
}

// ── Negotiation (DSP) ──

export type NegotiationState =
  | 'REQUESTED'
  | 'OFFERED'
  | 'ACCEPTED'
  | 'DECLINED'
  | 'AGREED'
  | 'VERIFIED'
  | 'FINALIZED'
  | 'TERMINATED';

export interface NegotiationProcess extends VersionedRecord<NegotiationState> {
  role: Role;
  counterpartyId: string;
  /** The counterparty's own id for its mirrored view, once known */
  counterpartyPid?: string;
  assetId: string;
  offers: Offer[];
  offerCount: number;
  agreement?: ContractAgreement;
  reason?: TerminationReason;
  processedMessageIds: string[];
}

// ── Transfer (DSP) ──

export type TransferState =
  | 'REQUESTED'
  | 'PROVISIONED'
  | 'STARTED'
  | 'SUSPENDED'
  | 'COMPLETED'
  | 'TERMINATED';

export interface DataAddress {
  type: string;
  endpoint?: string;
  properties?: Record<string, string>;
}

export interface EndpointDataReference {
  processId: string;
  endpoint: string;
  tokenId: string;
  token: string;
  expiresAt: string;
}

export interface TransferProcess extends VersionedRecord<TransferState> {
  role: Role;
  agreementId: string;
  negotiationId: string;
  counterpartyId: string;
  counterpartyPid?: string;
  type: TransferType;
  /** Provider side: where the data comes from (PULL) or goes to (PUSH) */
  dataAddress?: DataAddress;
  /** Consumer side, PULL only */
  edr?: EndpointDataReference;
  reason?: TerminationReason;
  processedMessageIds: string[];
}

// ── Signaling (DPS) ──

export type DataFlowState = 'REQUESTED' | 'STARTED' | 'SUSPENDED' | 'TERMINATED';

export interface DataFlow extends VersionedRecord<DataFlowState> {
  type: TransferType;
  agreementId: string;
  /** Source for PULL, destination for PUSH */
  address: DataAddress;
  /** Reference to the live token; never the token value */
  tokenId?: string;
  endpoint?: string;
  reason?: TerminationReason;
}

// ── Storage ──

export interface NegotiationFilter {
  state?: NegotiationState;
  role?: Role;
  counterpartyId?: string;
  counterpartyPid?: string;
  agreementId?: string;
}

export interface TransferFilter {
  state?: TransferState;
  agreementId?: string;
  counterpartyPid?: string;
}

export interface DataFlowFilter {
  state?: DataFlowState;
}

export interface StorageAdapter {
  saveNegotiation(process: NegotiationProcess): Promise<void>;
  getNegotiation(id: string): Promise<NegotiationProcess | null>;
  listNegotiations(filter?: NegotiationFilter): Promise<NegotiationProcess[]>;
  saveTransfer(process: TransferProcess): Promise<void>;
  getTransfer(id: string): Promise<TransferProcess | null>;
  listTransfers(filter?: TransferFilter): Promise<TransferProcess[]>;
  saveDataFlow(flow: DataFlow): Promise<void>;
  getDataFlow(id: string): Promise<DataFlow | null>;
  listDataFlows(filter?: DataFlowFilter): Promise<DataFlow[]>;
  saveToken(token: AccessToken): Promise<void>;
  getToken(id: string): Promise<AccessToken | null>;
  listTokens(processId: string): Promise<AccessToken[]>;
  saveCredential(credential: Credential): Promise<void>;
  getCredential(id: string): Promise<Credential | null>;
  saveRevocation(entry: RevocationEntry): Promise<void>;
  getRevocation(revocationId: string): Promise<RevocationEntry | null>;
  getRevocations(): Promise<RevocationEntry[]>;
}

// ── Collaborators ──

export interface ProvisionResult {
  endpoint: string;
}

/** Executes byte movement (PUSH) or serves data against a token (PULL) */
export interface DataPlane {
  provision(address: DataAddress, token: AccessToken): Promise<ProvisionResult>;
  pause(processId: string): Promise<void>;
  resume(processId: string, token: AccessToken): Promise<ProvisionResult>;
  teardown(processId: string): Promise<void>;
}

export type PolicyDecision = 'allow' | 'deny';

export interface PolicyEngine {
  evaluate(claims: ClaimSet, assetId: string): PolicyDecision | Promise<PolicyDecision>;
}

/** Single-shot entitlement check run before a credential is issued */
export type EntitlementCheck = (
  subjectId: string,
  claimSet: ClaimSet,
) => boolean | Promise<boolean>;

/** Answers whether a credential from a foreign issuer has been revoked */
export type StatusResolver = (credentialId: string) => Promise<boolean>;
