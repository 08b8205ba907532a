/**
 * Wire types — protocol messages exchanged between participants and the
 * transport interface that carries them.
 */

import type {
  ClaimSet,
  ContractAgreement,
  Credential,
  CredentialPresentation,
  EndpointDataReference,
  DataAddress,
  Offer,
  TerminationReason,
  TransferType,
  UsagePolicy,
} from '../core/types.js';
import type { ErrorKind } from '../core/errors.js';

// ── Negotiation (DSP) ──

export interface ContractRequestMessage {
  type: 'ContractRequest';
  consumerPid: string;
  /** Present on a counter-request */
  providerPid?: string;
  assetId: string;
  policy: UsagePolicy;
}

export interface ContractOfferMessage {
  type: 'ContractOffer';
  consumerPid: string;
  providerPid: string;
  offer: Offer;
}

export interface ContractNegotiationEventMessage {
  type: 'ContractNegotiationEvent';
  consumerPid: string;
  providerPid: string;
  event: 'ACCEPTED' | 'FINALIZED';
}

export interface ContractAgreementMessage {
  type: 'ContractAgreement';
  consumerPid: string;
  providerPid: string;
  agreement: ContractAgreement;
}

export interface ContractAgreementVerificationMessage {
  type: 'ContractAgreementVerification';
  consumerPid: string;
  providerPid: string;
  /** The agreement carrying both signatures */
  agreement: ContractAgreement;
}

export interface ContractNegotiationTerminationMessage {
  type: 'ContractNegotiationTermination';
  consumerPid?: string;
  providerPid?: string;
  reason: TerminationReason;
}

// ── Transfer (DSP) ──

export interface TransferRequestMessage {
  type: 'TransferRequest';
  consumerPid: string;
  agreementId: string;
  transferType: TransferType;
  /** Destination for PUSH */
  dataAddress?: DataAddress;
}

export interface TransferStartMessage {
  type: 'TransferStart';
  consumerPid?: string;
  providerPid: string;
  agreementId: string;
  transferType: TransferType;
  /** PULL only, provider to consumer */
  edr?: EndpointDataReference;
}

export interface TransferSuspensionMessage {
  type: 'TransferSuspension';
  consumerPid?: string;
  providerPid?: string;
  reason?: TerminationReason;
}

export interface TransferTerminationMessage {
  type: 'TransferTermination';
  consumerPid?: string;
  providerPid?: string;
  reason: TerminationReason;
}

export interface TransferCompletionMessage {
  type: 'TransferCompletion';
  consumerPid?: string;
  providerPid?: string;
}

// ── Claims (DCP) ──

export interface CredentialRequestMessage {
  type: 'CredentialRequest';
  claims: ClaimSet;
}

export interface CredentialOfferMessage {
  type: 'CredentialOffer';
  credential: Credential;
}

export interface PresentationQueryMessage {
  type: 'PresentationQuery';
}

export interface PresentationResponseMessage {
  type: 'PresentationResponse';
  presentation: CredentialPresentation;
}

export interface RevocationCheckMessage {
  type: 'RevocationCheck';
  credentialId: string;
}

export interface RevocationStatusMessage {
  type: 'RevocationStatus';
  credentialId: string;
  revoked: boolean;
}

export type NegotiationMessage =
  | ContractRequestMessage
  | ContractOfferMessage
  | ContractNegotiationEventMessage
  | ContractAgreementMessage
  | ContractAgreementVerificationMessage
  | ContractNegotiationTerminationMessage;

export type TransferMessage =
  | TransferRequestMessage
  | TransferStartMessage
  | TransferSuspensionMessage
  | TransferTerminationMessage
  | TransferCompletionMessage;

export type ClaimsMessage =
  | CredentialRequestMessage
  | CredentialOfferMessage
  | PresentationQueryMessage
  | PresentationResponseMessage
  | RevocationCheckMessage
  | RevocationStatusMessage;

/** A message before the dispatcher stamps it for sending */
export type MessageBody = NegotiationMessage | TransferMessage | ClaimsMessage;

export type MessageType = MessageBody['type'];

export interface Envelope {
  /** Stable across retries of the same logical message */
  messageId: string;
  senderId: string;
  /** Holder-signed presentation addressed to the recipient */
  presentation?: CredentialPresentation;
}

export type ProtocolMessage = MessageBody & Envelope;

// ── Acknowledgements ──

export type Ack =
  | { status: 'ok'; reply?: MessageBody }
  | { status: 'rejected'; error: { kind: ErrorKind; message: string } };

/** Sender identity and verified claims of an inbound message */
export interface InboundContext {
  messageId: string;
  senderId: string;
  claims: ClaimSet;
}

export type MessageHandler = (message: unknown) => Promise<Ack>;

export interface Transport {
  /** Deliver to `counterpartyId`; throws DeliveryFailed when the message cannot be delivered. */
  send(counterpartyId: string, message: ProtocolMessage): Promise<Ack>;
  onMessage(handler: MessageHandler): void;
}
