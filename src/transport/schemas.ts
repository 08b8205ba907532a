/**
 * JSON Schemas for inbound messages and acknowledgements.
 */

import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { TerminationCode } from '../core/types.js';
import type { Ack, ProtocolMessage } from './types.js';
import { ERROR_KINDS } from '../core/errors.js';

const Ajv = AjvModule.default;

const str = { type: 'string', minLength: 1 };
const flatRecord = {
  type: 'object',
  additionalProperties: { type: ['string', 'number', 'boolean'] },
};
const transferType = { enum: ['PUSH', 'PULL'] };

const TERMINATION_CODES: TerminationCode[] = [
  'PolicyDenied', 'VerificationFailed', 'IssuanceDenied', 'OfferLimitExceeded',
  'CounterpartyUnreachable', 'CounterpartyTerminated', 'Declined', 'Timeout',
  'AgreementExpired', 'PolicyViolation', 'Manual', 'SystemError', 'Completed',
];

const terminationReason = {
  type: 'object',
  required: ['code'],
  properties: { code: { enum: TERMINATION_CODES }, detail: { type: 'string' } },
};

const dataAddress = {
  type: 'object',
  required: ['type'],
  properties: {
    type: str,
    endpoint: { type: 'string' },
    properties: { type: 'object', additionalProperties: { type: 'string' } },
  },
};

const credential = {
  type: 'object',
  required: ['id', 'issuer', 'subject', 'claims', 'issuedAt', 'expiresAt', 'signature'],
  properties: {
    id: str, issuer: str, subject: str, claims: flatRecord,
    issuedAt: str, expiresAt: str, signature: str,
  },
};

const presentation = {
  type: 'object',
  required: ['kind', 'holder', 'issuedAt', 'credentials', 'signature'],
  properties: {
    kind: { const: 'credentials' },
    holder: str,
    audience: { type: 'string' },
    issuedAt: str,
    credentials: { type: 'array', items: credential },
    signature: str,
  },
};

const offer = {
  type: 'object',
  required: ['id', 'assetId', 'policy', 'proposedBy', 'proposedAt'],
  properties: {
    id: str, assetId: str, policy: flatRecord,
    proposedBy: { enum: ['CONSUMER', 'PROVIDER'] }, proposedAt: str,
  },
};

const agreement = {
  type: 'object',
  required: ['id', 'negotiationId', 'providerId', 'consumerId', 'assetId', 'policy', 'agreedAt', 'signatures'],
  properties: {
    id: str, negotiationId: str, providerId: str, consumerId: str, assetId: str,
    policy: flatRecord, agreedAt: str, expiresAt: { type: 'string' },
    signatures: {
      type: 'object',
      properties: { provider: { type: 'string' }, consumer: { type: 'string' } },
    },
  },
};

const edr = {
  type: 'object',
  required: ['processId', 'endpoint', 'tokenId', 'token', 'expiresAt'],
  properties: { processId: str, endpoint: str, tokenId: str, token: str, expiresAt: str },
};

function body(type: string, required: string[], properties: Record<string, object>): object {
  return {
    type: 'object',
    required: ['type', ...required],
    properties: { type: { const: type }, ...properties },
  };
}

const bodySchema = {
  type: 'object',
  discriminator: { propertyName: 'type' },
  required: ['type'],
  oneOf: [
    body('ContractRequest', ['consumerPid', 'assetId', 'policy'], {
      consumerPid: str, providerPid: str, assetId: str, policy: flatRecord,
    }),
    body('ContractOffer', ['consumerPid', 'providerPid', 'offer'], {
      consumerPid: str, providerPid: str, offer,
    }),
    body('ContractNegotiationEvent', ['consumerPid', 'providerPid', 'event'], {
      consumerPid: str, providerPid: str, event: { enum: ['ACCEPTED', 'FINALIZED'] },
    }),
    body('ContractAgreement', ['consumerPid', 'providerPid', 'agreement'], {
      consumerPid: str, providerPid: str, agreement,
    }),
    body('ContractAgreementVerification', ['consumerPid', 'providerPid', 'agreement'], {
      consumerPid: str, providerPid: str, agreement,
    }),
    body('ContractNegotiationTermination', ['reason'], {
      consumerPid: str, providerPid: str, reason: terminationReason,
    }),
    body('TransferRequest', ['consumerPid', 'agreementId', 'transferType'], {
      consumerPid: str, agreementId: str, transferType, dataAddress,
    }),
    body('TransferStart', ['providerPid', 'agreementId', 'transferType'], {
      consumerPid: str, providerPid: str, agreementId: str, transferType, edr,
    }),
    body('TransferSuspension', [], { consumerPid: str, providerPid: str, reason: terminationReason }),
    body('TransferTermination', ['reason'], { consumerPid: str, providerPid: str, reason: terminationReason }),
    body('TransferCompletion', [], { consumerPid: str, providerPid: str }),
    body('CredentialRequest', ['claims'], { claims: flatRecord }),
    body('CredentialOffer', ['credential'], { credential }),
    body('PresentationQuery', [], {}),
    body('PresentationResponse', ['presentation'], { presentation }),
    body('RevocationCheck', ['credentialId'], { credentialId: str }),
    body('RevocationStatus', ['credentialId', 'revoked'], { credentialId: str, revoked: { type: 'boolean' } }),
  ],
};

const messageSchema = {
  allOf: [
    {
      type: 'object',
      required: ['messageId', 'senderId'],
      properties: { messageId: str, senderId: str, presentation },
    },
    bodySchema,
  ],
};

const ackSchema = {
  type: 'object',
  discriminator: { propertyName: 'status' },
  required: ['status'],
  oneOf: [
    {
      type: 'object',
      properties: { status: { const: 'ok' }, reply: bodySchema },
    },
    {
      type: 'object',
      required: ['error'],
      properties: {
        status: { const: 'rejected' },
        error: {
          type: 'object',
          required: ['kind', 'message'],
          properties: { kind: { enum: [...ERROR_KINDS] }, message: { type: 'string' } },
        },
      },
    },
  ],
};

const ajv = new Ajv({ strict: false, allErrors: false, discriminator: true });

export const validateMessage = ajv.compile<ProtocolMessage>(messageSchema);
export const validateAck = ajv.compile<Ack>(ackSchema);

/** Human-readable description of the last validation failure. */
export function describeErrors(validator: ValidateFunction): string {
  return ajv.errorsText(validator.errors);
}
