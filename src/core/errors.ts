/**
 * Error taxonomy shared by every component.
 */

export type ErrorKind =
  | 'PolicyDenied'
  | 'InvalidStateTransition'
  | 'VerificationFailed'
  | 'IssuanceDenied'
  | 'DeliveryFailed'
  | 'CounterpartyUnreachable'
  | 'ConcurrentModification'
  | 'ContractNotAgreed'
  | 'ProcessNotFound'
  | 'MalformedMessage'
  | 'Aborted';

export const ERROR_KINDS: readonly ErrorKind[] = [
  'PolicyDenied',
  'InvalidStateTransition',
  'VerificationFailed',
  'IssuanceDenied',
  'DeliveryFailed',
  'CounterpartyUnreachable',
  'ConcurrentModification',
  'ContractNotAgreed',
  'ProcessNotFound',
  'MalformedMessage',
  'Aborted',
];

/** Kinds a caller may retry; everything else is definitive. */
const TRANSIENT: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'DeliveryFailed',
  'ConcurrentModification',
]);

export interface ErrorContext {
  processId?: string;
  state?: string;
  cause?: unknown;
}

/** Operator-facing shape of a failure */
export interface ErrorReport {
  kind: ErrorKind;
  message: string;
  processId?: string;
  state?: string;
}

export class DataspaceError extends Error {
  readonly kind: ErrorKind;
  readonly processId?: string;
  readonly state?: string;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = 'DataspaceError';
    this.kind = kind;
    this.processId = context.processId;
    this.state = context.state;
  }

  get transient(): boolean {
    return TRANSIENT.has(this.kind);
  }

  toJSON(): ErrorReport {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.processId !== undefined ? { processId: this.processId } : {}),
      ...(this.state !== undefined ? { state: this.state } : {}),
    };
  }
}

export function isDataspaceError(err: unknown, kind?: ErrorKind): err is DataspaceError {
  return err instanceof DataspaceError && (kind === undefined || err.kind === kind);
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
