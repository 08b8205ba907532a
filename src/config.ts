/**
 * Configuration — defaults, overrides, environment variables, validation.
 */

import AjvModule from 'ajv';
import type { Result } from './core/types.js';
import type { RetryConfig } from './core/retry.js';
import type { CircuitBreakerConfig } from './core/circuit-breaker.js';
import { DEFAULT_RETRY } from './core/retry.js';

// ajv is CommonJS; under NodeNext the class sits on `default`
const Ajv = AjvModule.default;

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

export interface DataspaceConfig {
  /** Offers (initial plus counter-offers) before a negotiation is forced to TERMINATED */
  maxOffers: number;
  /** Idle time after which a non-terminal negotiation is terminated with Timeout */
  negotiationTimeoutMs: number;
  /** Lifetime of an agreement from signing; 0 means it does not expire */
  agreementTtlMs: number;
  tokenTtlMs: number;
  credentialTtlMs: number;
  /** How long a conflicting operation waits for a process lease */
  leaseTimeoutMs: number;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
  logLevel: LogLevelName;
}

export interface ConfigOverrides extends Partial<Omit<DataspaceConfig, 'retry' | 'circuitBreaker'>> {
  retry?: Partial<RetryConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
}

export const DEFAULT_CONFIG: DataspaceConfig = {
  maxOffers: 5,
  negotiationTimeoutMs: 24 * 60 * 60 * 1000,
  agreementTtlMs: 0,
  tokenTtlMs: 10 * 60 * 1000,
  credentialTtlMs: 365 * 24 * 60 * 60 * 1000,
  leaseTimeoutMs: 30_000,
  retry: DEFAULT_RETRY,
  circuitBreaker: { failureThreshold: 5, resetTimeoutMs: 30_000 },
  logLevel: 'INFO',
};

const positiveInt = { type: 'integer', minimum: 1 } as const;
const nonNegativeInt = { type: 'integer', minimum: 0 } as const;

const configSchema = {
  type: 'object',
  required: [
    'maxOffers', 'negotiationTimeoutMs', 'agreementTtlMs', 'tokenTtlMs',
    'credentialTtlMs', 'leaseTimeoutMs', 'retry', 'circuitBreaker', 'logLevel',
  ],
  properties: {
    maxOffers: positiveInt,
    negotiationTimeoutMs: positiveInt,
    agreementTtlMs: nonNegativeInt,
    tokenTtlMs: positiveInt,
    credentialTtlMs: positiveInt,
    leaseTimeoutMs: nonNegativeInt,
    retry: {
      type: 'object',
      required: ['maxRetries', 'baseDelayMs', 'maxDelayMs', 'attemptTimeoutMs'],
      properties: {
        maxRetries: nonNegativeInt,
        baseDelayMs: nonNegativeInt,
        maxDelayMs: nonNegativeInt,
        attemptTimeoutMs: positiveInt,
      },
    },
    circuitBreaker: {
      type: 'object',
      required: ['failureThreshold', 'resetTimeoutMs'],
      properties: {
        failureThreshold: positiveInt,
        resetTimeoutMs: nonNegativeInt,
      },
    },
    logLevel: { enum: ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] },
  },
  additionalProperties: false,
} as const;

const ajv = new Ajv({ strict: false, allErrors: true });
const validate = ajv.compile<DataspaceConfig>(configSchema);

/** Check a complete configuration object. */
export function validateConfig(config: unknown): Result<DataspaceConfig, string> {
  if (!validate(config)) {
    return { ok: false, error: ajv.errorsText(validate.errors) };
  }
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    return { ok: false, error: 'retry.maxDelayMs must not be below retry.baseDelayMs' };
  }
  return { ok: true, value: config };
}

/** Merge overrides onto the defaults and validate; throws on an invalid result. */
export function resolveConfig(overrides: ConfigOverrides = {}): DataspaceConfig {
  const merged: DataspaceConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    retry: { ...DEFAULT_CONFIG.retry, ...overrides.retry },
    circuitBreaker: { ...DEFAULT_CONFIG.circuitBreaker, ...overrides.circuitBreaker },
  };
  const result = validateConfig(merged);
  if (!result.ok) {
    throw new Error(`Invalid configuration: ${result.error}`);
  }
  return result.value;
}

const ENV_NUMBERS: Record<string, (o: ConfigOverrides, v: number) => void> = {
  DATASPACE_MAX_OFFERS: (o, v) => { o.maxOffers = v; },
  DATASPACE_NEGOTIATION_TIMEOUT_MS: (o, v) => { o.negotiationTimeoutMs = v; },
  DATASPACE_AGREEMENT_TTL_MS: (o, v) => { o.agreementTtlMs = v; },
  DATASPACE_TOKEN_TTL_MS: (o, v) => { o.tokenTtlMs = v; },
  DATASPACE_CREDENTIAL_TTL_MS: (o, v) => { o.credentialTtlMs = v; },
  DATASPACE_LEASE_TIMEOUT_MS: (o, v) => { o.leaseTimeoutMs = v; },
  DATASPACE_RETRY_MAX: (o, v) => { o.retry = { ...o.retry, maxRetries: v }; },
  DATASPACE_RETRY_BASE_DELAY_MS: (o, v) => { o.retry = { ...o.retry, baseDelayMs: v }; },
  DATASPACE_RETRY_MAX_DELAY_MS: (o, v) => { o.retry = { ...o.retry, maxDelayMs: v }; },
  DATASPACE_ATTEMPT_TIMEOUT_MS: (o, v) => { o.retry = { ...o.retry, attemptTimeoutMs: v }; },
  DATASPACE_BREAKER_THRESHOLD: (o, v) => { o.circuitBreaker = { ...o.circuitBreaker, failureThreshold: v }; },
  DATASPACE_BREAKER_RESET_MS: (o, v) => { o.circuitBreaker = { ...o.circuitBreaker, resetTimeoutMs: v }; },
};

function isLogLevelName(value: string): value is LogLevelName {
  return ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'].includes(value);
}

/**
 * Read `DATASPACE_*` variables. Non-numeric values for numeric settings are
 * rejected rather than ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DataspaceConfig {
  const overrides: ConfigOverrides = {};
  for (const [name, apply] of Object.entries(ENV_NUMBERS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid configuration: ${name} must be a number, got "${raw}"`);
    }
    apply(overrides, value);
  }
  const level = env.DATASPACE_LOG_LEVEL?.trim().toUpperCase();
  if (level) {
    if (!isLogLevelName(level)) {
      throw new Error(`Invalid configuration: DATASPACE_LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR, SILENT`);
    }
    overrides.logLevel = level;
  }
  return resolveConfig(overrides);
}
