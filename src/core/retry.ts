/**
 * Bounded retries with exponential backoff and cancellation.
 */

import { DataspaceError, isDataspaceError, toError } from './errors.js';

export interface RetryConfig {
  /** Attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound for a single attempt */
  attemptTimeoutMs: number;
}

export const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 4,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  attemptTimeoutMs: 10_000,
};

export interface RetryOptions {
  signal?: AbortSignal;
  /** Errors for which this returns false are rethrown without further attempts */
  retryable?: (err: Error) => boolean;
  onRetry?: (attempt: number, delayMs: number, err: Error) => void;
}

/** Delay before retry number `attempt` (0-based): base · 2^attempt, capped. */
export function backoffDelay(config: RetryConfig, attempt: number): number {
  return Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
}

function abortError(signal?: AbortSignal): DataspaceError {
  const detail = signal?.reason instanceof Error ? signal.reason.message : 'operation cancelled';
  return new DataspaceError('Aborted', detail);
}

/** Resolve after `ms`, or reject at once when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortError(signal));
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race `promise` against a timeout and an abort signal. The losing promise
 * keeps running; its outcome is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) return Promise.reject(abortError(signal));
  return new Promise<T>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new DataspaceError('DeliveryFailed', `Attempt timed out after ${ms}ms`));
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => { cleanup(); resolve(value); },
      err => { cleanup(); reject(err); },
    );
  });
}

/**
 * Run `fn` until it succeeds, retries run out, or `signal` aborts.
 * Exhaustion throws CounterpartyUnreachable carrying the last error as cause.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: RetryOptions = {},
): Promise<T> {
  const { signal, retryable = () => true } = options;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (signal?.aborted) throw abortError(signal);
    try {
      return await withTimeout(fn(attempt), config.attemptTimeoutMs, signal);
    } catch (err) {
      const error = toError(err);
      if (isDataspaceError(error, 'Aborted') || !retryable(error)) throw error;
      lastError = error;
      if (attempt < config.maxRetries) {
        const delay = backoffDelay(config, attempt);
        options.onRetry?.(attempt + 1, delay, error);
        await sleep(delay, signal);
      }
    }
  }

  throw new DataspaceError(
    'CounterpartyUnreachable',
    `Gave up after ${config.maxRetries + 1} attempts: ${lastError?.message ?? 'unknown error'}`,
    { cause: lastError },
  );
}
