/**
 * Message Dispatcher — outbound delivery with retries, a circuit breaker per
 * counterparty, and cancellation by process id.
 */

import type { CredentialPresentation } from '../core/types.js';
import type { Ack, MessageBody, ProtocolMessage, Transport } from './types.js';
import { CircuitBreakerPool } from '../core/circuit-breaker.js';
import { DataspaceError, isDataspaceError } from '../core/errors.js';
import { generateId } from '../core/crypto.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import { DEFAULT_RETRY, retryWithBackoff, type RetryConfig } from '../core/retry.js';
import { describeErrors, validateAck } from './schemas.js';

/** Builds the presentation attached to a message for `audience` */
export type Presenter = (audience: string) => CredentialPresentation;

export interface DispatcherOptions {
  selfId: string;
  transport: Transport;
  presenter: Presenter;
  retry?: RetryConfig;
  breakers?: CircuitBreakerPool;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export interface SendOptions {
  /** Lets `cancel(processId)` abort this delivery */
  processId?: string;
}

export class MessageDispatcher {
  private readonly selfId: string;
  private readonly transport: Transport;
  private readonly presenter: Presenter;
  private readonly retry: RetryConfig;
  private readonly breakers: CircuitBreakerPool;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private inFlight = new Map<string, Set<AbortController>>();

  constructor(options: DispatcherOptions) {
    this.selfId = options.selfId;
    this.transport = options.transport;
    this.presenter = options.presenter;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.breakers = options.breakers ?? new CircuitBreakerPool({ failureThreshold: 5, resetTimeoutMs: 30_000 });
    this.metrics = options.metrics ?? globalMetrics;
    this.logger = options.logger ?? createLogger('MessageDispatcher');
  }

  /**
   * Send `body` to `counterpartyId` and return the reply carried by the ack, if any.
   *
   * A rejection is rethrown with the receiver's error kind; only transient
   * kinds are retried. Exhausted retries throw CounterpartyUnreachable.
   */
  async send(counterpartyId: string, body: MessageBody, options: SendOptions = {}): Promise<MessageBody | undefined> {
    const message: ProtocolMessage = {
      ...body,
      messageId: generateId('msg', 8),
      senderId: this.selfId,
      presentation: this.presenter(counterpartyId),
    };
    const controller = new AbortController();
    const { processId } = options;
    if (processId) this.track(processId, controller);

    const breaker = this.breakers.get(counterpartyId);
    const started = Date.now();
    try {
      const ack = await retryWithBackoff(
        async () => {
          const received = await breaker.execute(() => this.transport.send(counterpartyId, message));
          return this.unwrap(received, message);
        },
        this.retry,
        {
          signal: controller.signal,
          retryable: err => !isDataspaceError(err) || err.transient,
          onRetry: (attempt, delayMs, err) => {
            this.metrics.counter('dispatch.retries', { type: message.type });
            this.logger.debug('Retrying delivery', {
              to: counterpartyId, type: message.type, processId, attempt, delayMs, error: err.message,
            });
          },
        },
      );
      this.metrics.counter('dispatch.delivered', { type: message.type });
      this.metrics.histogram('dispatch.latency_ms', Date.now() - started, { type: message.type });
      return ack;
    } catch (err) {
      if (isDataspaceError(err, 'CounterpartyUnreachable')) {
        this.metrics.counter('dispatch.exhausted', { type: message.type });
        this.logger.warn('Delivery retries exhausted', {
          to: counterpartyId, type: message.type, processId, error: err.message,
        });
        throw new DataspaceError('CounterpartyUnreachable', err.message, { processId, cause: err.cause });
      }
      throw err;
    } finally {
      if (processId) this.untrack(processId, controller);
    }
  }

  /**
   * Abort every in-flight delivery for `processId`.
   * @returns the number of deliveries aborted
   */
  cancel(processId: string, reason = 'process terminated'): number {
    const controllers = this.inFlight.get(processId);
    if (!controllers) return 0;
    this.inFlight.delete(processId);
    for (const c of controllers) c.abort(new Error(reason));
    this.logger.debug('Cancelled deliveries', { processId, count: controllers.size });
    return controllers.size;
  }

  pending(processId: string): number {
    return this.inFlight.get(processId)?.size ?? 0;
  }

  breakerStates(): ReturnType<CircuitBreakerPool['states']> {
    return this.breakers.states();
  }

  private unwrap(received: Ack, message: ProtocolMessage): MessageBody | undefined {
    if (!validateAck(received)) {
      throw new DataspaceError('MalformedMessage', `Malformed acknowledgement: ${describeErrors(validateAck)}`);
    }
    if (received.status === 'rejected') {
      throw new DataspaceError(
        received.error.kind,
        `${message.type} rejected: ${received.error.message}`,
      );
    }
    return received.reply;
  }

  private track(processId: string, controller: AbortController): void {
    const set = this.inFlight.get(processId) ?? new Set<AbortController>();
    set.add(controller);
    this.inFlight.set(processId, set);
  }

  private untrack(processId: string, controller: AbortController): void {
    const set = this.inFlight.get(processId);
    if (!set) return;
    set.delete(controller);
    if (set.size === 0) this.inFlight.delete(processId);
  }
}
