/**
 * Circuit Breaker — fail fast towards a counterparty that keeps failing.
 */

import { DataspaceError } from './errors.js';

// ── Types ──

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before tripping to OPEN */
  failureThreshold: number;
  /** Time in ms before transitioning from OPEN to HALF_OPEN */
  resetTimeoutMs: number;
}

export type StateChangeCallback = (from: CircuitState, to: CircuitState) => void;

// ── Circuit Breaker ──

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private lastFailureTime = 0;
  private listeners: StateChangeCallback[] = [];

  constructor(
    private config: CircuitBreakerConfig,
    private label = 'circuit',
  ) {}

  /** Execute a function through the circuit breaker. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === 'OPEN') {
      throw new CircuitOpenError(`Circuit to ${this.label} is OPEN`);
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    }
  }

  getState(): CircuitState {
    if (this.state === 'OPEN' && Date.now() - this.lastFailureTime >= this.config.resetTimeoutMs) {
      this.transition('HALF_OPEN');
    }
    return this.state;
  }

  onStateChange(callback: StateChangeCallback): void {
    this.listeners.push(callback);
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  /** Manually reset the circuit breaker to CLOSED. */
  forceReset(): void {
    this.failureCount = 0;
    this.transition('CLOSED');
  }

  private onSuccess(): void {
    this.failureCount = 0;
    if (this.state === 'HALF_OPEN') this.transition('CLOSED');
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    // A single failed probe in HALF_OPEN trips straight back
    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    for (const cb of this.listeners) {
      cb(from, to);
    }
  }
}

/** One breaker per counterparty, created on first use. */
export class CircuitBreakerPool {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(private config: CircuitBreakerConfig) {}

  get(key: string): CircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      breaker = new CircuitBreaker(this.config, key);
      this.breakers.set(key, breaker);
    }
    return breaker;
  }

  states(): Record<string, CircuitState> {
    const out: Record<string, CircuitState> = {};
    for (const [key, breaker] of this.breakers) out[key] = breaker.getState();
    return out;
  }
}

/** Thrown when the circuit is open; counts as a failed delivery. */
export class CircuitOpenError extends DataspaceError {
  constructor(message: string) {
    super('DeliveryFailed', message);
    this.name = 'CircuitOpenError';
  }
}
