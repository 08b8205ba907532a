/**
 * Lease Manager — exclusive per-key leases with bounded waiting.
 *
 * Waiters queue in arrival order. A waiter that is not granted the lease
 * within its timeout leaves the queue and fails with ConcurrentModification.
 */

import { DataspaceError } from './errors.js';

export interface Lease {
  readonly key: string;
  release(): void;
}

export interface AcquireOptions {
  /** 0 fails at once when the key is held; undefined uses the manager default */
  timeoutMs?: number;
}

interface Waiter {
  grant: () => void;
  timer?: ReturnType<typeof setTimeout>;
}

export class LeaseManager {
  private held = new Set<string>();
  private queues = new Map<string, Waiter[]>();

  constructor(private defaultTimeoutMs = 30_000) {}

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  /** Number of callers waiting on `key`. */
  waiting(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  async acquire(key: string, options: AcquireOptions = {}): Promise<Lease> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return this.makeLease(key);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    if (timeoutMs <= 0) {
      throw new DataspaceError('ConcurrentModification', `Process ${key} is locked by another operation`, {
        processId: key,
      });
    }

    return new Promise<Lease>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer);
          resolve(this.makeLease(key));
        },
      };
      waiter.timer = setTimeout(() => {
        this.dequeue(key, waiter);
        reject(new DataspaceError(
          'ConcurrentModification',
          `Timed out after ${timeoutMs}ms waiting for the lease on ${key}`,
          { processId: key },
        ));
      }, timeoutMs);

      const queue = this.queues.get(key) ?? [];
      queue.push(waiter);
      this.queues.set(key, queue);
    });
  }

  /** Run `fn` while holding the lease on `key`. */
  async run<T>(key: string, fn: () => Promise<T>, options?: AcquireOptions): Promise<T> {
    const lease = await this.acquire(key, options);
    try {
      return await fn();
    } finally {
      lease.release();
    }
  }

  private makeLease(key: string): Lease {
    let released = false;
    return {
      key,
      release: () => {
        if (released) return;
        released = true;
        this.handOver(key);
      },
    };
  }

  private handOver(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.queues.delete(key);
    if (next) {
      // Ownership passes straight to the next waiter; the key stays held.
      next.grant();
    } else {
      this.held.delete(key);
    }
  }

  private dequeue(key: string, waiter: Waiter): void {
    const queue = this.queues.get(key);
    if (!queue) return;
    const idx = queue.indexOf(waiter);
    if (idx >= 0) queue.splice(idx, 1);
    if (queue.length === 0) this.queues.delete(key);
  }
}
