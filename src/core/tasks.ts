/**
 * Task Tracker — background follow-up work that runs after an inbound
 * message has been acknowledged.
 */

import type { Logger } from './logger.js';
import { toError } from './errors.js';

export class TaskTracker {
  private pending = new Set<Promise<void>>();

  constructor(private logger: Logger) {}

  /** Schedule `fn` on a later tick. Failures are logged with `label`. */
  run(label: string, fn: () => Promise<void>): void {
    const task: Promise<void> = new Promise<void>(resolve => setImmediate(resolve))
      .then(fn)
      .catch((err: unknown) => {
        const error = toError(err);
        this.logger.error('Background task failed', { task: label, error: error.message });
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Resolve once every task, including tasks scheduled meanwhile, has settled. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }
}
