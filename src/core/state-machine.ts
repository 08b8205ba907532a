/**
 * Transition tables for the process state machines.
 */

import type { VersionedRecord } from './types.js';
import { DataspaceError } from './errors.js';

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export class StateMachine<S extends string> {
  constructor(
    readonly name: string,
    private table: TransitionTable<S>,
  ) {}

  canTransition(from: S, to: S): boolean {
    return this.table[from].includes(to);
  }

  isTerminal(state: S): boolean {
    return this.table[state].length === 0;
  }

  /** Throws InvalidStateTransition unless `from → to` is in the table. */
  assertTransition(from: S, to: S, processId?: string): void {
    if (!this.canTransition(from, to)) {
      throw new DataspaceError(
        'InvalidStateTransition',
        `${this.name}: ${from} → ${to} is not allowed`,
        { processId, state: from },
      );
    }
  }

  /**
   * Return a copy of `record` moved to `to`, with the transition appended to
   * its history. The version is left alone; the store bumps it on save.
   */
  transition<R extends VersionedRecord<S>>(record: R, to: S, reason?: string, now = new Date()): R {
    this.assertTransition(record.state, to, record.id);
    const at = now.toISOString();
    return {
      ...record,
      state: to,
      updatedAt: at,
      history: [...record.history, { from: record.state, to, at, ...(reason ? { reason } : {}) }],
    };
  }
}
