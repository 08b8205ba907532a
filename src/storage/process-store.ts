/**
 * Process Store — versioned repositories for negotiations, transfers and
 * data flows, with a per-id lease that every transition runs under.
 */

import type {
  DataFlow,
  DataFlowState,
  NegotiationProcess,
  NegotiationState,
  StorageAdapter,
  TransferProcess,
  TransferState,
  VersionedRecord,
} from '../core/types.js';
import { DataspaceError } from '../core/errors.js';
import { LeaseManager } from '../core/lease.js';

interface RecordAccess<S extends string, R extends VersionedRecord<S>> {
  get(id: string): Promise<R | null>;
  save(record: R): Promise<void>;
  listByState(state: S): Promise<R[]>;
}

export class Repository<S extends string, R extends VersionedRecord<S>> {
  constructor(
    readonly kind: string,
    private access: RecordAccess<S, R>,
    private leases: LeaseManager,
    private leaseTimeoutMs: number,
  ) {}

  async load(id: string): Promise<R | null> {
    return this.access.get(id);
  }

  /** Load or throw ProcessNotFound. */
  async require(id: string): Promise<R> {
    const found = await this.access.get(id);
    if (!found) {
      throw new DataspaceError('ProcessNotFound', `No ${this.kind} with id ${id}`, { processId: id });
    }
    return found;
  }

  /**
   * Persist `record`, bumping its version. `record.version` must equal the
   * stored version (0 for a record that was never saved).
   */
  async save(record: R): Promise<R> {
    const stored = await this.access.get(record.id);
    const storedVersion = stored?.version ?? 0;
    if (record.version !== storedVersion) {
      throw new DataspaceError(
        'ConcurrentModification',
        `${this.kind} ${record.id} was written at version ${storedVersion}, not ${record.version}`,
        { processId: record.id, state: stored?.state },
      );
    }
    const next: R = { ...record, version: storedVersion + 1 };
    await this.access.save(next);
    return next;
  }

  async listByState(state: S): Promise<R[]> {
    return this.access.listByState(state);
  }

  /** Run `fn` holding the exclusive lease on `id` within this repository. */
  async withLease<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return this.leases.run(`${this.kind}:${id}`, fn, { timeoutMs: this.leaseTimeoutMs });
  }

  isLeased(id: string): boolean {
    return this.leases.isHeld(`${this.kind}:${id}`);
  }
}

export interface ProcessStoreOptions {
  leases?: LeaseManager;
  leaseTimeoutMs?: number;
}

export class ProcessStore {
  readonly negotiations: Repository<NegotiationState, NegotiationProcess>;
  readonly transfers: Repository<TransferState, TransferProcess>;
  readonly dataFlows: Repository<DataFlowState, DataFlow>;
  readonly leases: LeaseManager;

  constructor(readonly storage: StorageAdapter, options: ProcessStoreOptions = {}) {
    const timeout = options.leaseTimeoutMs ?? 30_000;
    this.leases = options.leases ?? new LeaseManager(timeout);

    this.negotiations = new Repository('negotiation', {
      get: id => storage.getNegotiation(id),
      save: r => storage.saveNegotiation(r),
      listByState: state => storage.listNegotiations({ state }),
    }, this.leases, timeout);

    this.transfers = new Repository('transfer', {
      get: id => storage.getTransfer(id),
      save: r => storage.saveTransfer(r),
      listByState: state => storage.listTransfers({ state }),
    }, this.leases, timeout);

    this.dataFlows = new Repository('dataflow', {
      get: id => storage.getDataFlow(id),
      save: r => storage.saveDataFlow(r),
      listByState: state => storage.listDataFlows({ state }),
    }, this.leases, timeout);
  }
}
