/**
 * In-process data plane that records every call instead of moving bytes.
 */

import type { AccessToken, DataAddress, DataPlane, ProvisionResult } from '../core/types.js';
import { DataspaceError } from '../core/errors.js';

export type DataPlaneOperation = 'provision' | 'pause' | 'resume' | 'teardown';

export interface DataPlaneCall {
  op: DataPlaneOperation;
  processId: string;
  tokenId?: string;
}

export class InMemoryDataPlane implements DataPlane {
  readonly calls: DataPlaneCall[] = [];
  private active = new Map<string, string>();
  private failures = new Map<DataPlaneOperation, number>();

  constructor(private baseUrl = 'memory://data-plane') {}

  async provision(address: DataAddress, token: AccessToken): Promise<ProvisionResult> {
    this.check('provision', token.processId);
    this.calls.push({ op: 'provision', processId: token.processId, tokenId: token.id });
    this.active.set(token.processId, token.id);
    return { endpoint: address.endpoint ?? `${this.baseUrl}/${token.processId}` };
  }

  async pause(processId: string): Promise<void> {
    this.check('pause', processId);
    this.calls.push({ op: 'pause', processId });
    this.active.delete(processId);
  }

  async resume(processId: string, token: AccessToken): Promise<ProvisionResult> {
    this.check('resume', processId);
    this.calls.push({ op: 'resume', processId, tokenId: token.id });
    this.active.set(processId, token.id);
    return { endpoint: `${this.baseUrl}/${processId}` };
  }

  async teardown(processId: string): Promise<void> {
    this.check('teardown', processId);
    this.calls.push({ op: 'teardown', processId });
    this.active.delete(processId);
  }

  /** Token id the data plane currently serves `processId` with. */
  activeToken(processId: string): string | undefined {
    return this.active.get(processId);
  }

  callsFor(processId: string): DataPlaneOperation[] {
    return this.calls.filter(c => c.processId === processId).map(c => c.op);
  }

  /** Make the next `count` calls of `op` fail. */
  failNext(op: DataPlaneOperation, count = 1): void {
    this.failures.set(op, (this.failures.get(op) ?? 0) + count);
  }

  private check(op: DataPlaneOperation, processId: string): void {
    const remaining = this.failures.get(op) ?? 0;
    if (remaining > 0) {
      this.failures.set(op, remaining - 1);
      throw new DataspaceError('DeliveryFailed', `Data plane ${op} failed for ${processId}`, { processId });
    }
  }
}
