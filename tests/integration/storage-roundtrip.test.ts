/**
 * Integration tests — full negotiation and transfer lifecycle on SQLite.
 */

import { describe, it, expect, afterAll } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SqliteStorageAdapter } from '../../src/storage/sqlite.js';
import { ProcessStore } from '../../src/storage/process-store.js';
import { createDataspace, settle, startTransfer } from '../helpers.js';

const dir = mkdtempSync(join(tmpdir(), 'dataspace-sqlite-'));
const opened: SqliteStorageAdapter[] = [];

function openAdapter(name: string): SqliteStorageAdapter {
  const adapter = new SqliteStorageAdapter(join(dir, name));
  opened.push(adapter);
  return adapter;
}

afterAll(() => {
  for (const adapter of opened) adapter.close();
  if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
});

describe('SQLite roundtrip', () => {
  it('runs a transfer end to end and survives a reopen', async () => {
    let n = 0;
    const space = await createDataspace({ storage: () => openAdapter(`participant-${n++}.db`) });
    const { process, agreementId } = await startTransfer(space);
    await space.provider.transfers.complete(process.id);
    await settle(space.consumer, space.provider);

    const reopened = openAdapter('participant-0.db');
    const stored = await reopened.getTransfer(process.id);
    expect(stored?.state).toBe('COMPLETED');
    expect(stored?.history.map(h => h.to)).toEqual(['REQUESTED', 'PROVISIONED', 'STARTED', 'COMPLETED']);
    expect(stored?.edr).toBeUndefined();

    const [negotiation] = await reopened.listNegotiations({ agreementId });
    expect(negotiation.state).toBe('FINALIZED');
    expect(negotiation.agreement?.signatures.consumer).toBeDefined();

    const flow = await reopened.getDataFlow(process.id);
    expect(flow?.state).toBe('TERMINATED');
    expect(flow?.tokenId).toBeUndefined();

    const tokens = await reopened.listTokens(process.id);
    expect(tokens.map(t => t.revoked)).toEqual([true]);
    expect((await reopened.getRevocations()).map(r => r.revocationId)).toEqual([tokens[0].id]);
  });

  it('rejects a stale write through the process store', async () => {
    const store = new ProcessStore(openAdapter('stale.db'));
    const at = new Date().toISOString();
    const created = await store.transfers.save({
      id: 'tp_1',
      state: 'REQUESTED',
      version: 0,
      createdAt: at,
      updatedAt: at,
      history: [{ from: null, to: 'REQUESTED', at }],
      role: 'PROVIDER',
      agreementId: 'agr_1',
      negotiationId: 'neg_1',
      counterpartyId: 'consumer',
      type: 'PULL',
      processedMessageIds: [],
    });
    expect(created.version).toBe(1);

    await store.transfers.save({ ...created, state: 'PROVISIONED' });
    await expect(store.transfers.save({ ...created, state: 'TERMINATED' })).rejects.toMatchObject({
      kind: 'ConcurrentModification',
      processId: 'tp_1',
      state: 'PROVISIONED',
    });
  });
});
