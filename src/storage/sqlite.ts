/**
 * SQLite storage adapter using better-sqlite3.
 *
 * Each record is stored whole as JSON; the columns beside it exist for lookups.
 * Updates keep a row's rowid, so listings stay in insertion order.
 */

import Database from 'better-sqlite3';
import type {
  AccessToken,
  Credential,
  DataFlow,
  DataFlowFilter,
  NegotiationFilter,
  NegotiationProcess,
  RevocationEntry,
  StorageAdapter,
  TransferFilter,
  TransferProcess,
} from '../core/types.js';

interface BodyRow {
  body_json: string;
}

interface RevocationRow {
  revocation_id: string;
  revoked_by: string;
  revoked_at: string;
  scope: RevocationEntry['scope'];
  signature: string;
}

export class SqliteStorageAdapter implements StorageAdapter {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS negotiations (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        role TEXT NOT NULL,
        counterparty_id TEXT NOT NULL,
        counterparty_pid TEXT,
        agreement_id TEXT,
        updated_at TEXT NOT NULL,
        body_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_negotiations_state ON negotiations(state);
      CREATE INDEX IF NOT EXISTS idx_negotiations_agreement ON negotiations(agreement_id);
      CREATE INDEX IF NOT EXISTS idx_negotiations_counterparty_pid ON negotiations(counterparty_pid);

      CREATE TABLE IF NOT EXISTS transfers (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        agreement_id TEXT NOT NULL,
        counterparty_pid TEXT,
        updated_at TEXT NOT NULL,
        body_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_transfers_state ON transfers(state);
      CREATE INDEX IF NOT EXISTS idx_transfers_agreement ON transfers(agreement_id);

      CREATE TABLE IF NOT EXISTS data_flows (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        body_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_data_flows_state ON data_flows(state);

      CREATE TABLE IF NOT EXISTS tokens (
        id TEXT PRIMARY KEY,
        process_id TEXT NOT NULL,
        revoked INTEGER NOT NULL,
        body_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tokens_process ON tokens(process_id);

      CREATE TABLE IF NOT EXISTS credentials (
        id TEXT PRIMARY KEY,
        subject TEXT NOT NULL,
        body_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS revocations (
        revocation_id TEXT PRIMARY KEY,
        revoked_by TEXT NOT NULL,
        revoked_at TEXT NOT NULL,
        scope TEXT NOT NULL,
        signature TEXT NOT NULL
      );
    `);
  }

  // ── Negotiations ──

  async saveNegotiation(n: NegotiationProcess): Promise<void> {
    this.db.prepare(`
      INSERT INTO negotiations (id, state, role, counterparty_id, counterparty_pid, agreement_id, updated_at, body_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state, counterparty_pid = excluded.counterparty_pid,
        agreement_id = excluded.agreement_id, updated_at = excluded.updated_at, body_json = excluded.body_json
    `).run(n.id, n.state, n.role, n.counterpartyId, n.counterpartyPid ?? null, n.agreement?.id ?? null, n.updatedAt, JSON.stringify(n));
  }

  async getNegotiation(id: string): Promise<NegotiationProcess | null> {
    const row = this.db.prepare<[string], BodyRow>('SELECT body_json FROM negotiations WHERE id = ?').get(id);
    return row ? this.parse<NegotiationProcess>(row) : null;
  }

  async listNegotiations(filter?: NegotiationFilter): Promise<NegotiationProcess[]> {
    let sql = 'SELECT body_json FROM negotiations WHERE 1=1';
    const params: string[] = [];
    if (filter?.state) { sql += ' AND state = ?'; params.push(filter.state); }
    if (filter?.role) { sql += ' AND role = ?'; params.push(filter.role); }
    if (filter?.counterpartyId) { sql += ' AND counterparty_id = ?'; params.push(filter.counterpartyId); }
    if (filter?.counterpartyPid) { sql += ' AND counterparty_pid = ?'; params.push(filter.counterpartyPid); }
    if (filter?.agreementId) { sql += ' AND agreement_id = ?'; params.push(filter.agreementId); }
    const rows = this.db.prepare<string[], BodyRow>(sql + ' ORDER BY rowid').all(...params);
    return rows.map(r => this.parse<NegotiationProcess>(r));
  }

  // ── Transfers ──

  async saveTransfer(t: TransferProcess): Promise<void> {
    this.db.prepare(`
      INSERT INTO transfers (id, state, agreement_id, counterparty_pid, updated_at, body_json)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state, counterparty_pid = excluded.counterparty_pid,
        updated_at = excluded.updated_at, body_json = excluded.body_json
    `).run(t.id, t.state, t.agreementId, t.counterpartyPid ?? null, t.updatedAt, JSON.stringify(t));
  }

  async getTransfer(id: string): Promise<TransferProcess | null> {
    const row = this.db.prepare<[string], BodyRow>('SELECT body_json FROM transfers WHERE id = ?').get(id);
    return row ? this.parse<TransferProcess>(row) : null;
  }

  async listTransfers(filter?: TransferFilter): Promise<TransferProcess[]> {
    let sql = 'SELECT body_json FROM transfers WHERE 1=1';
    const params: string[] = [];
    if (filter?.state) { sql += ' AND state = ?'; params.push(filter.state); }
    if (filter?.agreementId) { sql += ' AND agreement_id = ?'; params.push(filter.agreementId); }
    if (filter?.counterpartyPid) { sql += ' AND counterparty_pid = ?'; params.push(filter.counterpartyPid); }
    const rows = this.db.prepare<string[], BodyRow>(sql + ' ORDER BY rowid').all(...params);
    return rows.map(r => this.parse<TransferProcess>(r));
  }

  // ── Data flows ──

  async saveDataFlow(f: DataFlow): Promise<void> {
    this.db.prepare(`
      INSERT INTO data_flows (id, state, updated_at, body_json)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state, updated_at = excluded.updated_at, body_json = excluded.body_json
    `).run(f.id, f.state, f.updatedAt, JSON.stringify(f));
  }

  async getDataFlow(id: string): Promise<DataFlow | null> {
    const row = this.db.prepare<[string], BodyRow>('SELECT body_json FROM data_flows WHERE id = ?').get(id);
    return row ? this.parse<DataFlow>(row) : null;
  }

  async listDataFlows(filter?: DataFlowFilter): Promise<DataFlow[]> {
    const rows = filter?.state
      ? this.db.prepare<[string], BodyRow>('SELECT body_json FROM data_flows WHERE state = ? ORDER BY rowid').all(filter.state)
      : this.db.prepare<[], BodyRow>('SELECT body_json FROM data_flows ORDER BY rowid').all();
    return rows.map(r => this.parse<DataFlow>(r));
  }

  // ── Tokens & credentials ──

  async saveToken(t: AccessToken): Promise<void> {
    this.db.prepare(`
      INSERT INTO tokens (id, process_id, revoked, body_json)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET revoked = excluded.revoked, body_json = excluded.body_json
    `).run(t.id, t.processId, t.revoked ? 1 : 0, JSON.stringify(t));
  }

  async getToken(id: string): Promise<AccessToken | null> {
    const row = this.db.prepare<[string], BodyRow>('SELECT body_json FROM tokens WHERE id = ?').get(id);
    return row ? this.parse<AccessToken>(row) : null;
  }

  async listTokens(processId: string): Promise<AccessToken[]> {
    const rows = this.db.prepare<[string], BodyRow>('SELECT body_json FROM tokens WHERE process_id = ? ORDER BY rowid').all(processId);
    return rows.map(r => this.parse<AccessToken>(r));
  }

  async saveCredential(c: Credential): Promise<void> {
    this.db.prepare(`
      INSERT OR REPLACE INTO credentials (id, subject, body_json)
      VALUES (?, ?, ?)
    `).run(c.id, c.subject, JSON.stringify(c));
  }

  async getCredential(id: string): Promise<Credential | null> {
    const row = this.db.prepare<[string], BodyRow>('SELECT body_json FROM credentials WHERE id = ?').get(id);
    return row ? this.parse<Credential>(row) : null;
  }

  // ── Revocations ──

  async saveRevocation(e: RevocationEntry): Promise<void> {
    this.db.prepare(`
      INSERT OR REPLACE INTO revocations (revocation_id, revoked_by, revoked_at, scope, signature)
      VALUES (?, ?, ?, ?, ?)
    `).run(e.revocationId, e.revokedBy, e.revokedAt, e.scope, e.signature);
  }

  async getRevocation(revocationId: string): Promise<RevocationEntry | null> {
    const row = this.db.prepare<[string], RevocationRow>('SELECT * FROM revocations WHERE revocation_id = ?').get(revocationId);
    return row ? this.rowToRevocation(row) : null;
  }

  async getRevocations(): Promise<RevocationEntry[]> {
    const rows = this.db.prepare<[], RevocationRow>('SELECT * FROM revocations ORDER BY rowid').all();
    return rows.map(r => this.rowToRevocation(r));
  }

  close(): void {
    this.db.close();
  }

  private parse<T>(row: BodyRow): T {
    return JSON.parse(row.body_json);
  }

  private rowToRevocation(row: RevocationRow): RevocationEntry {
    return {
      revocationId: row.revocation_id,
      revokedBy: row.revoked_by,
      revokedAt: row.revoked_at,
      scope: row.scope,
      signature: row.signature,
    };
  }
}
