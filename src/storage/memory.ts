/**
 * In-memory storage adapter for tests and simple use.
 */

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

export class MemoryStorageAdapter implements StorageAdapter {
  private negotiations = new Map<string, NegotiationProcess>();
  private transfers = new Map<string, TransferProcess>();
  private dataFlows = new Map<string, DataFlow>();
  private tokens = new Map<string, AccessToken>();
  private credentials = new Map<string, Credential>();
  private revocations = new Map<string, RevocationEntry>();

  async saveNegotiation(process: NegotiationProcess): Promise<void> {
    this.negotiations.set(process.id, structuredClone(process));
  }

  async getNegotiation(id: string): Promise<NegotiationProcess | null> {
    const found = this.negotiations.get(id);
    return found ? structuredClone(found) : null;
  }

  async listNegotiations(filter?: NegotiationFilter): Promise<NegotiationProcess[]> {
    let results = Array.from(this.negotiations.values());
    if (filter) {
      if (filter.state) results = results.filter(n => n.state === filter.state);
      if (filter.role) results = results.filter(n => n.role === filter.role);
      if (filter.counterpartyId) results = results.filter(n => n.counterpartyId === filter.counterpartyId);
      if (filter.counterpartyPid) results = results.filter(n => n.counterpartyPid === filter.counterpartyPid);
      if (filter.agreementId) results = results.filter(n => n.agreement?.id === filter.agreementId);
    }
    return results.map(n => structuredClone(n));
  }

  async saveTransfer(process: TransferProcess): Promise<void> {
    this.transfers.set(process.id, structuredClone(process));
  }

  async getTransfer(id: string): Promise<TransferProcess | null> {
    const found = this.transfers.get(id);
    return found ? structuredClone(found) : null;
  }

  async listTransfers(filter?: TransferFilter): Promise<TransferProcess[]> {
    let results = Array.from(this.transfers.values());
    if (filter) {
      if (filter.state) results = results.filter(t => t.state === filter.state);
      if (filter.agreementId) results = results.filter(t => t.agreementId === filter.agreementId);
      if (filter.counterpartyPid) results = results.filter(t => t.counterpartyPid === filter.counterpartyPid);
    }
    return results.map(t => structuredClone(t));
  }

  async saveDataFlow(flow: DataFlow): Promise<void> {
    this.dataFlows.set(flow.id, structuredClone(flow));
  }

  async getDataFlow(id: string): Promise<DataFlow | null> {
    const found = this.dataFlows.get(id);
    return found ? structuredClone(found) : null;
  }

  async listDataFlows(filter?: DataFlowFilter): Promise<DataFlow[]> {
    let results = Array.from(this.dataFlows.values());
    if (filter?.state) results = results.filter(f => f.state === filter.state);
    return results.map(f => structuredClone(f));
  }

  async saveToken(token: AccessToken): Promise<void> {
    this.tokens.set(token.id, { ...token });
  }

  async getToken(id: string): Promise<AccessToken | null> {
    const found = this.tokens.get(id);
    return found ? { ...found } : null;
  }

  async listTokens(processId: string): Promise<AccessToken[]> {
    return Array.from(this.tokens.values())
      .filter(t => t.processId === processId)
      .map(t => ({ ...t }));
  }

  async saveCredential(credential: Credential): Promise<void> {
    this.credentials.set(credential.id, structuredClone(credential));
  }

  async getCredential(id: string): Promise<Credential | null> {
    const found = this.credentials.get(id);
    return found ? structuredClone(found) : null;
  }

  async saveRevocation(entry: RevocationEntry): Promise<void> {
    this.revocations.set(entry.revocationId, { ...entry });
  }

  async getRevocation(revocationId: string): Promise<RevocationEntry | null> {
    const found = this.revocations.get(revocationId);
    return found ? { ...found } : null;
  }

  async getRevocations(): Promise<RevocationEntry[]> {
    return Array.from(this.revocations.values()).map(e => ({ ...e }));
  }
}
