/**
 * Revocation Registry — signed revocation entries for tokens and credentials,
 * written through to persistence.
 */

import type { Keypair, RevocationEntry, StorageAdapter } from '../core/types.js';
import { signObject, verifyObjectSignature } from '../core/crypto.js';

/**
 * Create a signed revocation entry.
 * @param signer - Keypair of the revoking authority
 */
export function createRevocationEntry(
  signer: Keypair,
  revocationId: string,
  scope: RevocationEntry['scope'],
  now: Date = new Date(),
): RevocationEntry {
  const entry: RevocationEntry = {
    revocationId,
    revokedBy: signer.principal.id,
    revokedAt: now.toISOString(),
    scope,
    signature: '',
  };

  const { signature: _, ...toSign } = entry;
  entry.signature = signObject(signer.privateKey, toSign);
  return entry;
}

export function verifyRevocationEntry(entry: RevocationEntry): boolean {
  const { signature, ...toVerify } = entry;
  return verifyObjectSignature(entry.revokedBy, toVerify, signature);
}

export class RevocationRegistry {
  /** Read cache over the persisted entries */
  private cache = new Map<string, RevocationEntry>();

  constructor(
    private storage: StorageAdapter,
    private signer: Keypair,
  ) {}

  async isRevoked(revocationId: string): Promise<boolean> {
    if (this.cache.has(revocationId)) return true;
    const entry = await this.storage.getRevocation(revocationId);
    if (entry) this.cache.set(revocationId, entry);
    return entry !== null;
  }

  /**
   * Record a revocation. The entry is persisted before this resolves.
   * @returns false when the id was already revoked
   */
  async revoke(revocationId: string, scope: RevocationEntry['scope'], now?: Date): Promise<boolean> {
    if (await this.isRevoked(revocationId)) return false;
    const entry = createRevocationEntry(this.signer, revocationId, scope, now);
    await this.storage.saveRevocation(entry);
    this.cache.set(revocationId, entry);
    return true;
  }
}
