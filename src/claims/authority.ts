/**
 * Claims Authority — issues, verifies and revokes credentials and access tokens.
 *
 * Every issuance and revocation is persisted before the call returns.
 */

import type {
  AccessToken,
  ClaimSet,
  Credential,
  CredentialPresentation,
  CredentialStatus,
  EntitlementCheck,
  Keypair,
  Presentation,
  StatusResolver,
  StorageAdapter,
  TokenPresentation,
  TransferType,
  VerifiedPresentation,
} from '../core/types.js';
import { DataspaceError, toError } from '../core/errors.js';
import { LeaseManager } from '../core/lease.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import { createCredential, verifyCredentialSignature, verifyPresentationSignature } from './credential.js';
import { decodeToken, mintToken } from './token.js';
import { RevocationRegistry } from './revocation.js';

export interface ClaimsAuthorityOptions {
  keypair: Keypair;
  storage: StorageAdapter;
  /** Single-shot check run before issuing; allows everything when omitted */
  entitlementCheck?: EntitlementCheck;
  tokenTtlMs?: number;
  credentialTtlMs?: number;
  leases?: LeaseManager;
  metrics?: MetricsCollector;
  logger?: Logger;
  now?: () => Date;
}

export interface VerifyOptions {
  /** Reject credential presentations addressed to someone else */
  audience?: string;
}

function verificationFailed(message: string): DataspaceError {
  return new DataspaceError('VerificationFailed', message);
}

export class ClaimsAuthority {
  private readonly keypair: Keypair;
  private readonly storage: StorageAdapter;
  private readonly revocations: RevocationRegistry;
  private readonly trustedIssuers = new Map<string, StatusResolver>();
  private readonly entitlementCheck: EntitlementCheck;
  private readonly tokenTtlMs: number;
  private readonly credentialTtlMs: number;
  private readonly leases: LeaseManager;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ClaimsAuthorityOptions) {
    this.keypair = options.keypair;
    this.storage = options.storage;
    this.revocations = new RevocationRegistry(options.storage, options.keypair);
    this.entitlementCheck = options.entitlementCheck ?? (() => true);
    this.tokenTtlMs = options.tokenTtlMs ?? 10 * 60 * 1000;
    this.credentialTtlMs = options.credentialTtlMs ?? 365 * 24 * 60 * 60 * 1000;
    this.leases = options.leases ?? new LeaseManager();
    this.metrics = options.metrics ?? globalMetrics;
    this.logger = options.logger ?? createLogger('ClaimsAuthority');
    this.now = options.now ?? (() => new Date());
  }

  /** Issuer id: the authority's public key. */
  get id(): string {
    return this.keypair.principal.id;
  }

  /**
   * Accept credentials from a foreign issuer. `resolver` answers revocation
   * queries for that issuer's credentials.
   */
  trustIssuer(issuerId: string, resolver: StatusResolver): void {
    this.trustedIssuers.set(issuerId, resolver);
  }

  isTrusted(issuerId: string): boolean {
    return issuerId === this.id || this.trustedIssuers.has(issuerId);
  }

  // ── Credentials ──

  async issueCredential(subjectId: string, claimSet: ClaimSet): Promise<Credential> {
    const entitled = await this.entitlementCheck(subjectId, claimSet);
    if (!entitled) {
      this.metrics.counter('claims.credentials.denied');
      this.logger.warn('Credential issuance denied', { subject: subjectId });
      throw new DataspaceError('IssuanceDenied', `Subject ${subjectId} is not entitled to the requested claims`);
    }

    const credential = createCredential(this.keypair, subjectId, claimSet, this.credentialTtlMs, this.now());
    await this.storage.saveCredential(credential);
    this.metrics.counter('claims.credentials.issued');
    this.logger.info('Credential issued', { credentialId: credential.id, subject: subjectId });
    return credential;
  }

  async checkRevocation(credentialId: string): Promise<{ revoked: boolean }> {
    return { revoked: await this.revocations.isRevoked(credentialId) };
  }

  /** @returns false when already revoked */
  async revokeCredential(credentialId: string): Promise<boolean> {
    return this.leases.run(`credential:${credentialId}`, async () => {
      const recorded = await this.revocations.revoke(credentialId, 'credential', this.now());
      if (recorded) {
        this.metrics.counter('claims.credentials.revoked');
        this.logger.info('Credential revoked', { credentialId });
      }
      return recorded;
    });
  }

  async credentialStatus(credential: Credential): Promise<CredentialStatus> {
    if (await this.isCredentialRevoked(credential)) return 'revoked';
    if (new Date(credential.expiresAt).getTime() <= this.now().getTime()) return 'expired';
    return 'valid';
  }

  // ── Presentations ──

  /**
   * Verify a presentation. Throws VerificationFailed with the first problem found.
   */
  async verifyPresentation(presentation: Presentation, options: VerifyOptions = {}): Promise<VerifiedPresentation> {
    const result = presentation.kind === 'token'
      ? await this.verifyTokenPresentation(presentation)
      : await this.verifyCredentialPresentation(presentation, options);
    this.metrics.counter('claims.presentations.verified', { kind: presentation.kind });
    return result;
  }

  private async verifyCredentialPresentation(
    presentation: CredentialPresentation,
    options: VerifyOptions,
  ): Promise<VerifiedPresentation> {
    if (!verifyPresentationSignature(presentation)) {
      throw verificationFailed('Presentation signature is invalid');
    }
    if (options.audience && presentation.audience && presentation.audience !== options.audience) {
      throw verificationFailed(`Presentation is addressed to ${presentation.audience}`);
    }

    const claims: ClaimSet = {};
    for (const credential of presentation.credentials) {
      if (!this.isTrusted(credential.issuer)) {
        throw verificationFailed(`Credential ${credential.id} comes from an untrusted issuer`);
      }
      if (!verifyCredentialSignature(credential)) {
        throw verificationFailed(`Credential ${credential.id} has an invalid signature`);
      }
      if (credential.subject !== presentation.holder) {
        throw verificationFailed(`Credential ${credential.id} was not issued to the presenter`);
      }
      if (new Date(credential.expiresAt).getTime() <= this.now().getTime()) {
        throw verificationFailed(`Credential ${credential.id} has expired`);
      }
      if (await this.isCredentialRevoked(credential)) {
        throw verificationFailed(`Credential ${credential.id} has been revoked`);
      }
      Object.assign(claims, credential.claims);
    }

    return { valid: true, subject: presentation.holder, claims };
  }

  private async verifyTokenPresentation(presentation: TokenPresentation): Promise<VerifiedPresentation> {
    const decoded = decodeToken(presentation.token);
    if (!decoded.ok) throw verificationFailed(decoded.error);
    const payload = decoded.value;
    if (payload.iss !== this.id) {
      throw verificationFailed('Token was issued by another authority');
    }

    const record = await this.storage.getToken(payload.jti);
    if (!record || record.value !== presentation.token) {
      throw verificationFailed(`Token ${payload.jti} is unknown`);
    }
    if (record.revoked || await this.revocations.isRevoked(record.id)) {
      throw verificationFailed(`Token ${payload.jti} has been revoked`);
    }
    if (new Date(payload.exp).getTime() <= this.now().getTime()) {
      throw verificationFailed(`Token ${payload.jti} has expired`);
    }

    return {
      valid: true,
      subject: payload.pid,
      claims: { processId: payload.pid, direction: payload.dir, issuer: payload.iss, expiresAt: payload.exp },
    };
  }

  private async isCredentialRevoked(credential: Credential): Promise<boolean> {
    if (credential.issuer === this.id) {
      return this.revocations.isRevoked(credential.id);
    }
    const resolver = this.trustedIssuers.get(credential.issuer);
    if (!resolver) {
      throw verificationFailed(`No status source for issuer ${credential.issuer}`);
    }
    try {
      return await resolver(credential.id);
    } catch (err) {
      throw new DataspaceError(
        'VerificationFailed',
        `Revocation status of ${credential.id} is unavailable: ${toError(err).message}`,
        { cause: err },
      );
    }
  }

  // ── Tokens ──

  /** Mint a new token. Never returns a token minted earlier for the same process. */
  async issueToken(transferProcessId: string, direction: TransferType): Promise<AccessToken> {
    const token = mintToken(this.keypair, transferProcessId, direction, this.tokenTtlMs, this.now());
    await this.storage.saveToken(token);
    this.metrics.counter('claims.tokens.issued', { direction });
    this.logger.info('Token issued', { tokenId: token.id, processId: transferProcessId, direction });
    return token;
  }

  /**
   * Revoke a token. Unknown and already-revoked ids are a successful no-op.
   * @returns true only when this call recorded the revocation
   */
  async revokeToken(tokenId: string): Promise<boolean> {
    return this.leases.run(`token:${tokenId}`, async () => {
      const token = await this.storage.getToken(tokenId);
      if (!token || token.revoked) return false;

      await this.revocations.revoke(tokenId, 'token', this.now());
      await this.storage.saveToken({ ...token, revoked: true });
      this.metrics.counter('claims.tokens.revoked', { direction: token.direction });
      this.logger.info('Token revoked', { tokenId, processId: token.processId });
      return true;
    });
  }

  async getToken(tokenId: string): Promise<AccessToken | null> {
    return this.storage.getToken(tokenId);
  }

  /** Tokens minted for a process that are neither revoked nor expired. */
  async liveTokens(processId: string): Promise<AccessToken[]> {
    const now = this.now().getTime();
    const tokens = await this.storage.listTokens(processId);
    return tokens.filter(t => !t.revoked && new Date(t.expiresAt).getTime() > now);
  }
}
