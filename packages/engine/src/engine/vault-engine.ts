/**
 * Vault Engine
 * The operation surface handed to a presentation layer. Every call resolves to
 * a value or rejects with a VaultError, and writes one audit entry when it
 * touches credentials, authentication or shares.
 */

import { z } from 'zod';
import { AuditLog } from '../audit/audit-log';
import { AuthSessionManager } from '../auth/session-manager';
import { loadConfigFromEnv, resolveConfig, type EngineConfig, type EngineConfigInput } from '../config/engine-config';
import { assertPassphraseStrength } from '../crypto/passphrase-policy';
import { ValidationError } from '../errors/vault-errors';
import { createLogger, setLogLevel } from '../logging/logger';
import { rejectionError, ShareTokenService } from '../sharing/share-token-service';
import { buildSearchPredicate, sortCredentials } from '../vault/credential-search';
import { parseCredentialFields, parseCredentialUpdate } from '../vault/record-schema';
import { VaultStore } from '../vault/vault-store';
import type {
  AuditLogEntry,
  AuthSession,
  AuthState,
  CredentialFields,
  CredentialRecord,
  CredentialUpdate,
  IssuedShare,
  LockoutState,
  SessionStatus,
  SharedCredential,
  ShareSummary,
  VaultHeader,
  VaultStats,
} from '../types';

const logger = createLogger('VaultEngine');

const IdSchema = z.string().min(1).max(256);
const PassphraseSchema = z.string();
const TokenSchema = z.string().max(512);
const QuerySchema = z.object({
  query: z.string().max(256).optional(),
  tags: z.array(z.string().max(100)).max(50).optional(),
});
const TtlSchema = z.number().optional();
const LimitSchema = z.number().int().positive().optional();

function parseInput<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${label}`,
      parsed.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }
  return parsed.data;
}

export interface VaultEngineOptions {
  /** Clock shared by sessions, lockouts, shares, records and the audit log */
  now?: () => number;
}

export interface ImportResult {
  added: number;
  replaced: number;
}

export interface IntegrityReport {
  formatVersion: number;
  kdfIterations: number;
}

export class VaultEngine {
  readonly config: EngineConfig;
  private readonly store: VaultStore;
  private readonly audit: AuditLog;
  private readonly sessions: AuthSessionManager;
  private readonly shares: ShareTokenService;

  /**
   * @throws ValidationError for bad configuration
   * @throws TamperDetectedError when the persisted audit log cannot be read
   */
  constructor(input: EngineConfigInput, options: VaultEngineOptions = {}) {
    this.config = resolveConfig(input);
    setLogLevel(this.config.logLevel);

    const now = options.now ?? Date.now;
    this.store = new VaultStore({
      vaultPath: this.config.vaultPath,
      kdfIterations: this.config.kdfIterations,
      now,
    });
    this.audit = AuditLog.load({ path: this.config.auditLogPath, now });
    this.sessions = new AuthSessionManager({
      sessionTimeoutMs: this.config.sessionTimeoutMs,
      maxFailedAttempts: this.config.maxFailedAttempts,
      lockoutDurationMs: this.config.lockoutDurationMs,
      failedAttemptWindowMs: this.config.failedAttemptWindowMs,
      audit: this.audit,
      now,
    });
    this.shares = new ShareTokenService({
      maxFailedAttempts: this.config.maxFailedAttempts,
      defaultTtlMs: this.config.defaultShareTtlMs,
      maxTtlMs: this.config.maxShareTtlMs,
      tombstoneRetentionMs: this.config.shareTombstoneRetentionMs,
      kdfIterations: this.config.kdfIterations,
      now,
    });

    logger.debug('Engine ready', { vaultPath: this.config.vaultPath, auditEntries: this.audit.length });
  }

  /** Engine configured from KEYCASE_* environment variables */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, options: VaultEngineOptions = {}): VaultEngine {
    return new VaultEngine(loadConfigFromEnv(env), options);
  }

  get vaultId(): string {
    return this.store.vaultId;
  }

  // ==================== Vault lifecycle ====================

  /**
   * @throws ValidationError | VaultExistsError
   */
  async createVault(passphrase: string): Promise<void> {
    assertPassphraseStrength(parseInput(PassphraseSchema, passphrase, 'passphrase'));
    const header = await this.store.create(passphrase);
    this.audit.append('vault_created', this.store.vaultId, {
      formatVersion: header.formatVersion,
      kdfIterations: header.kdfIterations,
    });
  }

  async vaultExists(): Promise<boolean> {
    return this.store.exists();
  }

  /**
   * @throws LockoutError | AuthenticationError | VaultMissingError | VaultBusyError
   */
  async authenticate(passphrase: string): Promise<AuthSession> {
    return this.sessions.authenticate(this.store, parseInput(PassphraseSchema, passphrase, 'passphrase'));
  }

  /**
   * @throws SessionExpiredError
   */
  async logout(session: AuthSession): Promise<void> {
    await this.sessions.logout(session);
  }

  /** End every session; call before the process exits */
  async shutdown(): Promise<void> {
    await this.sessions.shutdown();
  }

  // ==================== Credentials ====================

  async listCredentials(session: AuthSession): Promise<CredentialRecord[]> {
    const vault = await this.sessions.requireVault(session);
    const records = sortCredentials(vault.list());
    this.audit.append('credential_listed', session.sessionId, { count: records.length });
    return records;
  }

  /**
   * @throws NotFoundError
   */
  async getCredential(session: AuthSession, id: string): Promise<CredentialRecord> {
    const vault = await this.sessions.requireVault(session);
    const record = vault.get(parseInput(IdSchema, id, 'credential id'));
    this.audit.append('credential_viewed', record.id, { sessionId: session.sessionId });
    return record;
  }

  /**
   * @throws ValidationError
   */
  async addCredential(session: AuthSession, fields: CredentialFields): Promise<CredentialRecord> {
    const vault = await this.sessions.requireVault(session);
    const record = await vault.add(parseCredentialFields(fields));
    this.audit.append('credential_added', record.id, { serviceName: record.serviceName });
    return record;
  }

  /**
   * @throws ValidationError | NotFoundError
   */
  async updateCredential(session: AuthSession, id: string, fields: CredentialUpdate): Promise<CredentialRecord> {
    const vault = await this.sessions.requireVault(session);
    const credentialId = parseInput(IdSchema, id, 'credential id');
    const update = parseCredentialUpdate(fields);
    const record = await vault.update(credentialId, update);
    this.audit.append('credential_updated', record.id, { fields: Object.keys(update).sort() });
    return record;
  }

  /**
   * @throws NotFoundError
   */
  async deleteCredential(session: AuthSession, id: string): Promise<void> {
    const vault = await this.sessions.requireVault(session);
    const deleted = await vault.delete(parseInput(IdSchema, id, 'credential id'));
    this.audit.append('credential_deleted', deleted.id, { serviceName: deleted.serviceName });
  }

  /**
   * Case-insensitive match on service name, username, url and notes; any-tag match.
   */
  async search(session: AuthSession, query?: string, tags?: string[]): Promise<CredentialRecord[]> {
    const vault = await this.sessions.requireVault(session);
    const criteria = parseInput(QuerySchema, { query, tags }, 'search query');
    const results = sortCredentials(vault.search(buildSearchPredicate(criteria)));
    this.audit.append('credential_searched', session.sessionId, {
      matches: results.length,
      tags: criteria.tags ?? [],
    });
    return results;
  }

  /**
   * @throws ValidationError when the new passphrase is too weak
   * @throws AuthenticationError when `oldPassphrase` is wrong
   */
  async changePassphrase(session: AuthSession, oldPassphrase: string, newPassphrase: string): Promise<void> {
    const vault = await this.sessions.requireVault(session);
    parseInput(PassphraseSchema, oldPassphrase, 'passphrase');
    assertPassphraseStrength(parseInput(PassphraseSchema, newPassphrase, 'new passphrase'), 'New passphrase');
    await vault.changePassphrase(oldPassphrase, newPassphrase);
    this.audit.append('passphrase_changed', this.store.vaultId, { sessionId: session.sessionId });
  }

  // ==================== Backup ====================

  /**
   * @returns a self-contained bundle sealed under `exportPassphrase`
   * @throws ValidationError when the export passphrase is too weak
   */
  async exportVault(session: AuthSession, exportPassphrase: string): Promise<string> {
    const vault = await this.sessions.requireVault(session);
    assertPassphraseStrength(parseInput(PassphraseSchema, exportPassphrase, 'export passphrase'), 'Export passphrase');
    const { blob, count } = await vault.exportBundle(exportPassphrase);
    this.audit.append('vault_exported', this.store.vaultId, { count });
    return blob;
  }

  /**
   * Merge a bundle into the unlocked vault. Nothing is merged unless the whole
   * bundle verifies.
   * @throws IntegrityError on a wrong passphrase or a damaged bundle
   */
  async importVault(session: AuthSession, blob: string, exportPassphrase: string): Promise<ImportResult> {
    const vault = await this.sessions.requireVault(session);
    const records = await this.store.readBundle(
      parseInput(z.string(), blob, 'export bundle'),
      parseInput(PassphraseSchema, exportPassphrase, 'export passphrase')
    );
    const result = await vault.importRecords(records);
    this.audit.append('vault_imported', this.store.vaultId, { added: result.added, replaced: result.replaced });
    return result;
  }

  // ==================== Sharing ====================

  /**
   * @throws NotFoundError | ValidationError
   */
  async issueShare(
    session: AuthSession,
    credentialId: string,
    ttlMs?: number,
    sharePassphrase?: string
  ): Promise<IssuedShare> {
    const vault = await this.sessions.requireVault(session);
    const issued = await this.shares.issue(vault, parseInput(IdSchema, credentialId, 'credential id'), {
      ttlMs: parseInput(TtlSchema, ttlMs, 'share ttl'),
      sharePassphrase: parseInput(PassphraseSchema.optional(), sharePassphrase, 'share passphrase'),
    });
    this.audit.append('share_issued', issued.tokenId, {
      credentialId: issued.credentialId,
      expiresAt: issued.expiresAt,
      passphraseProtected: issued.passphraseProtected,
    });
    return issued;
  }

  /**
   * Needs no session: the token itself carries the decryption key.
   * @throws NotFoundError | TokenExpiredError | AuthenticationError
   */
  async redeemShare(token: string, sharePassphrase?: string): Promise<SharedCredential> {
    const outcome = await this.shares.redeem(
      parseInput(TokenSchema, token, 'share token'),
      parseInput(PassphraseSchema.optional(), sharePassphrase, 'share passphrase')
    );

    if (!outcome.ok) {
      this.audit.append('share_rejected', outcome.tokenId ?? 'unknown', {
        reason: outcome.rejection,
        credentialId: outcome.credentialId,
      });
      throw rejectionError(outcome.rejection);
    }

    this.audit.append('share_redeemed', outcome.tokenId, { credentialId: outcome.credentialId });
    return outcome.credential;
  }

  /**
   * @returns false when the token was already used, expired or revoked
   * @throws NotFoundError
   */
  async revokeShare(session: AuthSession, tokenId: string): Promise<boolean> {
    await this.sessions.requireVault(session);
    const revoked = this.shares.revoke(parseInput(IdSchema, tokenId, 'token id'));
    this.audit.append('share_revoked', tokenId, { wasActive: revoked });
    return revoked;
  }

  async listShares(session: AuthSession, credentialId?: string): Promise<ShareSummary[]> {
    await this.sessions.requireVault(session);
    this.shares.purgeExpired();
    return this.shares.listActive(parseInput(IdSchema.optional(), credentialId, 'credential id'));
  }

  // ==================== Audit & diagnostics ====================

  /**
   * Entries oldest first; with `limit`, only the most recent ones. The read
   * itself is recorded before the entries are returned.
   */
  async readAuditLog(session: AuthSession, limit?: number): Promise<AuditLogEntry[]> {
    await this.sessions.requireVault(session);
    const count = parseInput(LimitSchema, limit, 'limit');
    this.audit.append('audit_log_read', session.sessionId, { limit: count ?? null });
    const entries = this.audit.entries();
    return count === undefined ? entries : entries.slice(-count);
  }

  /**
   * @returns number of verified entries
   * @throws TamperDetectedError
   */
  async verifyAuditLog(): Promise<number> {
    return this.audit.verifyChain();
  }

  /**
   * Says why a vault will not open, where `authenticate` only says that it did not.
   * @throws LockoutError | IntegrityError | VaultMissingError
   */
  async verifyIntegrity(passphrase: string): Promise<IntegrityReport> {
    const header: VaultHeader = await this.sessions.checkIntegrity(
      this.store,
      parseInput(PassphraseSchema, passphrase, 'passphrase')
    );
    return { formatVersion: header.formatVersion, kdfIterations: header.kdfIterations };
  }

  async getVaultStats(session: AuthSession): Promise<VaultStats> {
    const vault = await this.sessions.requireVault(session);
    return vault.stats();
  }

  async getSessionStatus(session: AuthSession): Promise<SessionStatus> {
    return this.sessions.getStatus(session);
  }

  getAuthState(): AuthState {
    return this.sessions.getState(this.store.vaultId);
  }

  getLockoutState(): LockoutState {
    return this.sessions.getLockoutState(this.store.vaultId);
  }
}
