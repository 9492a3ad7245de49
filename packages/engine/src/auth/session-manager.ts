/**
 * Auth Session Manager
 * Unlock/lockout state machine and active-session bookkeeping, per vault identity.
 */

import { generateRandomBytes, bytesToBase64Url } from '../crypto/utils';
import {
  AuthenticationError,
  LockoutError,
  SessionExpiredError,
  VaultBusyError,
  VaultMissingError,
  IntegrityError,
} from '../errors/vault-errors';
import { createLogger } from '../logging/logger';
import { createSerialQueue, type SerialQueue } from '../vault/serial-queue';
import type { AuditLog } from '../audit/audit-log';
import type { UnlockedVault, VaultStore } from '../vault/vault-store';
import type { AuthSession, AuthState, LockoutState, SessionStatus } from '../types/session';
import type { VaultHeader } from '../types/vault';
import { LockoutTracker, type LockoutPolicy } from './lockout-tracker';

const logger = createLogger('AuthSession');

const SESSION_ID_BYTES = 32;

export interface AuthSessionManagerOptions extends LockoutPolicy {
  sessionTimeoutMs: number;
  audit: AuditLog;
  now?: () => number;
}

/** Which operation checked the passphrase */
type AuthPath = 'unlock' | 'integrity';

/** Why a session ended */
export type SessionEndReason = 'logout' | 'expired' | 'replaced' | 'shutdown';

interface ActiveSession {
  sessionId: string;
  vaultId: string;
  createdAt: number;
  lastActivityAt: number;
  vault: UnlockedVault;
}

function toHandle(entry: ActiveSession): AuthSession {
  return Object.freeze({
    sessionId: entry.sessionId,
    vaultId: entry.vaultId,
    createdAt: entry.createdAt,
    lastActivityAt: entry.lastActivityAt,
  });
}

export class AuthSessionManager {
  private readonly sessions = new Map<string, ActiveSession>();
  private readonly sessionByVault = new Map<string, string>();
  private readonly authenticating = new Set<string>();
  private readonly queues = new Map<string, SerialQueue>();
  private readonly lockouts: LockoutTracker;
  private readonly sessionTimeoutMs: number;
  private readonly audit: AuditLog;
  private readonly now: () => number;

  constructor(options: AuthSessionManagerOptions) {
    this.now = options.now ?? Date.now;
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.audit = options.audit;
    this.lockouts = new LockoutTracker(
      {
        maxFailedAttempts: options.maxFailedAttempts,
        lockoutDurationMs: options.lockoutDurationMs,
        failedAttemptWindowMs: options.failedAttemptWindowMs,
      },
      this.now
    );
  }

  private queueFor(vaultId: string): SerialQueue {
    let queue = this.queues.get(vaultId);
    if (!queue) {
      queue = createSerialQueue();
      this.queues.set(vaultId, queue);
    }
    return queue;
  }

  /**
   * Unlock `store` with `passphrase`.
   *
   * A locked-out vault is refused before any key derivation. A successful
   * unlock resets the failure count and replaces any earlier session on the
   * same vault.
   *
   * @throws LockoutError | AuthenticationError | VaultMissingError | VaultBusyError
   */
  authenticate(store: VaultStore, passphrase: string): Promise<AuthSession> {
    const vaultId = store.vaultId;
    return this.queueFor(vaultId)(async () => {
      this.assertNotLockedOut(vaultId, 'unlock');

      this.authenticating.add(vaultId);
      try {
        const vault = await this.unlock(store, passphrase);
        return this.startSession(vaultId, vault);
      } catch (error) {
        this.recordFailure(vaultId, error, 'unlock');
        throw error;
      } finally {
        this.authenticating.delete(vaultId);
      }
    });
  }

  /**
   * Run the vault's integrity check under the same lockout rules as unlock.
   * A failed decryption counts as a wrong passphrase; structural damage does
   * not. Success proves the passphrase and resets the failure count. Every
   * outcome is audited with `path: 'integrity'`.
   * @throws LockoutError | IntegrityError | VaultMissingError
   */
  checkIntegrity(store: VaultStore, passphrase: string): Promise<VaultHeader> {
    const vaultId = store.vaultId;
    return this.queueFor(vaultId)(async () => {
      this.assertNotLockedOut(vaultId, 'integrity');

      let header: VaultHeader;
      try {
        header = await store.verifyIntegrity(passphrase);
      } catch (error) {
        const counted = error instanceof IntegrityError && error.reason === 'decryption_failed';
        this.recordFailure(vaultId, counted ? new AuthenticationError() : error, 'integrity');
        throw error;
      }

      this.lockouts.reset(vaultId);
      this.audit.append('auth_success', vaultId, { vaultId, path: 'integrity' });
      return header;
    });
  }

  /**
   * @throws LockoutError
   */
  private assertNotLockedOut(vaultId: string, path: AuthPath): void {
    const check = this.lockouts.check(vaultId);
    if (!check.allowed) {
      this.audit.append('auth_lockout', vaultId, { lockedUntil: check.lockedUntil, path });
      logger.warn('Authentication refused while locked out', { vaultId, lockedUntil: check.lockedUntil, path });
      throw new LockoutError(check.lockedUntil);
    }
  }

  private async unlock(store: VaultStore, passphrase: string): Promise<UnlockedVault> {
    const existingId = this.sessionByVault.get(store.vaultId);
    if (existingId !== undefined) {
      // the running session holds the file lock; prove the passphrase before ending it
      try {
        await store.verifyIntegrity(passphrase);
      } catch (error) {
        if (error instanceof IntegrityError) {
          throw new AuthenticationError();
        }
        throw error;
      }
      await this.endSession(existingId, 'replaced');
    }
    return store.open(passphrase);
  }

  private startSession(vaultId: string, vault: UnlockedVault): AuthSession {
    this.lockouts.reset(vaultId);

    const now = this.now();
    const entry: ActiveSession = {
      sessionId: bytesToBase64Url(generateRandomBytes(SESSION_ID_BYTES)),
      vaultId,
      createdAt: now,
      lastActivityAt: now,
      vault,
    };
    this.sessions.set(entry.sessionId, entry);
    this.sessionByVault.set(vaultId, entry.sessionId);

    this.audit.append('auth_success', entry.sessionId, { vaultId, path: 'unlock' });
    logger.info('Session started', { vaultId });
    return toHandle(entry);
  }

  private recordFailure(vaultId: string, error: unknown, path: AuthPath): void {
    if (error instanceof AuthenticationError) {
      const state = this.lockouts.recordFailure(vaultId);
      this.audit.append('auth_failure', vaultId, {
        reason: 'invalid_credentials',
        failedAttempts: state.failedAttemptCount,
        lockedUntil: state.lockedUntil,
        path,
      });
      if (state.lockedUntil !== null) {
        logger.warn('Vault locked out after repeated failures', { vaultId, lockedUntil: state.lockedUntil });
      }
      return;
    }

    // not a guess at the passphrase, so it does not count toward a lockout
    const reason =
      error instanceof VaultMissingError
        ? 'vault_missing'
        : error instanceof VaultBusyError
          ? 'vault_busy'
          : error instanceof IntegrityError
            ? error.reason
            : 'error';
    this.audit.append('auth_failure', vaultId, { reason, path });
    if (reason === 'error') {
      logger.error('Authentication failed unexpectedly', { vaultId, error });
    }
  }

  private async endSession(sessionId: string, reason: SessionEndReason): Promise<void> {
    const entry = this.sessions.get(sessionId);
    if (!entry) return;

    this.sessions.delete(sessionId);
    if (this.sessionByVault.get(entry.vaultId) === sessionId) {
      this.sessionByVault.delete(entry.vaultId);
    }
    await entry.vault.close();
    logger.info('Session ended', { vaultId: entry.vaultId, reason });
  }

  private isEntryExpired(entry: ActiveSession): boolean {
    return this.now() - entry.lastActivityAt > this.sessionTimeoutMs;
  }

  /**
   * Whether the session has idled past the timeout. Unknown sessions count as expired.
   */
  isExpired(session: AuthSession): boolean {
    const entry = this.sessions.get(session.sessionId);
    return !entry || this.isEntryExpired(entry);
  }

  /**
   * Record activity on a live session.
   * @throws SessionExpiredError
   */
  async touch(session: AuthSession): Promise<AuthSession> {
    const entry = await this.requireEntry(session);
    return toHandle(entry);
  }

  private async requireEntry(session: AuthSession): Promise<ActiveSession> {
    const entry = this.sessions.get(session.sessionId);
    if (!entry) {
      throw new SessionExpiredError();
    }
    if (this.isEntryExpired(entry)) {
      await this.endSession(entry.sessionId, 'expired');
      this.audit.append('session_expired', entry.sessionId, { vaultId: entry.vaultId });
      throw new SessionExpiredError();
    }
    entry.lastActivityAt = this.now();
    return entry;
  }

  /**
   * Resolve a live session to its unlocked vault, touching it.
   * @throws SessionExpiredError for unknown, ended or idle sessions
   */
  async requireVault(session: AuthSession): Promise<UnlockedVault> {
    const entry = await this.requireEntry(session);
    return entry.vault;
  }

  /**
   * End the session now: the key is zeroed and the vault file lock released.
   * @throws SessionExpiredError if the session is not known
   */
  async logout(session: AuthSession): Promise<void> {
    if (!this.sessions.has(session.sessionId)) {
      throw new SessionExpiredError();
    }
    await this.endSession(session.sessionId, 'logout');
    this.audit.append('logout', session.sessionId, { vaultId: session.vaultId });
  }

  /** End every session, e.g. before process exit */
  async shutdown(): Promise<void> {
    for (const sessionId of Array.from(this.sessions.keys())) {
      await this.endSession(sessionId, 'shutdown');
    }
  }

  /**
   * @throws SessionExpiredError
   */
  async getStatus(session: AuthSession): Promise<SessionStatus> {
    const entry = await this.requireEntry(session);
    return {
      sessionId: entry.sessionId,
      createdAt: entry.createdAt,
      lastActivityAt: entry.lastActivityAt,
      expiresAt: entry.lastActivityAt + this.sessionTimeoutMs,
    };
  }

  getState(vaultId: string): AuthState {
    if (this.authenticating.has(vaultId)) return 'authenticating';
    if (this.lockouts.isLockedOut(vaultId)) return 'locked_out';

    const sessionId = this.sessionByVault.get(vaultId);
    const entry = sessionId !== undefined ? this.sessions.get(sessionId) : undefined;
    if (entry && !this.isEntryExpired(entry)) return 'unlocked';
    return 'idle';
  }

  getLockoutState(vaultId: string): LockoutState {
    return this.lockouts.getState(vaultId);
  }
}
