import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AuthSessionManager } from '../session-manager';
import { AuditLog } from '../../audit/audit-log';
import { VaultStore } from '../../vault/vault-store';
import {
  AuthenticationError,
  IntegrityError,
  LockoutError,
  SessionExpiredError,
  VaultMissingError,
} from '../../errors/vault-errors';
import { setLogLevel } from '../../logging/logger';

const PASSPHRASE = 'Tr0ub4dor&3';
const TIMEOUT = 300_000;
const LOCKOUT = 300_000;

describe('Auth Session Manager', () => {
  let dir: string;
  let clock: number;
  let audit: AuditLog;
  let store: VaultStore;
  let sessions: AuthSessionManager;

  const now = () => clock;
  const kinds = () => audit.entries().map(entry => entry.kind);

  beforeEach(async () => {
    setLogLevel('silent');
    dir = mkdtempSync(join(tmpdir(), 'keycase-auth-'));
    clock = 1_700_000_000_000;
    audit = new AuditLog({ now });
    store = new VaultStore({ vaultPath: join(dir, 'vault.keycase'), kdfIterations: 1_000, now });
    await store.create(PASSPHRASE);
    sessions = new AuthSessionManager({
      sessionTimeoutMs: TIMEOUT,
      maxFailedAttempts: 5,
      lockoutDurationMs: LOCKOUT,
      failedAttemptWindowMs: 900_000,
      audit,
      now,
    });
  });

  afterEach(async () => {
    await sessions.shutdown();
    rmSync(dir, { recursive: true, force: true });
    setLogLevel('info');
  });

  describe('authenticate', () => {
    it('should open the vault and start a session', async () => {
      const session = await sessions.authenticate(store, PASSPHRASE);

      expect(session.vaultId).toBe(store.vaultId);
      expect(session.createdAt).toBe(clock);
      expect(session.lastActivityAt).toBe(clock);
      expect(session.sessionId).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(Object.isFrozen(session)).toBe(true);
      expect(sessions.getState(store.vaultId)).toBe('unlocked');

      const vault = await sessions.requireVault(session);
      expect(vault.list()).toEqual([]);

      const [entry] = audit.entries();
      expect(entry).toMatchObject({ kind: 'auth_success', subjectId: session.sessionId, details: { vaultId: store.vaultId } });
    });

    it('should reject a wrong passphrase and count it', async () => {
      await expect(sessions.authenticate(store, 'wrong')).rejects.toBeInstanceOf(AuthenticationError);

      expect(sessions.getLockoutState(store.vaultId)).toEqual({
        failedAttemptCount: 1,
        firstFailureAt: clock,
        lockedUntil: null,
      });
      expect(audit.entries()[0]).toMatchObject({
        kind: 'auth_failure',
        subjectId: store.vaultId,
        details: { reason: 'invalid_credentials', failedAttempts: 1, lockedUntil: null },
      });
      expect(sessions.getState(store.vaultId)).toBe('idle');
    });

    it('should lock out after five failures, even for the right passphrase', async () => {
      for (let i = 0; i < 5; i++) {
        await expect(sessions.authenticate(store, `wrong-${i}`)).rejects.toBeInstanceOf(AuthenticationError);
      }

      const attempt = sessions.authenticate(store, PASSPHRASE);
      await expect(attempt).rejects.toBeInstanceOf(LockoutError);
      await expect(attempt).rejects.toMatchObject({ lockedUntil: clock + LOCKOUT });
      expect(sessions.getState(store.vaultId)).toBe('locked_out');
      expect(kinds()).toEqual([
        'auth_failure',
        'auth_failure',
        'auth_failure',
        'auth_failure',
        'auth_failure',
        'auth_lockout',
      ]);

      clock += LOCKOUT;
      const session = await sessions.authenticate(store, PASSPHRASE);
      expect(session.vaultId).toBe(store.vaultId);
      expect(sessions.getLockoutState(store.vaultId).failedAttemptCount).toBe(0);
    });

    it('should reset the failure count on success', async () => {
      await expect(sessions.authenticate(store, 'wrong')).rejects.toThrow();
      await sessions.authenticate(store, PASSPHRASE);

      expect(sessions.getLockoutState(store.vaultId)).toEqual({
        failedAttemptCount: 0,
        firstFailureAt: null,
        lockedUntil: null,
      });
    });

    it('should not count a missing vault toward lockout', async () => {
      const missing = new VaultStore({ vaultPath: join(dir, 'absent.keycase'), kdfIterations: 1_000, now });

      await expect(sessions.authenticate(missing, PASSPHRASE)).rejects.toBeInstanceOf(VaultMissingError);

      expect(sessions.getLockoutState(missing.vaultId).failedAttemptCount).toBe(0);
      expect(audit.entries()[0]).toMatchObject({ kind: 'auth_failure', details: { reason: 'vault_missing' } });
    });

    it('should replace an earlier session on the same vault', async () => {
      const first = await sessions.authenticate(store, PASSPHRASE);
      const firstVault = await sessions.requireVault(first);

      const second = await sessions.authenticate(store, PASSPHRASE);

      expect(second.sessionId).not.toBe(first.sessionId);
      expect(firstVault.isClosed).toBe(true);
      await expect(sessions.requireVault(first)).rejects.toBeInstanceOf(SessionExpiredError);
      expect((await sessions.requireVault(second)).isClosed).toBe(false);
    });

    it('should keep the running session when a second unlock fails', async () => {
      const first = await sessions.authenticate(store, PASSPHRASE);

      await expect(sessions.authenticate(store, 'wrong')).rejects.toBeInstanceOf(AuthenticationError);

      expect((await sessions.requireVault(first)).isClosed).toBe(false);
      expect(sessions.getLockoutState(store.vaultId).failedAttemptCount).toBe(1);
    });
  });

  describe('expiry', () => {
    it('should expire a session idle longer than the timeout', async () => {
      const session = await sessions.authenticate(store, PASSPHRASE);
      const vault = await sessions.requireVault(session);

      clock += TIMEOUT + 1;
      expect(sessions.isExpired(session)).toBe(true);
      await expect(sessions.requireVault(session)).rejects.toBeInstanceOf(SessionExpiredError);

      expect(vault.isClosed).toBe(true);
      expect(kinds()).toEqual(['auth_success', 'session_expired']);
      expect(sessions.getState(store.vaultId)).toBe('idle');

      // destroyed, so a second use reports expiry without another audit entry
      await expect(sessions.requireVault(session)).rejects.toBeInstanceOf(SessionExpiredError);
      expect(audit.length).toBe(2);
    });

    it('should not expire at exactly the timeout', async () => {
      const session = await sessions.authenticate(store, PASSPHRASE);
      clock += TIMEOUT;
      expect(sessions.isExpired(session)).toBe(false);
      await expect(sessions.requireVault(session)).resolves.toBeDefined();
    });

    it('should extend the session on every touch', async () => {
      const session = await sessions.authenticate(store, PASSPHRASE);

      clock += TIMEOUT - 1;
      const touched = await sessions.touch(session);
      expect(touched.lastActivityAt).toBe(clock);

      clock += TIMEOUT - 1;
      expect(sessions.isExpired(session)).toBe(false);
      const status = await sessions.getStatus(session);
      expect(status).toEqual({
        sessionId: session.sessionId,
        createdAt: session.createdAt,
        lastActivityAt: clock,
        expiresAt: clock + TIMEOUT,
      });
    });

    it('should treat an unknown session as expired', async () => {
      const forged = { sessionId: 'forged', vaultId: store.vaultId, createdAt: clock, lastActivityAt: clock };
      expect(sessions.isExpired(forged)).toBe(true);
      await expect(sessions.requireVault(forged)).rejects.toBeInstanceOf(SessionExpiredError);
    });
  });

  describe('logout', () => {
    it('should close the vault and end the session immediately', async () => {
      const session = await sessions.authenticate(store, PASSPHRASE);
      const vault = await sessions.requireVault(session);

      await sessions.logout(session);

      expect(vault.isClosed).toBe(true);
      await expect(sessions.requireVault(session)).rejects.toBeInstanceOf(SessionExpiredError);
      await expect(sessions.logout(session)).rejects.toBeInstanceOf(SessionExpiredError);
      expect(kinds()).toEqual(['auth_success', 'logout']);
    });

    it('should release the vault for the next unlock', async () => {
      const session = await sessions.authenticate(store, PASSPHRASE);
      await sessions.logout(session);

      const other = new VaultStore({ vaultPath: join(dir, 'vault.keycase'), kdfIterations: 1_000, now });
      const handle = await other.open(PASSPHRASE);
      expect(handle.list()).toEqual([]);
      await handle.close();
    });
  });

  describe('integrity check', () => {
    it('should report the header of a healthy vault and audit the check', async () => {
      const header = await sessions.checkIntegrity(store, PASSPHRASE);
      expect(header.kdfIterations).toBe(1_000);
      expect(audit.entries().map(entry => [entry.kind, entry.subjectId, entry.details])).toEqual([
        ['auth_success', store.vaultId, { vaultId: store.vaultId, path: 'integrity' }],
      ]);
    });

    it('should count a failed decryption as a failed attempt', async () => {
      await expect(sessions.checkIntegrity(store, 'wrong')).rejects.toBeInstanceOf(IntegrityError);
      expect(sessions.getLockoutState(store.vaultId).failedAttemptCount).toBe(1);
      expect(audit.entries().map(entry => entry.details)).toEqual([
        { reason: 'invalid_credentials', failedAttempts: 1, lockedUntil: null, path: 'integrity' },
      ]);
    });

    it('should audit structural damage without counting it', async () => {
      writeFileSync(join(dir, 'vault.keycase'), Uint8Array.from([1, 2, 3]));

      await expect(sessions.checkIntegrity(store, PASSPHRASE)).rejects.toMatchObject({ reason: 'truncated' });
      expect(sessions.getLockoutState(store.vaultId).failedAttemptCount).toBe(0);
      expect(audit.entries().map(entry => [entry.kind, entry.details])).toEqual([
        ['auth_failure', { reason: 'truncated', path: 'integrity' }],
      ]);
    });

    it('should reset the failure count when the passphrase checks out', async () => {
      await expect(sessions.authenticate(store, 'wrong-1')).rejects.toBeInstanceOf(AuthenticationError);
      await expect(sessions.authenticate(store, 'wrong-2')).rejects.toBeInstanceOf(AuthenticationError);

      await sessions.checkIntegrity(store, PASSPHRASE);
      expect(sessions.getLockoutState(store.vaultId).failedAttemptCount).toBe(0);
      expect(audit.entries().map(entry => entry.kind)).toEqual(['auth_failure', 'auth_failure', 'auth_success']);
    });

    it('should refuse while locked out', async () => {
      for (let i = 0; i < 5; i++) {
        await expect(sessions.authenticate(store, 'wrong')).rejects.toThrow();
      }
      await expect(sessions.checkIntegrity(store, PASSPHRASE)).rejects.toBeInstanceOf(LockoutError);
    });
  });
});
