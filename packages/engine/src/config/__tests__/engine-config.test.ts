import { describe, it, expect } from 'vitest';
import { MAX_KDF_ITERATIONS, MIN_KDF_ITERATIONS, loadConfigFromEnv, resolveConfig } from '../engine-config';
import { ValidationError } from '../../errors/vault-errors';

describe('Engine Config', () => {
  it('should apply defaults', () => {
    expect(resolveConfig({ vaultPath: '/tmp/test.keycase' })).toEqual({
      vaultPath: '/tmp/test.keycase',
      auditLogPath: '/tmp/test.keycase.audit.jsonl',
      sessionTimeoutMs: 300_000,
      maxFailedAttempts: 5,
      lockoutDurationMs: 300_000,
      failedAttemptWindowMs: 900_000,
      kdfIterations: 600_000,
      defaultShareTtlMs: 3_600_000,
      maxShareTtlMs: 604_800_000,
      shareTombstoneRetentionMs: 86_400_000,
      logLevel: 'info',
    });
  });

  it('should keep an explicit audit log path', () => {
    const config = resolveConfig({ vaultPath: 'a.keycase', auditLogPath: 'logs/audit.jsonl' });
    expect(config.auditLogPath).toBe('logs/audit.jsonl');
  });

  it('should reject iteration counts outside the accepted range', () => {
    expect(() => resolveConfig({ vaultPath: 'v', kdfIterations: MIN_KDF_ITERATIONS - 1 })).toThrow(ValidationError);
    expect(() => resolveConfig({ vaultPath: 'v', kdfIterations: MAX_KDF_ITERATIONS + 1 })).toThrow(ValidationError);
    expect(resolveConfig({ vaultPath: 'v', kdfIterations: MIN_KDF_ITERATIONS }).kdfIterations).toBe(100_000);
  });

  it('should list each offending field', () => {
    try {
      resolveConfig({ vaultPath: '', maxFailedAttempts: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.message).toBe('Invalid engine configuration');
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^vaultPath: /);
      expect(error.issues[1]).toMatch(/^maxFailedAttempts: /);
    }
  });

  it('should reject a default share ttl above the maximum', () => {
    try {
      resolveConfig({ vaultPath: 'v', defaultShareTtlMs: 2000, maxShareTtlMs: 1000 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.issues).toEqual(['defaultShareTtlMs: defaultShareTtlMs must not exceed maxShareTtlMs']);
    }
  });

  it('should read KEYCASE_* variables', () => {
    const config = loadConfigFromEnv({
      KEYCASE_VAULT_PATH: '/data/vault.keycase',
      KEYCASE_SESSION_TIMEOUT_MS: '60000',
      KEYCASE_MAX_FAILED_ATTEMPTS: '3',
      KEYCASE_KDF_ITERATIONS: '200000',
      KEYCASE_LOG_LEVEL: 'warn',
      KEYCASE_SHARE_TOMBSTONE_RETENTION_MS: '0',
    });

    expect(config.vaultPath).toBe('/data/vault.keycase');
    expect(config.auditLogPath).toBe('/data/vault.keycase.audit.jsonl');
    expect(config.sessionTimeoutMs).toBe(60_000);
    expect(config.maxFailedAttempts).toBe(3);
    expect(config.kdfIterations).toBe(200_000);
    expect(config.logLevel).toBe('warn');
    expect(config.lockoutDurationMs).toBe(300_000);
    expect(config.shareTombstoneRetentionMs).toBe(0);
  });

  it('should fall back to defaults for unset or empty variables', () => {
    const config = loadConfigFromEnv({ KEYCASE_SESSION_TIMEOUT_MS: '' });
    expect(config.vaultPath).toBe('vault.keycase');
    expect(config.sessionTimeoutMs).toBe(300_000);
  });

  it('should reject values that are not numbers', () => {
    expect(() => loadConfigFromEnv({ KEYCASE_MAX_FAILED_ATTEMPTS: 'five' })).toThrow('Invalid engine configuration');
    expect(() => loadConfigFromEnv({ KEYCASE_LOG_LEVEL: 'verbose' })).toThrow(ValidationError);
  });
});
