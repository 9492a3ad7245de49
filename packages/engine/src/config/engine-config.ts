/**
 * Engine configuration
 * Supplied by the host process; validated here before anything else runs.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/vault-errors';

/** Minimum PBKDF2 iteration count accepted for a new vault */
export const MIN_KDF_ITERATIONS = 100_000;

/** Upper bound accepted from a vault header, so a forged header cannot stall unlock */
export const MAX_KDF_ITERATIONS = 10_000_000;

const MINUTE_MS = 60 * 1000;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const EngineConfigSchema = z
  .object({
    vaultPath: z.string().min(1),
    auditLogPath: z.string().min(1).optional(),
    sessionTimeoutMs: z.number().int().positive().default(5 * MINUTE_MS),
    maxFailedAttempts: z.number().int().min(1).default(5),
    lockoutDurationMs: z.number().int().positive().default(5 * MINUTE_MS),
    failedAttemptWindowMs: z.number().int().positive().default(15 * MINUTE_MS),
    kdfIterations: z.number().int().min(MIN_KDF_ITERATIONS).max(MAX_KDF_ITERATIONS).default(600_000),
    defaultShareTtlMs: z.number().int().positive().default(60 * MINUTE_MS),
    maxShareTtlMs: z.number().int().positive().default(7 * 24 * 60 * MINUTE_MS),
    /** How long a spent or expired share id keeps answering "expired" before it is forgotten */
    shareTombstoneRetentionMs: z.number().int().nonnegative().default(24 * 60 * MINUTE_MS),
    logLevel: LogLevelSchema.default('info'),
  })
  .refine(config => config.defaultShareTtlMs <= config.maxShareTtlMs, {
    message: 'defaultShareTtlMs must not exceed maxShareTtlMs',
    path: ['defaultShareTtlMs'],
  });

/** Options as the host passes them (defaults not yet applied) */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export interface EngineConfig extends Omit<z.output<typeof EngineConfigSchema>, 'auditLogPath'> {
  auditLogPath: string;
}

/**
 * Apply defaults and validate.
 * @throws ValidationError listing every offending field
 */
export function resolveConfig(input: EngineConfigInput): EngineConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid engine configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    ...parsed.data,
    auditLogPath: parsed.data.auditLogPath ?? `${parsed.data.vaultPath}.audit.jsonl`,
  };
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Build configuration from KEYCASE_* environment variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const input = {
    vaultPath: env.KEYCASE_VAULT_PATH || 'vault.keycase',
    auditLogPath: env.KEYCASE_AUDIT_LOG_PATH || undefined,
    sessionTimeoutMs: readInt(env.KEYCASE_SESSION_TIMEOUT_MS),
    maxFailedAttempts: readInt(env.KEYCASE_MAX_FAILED_ATTEMPTS),
    lockoutDurationMs: readInt(env.KEYCASE_LOCKOUT_DURATION_MS),
    failedAttemptWindowMs: readInt(env.KEYCASE_FAILED_ATTEMPT_WINDOW_MS),
    kdfIterations: readInt(env.KEYCASE_KDF_ITERATIONS),
    defaultShareTtlMs: readInt(env.KEYCASE_DEFAULT_SHARE_TTL_MS),
    maxShareTtlMs: readInt(env.KEYCASE_MAX_SHARE_TTL_MS),
    shareTombstoneRetentionMs: readInt(env.KEYCASE_SHARE_TOMBSTONE_RETENTION_MS),
    logLevel: env.KEYCASE_LOG_LEVEL || undefined,
  };

  return parseConfig(input);
}
