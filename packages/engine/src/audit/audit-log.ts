/**
 * Audit Log Module
 * Append-only, hash-chained record of security-relevant events.
 *
 * entryHash = SHA-256(priorHash ‖ canonical(sequence, timestamp, kind, subjectId, details))
 */

import { appendFileSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { sha256Hex } from '../crypto/utils';
import { StorageError, TamperDetectedError } from '../errors/vault-errors';
import { createLogger } from '../logging/logger';
import type { AuditDetails, AuditEventKind, AuditLogEntry } from '../types/audit';

const logger = createLogger('AuditLog');

export const GENESIS_HASH = '0'.repeat(64);

const AuditDetailValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]);

const AuditLogEntrySchema = z.object({
  sequence: z.number().int().positive(),
  timestamp: z.number(),
  kind: z.string(),
  subjectId: z.string(),
  details: z.record(AuditDetailValueSchema).nullable(),
  priorHash: z.string(),
  entryHash: z.string(),
});

export interface AuditLogOptions {
  /** JSONL file the log appends to; in-memory only when omitted */
  path?: string;
  now?: () => number;
}

/**
 * Stable serialisation: details keys are sorted so the hash does not depend on
 * insertion order.
 */
export function canonicalizeEntry(entry: Omit<AuditLogEntry, 'priorHash' | 'entryHash'>): string {
  const details =
    entry.details === null
      ? null
      : Object.fromEntries(Object.entries(entry.details).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  return JSON.stringify([entry.sequence, entry.timestamp, entry.kind, entry.subjectId, details]);
}

/** Entries share no arrays with callers */
function copyDetails(details: AuditDetails | null): AuditDetails | null {
  if (details === null) return null;
  return Object.fromEntries(
    Object.entries(details).map(([key, value]) => [key, Array.isArray(value) ? [...value] : value])
  );
}

export function computeEntryHash(
  priorHash: string,
  entry: Omit<AuditLogEntry, 'priorHash' | 'entryHash'>
): string {
  return sha256Hex(`${priorHash}‖${canonicalizeEntry(entry)}`);
}

export class AuditLog {
  private readonly path: string | null;
  private readonly now: () => number;
  private readonly log: AuditLogEntry[];

  constructor(options: AuditLogOptions = {}, entries: AuditLogEntry[] = []) {
    this.path = options.path ?? null;
    this.now = options.now ?? Date.now;
    this.log = [...entries];
  }

  /**
   * Open a persisted log, continuing its chain. A missing file is an empty log.
   * @throws TamperDetectedError when a line cannot be parsed
   */
  static load(options: AuditLogOptions & { path: string }): AuditLog {
    let text: string;
    try {
      text = readFileSync(options.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new AuditLog(options);
      }
      throw new StorageError('read', 'Cannot read audit log', { cause: error });
    }

    const entries: AuditLogEntry[] = [];
    const lines = text.split('\n').filter(line => line.trim().length > 0);
    lines.forEach((line, index) => {
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        throw new TamperDetectedError(index + 1, `Audit log line ${index + 1} is not valid JSON`);
      }
      const parsed = AuditLogEntrySchema.safeParse(json);
      if (!parsed.success) {
        throw new TamperDetectedError(index + 1, `Audit log line ${index + 1} is malformed`);
      }
      const { kind } = parsed.data;
      if (!isAuditEventKind(kind)) {
        throw new TamperDetectedError(index + 1, `Audit log line ${index + 1} has unknown kind`);
      }
      entries.push({ ...parsed.data, kind });
    });

    return new AuditLog(options, entries);
  }

  get length(): number {
    return this.log.length;
  }

  get headHash(): string {
    return this.log.length > 0 ? this.log[this.log.length - 1].entryHash : GENESIS_HASH;
  }

  /**
   * Append one event. The entry is persisted before it becomes visible in memory.
   * @throws StorageError when the log file cannot be written
   */
  append(kind: AuditEventKind, subjectId: string, details: AuditDetails | null = null): AuditLogEntry {
    const previous = this.log.length > 0 ? this.log[this.log.length - 1] : null;
    const fields = {
      sequence: (previous?.sequence ?? 0) + 1,
      timestamp: this.now(),
      kind,
      subjectId,
      details: copyDetails(details),
    };
    const priorHash = previous?.entryHash ?? GENESIS_HASH;
    const entry: AuditLogEntry = { ...fields, priorHash, entryHash: computeEntryHash(priorHash, fields) };

    if (this.path) {
      try {
        mkdirSync(dirname(this.path), { recursive: true });
        appendFileSync(this.path, `${JSON.stringify(entry)}\n`, { encoding: 'utf8', mode: 0o600 });
      } catch (error) {
        throw new StorageError('append', 'Cannot append to audit log', { cause: error });
      }
    }
    this.log.push(entry);

    logger.debug('Audit entry appended', { sequence: entry.sequence, kind, hash: entry.entryHash.slice(0, 16) });
    return entry;
  }

  /**
   * Recompute the chain from the first entry.
   * @returns number of verified entries
   * @throws TamperDetectedError naming the first entry that does not verify
   */
  verifyChain(): number {
    let priorHash = GENESIS_HASH;

    this.log.forEach((entry, index) => {
      const { entryHash, priorHash: recordedPrior, ...fields } = entry;
      if (entry.sequence !== index + 1 || recordedPrior !== priorHash || computeEntryHash(priorHash, fields) !== entryHash) {
        logger.error('Audit chain verification failed', { sequence: entry.sequence });
        throw new TamperDetectedError(entry.sequence);
      }
      priorHash = entryHash;
    });

    return this.log.length;
  }

  /** Copies of every entry, oldest first */
  entries(): AuditLogEntry[] {
    return this.log.map(entry => ({ ...entry, details: copyDetails(entry.details) }));
  }
}

const AUDIT_EVENT_KINDS: readonly AuditEventKind[] = [
  'vault_created',
  'auth_success',
  'auth_failure',
  'auth_lockout',
  'logout',
  'session_expired',
  'credential_listed',
  'credential_viewed',
  'credential_added',
  'credential_updated',
  'credential_deleted',
  'credential_searched',
  'passphrase_changed',
  'vault_exported',
  'vault_imported',
  'share_issued',
  'share_redeemed',
  'share_rejected',
  'share_revoked',
  'audit_log_read',
];

export function isAuditEventKind(value: string): value is AuditEventKind {
  return AUDIT_EVENT_KINDS.some(kind => kind === value);
}
