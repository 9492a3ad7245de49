import { describe, it, expect } from 'vitest';
import {
  countFailedAuthentications,
  filterLogsByDateRange,
  filterLogsByKind,
  getAuthenticationHistory,
  getRecentLogs,
  getSecurityEvents,
} from '../audit-service';
import type { AuditEventKind, AuditLogEntry } from '../../types/audit';

function entry(sequence: number, kind: AuditEventKind, timestamp: number): AuditLogEntry {
  return {
    sequence,
    timestamp,
    kind,
    subjectId: `subject-${sequence}`,
    details: null,
    priorHash: '',
    entryHash: '',
  };
}

const MINUTE = 60 * 1000;

const logs: AuditLogEntry[] = [
  entry(1, 'vault_created', 0),
  entry(2, 'auth_failure', 1 * MINUTE),
  entry(3, 'auth_success', 2 * MINUTE),
  entry(4, 'credential_added', 3 * MINUTE),
  entry(5, 'share_rejected', 4 * MINUTE),
  entry(6, 'auth_failure', 20 * MINUTE),
  entry(7, 'auth_lockout', 21 * MINUTE),
  entry(8, 'logout', 22 * MINUTE),
];

const sequences = (entries: AuditLogEntry[]) => entries.map(e => e.sequence);

describe('Audit Service', () => {
  it('should filter by kind', () => {
    expect(sequences(filterLogsByKind(logs, ['auth_failure', 'logout']))).toEqual([2, 6, 8]);
    expect(filterLogsByKind(logs, [])).toEqual([]);
  });

  it('should filter by an inclusive date range', () => {
    expect(sequences(filterLogsByDateRange(logs, 2 * MINUTE, 4 * MINUTE))).toEqual([3, 4, 5]);
  });

  it('should return the most recent entries newest first', () => {
    expect(sequences(getRecentLogs(logs, 3))).toEqual([8, 7, 6]);
    expect(getRecentLogs(logs)).toHaveLength(8);
  });

  it('should not reorder the input', () => {
    const input = [...logs];
    getRecentLogs(input, 2);
    expect(sequences(input)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('should collect the authentication history', () => {
    expect(sequences(getAuthenticationHistory(logs))).toEqual([2, 3, 6, 7, 8]);
  });

  it('should collect security events', () => {
    expect(sequences(getSecurityEvents(logs))).toEqual([2, 5, 6, 7]);
  });

  it('should count failures inside the window only', () => {
    expect(countFailedAuthentications(logs, 22 * MINUTE)).toBe(1);
    expect(countFailedAuthentications(logs, 22 * MINUTE, 30 * MINUTE)).toBe(2);
  });
});
