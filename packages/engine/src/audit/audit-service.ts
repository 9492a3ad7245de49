/**
 * Audit Service Module
 * Query helpers over audit log entries
 */

import type { AuditEventKind, AuditLogEntry } from '../types/audit';

/**
 * Filter audit logs by kind
 */
export function filterLogsByKind(logs: AuditLogEntry[], kinds: AuditEventKind[]): AuditLogEntry[] {
  return logs.filter(log => kinds.includes(log.kind));
}

/**
 * Filter audit logs by date range (inclusive)
 */
export function filterLogsByDateRange(
  logs: AuditLogEntry[],
  startDate: number,
  endDate: number
): AuditLogEntry[] {
  return logs.filter(log => log.timestamp >= startDate && log.timestamp <= endDate);
}

/**
 * Get the last N entries, newest first
 */
export function getRecentLogs(logs: AuditLogEntry[], count: number = 100): AuditLogEntry[] {
  return [...logs].sort((a, b) => b.sequence - a.sequence).slice(0, count);
}

/**
 * Get unlock/lock history
 */
export function getAuthenticationHistory(logs: AuditLogEntry[]): AuditLogEntry[] {
  return filterLogsByKind(logs, ['auth_success', 'auth_failure', 'auth_lockout', 'logout', 'session_expired']);
}

/**
 * Get security-related events
 */
export function getSecurityEvents(logs: AuditLogEntry[]): AuditLogEntry[] {
  return filterLogsByKind(logs, [
    'auth_failure',
    'auth_lockout',
    'passphrase_changed',
    'vault_exported',
    'vault_imported',
    'share_rejected',
  ]);
}

/**
 * Count failed unlock attempts in time window
 */
export function countFailedAuthentications(
  logs: AuditLogEntry[],
  now: number,
  windowMs: number = 15 * 60 * 1000 // 15 minutes
): number {
  const cutoff = now - windowMs;
  return logs.filter(log => log.kind === 'auth_failure' && log.timestamp >= cutoff).length;
}
