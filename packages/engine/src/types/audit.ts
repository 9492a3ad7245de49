/**
 * 审计日志相关类型定义
 */

/** 审计事件类型 */
export type AuditEventKind =
  | 'vault_created'
  | 'auth_success'
  | 'auth_failure'
  | 'auth_lockout'
  | 'logout'
  | 'session_expired'
  | 'credential_listed'
  | 'credential_viewed'
  | 'credential_added'
  | 'credential_updated'
  | 'credential_deleted'
  | 'credential_searched'
  | 'passphrase_changed'
  | 'vault_exported'
  | 'vault_imported'
  | 'share_issued'
  | 'share_redeemed'
  | 'share_rejected'
  | 'share_revoked'
  | 'audit_log_read';

/** 审计附加信息（不得包含口令、秘密值或密钥） */
export type AuditDetails = Record<string, string | number | boolean | null | string[]>;

/** 审计日志条目 */
export interface AuditLogEntry {
  /** 序号（从 1 开始） */
  sequence: number;
  /** 时间戳 */
  timestamp: number;
  /** 事件类型 */
  kind: AuditEventKind;
  /** 主体ID（凭据ID、会话ID、令牌ID 或保险库ID） */
  subjectId: string;
  /** 附加信息 */
  details: AuditDetails | null;
  /** 上一条目的哈希 */
  priorHash: string;
  /** 本条目哈希 */
  entryHash: string;
}
