/**
 * 会话与锁定相关类型定义
 */

/** 认证状态 */
export type AuthState = 'idle' | 'authenticating' | 'unlocked' | 'locked_out';

/** 会话句柄（派生密钥仅保存在会话管理器内部） */
export interface AuthSession {
  /** 会话ID */
  readonly sessionId: string;
  /** 保险库标识 */
  readonly vaultId: string;
  /** 创建时间 */
  readonly createdAt: number;
  /** 最后活动时间 */
  readonly lastActivityAt: number;
}

/** 锁定状态 */
export interface LockoutState {
  /** 失败次数 */
  failedAttemptCount: number;
  /** 首次失败时间 */
  firstFailureAt: number | null;
  /** 锁定截止时间 */
  lockedUntil: number | null;
}

/** 会话状态（对外展示） */
export interface SessionStatus {
  sessionId: string;
  createdAt: number;
  lastActivityAt: number;
  /** 会话到期时间 */
  expiresAt: number;
}
