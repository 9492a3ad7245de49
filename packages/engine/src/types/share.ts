/**
 * 共享相关类型定义
 */

import type { PassphraseHash } from './crypto';

/** 共享令牌记录（仅保存在内存中） */
export interface ShareToken {
  /** 令牌ID */
  tokenId: string;
  /** 凭据ID */
  credentialId: string;
  /** 签发时间 */
  issuedAt: number;
  /** 过期时间 */
  expiresAt: number;
  /** 共享口令哈希 */
  sharePassphraseHash: PassphraseHash | null;
  /** 是否已兑换 */
  redeemed: boolean;
  /** 是否已撤销 */
  revoked: boolean;
  /** 共享口令错误次数 */
  failedAttempts: number;
  /** 加密的快照（兑换或过期后清除） */
  sealedSnapshot: Uint8Array | null;
}

/** 签发结果 */
export interface IssuedShare {
  /** 交给接收者的令牌字符串 */
  token: string;
  tokenId: string;
  credentialId: string;
  expiresAt: number;
  passphraseProtected: boolean;
}

/** 兑换后返回的凭据快照 */
export interface SharedCredential {
  readonly serviceName: string;
  readonly username: string;
  readonly secret: string;
  readonly url: string | null;
  readonly notes: string | null;
  /** 令牌签发时间 */
  readonly sharedAt: number;
}

/** 活跃令牌摘要 */
export interface ShareSummary {
  tokenId: string;
  credentialId: string;
  issuedAt: number;
  expiresAt: number;
  passphraseProtected: boolean;
}
