/**
 * 加密相关类型定义
 */

/** 加盐口令哈希（用于共享口令，永不保存明文） */
export interface PassphraseHash {
  /** Base64url 编码的盐值 */
  salt: string;
  /** Base64url 编码的哈希 */
  hash: string;
  /** 迭代次数 */
  iterations: number;
}

/** 口令强度校验结果 */
export interface PassphraseStrength {
  valid: boolean;
  errors: string[];
}
