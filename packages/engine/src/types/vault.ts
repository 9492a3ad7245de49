/**
 * 保险库容器相关类型定义
 */

import type { CredentialRecord } from './credential';

/** 容器头部 */
export interface VaultHeader {
  /** 格式版本 */
  formatVersion: number;
  /** 盐值（创建时生成，修改主口令时轮换） */
  salt: Uint8Array;
  /** 密钥派生迭代次数 */
  kdfIterations: number;
}

/** 解析后的保险库文件 */
export interface VaultContainer {
  header: VaultHeader;
  /** 原始头部字节（作为 AEAD 附加数据） */
  headerBytes: Uint8Array;
  /** nonce ‖ 密文 ‖ 认证标签 */
  sealed: Uint8Array;
}

/** 解密后的保险库内容 */
export interface VaultPayload {
  version: 1;
  /** 保险库创建时间 */
  createdAt: number;
  records: CredentialRecord[];
}

/** 导出包 */
export interface ExportBundle {
  format: 'keycase-export';
  version: 1;
  /** Base64url 编码的盐值 */
  salt: string;
  /** 迭代次数 */
  iterations: number;
  /** Base64url 编码的 nonce ‖ 密文 ‖ 标签 */
  data: string;
  /** 导出时间 */
  exportedAt: number;
}

/** 保险库统计 */
export interface VaultStats {
  /** 凭据数量 */
  totalCredentials: number;
  /** 创建时间 */
  createdAt: number;
  /** 最后写入时间 */
  lastModifiedAt: number;
  /** 文件大小（字节） */
  fileSize: number;
  /** 迭代次数 */
  kdfIterations: number;
  /** 格式版本 */
  formatVersion: number;
}
