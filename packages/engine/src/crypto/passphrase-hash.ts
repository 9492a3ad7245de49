/**
 * 加盐口令哈希
 * 用于共享口令：只保存盐值与派生结果，校验时做时间恒定比较
 */

import { deriveKey, generateSalt } from './key-derivation';
import { base64UrlToBytes, bytesToBase64Url, constantTimeEqual } from './utils';
import type { PassphraseHash } from '../types/crypto';

/**
 * 计算口令哈希
 */
export async function hashPassphrase(passphrase: string, iterations: number): Promise<PassphraseHash> {
  const salt = generateSalt();
  const key = await deriveKey(passphrase, salt, iterations);
  try {
    return {
      salt: bytesToBase64Url(salt),
      hash: bytesToBase64Url(key.bytes()),
      iterations,
    };
  } finally {
    key.dispose();
  }
}

/**
 * 校验口令是否与哈希匹配
 */
export async function verifyPassphrase(passphrase: string, stored: PassphraseHash): Promise<boolean> {
  const key = await deriveKey(passphrase, base64UrlToBytes(stored.salt), stored.iterations);
  try {
    return constantTimeEqual(key.bytes(), base64UrlToBytes(stored.hash));
  } finally {
    key.dispose();
  }
}
