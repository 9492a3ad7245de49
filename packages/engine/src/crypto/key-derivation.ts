/**
 * 密钥派生函数
 * PBKDF2-HMAC-SHA256，迭代次数保存在保险库头部，可随时提高而不影响已有保险库
 */

import { generateRandomBytes, stringToBytes, subtle, wipe } from './utils';
import { SecretKey } from './secret-key';

/** 盐值长度（字节） */
export const SALT_LENGTH = 16;

/** 派生密钥长度（256位） */
export const KEY_LENGTH_BITS = 256;

/**
 * 生成随机盐值
 */
export function generateSalt(): Uint8Array {
  return generateRandomBytes(SALT_LENGTH);
}

/**
 * 校验派生参数；参数越界属于编程错误
 * @throws RangeError
 */
export function assertDerivationParams(salt: Uint8Array, iterations: number): void {
  if (salt.length !== SALT_LENGTH) {
    throw new RangeError(`Salt must be ${SALT_LENGTH} bytes, got ${salt.length}`);
  }
  if (!Number.isInteger(iterations) || iterations <= 0) {
    throw new RangeError(`Iteration count must be a positive integer, got ${iterations}`);
  }
}

/**
 * 从口令派生密钥
 * @param passphrase 口令
 * @param salt 16 字节盐值
 * @param iterations 迭代次数
 * @returns 持有原始字节的 SecretKey，调用方负责 dispose()
 */
export async function deriveKey(
  passphrase: string,
  salt: Uint8Array,
  iterations: number
): Promise<SecretKey> {
  assertDerivationParams(salt, iterations);

  const passphraseBytes = stringToBytes(passphrase);
  try {
    const keyMaterial = await subtle.importKey('raw', passphraseBytes, 'PBKDF2', false, ['deriveBits']);

    const bits = await subtle.deriveBits(
      {
        name: 'PBKDF2',
        salt,
        iterations,
        hash: 'SHA-256',
      },
      keyMaterial,
      KEY_LENGTH_BITS
    );

    return new SecretKey(new Uint8Array(bits));
  } finally {
    wipe(passphraseBytes);
  }
}
