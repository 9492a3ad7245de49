/**
 * AES-256-GCM 认证加密
 * 输出格式：nonce(12) ‖ 密文 ‖ 认证标签(16)。nonce 只在 seal 内部生成，调用方无法传入
 */

import { concatBytes, generateRandomBytes, subtle } from './utils';
import type { SecretKey } from './secret-key';
import { IntegrityError } from '../errors/vault-errors';

/** nonce 长度（12字节，GCM推荐） */
export const NONCE_LENGTH = 12;

/** 认证标签长度（字节） */
export const TAG_LENGTH = 16;

/** 最短密封数据长度 */
export const MIN_SEALED_LENGTH = NONCE_LENGTH + TAG_LENGTH;

async function importAesKey(key: SecretKey, usage: 'encrypt' | 'decrypt') {
  return subtle.importKey('raw', key.bytes(), { name: 'AES-GCM' }, false, [usage]);
}

/**
 * 加密并认证
 * @param key 256 位密钥
 * @param plaintext 明文
 * @param associatedData 参与认证但不加密的数据（如容器头部）
 */
export async function seal(
  key: SecretKey,
  plaintext: Uint8Array,
  associatedData?: Uint8Array
): Promise<Uint8Array> {
  const nonce = generateRandomBytes(NONCE_LENGTH);
  const cryptoKey = await importAesKey(key, 'encrypt');

  const ciphertextWithTag = await subtle.encrypt(
    {
      name: 'AES-GCM',
      iv: nonce,
      tagLength: TAG_LENGTH * 8,
      ...(associatedData ? { additionalData: associatedData } : {}),
    },
    cryptoKey,
    plaintext
  );

  return concatBytes(nonce, new Uint8Array(ciphertextWithTag));
}

/**
 * 验证并解密；任何失败都不返回部分明文
 * @throws IntegrityError 标签不匹配、密钥错误或数据过短
 */
export async function open(
  key: SecretKey,
  sealed: Uint8Array,
  associatedData?: Uint8Array
): Promise<Uint8Array> {
  if (sealed.length < MIN_SEALED_LENGTH) {
    throw new IntegrityError('truncated', 'Sealed data is too short');
  }

  const nonce = sealed.subarray(0, NONCE_LENGTH);
  const ciphertextWithTag = sealed.subarray(NONCE_LENGTH);
  const cryptoKey = await importAesKey(key, 'decrypt');

  try {
    const plaintext = await subtle.decrypt(
      {
        name: 'AES-GCM',
        iv: nonce,
        tagLength: TAG_LENGTH * 8,
        ...(associatedData ? { additionalData: associatedData } : {}),
      },
      cryptoKey,
      ciphertextWithTag
    );
    return new Uint8Array(plaintext);
  } catch (error) {
    throw new IntegrityError('decryption_failed', 'Authenticated decryption failed', { cause: error });
  }
}
