/**
 * 加密工具函数
 */

import { createHash, randomUUID, timingSafeEqual, webcrypto } from 'crypto';

/** WebCrypto 子接口 */
export const subtle = webcrypto.subtle;

/** 将字节编码为 Base64url 字符串 */
export function bytesToBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/** 将 Base64url 字符串解码为字节 */
export function base64UrlToBytes(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, 'base64url'));
}

/** 将字符串转换为 UTF-8 字节 */
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/** 将 UTF-8 字节转换为字符串 */
export function bytesToString(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

/** 生成随机字节 */
export function generateRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  webcrypto.getRandomValues(bytes);
  return bytes;
}

/** 生成UUID */
export function generateUUID(): string {
  return randomUUID();
}

/** 计算 SHA-256 哈希（十六进制） */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/** 拼接多个字节数组 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/** 时间恒定的字节比较，防止时序攻击 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    // 长度不同时仍执行一次比较以保持耗时一致
    timingSafeEqual(a, a);
    return false;
  }
  return timingSafeEqual(a, b);
}

/** 用零覆盖字节数组 */
export function wipe(bytes: Uint8Array): void {
  bytes.fill(0);
}
