/**
 * 密码生成与强度评估
 * 用于为新凭据生成随机密码，并按熵值给出强度等级
 */

import { ValidationError } from '../errors/vault-errors';
import { generateRandomBytes } from './utils';

export const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
export const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const DIGITS = '0123456789';
export const SYMBOLS = '!@#$%^&*()_+-=[]{}|;:,.<>?';

/** 容易看错的字符 */
export const AMBIGUOUS = '0O1lI|';

export const DEFAULT_PASSWORD_LENGTH = 16;
export const MAX_PASSWORD_LENGTH = 1024;

export interface PasswordGeneratorOptions {
  length?: number;
  lowercase?: boolean;
  uppercase?: boolean;
  numbers?: boolean;
  symbols?: boolean;
  /** 排除 0 O 1 l I | */
  excludeAmbiguous?: boolean;
}

export type StrengthRating = 'weak' | 'medium' | 'strong' | 'very_strong';

export interface PasswordStrengthScore {
  rating: StrengthRating;
  /** 长度 × log2(字符集大小) */
  entropyBits: number;
}

/**
 * 构建候选字符集；未选择任何字符类时退回字母数字
 */
export function buildCharset(options: PasswordGeneratorOptions = {}): string {
  let chars = '';
  if (options.lowercase ?? true) chars += LOWERCASE;
  if (options.uppercase ?? true) chars += UPPERCASE;
  if (options.numbers ?? true) chars += DIGITS;
  if (options.symbols ?? true) chars += SYMBOLS;

  if (options.excludeAmbiguous ?? true) {
    chars = Array.from(chars)
      .filter(char => !AMBIGUOUS.includes(char))
      .join('');
  }

  return chars.length > 0 ? chars : LOWERCASE + UPPERCASE + DIGITS;
}

/**
 * 生成 `count` 个 [0, size) 内的均匀随机下标。
 * 拒绝采样：丢弃落在 256 的最后一个不完整区间内的字节，避免取模偏差。
 */
export function sampleIndices(
  count: number,
  size: number,
  random: (length: number) => Uint8Array = generateRandomBytes
): number[] {
  if (!Number.isInteger(size) || size < 1 || size > 256) {
    throw new RangeError(`Alphabet size must be between 1 and 256, got ${size}`);
  }

  const limit = 256 - (256 % size);
  const indices: number[] = [];
  while (indices.length < count) {
    for (const byte of random(count - indices.length)) {
      if (byte < limit) indices.push(byte % size);
    }
  }
  return indices;
}

/**
 * 生成随机密码
 * @throws ValidationError 长度不是 1 到 1024 之间的整数
 */
export function generatePassword(options: PasswordGeneratorOptions = {}): string {
  const length = options.length ?? DEFAULT_PASSWORD_LENGTH;
  if (!Number.isInteger(length) || length < 1 || length > MAX_PASSWORD_LENGTH) {
    throw new ValidationError(`Password length must be an integer between 1 and ${MAX_PASSWORD_LENGTH}`);
  }

  const charset = buildCharset(options);
  return sampleIndices(length, charset.length)
    .map(index => charset[index])
    .join('');
}

/**
 * 按字符类估算熵值并给出强度等级
 */
export function scorePasswordStrength(password: string): PasswordStrengthScore {
  const chars = Array.from(password);

  let charsetSize = 0;
  if (chars.some(char => LOWERCASE.includes(char))) charsetSize += LOWERCASE.length;
  if (chars.some(char => UPPERCASE.includes(char))) charsetSize += UPPERCASE.length;
  if (chars.some(char => DIGITS.includes(char))) charsetSize += DIGITS.length;
  if (chars.some(char => SYMBOLS.includes(char))) charsetSize += SYMBOLS.length;

  const entropyBits = charsetSize > 0 ? chars.length * Math.log2(charsetSize) : 0;

  let rating: StrengthRating;
  if (entropyBits < 30) rating = 'weak';
  else if (entropyBits < 60) rating = 'medium';
  else if (entropyBits < 90) rating = 'strong';
  else rating = 'very_strong';

  return { rating, entropyBits };
}
