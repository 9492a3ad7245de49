import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { pbkdf2Sync } from 'crypto';
import {
  SALT_LENGTH,
  assertDerivationParams,
  deriveKey,
  generateSalt,
} from '../key-derivation';
import { bytesToBase64Url } from '../utils';

const ITERATIONS = 1_000;

describe('Key Derivation', () => {
  it('should generate salts of 16 bytes', () => {
    expect(generateSalt().length).toBe(SALT_LENGTH);
    expect(SALT_LENGTH).toBe(16);
  });

  it('should not repeat salts', () => {
    const salts = new Set(Array.from({ length: 50 }, () => bytesToBase64Url(generateSalt())));
    expect(salts.size).toBe(50);
  });

  it('should match PBKDF2-HMAC-SHA256 as computed by node', async () => {
    const salt = new Uint8Array(SALT_LENGTH).fill(7);
    const key = await deriveKey('Tr0ub4dor&3', salt, ITERATIONS);

    const expected = pbkdf2Sync('Tr0ub4dor&3', salt, ITERATIONS, 32, 'sha256');
    expect(Buffer.from(key.bytes()).equals(expected)).toBe(true);
    key.dispose();
  });

  /**
   * 同一口令与盐值总是派生出相同密钥
   */
  it('should be deterministic for the same passphrase, salt and iterations', async () => {
    await fc.assert(
      fc.asyncProperty(fc.string({ minLength: 1, maxLength: 40 }), async passphrase => {
        const salt = generateSalt();
        const a = await deriveKey(passphrase, salt, ITERATIONS);
        const b = await deriveKey(passphrase, salt, ITERATIONS);
        expect(bytesToBase64Url(a.bytes())).toBe(bytesToBase64Url(b.bytes()));
        a.dispose();
        b.dispose();
      }),
      { numRuns: 20 }
    );
  });

  it('should derive different keys for different salts', async () => {
    const a = await deriveKey('same-passphrase', generateSalt(), ITERATIONS);
    const b = await deriveKey('same-passphrase', generateSalt(), ITERATIONS);
    expect(bytesToBase64Url(a.bytes())).not.toBe(bytesToBase64Url(b.bytes()));
  });

  it('should derive different keys for different iteration counts', async () => {
    const salt = generateSalt();
    const a = await deriveKey('same-passphrase', salt, ITERATIONS);
    const b = await deriveKey('same-passphrase', salt, ITERATIONS + 1);
    expect(bytesToBase64Url(a.bytes())).not.toBe(bytesToBase64Url(b.bytes()));
  });

  it('should reject a salt of the wrong length', async () => {
    await expect(deriveKey('passphrase', new Uint8Array(8), ITERATIONS)).rejects.toThrow(
      'Salt must be 16 bytes, got 8'
    );
  });

  it('should reject non-positive or fractional iteration counts', () => {
    const salt = generateSalt();
    expect(() => assertDerivationParams(salt, 0)).toThrow(RangeError);
    expect(() => assertDerivationParams(salt, -5)).toThrow(RangeError);
    expect(() => assertDerivationParams(salt, 1.5)).toThrow('Iteration count must be a positive integer, got 1.5');
  });
});
