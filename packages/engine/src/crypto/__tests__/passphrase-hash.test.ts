import { describe, it, expect } from 'vitest';
import { hashPassphrase, verifyPassphrase } from '../passphrase-hash';
import { base64UrlToBytes } from '../utils';

const ITERATIONS = 1_000;

describe('Passphrase Hash', () => {
  it('should store salt, hash and iteration count', async () => {
    const stored = await hashPassphrase('share-phrase', ITERATIONS);

    expect(stored.iterations).toBe(ITERATIONS);
    expect(base64UrlToBytes(stored.salt).length).toBe(16);
    expect(base64UrlToBytes(stored.hash).length).toBe(32);
  });

  it('should verify the right passphrase and reject a wrong one', async () => {
    const stored = await hashPassphrase('share-phrase', ITERATIONS);

    expect(await verifyPassphrase('share-phrase', stored)).toBe(true);
    expect(await verifyPassphrase('share-phrase ', stored)).toBe(false);
  });

  it('should salt every hash separately', async () => {
    const a = await hashPassphrase('same', ITERATIONS);
    const b = await hashPassphrase('same', ITERATIONS);

    expect(a.salt).not.toBe(b.salt);
    expect(a.hash).not.toBe(b.hash);
  });
});
