import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, redact, setLogLevel } from '../logger';

describe('Logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should redact values under sensitive keys', () => {
    expect(
      redact({
        passphrase: 'Tr0ub4dor&3',
        secret: 's3cr3t',
        tokenId: 'abc',
        sharePassphrase: 'x',
        salt: 'AAAA',
        vaultId: '/tmp/v',
        count: 3,
      })
    ).toEqual({
      passphrase: '[redacted]',
      secret: '[redacted]',
      tokenId: '[redacted]',
      sharePassphrase: '[redacted]',
      salt: '[redacted]',
      vaultId: '/tmp/v',
      count: 3,
    });
  });

  it('should recurse into nested objects and shorten errors and bytes', () => {
    expect(
      redact({
        nested: { password: 'p', ok: true },
        error: new TypeError('bad input'),
        bytes: new Uint8Array(12),
        list: ['a', 'b'],
      })
    ).toEqual({
      nested: { password: '[redacted]', ok: true },
      error: 'TypeError: bad input',
      bytes: '<12 bytes>',
      list: ['a', 'b'],
    });
  });

  it('should prefix lines with the scope', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    createLogger('VaultStore').info('Vault unlocked', { records: 2 });

    expect(info).toHaveBeenCalledTimes(1);
    const [line, data] = info.mock.calls[0];
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[VaultStore\] Vault unlocked$/);
    expect(data).toEqual({ records: 2 });
  });

  it('should drop messages below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('Test');

    logger.debug('hidden');
    setLogLevel('debug');
    logger.debug('shown');
    setLogLevel('silent');
    logger.warn('hidden too');

    expect(getLogLevel()).toBe('silent');
    expect(debug).toHaveBeenCalledTimes(1);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should never print a redacted value', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('Test').error('Failed', { secret: 'hunter2' });

    expect(error.mock.calls[0][1]).toEqual({ secret: '[redacted]' });
  });
});
