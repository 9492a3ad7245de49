/**
 * Atomic file writes: temp file -> fsync -> rename.
 * A crash at any point leaves either the old file or the new one, never a mix.
 */

import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, unlinkSync, writeSync } from 'fs';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { StorageError, VaultExistsError } from '../errors/vault-errors';
import { createLogger } from '../logging/logger';

const logger = createLogger('AtomicFile');

/**
 * Temporary path next to the target so rename stays on one filesystem
 */
function getTmpPath(targetPath: string): string {
  const suffix = randomBytes(8).toString('hex');
  return join(dirname(targetPath), `.${basename(targetPath)}.tmp-${suffix}`);
}

function fsyncDirectory(dirPath: string): void {
  let fd: number | undefined;
  try {
    fd = openSync(dirPath, 'r');
    fsyncSync(fd);
  } catch (error) {
    // directories cannot be opened for fsync on every platform
    logger.debug('Directory fsync skipped', { dirPath, error });
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Write bytes to `targetPath` atomically.
 * @param options.exclusive fail if the target already exists
 * @throws VaultExistsError | StorageError
 */
export function atomicWriteFile(
  targetPath: string,
  content: Uint8Array,
  options: { exclusive?: boolean } = {}
): void {
  if (options.exclusive && existsSync(targetPath)) {
    throw new VaultExistsError(`Refusing to overwrite existing file "${targetPath}"`);
  }

  const tmpPath = getTmpPath(targetPath);
  let fd: number | undefined;

  try {
    mkdirSync(dirname(targetPath), { recursive: true });
    fd = openSync(tmpPath, 'wx', 0o600);
    let offset = 0;
    while (offset < content.length) {
      offset += writeSync(fd, content, offset, content.length - offset);
    }
    fsyncSync(fd);
    closeSync(fd);
    fd = undefined;

    renameSync(tmpPath, targetPath);
    fsyncDirectory(dirname(targetPath));
  } catch (error) {
    if (fd !== undefined) closeSync(fd);
    if (existsSync(tmpPath)) {
      try {
        unlinkSync(tmpPath);
      } catch (cleanupError) {
        logger.warn('Failed to remove temporary file', { tmpPath, error: cleanupError });
      }
    }
    throw new StorageError('write', `Atomic write to "${targetPath}" failed: ${messageOf(error)}`, { cause: error });
  }
}

/**
 * Read a whole file, or null when it does not exist.
 * @throws StorageError
 */
export function readFileIfExists(filePath: string): Uint8Array | null {
  try {
    return new Uint8Array(readFileSync(filePath));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new StorageError('read', `Cannot read "${filePath}": ${messageOf(error)}`, { cause: error });
  }
}
