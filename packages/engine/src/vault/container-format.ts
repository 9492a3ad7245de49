/**
 * Vault container format
 *
 * ```
 * [formatVersion u8][salt 16][kdfIterations u32 BE][nonce 12][ciphertext ‖ tag]
 * ```
 *
 * The 21-byte header is passed to the cipher as associated data, so a change
 * to any header byte fails authentication just like a change to the ciphertext.
 */

import { IntegrityError } from '../errors/vault-errors';
import { MAX_KDF_ITERATIONS } from '../config/engine-config';
import { MIN_SEALED_LENGTH } from '../crypto/cipher-codec';
import { SALT_LENGTH } from '../crypto/key-derivation';
import { concatBytes } from '../crypto/utils';
import type { VaultContainer, VaultHeader } from '../types/vault';

export const FORMAT_VERSION = 1;

export const HEADER_LENGTH = 1 + SALT_LENGTH + 4;

export function encodeHeader(header: VaultHeader): Uint8Array {
  const bytes = new Uint8Array(HEADER_LENGTH);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, header.formatVersion);
  bytes.set(header.salt, 1);
  view.setUint32(1 + SALT_LENGTH, header.kdfIterations, false);
  return bytes;
}

export function encodeContainer(headerBytes: Uint8Array, sealed: Uint8Array): Uint8Array {
  return concatBytes(headerBytes, sealed);
}

/**
 * Split a vault file into header and sealed payload.
 * @throws IntegrityError describing the first structural problem found
 */
export function decodeContainer(file: Uint8Array): VaultContainer {
  if (file.length < HEADER_LENGTH + MIN_SEALED_LENGTH) {
    throw new IntegrityError('truncated', 'Vault file is shorter than the minimum container size');
  }

  const view = new DataView(file.buffer, file.byteOffset, file.byteLength);
  const formatVersion = view.getUint8(0);
  if (formatVersion !== FORMAT_VERSION) {
    throw new IntegrityError('unsupported_version', `Unsupported vault format version ${formatVersion}`);
  }

  const kdfIterations = view.getUint32(1 + SALT_LENGTH, false);
  if (kdfIterations === 0 || kdfIterations > MAX_KDF_ITERATIONS) {
    throw new IntegrityError('invalid_header', `Implausible iteration count ${kdfIterations}`);
  }

  // copies, so later wiping or mutation of the file buffer cannot reach them
  const headerBytes = file.slice(0, HEADER_LENGTH);
  const salt = file.slice(1, 1 + SALT_LENGTH);
  const sealed = file.slice(HEADER_LENGTH);

  return {
    header: { formatVersion, salt, kdfIterations },
    headerBytes,
    sealed,
  };
}
