/**
 * Export bundles
 * Self-contained encrypted backups keyed by their own passphrase, independent
 * of the live vault key. Decoding either yields every record or fails; there
 * is no partial result to merge.
 */

import { z } from 'zod';
import { deriveKey, generateSalt, SALT_LENGTH } from '../crypto/key-derivation';
import { open, seal } from '../crypto/cipher-codec';
import { base64UrlToBytes, bytesToBase64Url, bytesToString, stringToBytes } from '../crypto/utils';
import { IntegrityError } from '../errors/vault-errors';
import { MAX_KDF_ITERATIONS } from '../config/engine-config';
import { parseCredentialRecords } from './record-schema';
import type { CredentialRecord, ExportBundle } from '../types';

const BUNDLE_FORMAT = 'keycase-export';

const ExportBundleSchema = z.object({
  format: z.literal(BUNDLE_FORMAT),
  version: z.literal(1),
  salt: z.string().min(1),
  iterations: z.number().int().positive().max(MAX_KDF_ITERATIONS),
  data: z.string().min(1),
  exportedAt: z.number().int().nonnegative(),
});

const BundlePayloadSchema = z.object({
  exportedAt: z.number().int().nonnegative(),
  records: z.unknown(),
});

/**
 * Everything outside `data` is bound to the ciphertext as associated data
 */
function bundleAssociatedData(bundle: Omit<ExportBundle, 'data'>): Uint8Array {
  return stringToBytes(`${bundle.format}:${bundle.version}:${bundle.salt}:${bundle.iterations}:${bundle.exportedAt}`);
}

/**
 * Seal records into an opaque, transportable blob
 */
export async function createExportBundle(
  records: CredentialRecord[],
  exportPassphrase: string,
  iterations: number,
  exportedAt: number
): Promise<string> {
  const salt = generateSalt();
  const header: Omit<ExportBundle, 'data'> = {
    format: BUNDLE_FORMAT,
    version: 1,
    salt: bytesToBase64Url(salt),
    iterations,
    exportedAt,
  };

  const key = await deriveKey(exportPassphrase, salt, iterations);
  try {
    const plaintext = stringToBytes(JSON.stringify({ exportedAt, records }));
    const sealed = await seal(key, plaintext, bundleAssociatedData(header));
    const bundle: ExportBundle = { ...header, data: bytesToBase64Url(sealed) };
    return Buffer.from(JSON.stringify(bundle), 'utf8').toString('base64url');
  } finally {
    key.dispose();
  }
}

function parseBundle(blob: string): ExportBundle {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(blob, 'base64url').toString('utf8'));
  } catch (error) {
    throw new IntegrityError('invalid_bundle', 'Export bundle is not readable', { cause: error });
  }

  const parsed = ExportBundleSchema.safeParse(json);
  if (!parsed.success || base64UrlToBytes(parsed.data.salt).length !== SALT_LENGTH) {
    throw new IntegrityError('invalid_bundle', 'Export bundle is malformed');
  }
  return parsed.data;
}

/**
 * Decrypt and validate a bundle.
 * @throws IntegrityError on tampering, a wrong passphrase or a malformed bundle
 */
export async function readExportBundle(blob: string, exportPassphrase: string): Promise<CredentialRecord[]> {
  const bundle = parseBundle(blob);
  const { data, ...header } = bundle;

  const key = await deriveKey(exportPassphrase, base64UrlToBytes(bundle.salt), bundle.iterations);
  let plaintext: Uint8Array;
  try {
    plaintext = await open(key, base64UrlToBytes(data), bundleAssociatedData(header));
  } finally {
    key.dispose();
  }

  let payload: unknown;
  try {
    payload = JSON.parse(bytesToString(plaintext));
  } catch (error) {
    throw new IntegrityError('invalid_payload', 'Export bundle payload is not readable', { cause: error });
  }

  const parsedPayload = BundlePayloadSchema.safeParse(payload);
  const records = parsedPayload.success ? parseCredentialRecords(parsedPayload.data.records) : null;
  if (!records) {
    throw new IntegrityError('invalid_payload', 'Export bundle payload is malformed');
  }

  const ids = new Set(records.map(record => record.id));
  if (ids.size !== records.length) {
    throw new IntegrityError('invalid_payload', 'Export bundle contains duplicate record ids');
  }

  return records;
}
