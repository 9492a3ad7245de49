/**
 * Vault Store Module
 * Owns one vault file: creation, unlock, and the unlocked record collection.
 */

import { existsSync, statSync, type Stats } from 'fs';
import { resolve } from 'path';
import * as lockfile from 'proper-lockfile';
import { deriveKey, generateSalt } from '../crypto/key-derivation';
import { open, seal } from '../crypto/cipher-codec';
import { bytesToString, generateUUID, stringToBytes } from '../crypto/utils';
import type { SecretKey } from '../crypto/secret-key';
import {
  AuthenticationError,
  IntegrityError,
  NotFoundError,
  SessionExpiredError,
  StorageError,
  VaultBusyError,
  VaultExistsError,
  VaultMissingError,
} from '../errors/vault-errors';
import { createLogger } from '../logging/logger';
import { atomicWriteFile, readFileIfExists } from './atomic-file';
import { decodeContainer, encodeContainer, encodeHeader, FORMAT_VERSION } from './container-format';
import { createExportBundle, readExportBundle } from './export-bundle';
import { normalizeTags, parseVaultPayload } from './record-schema';
import { createSerialQueue } from './serial-queue';
import type {
  CredentialFields,
  CredentialPredicate,
  CredentialRecord,
  CredentialUpdate,
  VaultContainer,
  VaultHeader,
  VaultPayload,
  VaultStats,
} from '../types';

const logger = createLogger('VaultStore');

export interface VaultStoreOptions {
  /** Vault file location */
  vaultPath: string;
  /** Iteration count for newly derived keys (creation, passphrase change, export) */
  kdfIterations: number;
  now?: () => number;
}

/** File contents as read once and shared by every unlock path */
interface LoadedVault {
  container: VaultContainer;
  key: SecretKey;
  payload: VaultPayload;
}

function cloneRecord(record: CredentialRecord): CredentialRecord {
  return { ...record, tags: [...record.tags] };
}

function encodePayload(payload: VaultPayload): Uint8Array {
  return stringToBytes(JSON.stringify(payload));
}

export class VaultStore {
  /** Stable identity of the vault (its resolved path) */
  readonly vaultId: string;
  private readonly vaultPath: string;
  private readonly kdfIterations: number;
  private readonly now: () => number;

  constructor(options: VaultStoreOptions) {
    this.vaultPath = resolve(options.vaultPath);
    this.vaultId = this.vaultPath;
    this.kdfIterations = options.kdfIterations;
    this.now = options.now ?? Date.now;
  }

  exists(): boolean {
    return existsSync(this.vaultPath);
  }

  /**
   * Create a vault holding an empty record collection.
   * @throws VaultExistsError if a vault file is already present
   */
  async create(passphrase: string): Promise<VaultHeader> {
    if (this.exists()) {
      throw new VaultExistsError();
    }

    const header: VaultHeader = {
      formatVersion: FORMAT_VERSION,
      salt: generateSalt(),
      kdfIterations: this.kdfIterations,
    };
    const key = await deriveKey(passphrase, header.salt, header.kdfIterations);

    try {
      const payload: VaultPayload = { version: 1, createdAt: this.now(), records: [] };
      const headerBytes = encodeHeader(header);
      const sealed = await seal(key, encodePayload(payload), headerBytes);

      if (this.exists()) {
        throw new VaultExistsError();
      }
      atomicWriteFile(this.vaultPath, encodeContainer(headerBytes, sealed), { exclusive: true });
    } finally {
      key.dispose();
    }

    logger.info('Vault created', { vaultId: this.vaultId, kdfIterations: header.kdfIterations });
    return header;
  }

  /**
   * Read, derive and decrypt. Every failure surfaces as IntegrityError with a
   * reason; `open` folds those into AuthenticationError.
   */
  private async load(passphrase: string): Promise<LoadedVault> {
    const file = readFileIfExists(this.vaultPath);
    if (!file) {
      throw new VaultMissingError();
    }

    const container = decodeContainer(file);
    const key = await deriveKey(passphrase, container.header.salt, container.header.kdfIterations);

    try {
      const plaintext = await open(key, container.sealed, container.headerBytes);
      let json: unknown;
      try {
        json = JSON.parse(bytesToString(plaintext));
      } catch (error) {
        throw new IntegrityError('invalid_payload', 'Vault payload is not readable', { cause: error });
      }

      const payload = parseVaultPayload(json);
      if (!payload) {
        throw new IntegrityError('invalid_payload', 'Vault payload is malformed');
      }
      return { container, key, payload };
    } catch (error) {
      key.dispose();
      throw error;
    }
  }

  /**
   * Unlock the vault.
   * A wrong passphrase and a damaged file are reported identically.
   * @throws AuthenticationError | VaultMissingError | VaultBusyError
   */
  async open(passphrase: string): Promise<UnlockedVault> {
    let loaded: LoadedVault;
    try {
      loaded = await this.load(passphrase);
    } catch (error) {
      if (error instanceof IntegrityError) {
        throw new AuthenticationError();
      }
      throw error;
    }

    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.vaultPath, {
        realpath: false,
        retries: 0,
        lockfilePath: `${this.vaultPath}.lock`,
        onCompromised: error => {
          logger.error('Vault lock compromised', { vaultId: this.vaultId, error });
        },
      });
    } catch (error) {
      loaded.key.dispose();
      throw new VaultBusyError(undefined, { cause: error });
    }

    logger.info('Vault unlocked', { vaultId: this.vaultId, records: loaded.payload.records.length });
    return new UnlockedVault({
      vaultPath: this.vaultPath,
      vaultId: this.vaultId,
      kdfIterations: this.kdfIterations,
      now: this.now,
      header: loaded.container.header,
      key: loaded.key,
      payload: loaded.payload,
      release,
      reload: passphrase => this.load(passphrase),
    });
  }

  /**
   * Recovery tooling path: says why a vault cannot be opened instead of
   * folding every cause into one error.
   * @throws IntegrityError | VaultMissingError
   */
  async verifyIntegrity(passphrase: string): Promise<VaultHeader> {
    const loaded = await this.load(passphrase);
    loaded.key.dispose();
    return loaded.container.header;
  }

  /**
   * Decrypt an export bundle without touching this vault.
   * @throws IntegrityError
   */
  async readBundle(blob: string, exportPassphrase: string): Promise<CredentialRecord[]> {
    return readExportBundle(blob, exportPassphrase);
  }
}

interface UnlockedVaultInit {
  vaultPath: string;
  vaultId: string;
  kdfIterations: number;
  now: () => number;
  header: VaultHeader;
  key: SecretKey;
  payload: VaultPayload;
  release: () => Promise<void>;
  reload: (passphrase: string) => Promise<LoadedVault>;
}

/**
 * Handle on a decrypted vault. Every mutation re-seals the full collection and
 * rewrites the file before it resolves; mutations run one at a time.
 */
export class UnlockedVault {
  readonly vaultId: string;
  private readonly vaultPath: string;
  private readonly kdfIterations: number;
  private readonly now: () => number;
  private readonly createdAt: number;
  private readonly release: () => Promise<void>;
  private readonly reload: (passphrase: string) => Promise<LoadedVault>;
  private readonly enqueue = createSerialQueue();
  private header: VaultHeader;
  private key: SecretKey;
  private records: Map<string, CredentialRecord>;
  private closed = false;

  constructor(init: UnlockedVaultInit) {
    this.vaultId = init.vaultId;
    this.vaultPath = init.vaultPath;
    this.kdfIterations = init.kdfIterations;
    this.now = init.now;
    this.createdAt = init.payload.createdAt;
    this.release = init.release;
    this.reload = init.reload;
    this.header = init.header;
    this.key = init.key;
    this.records = new Map(init.payload.records.map(record => [record.id, record]));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * A handle closes when its session ends, so late callers see an expired session.
   */
  private assertOpen(): void {
    if (this.closed) {
      throw new SessionExpiredError('Vault handle used after close');
    }
  }

  /**
   * Seal `records` under `key`/`header` and atomically replace the file.
   */
  private async persist(records: Map<string, CredentialRecord>, key: SecretKey, header: VaultHeader): Promise<void> {
    const payload: VaultPayload = {
      version: 1,
      createdAt: this.createdAt,
      records: Array.from(records.values()),
    };
    const headerBytes = encodeHeader(header);
    const sealed = await seal(key, encodePayload(payload), headerBytes);
    atomicWriteFile(this.vaultPath, encodeContainer(headerBytes, sealed));
  }

  /**
   * Apply a change to a copy of the collection, persist it, and only then
   * make it the live collection.
   */
  private mutate<T>(change: (draft: Map<string, CredentialRecord>) => T): Promise<T> {
    return this.enqueue(async () => {
      this.assertOpen();
      const draft = new Map(this.records);
      const result = change(draft);
      await this.persist(draft, this.key, this.header);
      this.records = draft;
      return result;
    });
  }

  list(): CredentialRecord[] {
    this.assertOpen();
    return Array.from(this.records.values(), cloneRecord);
  }

  /**
   * @throws NotFoundError
   */
  get(id: string): CredentialRecord {
    this.assertOpen();
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(`Credential ${id} not found`);
    }
    return cloneRecord(record);
  }

  has(id: string): boolean {
    this.assertOpen();
    return this.records.has(id);
  }

  search(predicate: CredentialPredicate): CredentialRecord[] {
    this.assertOpen();
    const results: CredentialRecord[] = [];
    for (const record of this.records.values()) {
      if (predicate(record)) results.push(cloneRecord(record));
    }
    return results;
  }

  add(fields: CredentialFields): Promise<CredentialRecord> {
    return this.mutate(draft => {
      const timestamp = this.now();
      const record: CredentialRecord = {
        id: generateUUID(),
        serviceName: fields.serviceName,
        username: fields.username,
        secret: fields.secret,
        url: fields.url ?? null,
        notes: fields.notes ?? null,
        tags: normalizeTags(fields.tags ?? []),
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      draft.set(record.id, record);
      return cloneRecord(record);
    });
  }

  /**
   * @throws NotFoundError
   */
  update(id: string, fields: CredentialUpdate): Promise<CredentialRecord> {
    return this.mutate(draft => {
      const current = draft.get(id);
      if (!current) {
        throw new NotFoundError(`Credential ${id} not found`);
      }

      const next: CredentialRecord = {
        ...current,
        ...(fields.serviceName !== undefined ? { serviceName: fields.serviceName } : {}),
        ...(fields.username !== undefined ? { username: fields.username } : {}),
        ...(fields.secret !== undefined ? { secret: fields.secret } : {}),
        ...(fields.url !== undefined ? { url: fields.url } : {}),
        ...(fields.notes !== undefined ? { notes: fields.notes } : {}),
        tags: fields.tags !== undefined ? normalizeTags(fields.tags) : [...current.tags],
        id: current.id,
        createdAt: current.createdAt,
        updatedAt: Math.max(this.now(), current.updatedAt),
      };
      draft.set(id, next);
      return cloneRecord(next);
    });
  }

  /**
   * @throws NotFoundError
   */
  delete(id: string): Promise<CredentialRecord> {
    return this.mutate(draft => {
      const current = draft.get(id);
      if (!current) {
        throw new NotFoundError(`Credential ${id} not found`);
      }
      draft.delete(id);
      return cloneRecord(current);
    });
  }

  /**
   * Merge records from a decoded bundle in one write. Records keep their ids;
   * an imported record replaces a live record with the same id.
   */
  importRecords(records: CredentialRecord[]): Promise<{ added: number; replaced: number }> {
    return this.mutate(draft => {
      let added = 0;
      let replaced = 0;
      for (const record of records) {
        if (draft.has(record.id)) replaced++;
        else added++;
        draft.set(record.id, { ...cloneRecord(record), tags: normalizeTags(record.tags) });
      }
      return { added, replaced };
    });
  }

  /**
   * Re-key the vault under a fresh salt.
   * @throws AuthenticationError if `oldPassphrase` does not open the vault file
   */
  changePassphrase(oldPassphrase: string, newPassphrase: string): Promise<void> {
    return this.enqueue(async () => {
      this.assertOpen();

      try {
        const check = await this.reload(oldPassphrase);
        check.key.dispose();
      } catch (error) {
        if (error instanceof IntegrityError || error instanceof VaultMissingError) {
          throw new AuthenticationError();
        }
        throw error;
      }

      const header: VaultHeader = {
        formatVersion: FORMAT_VERSION,
        salt: generateSalt(),
        kdfIterations: this.kdfIterations,
      };
      const key = await deriveKey(newPassphrase, header.salt, header.kdfIterations);

      try {
        await this.persist(this.records, key, header);
      } catch (error) {
        key.dispose();
        throw error;
      }

      this.key.dispose();
      this.key = key;
      this.header = header;
      logger.info('Vault passphrase changed', { vaultId: this.vaultId });
    });
  }

  /**
   * Produce a bundle sealed under `exportPassphrase` holding every record.
   */
  exportBundle(exportPassphrase: string): Promise<{ blob: string; count: number }> {
    return this.enqueue(async () => {
      this.assertOpen();
      const records = Array.from(this.records.values(), cloneRecord);
      const blob = await createExportBundle(records, exportPassphrase, this.kdfIterations, this.now());
      return { blob, count: records.length };
    });
  }

  stats(): VaultStats {
    this.assertOpen();
    let file: Stats;
    try {
      file = statSync(this.vaultPath);
    } catch (error) {
      throw new StorageError('stat', 'Cannot read vault file metadata', { cause: error });
    }
    return {
      totalCredentials: this.records.size,
      createdAt: this.createdAt,
      lastModifiedAt: Math.floor(file.mtimeMs),
      fileSize: file.size,
      kdfIterations: this.header.kdfIterations,
      formatVersion: this.header.formatVersion,
    };
  }

  /**
   * Zero the key, drop decrypted records and release the file lock.
   * Waits for in-flight mutations to finish first.
   */
  close(): Promise<void> {
    return this.enqueue(async () => {
      if (this.closed) return;
      this.closed = true;
      this.key.dispose();
      this.records.clear();

      try {
        await this.release();
      } catch (error) {
        logger.warn('Failed to release vault lock', { vaultId: this.vaultId, error });
      }
      logger.info('Vault locked', { vaultId: this.vaultId });
    });
  }
}
