/**
 * Share Token Module
 * One-time, expiring handoff of a single credential.
 *
 * A token string is `<tokenId>.<tokenKey>`. Only the tokenId is kept here; the
 * tokenKey is the AES key of the sealed snapshot and leaves with the recipient.
 */

import { z } from 'zod';
import { open, seal } from '../crypto/cipher-codec';
import { hashPassphrase, verifyPassphrase } from '../crypto/passphrase-hash';
import { SecretKey } from '../crypto/secret-key';
import {
  base64UrlToBytes,
  bytesToBase64Url,
  bytesToString,
  generateRandomBytes,
  stringToBytes,
  wipe,
} from '../crypto/utils';
import {
  AuthenticationError,
  IntegrityError,
  NotFoundError,
  TokenExpiredError,
  ValidationError,
} from '../errors/vault-errors';
import { createLogger } from '../logging/logger';
import { createSerialQueue } from '../vault/serial-queue';
import type { UnlockedVault } from '../vault/vault-store';
import type { IssuedShare, SharedCredential, ShareSummary, ShareToken } from '../types/share';

const logger = createLogger('ShareToken');

const TOKEN_ID_BYTES = 16;
const TOKEN_KEY_BYTES = 32;
const BASE64URL = /^[A-Za-z0-9_-]+$/;

const SnapshotSchema = z.object({
  serviceName: z.string(),
  username: z.string(),
  secret: z.string(),
  url: z.string().nullable(),
  notes: z.string().nullable(),
});

type Snapshot = z.infer<typeof SnapshotSchema>;

export interface ShareTokenServiceOptions {
  /** Wrong share passphrases tolerated before a token is burned */
  maxFailedAttempts: number;
  defaultTtlMs: number;
  maxTtlMs: number;
  /** Time after expiry before a token's tombstone is dropped and its id reads as unknown */
  tombstoneRetentionMs: number;
  /** PBKDF2 iterations for share passphrase hashes */
  kdfIterations: number;
  now?: () => number;
}

export interface IssueShareOptions {
  ttlMs?: number;
  sharePassphrase?: string;
}

/** Outcome of a redemption attempt that did not hand out the credential */
export type ShareRejection = 'unknown' | 'expired' | 'redeemed' | 'revoked' | 'passphrase_required' | 'wrong_passphrase';

/** Parsed token string; `null` when the shape is wrong */
function parseToken(token: string): { tokenId: string; tokenKey: Uint8Array } | null {
  const parts = token.split('.');
  if (parts.length !== 2) return null;
  const [tokenId, keyPart] = parts;
  if (!BASE64URL.test(tokenId) || !BASE64URL.test(keyPart)) return null;

  const tokenKey = base64UrlToBytes(keyPart);
  if (tokenKey.length !== TOKEN_KEY_BYTES) return null;
  return { tokenId, tokenKey };
}

function toSummary(token: ShareToken): ShareSummary {
  return {
    tokenId: token.tokenId,
    credentialId: token.credentialId,
    issuedAt: token.issuedAt,
    expiresAt: token.expiresAt,
    passphraseProtected: token.sharePassphraseHash !== null,
  };
}

/** Result of a redemption attempt */
export type RedeemOutcome =
  | { ok: true; tokenId: string; credentialId: string; credential: SharedCredential }
  | { ok: false; tokenId: string | null; credentialId: string | null; rejection: ShareRejection };

/**
 * Error reported to the caller for a rejected redemption.
 */
export function rejectionError(rejection: ShareRejection): NotFoundError | TokenExpiredError | AuthenticationError {
  switch (rejection) {
    case 'unknown':
      return new NotFoundError('Share token not found');
    case 'expired':
    case 'redeemed':
    case 'revoked':
      return new TokenExpiredError();
    case 'passphrase_required':
      return new AuthenticationError('Share passphrase required');
    case 'wrong_passphrase':
      return new AuthenticationError('Invalid share passphrase');
  }
}

export class ShareTokenService {
  private readonly tokens = new Map<string, ShareToken>();
  private readonly enqueue = createSerialQueue();
  private readonly options: ShareTokenServiceOptions;
  private readonly now: () => number;

  constructor(options: ShareTokenServiceOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Validate a requested lifetime, falling back to the default.
   * @throws ValidationError
   */
  resolveTtl(ttlMs: number | undefined): number {
    if (ttlMs === undefined) return this.options.defaultTtlMs;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new ValidationError('Share TTL must be a positive number of milliseconds');
    }
    if (ttlMs > this.options.maxTtlMs) {
      throw new ValidationError(`Share TTL must not exceed ${this.options.maxTtlMs} ms`);
    }
    return ttlMs;
  }

  /**
   * Snapshot a credential into a new token.
   * @throws NotFoundError | ValidationError
   */
  async issue(vault: UnlockedVault, credentialId: string, options: IssueShareOptions = {}): Promise<IssuedShare> {
    const ttlMs = this.resolveTtl(options.ttlMs);
    this.purgeExpired();
    if (options.sharePassphrase !== undefined && options.sharePassphrase.length === 0) {
      throw new ValidationError('Share passphrase must not be empty');
    }

    const record = vault.get(credentialId);
    const snapshot: Snapshot = {
      serviceName: record.serviceName,
      username: record.username,
      secret: record.secret,
      url: record.url,
      notes: record.notes,
    };

    const tokenId = bytesToBase64Url(generateRandomBytes(TOKEN_ID_BYTES));
    const key = new SecretKey(generateRandomBytes(TOKEN_KEY_BYTES));
    let tokenKey: string;
    let sealedSnapshot: Uint8Array;
    try {
      sealedSnapshot = await seal(key, stringToBytes(JSON.stringify(snapshot)), stringToBytes(tokenId));
      tokenKey = bytesToBase64Url(key.bytes());
    } finally {
      key.dispose();
    }

    const sharePassphraseHash =
      options.sharePassphrase !== undefined
        ? await hashPassphrase(options.sharePassphrase, this.options.kdfIterations)
        : null;

    const issuedAt = this.now();
    const token: ShareToken = {
      tokenId,
      credentialId,
      issuedAt,
      expiresAt: issuedAt + ttlMs,
      sharePassphraseHash,
      redeemed: false,
      revoked: false,
      failedAttempts: 0,
      sealedSnapshot,
    };
    this.tokens.set(tokenId, token);

    logger.info('Share token issued', { tokenId, credentialId, expiresAt: token.expiresAt });
    return {
      token: `${tokenId}.${tokenKey}`,
      tokenId,
      credentialId,
      expiresAt: token.expiresAt,
      passphraseProtected: sharePassphraseHash !== null,
    };
  }

  /**
   * Hand out the snapshot once. Does not need an unlocked vault.
   * Rejections are returned, not thrown; see `rejectionError`.
   */
  redeem(token: string, sharePassphrase?: string): Promise<RedeemOutcome> {
    return this.enqueue(() => this.redeemToken(token, sharePassphrase));
  }

  private async redeemToken(token: string, sharePassphrase: string | undefined): Promise<RedeemOutcome> {
    const parsed = parseToken(token);
    const stored = parsed ? this.tokens.get(parsed.tokenId) : undefined;
    if (!parsed || !stored) {
      if (parsed) wipe(parsed.tokenKey);
      return { ok: false, tokenId: null, credentialId: null, rejection: 'unknown' };
    }

    const reject = (rejection: ShareRejection): RedeemOutcome => ({
      ok: false,
      tokenId: stored.tokenId,
      credentialId: stored.credentialId,
      rejection,
    });

    const inactive = this.inactiveReason(stored);
    if (inactive) {
      wipe(parsed.tokenKey);
      return reject(inactive);
    }

    const key = new SecretKey(parsed.tokenKey);
    let snapshot: Snapshot;
    try {
      snapshot = await this.openSnapshot(stored, key);
    } catch (error) {
      if (error instanceof IntegrityError) {
        // right id, wrong key: treated as a token we never issued
        return { ok: false, tokenId: null, credentialId: null, rejection: 'unknown' };
      }
      throw error;
    } finally {
      key.dispose();
    }

    if (stored.sharePassphraseHash !== null) {
      if (sharePassphrase === undefined) {
        return reject('passphrase_required');
      }
      const matches = await verifyPassphrase(sharePassphrase, stored.sharePassphraseHash);
      if (!matches) {
        this.recordWrongPassphrase(stored);
        return reject('wrong_passphrase');
      }
    }

    stored.redeemed = true;
    this.dropSnapshot(stored);
    logger.info('Share token redeemed', { tokenId: stored.tokenId, credentialId: stored.credentialId });

    return {
      ok: true,
      tokenId: stored.tokenId,
      credentialId: stored.credentialId,
      credential: Object.freeze({ ...snapshot, sharedAt: stored.issuedAt }),
    };
  }

  private async openSnapshot(stored: ShareToken, key: SecretKey): Promise<Snapshot> {
    if (!stored.sealedSnapshot) {
      throw new IntegrityError('decryption_failed', 'Share snapshot is gone');
    }
    const plaintext = await open(key, stored.sealedSnapshot, stringToBytes(stored.tokenId));
    let json: unknown;
    try {
      json = JSON.parse(bytesToString(plaintext));
    } catch (error) {
      throw new IntegrityError('invalid_payload', 'Share snapshot is not readable', { cause: error });
    }
    const snapshot = SnapshotSchema.safeParse(json);
    if (!snapshot.success) {
      throw new IntegrityError('invalid_payload', 'Share snapshot is malformed');
    }
    return snapshot.data;
  }

  private recordWrongPassphrase(stored: ShareToken): void {
    stored.failedAttempts++;
    if (stored.failedAttempts >= this.options.maxFailedAttempts) {
      stored.revoked = true;
      this.dropSnapshot(stored);
      logger.warn('Share token burned after repeated wrong passphrases', { tokenId: stored.tokenId });
    }
  }

  private inactiveReason(stored: ShareToken): ShareRejection | null {
    if (stored.redeemed) return 'redeemed';
    if (stored.revoked) return 'revoked';
    if (this.now() > stored.expiresAt) return 'expired';
    return null;
  }

  private dropSnapshot(stored: ShareToken): void {
    if (stored.sealedSnapshot) {
      wipe(stored.sealedSnapshot);
      stored.sealedSnapshot = null;
    }
  }

  /**
   * Withdraw a token before it is used.
   * @returns false when the token was already inactive
   * @throws NotFoundError for an unknown tokenId
   */
  revoke(tokenId: string): boolean {
    const stored = this.tokens.get(tokenId);
    if (!stored) {
      throw new NotFoundError(`Share token ${tokenId} not found`);
    }
    if (this.inactiveReason(stored) !== null) {
      this.dropSnapshot(stored);
      return false;
    }
    stored.revoked = true;
    this.dropSnapshot(stored);
    logger.info('Share token revoked', { tokenId });
    return true;
  }

  /** Tokens that can still be redeemed, oldest first */
  listActive(credentialId?: string): ShareSummary[] {
    return Array.from(this.tokens.values())
      .filter(token => this.inactiveReason(token) === null)
      .filter(token => credentialId === undefined || token.credentialId === credentialId)
      .sort((a, b) => a.issuedAt - b.issuedAt)
      .map(toSummary);
  }

  /**
   * Drop sealed snapshots of expired tokens. Tombstones stay so the ids keep
   * reporting TokenExpiredError, until `tombstoneRetentionMs` after expiry.
   * @returns number of snapshots dropped
   */
  purgeExpired(): number {
    const now = this.now();
    let purged = 0;
    let evicted = 0;
    for (const token of Array.from(this.tokens.values())) {
      if (now <= token.expiresAt) continue;
      if (token.sealedSnapshot) {
        this.dropSnapshot(token);
        purged++;
      }
      if (now - token.expiresAt > this.options.tombstoneRetentionMs) {
        this.tokens.delete(token.tokenId);
        evicted++;
      }
    }
    if (purged > 0 || evicted > 0) {
      logger.debug('Expired share tokens purged', { snapshots: purged, tombstones: evicted });
    }
    return purged;
  }

  /** Bookkeeping view of one token, without its snapshot */
  describe(tokenId: string): ShareSummary | null {
    const stored = this.tokens.get(tokenId);
    return stored ? toSummary(stored) : null;
  }
}
