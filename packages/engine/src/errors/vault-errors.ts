/**
 * Engine error taxonomy
 *
 * Every failure the engine reports is one of the classes below. Callers switch
 * on `code` instead of catching a broad exception class.
 */

export const VaultErrorCodes = {
  Authentication: 'auth/invalid_credentials',
  Lockout: 'auth/locked_out',
  SessionExpired: 'session/expired',
  NotFound: 'resource/not_found',
  TokenExpired: 'share/token_expired',
  Integrity: 'crypto/integrity',
  TamperDetected: 'audit/tamper_detected',
  Validation: 'input/invalid',
  VaultExists: 'vault/exists',
  VaultMissing: 'vault/missing',
  VaultBusy: 'vault/busy',
  Storage: 'vault/storage',
} as const;

export type VaultErrorCode = (typeof VaultErrorCodes)[keyof typeof VaultErrorCodes];

/** Reasons reported by the integrity-check path and by import. */
export type IntegrityReason =
  | 'truncated'
  | 'unsupported_version'
  | 'invalid_header'
  | 'decryption_failed'
  | 'invalid_payload'
  | 'invalid_bundle';

export interface VaultErrorJson {
  kind: 'VaultError';
  code: VaultErrorCode;
  message: string;
  data?: Record<string, unknown>;
}

export abstract class VaultError extends Error {
  readonly kind = 'VaultError' as const;
  abstract readonly code: VaultErrorCode;
  /** Lockout, session and input failures can be retried; integrity failures cannot. */
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }

  protected data(): Record<string, unknown> | undefined {
    return undefined;
  }

  toJSON(): VaultErrorJson {
    const data = this.data();
    return {
      kind: 'VaultError',
      code: this.code,
      message: this.message,
      ...(data !== undefined ? { data } : {}),
    };
  }
}

/**
 * Wrong passphrase or unreadable vault. The two are deliberately reported the
 * same way so the caller cannot tell them apart.
 */
export class AuthenticationError extends VaultError {
  readonly code = VaultErrorCodes.Authentication;
  readonly recoverable = true;

  constructor(message: string = 'Invalid credentials', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class LockoutError extends VaultError {
  readonly code = VaultErrorCodes.Lockout;
  readonly recoverable = true;
  readonly lockedUntil: number;

  constructor(lockedUntil: number) {
    super('Too many failed attempts, try again later');
    this.lockedUntil = lockedUntil;
  }

  protected data(): Record<string, unknown> {
    return { lockedUntil: this.lockedUntil };
  }
}

export class SessionExpiredError extends VaultError {
  readonly code = VaultErrorCodes.SessionExpired;
  readonly recoverable = true;

  constructor(message: string = 'Session expired') {
    super(message);
  }
}

export class NotFoundError extends VaultError {
  readonly code = VaultErrorCodes.NotFound;
  readonly recoverable = true;

  constructor(message: string = 'Resource not found') {
    super(message);
  }
}

export class TokenExpiredError extends VaultError {
  readonly code = VaultErrorCodes.TokenExpired;
  readonly recoverable = true;

  constructor(message: string = 'Share token expired or already used') {
    super(message);
  }
}

export class IntegrityError extends VaultError {
  readonly code = VaultErrorCodes.Integrity;
  readonly recoverable = false;
  readonly reason: IntegrityReason;

  constructor(reason: IntegrityReason, message: string = 'Integrity check failed', options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }

  protected data(): Record<string, unknown> {
    return { reason: this.reason };
  }
}

export class TamperDetectedError extends VaultError {
  readonly code = VaultErrorCodes.TamperDetected;
  readonly recoverable = false;
  /** First sequence number whose hash does not verify */
  readonly sequence: number;

  constructor(sequence: number, message: string = `Audit chain broken at entry ${sequence}`) {
    super(message);
    this.sequence = sequence;
  }

  protected data(): Record<string, unknown> {
    return { sequence: this.sequence };
  }
}

export class ValidationError extends VaultError {
  readonly code = VaultErrorCodes.Validation;
  readonly recoverable = true;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }

  protected data(): Record<string, unknown> | undefined {
    return this.issues.length > 0 ? { issues: this.issues } : undefined;
  }
}

export class VaultExistsError extends VaultError {
  readonly code = VaultErrorCodes.VaultExists;
  readonly recoverable = false;

  constructor(message: string = 'A vault already exists at this location') {
    super(message);
  }
}

export class VaultMissingError extends VaultError {
  readonly code = VaultErrorCodes.VaultMissing;
  readonly recoverable = false;

  constructor(message: string = 'No vault exists at this location') {
    super(message);
  }
}

export class VaultBusyError extends VaultError {
  readonly code = VaultErrorCodes.VaultBusy;
  readonly recoverable = true;

  constructor(message: string = 'Vault is held by another handle', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Which file operation failed */
export type StorageOperation = 'read' | 'write' | 'stat' | 'append';

/**
 * The filesystem refused a read or write. The file on disk is left as it was.
 */
export class StorageError extends VaultError {
  readonly code = VaultErrorCodes.Storage;
  readonly recoverable = true;
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.operation = operation;
  }

  protected data(): Record<string, unknown> {
    return { operation: this.operation };
  }
}

export function isVaultError(value: unknown): value is VaultError {
  return value instanceof VaultError;
}

export function hasErrorCode<C extends VaultErrorCode>(
  value: unknown,
  code: C
): value is VaultError & { code: C } {
  return isVaultError(value) && value.code === code;
}
