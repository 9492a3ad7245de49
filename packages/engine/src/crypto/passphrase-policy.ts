/**
 * Master passphrase policy
 * Applied when a passphrase is chosen (vault creation, passphrase change, export),
 * never when one is only being checked.
 */

import { ValidationError } from '../errors/vault-errors';
import type { PassphraseStrength } from '../types/crypto';

export const MIN_PASSPHRASE_LENGTH = 8;

/**
 * Validate passphrase strength
 */
export function validatePassphraseStrength(passphrase: string): PassphraseStrength {
  const errors: string[] = [];

  if (passphrase.length < MIN_PASSPHRASE_LENGTH) {
    errors.push(`Passphrase must be at least ${MIN_PASSPHRASE_LENGTH} characters`);
  }

  if (!/[A-Z]/.test(passphrase)) {
    errors.push('Passphrase must contain at least one uppercase letter');
  }

  if (!/[a-z]/.test(passphrase)) {
    errors.push('Passphrase must contain at least one lowercase letter');
  }

  if (!/[0-9]/.test(passphrase)) {
    errors.push('Passphrase must contain at least one number');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * @throws ValidationError when the passphrase does not meet the policy
 */
export function assertPassphraseStrength(passphrase: string, label: string = 'Passphrase'): void {
  const { valid, errors } = validatePassphraseStrength(passphrase);
  if (!valid) {
    throw new ValidationError(`${label} is too weak`, errors);
  }
}
