/**
 * Failed-attempt tracking and lockout, keyed by vault identity.
 * Memory only: a restart clears lockouts.
 */

import type { LockoutState } from '../types/session';

export interface LockoutPolicy {
  maxFailedAttempts: number;
  lockoutDurationMs: number;
  /** Failures older than this no longer count toward a lockout */
  failedAttemptWindowMs: number;
}

export type LockoutCheck =
  | { allowed: true; remainingAttempts: number }
  | { allowed: false; lockedUntil: number };

function emptyState(): LockoutState {
  return { failedAttemptCount: 0, firstFailureAt: null, lockedUntil: null };
}

export class LockoutTracker {
  private readonly states = new Map<string, LockoutState>();

  constructor(
    private readonly policy: LockoutPolicy,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Whether an attempt may proceed. An elapsed lockout is cleared here.
   */
  check(vaultId: string): LockoutCheck {
    const state = this.states.get(vaultId);
    if (!state) {
      return { allowed: true, remainingAttempts: this.policy.maxFailedAttempts };
    }

    if (state.lockedUntil !== null) {
      if (this.now() < state.lockedUntil) {
        return { allowed: false, lockedUntil: state.lockedUntil };
      }
      this.states.delete(vaultId);
      return { allowed: true, remainingAttempts: this.policy.maxFailedAttempts };
    }

    return {
      allowed: true,
      remainingAttempts: Math.max(0, this.policy.maxFailedAttempts - state.failedAttemptCount),
    };
  }

  /**
   * Count a failed attempt; locks the vault once the threshold is reached
   * inside the window.
   */
  recordFailure(vaultId: string): LockoutState {
    const now = this.now();
    const current = this.states.get(vaultId) ?? emptyState();

    const windowExpired =
      current.firstFailureAt !== null && now - current.firstFailureAt > this.policy.failedAttemptWindowMs;
    const state: LockoutState = windowExpired || current.firstFailureAt === null
      ? { failedAttemptCount: 1, firstFailureAt: now, lockedUntil: null }
      : { ...current, failedAttemptCount: current.failedAttemptCount + 1 };

    if (state.failedAttemptCount >= this.policy.maxFailedAttempts) {
      state.lockedUntil = now + this.policy.lockoutDurationMs;
    }

    this.states.set(vaultId, state);
    return { ...state };
  }

  reset(vaultId: string): void {
    this.states.delete(vaultId);
  }

  getState(vaultId: string): LockoutState {
    const state = this.states.get(vaultId);
    return state ? { ...state } : emptyState();
  }

  isLockedOut(vaultId: string): boolean {
    return !this.check(vaultId).allowed;
  }
}
