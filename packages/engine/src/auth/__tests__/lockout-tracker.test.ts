import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { LockoutTracker } from '../lockout-tracker';

const POLICY = { maxFailedAttempts: 5, lockoutDurationMs: 300_000, failedAttemptWindowMs: 900_000 };
const VAULT = '/vaults/a.keycase';

describe('Lockout Tracker', () => {
  let clock: number;
  let tracker: LockoutTracker;

  beforeEach(() => {
    clock = 1_000_000;
    tracker = new LockoutTracker(POLICY, () => clock);
  });

  it('should allow attempts for an unknown vault', () => {
    expect(tracker.check(VAULT)).toEqual({ allowed: true, remainingAttempts: 5 });
    expect(tracker.getState(VAULT)).toEqual({ failedAttemptCount: 0, firstFailureAt: null, lockedUntil: null });
  });

  it('should count down remaining attempts', () => {
    tracker.recordFailure(VAULT);
    clock += 1_000;
    tracker.recordFailure(VAULT);

    expect(tracker.check(VAULT)).toEqual({ allowed: true, remainingAttempts: 3 });
    expect(tracker.getState(VAULT)).toEqual({ failedAttemptCount: 2, firstFailureAt: 1_000_000, lockedUntil: null });
  });

  it('should lock at the threshold until the duration elapses', () => {
    for (let i = 0; i < 4; i++) {
      expect(tracker.recordFailure(VAULT).lockedUntil).toBeNull();
    }
    const state = tracker.recordFailure(VAULT);

    expect(state.lockedUntil).toBe(1_300_000);
    expect(tracker.check(VAULT)).toEqual({ allowed: false, lockedUntil: 1_300_000 });
    expect(tracker.isLockedOut(VAULT)).toBe(true);

    clock = 1_299_999;
    expect(tracker.isLockedOut(VAULT)).toBe(true);

    clock = 1_300_000;
    expect(tracker.check(VAULT)).toEqual({ allowed: true, remainingAttempts: 5 });
    expect(tracker.getState(VAULT).failedAttemptCount).toBe(0);
  });

  it('should restart the count when the first failure leaves the window', () => {
    for (let i = 0; i < 4; i++) tracker.recordFailure(VAULT);
    clock += 900_001;

    const state = tracker.recordFailure(VAULT);
    expect(state).toEqual({ failedAttemptCount: 1, firstFailureAt: clock, lockedUntil: null });
  });

  it('should keep vaults apart', () => {
    for (let i = 0; i < 5; i++) tracker.recordFailure(VAULT);
    expect(tracker.isLockedOut(VAULT)).toBe(true);
    expect(tracker.isLockedOut('/vaults/b.keycase')).toBe(false);
  });

  it('should clear state on reset', () => {
    tracker.recordFailure(VAULT);
    tracker.reset(VAULT);
    expect(tracker.getState(VAULT).failedAttemptCount).toBe(0);
  });

  /**
   * 窗口内少于阈值的失败次数永远不会触发锁定
   */
  it('should never lock below the threshold', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), fc.integer({ min: 0, max: 9 }), (max, failures) => {
        const local = new LockoutTracker({ ...POLICY, maxFailedAttempts: max }, () => clock);
        for (let i = 0; i < failures; i++) local.recordFailure(VAULT);
        expect(local.isLockedOut(VAULT)).toBe(failures >= max);
      })
    );
  });
});
