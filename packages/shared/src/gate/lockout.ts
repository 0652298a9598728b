/**
 * Password lockout
 * Per-tier, in-memory attempt counter with a flat cooldown.
 */

import { LOCKOUT_CONFIG } from '../config';
import type { LockoutConfig } from '../config';

export interface LockoutState {
  /** Number of consecutive failed attempts */
  failedAttempts: number;
  /** Cooldown end time (null if not cooling) */
  cooldownUntil: number | null;
}

export function createLockoutState(): LockoutState {
  return { failedAttempts: 0, cooldownUntil: null };
}

/**
 * Remaining cooldown in milliseconds, 0 when attempts are allowed.
 * Always computed from the supplied clock reading, never cached.
 */
export function getCooldownRemaining(state: LockoutState, now: number): number {
  if (state.cooldownUntil === null) return 0;
  return Math.max(0, state.cooldownUntil - now);
}

/**
 * Record a failed password attempt
 */
export function recordFailedAttempt(
  state: LockoutState,
  now: number,
  config: LockoutConfig = LOCKOUT_CONFIG
): LockoutState {
  const failedAttempts = state.failedAttempts + 1;

  if (failedAttempts >= config.maxAttempts) {
    return {
      failedAttempts,
      cooldownUntil: now + config.cooldownMs,
    };
  }

  return {
    ...state,
    failedAttempts,
  };
}

/**
 * Reset failed attempts after successful password entry
 */
export function resetFailedAttempts(): LockoutState {
  return createLockoutState();
}

/**
 * Check lockout status
 */
export function getLockoutStatus(
  state: LockoutState,
  now: number,
  config: LockoutConfig = LOCKOUT_CONFIG
): {
  isLocked: boolean;
  remainingMs: number;
  attemptsRemaining: number;
} {
  const remainingMs = getCooldownRemaining(state, now);

  if (remainingMs > 0) {
    return { isLocked: true, remainingMs, attemptsRemaining: 0 };
  }

  return {
    isLocked: false,
    remainingMs: 0,
    attemptsRemaining: Math.max(0, config.maxAttempts - state.failedAttempts),
  };
}
