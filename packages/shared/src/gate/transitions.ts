/**
 * Runtime gate state machine
 *
 * Locked --correct--> Unlocked
 * Locked --wrong x maxAttempts--> Cooling
 * Cooling --attempt before until--> Cooling (rejected, nothing derived)
 * Cooling --attempt at/after until--> Locked, then the attempt proceeds
 * Unlocked --logout | session expired--> Locked
 *
 * All functions are pure: state in, state out.
 */

import type { EncryptedEnvelope, JsonValue, UnlockMethod } from '../types';
import { GATE_DEFAULTS, LOCKOUT_CONFIG } from '../config';
import type { LockoutConfig } from '../config';
import { AuthenticationFailure, ExpiredMethod, FormatError, RateLimited } from '../errors';
import { decodeEnvelope } from '../envelope/codec';
import { openEnvelope } from '../build/encryptor';
import { createLockoutState, getCooldownRemaining, recordFailedAttempt, resetFailedAttempts } from './lockout';
import type { LockoutState } from './lockout';
import { createSession, isSessionExpired } from './session';
import type { Session } from './session';

export type GateState<T> =
  | { status: 'locked'; tier: string; lockout: LockoutState }
  | { status: 'cooling'; tier: string; lockout: LockoutState; until: number }
  | {
      status: 'unlocked';
      tier: string;
      lockout: LockoutState;
      session: Session;
      method: UnlockMethod;
      content: T;
    };

export type RejectionError = AuthenticationFailure | FormatError | ExpiredMethod;

export type AttemptResult<T> =
  | { kind: 'unlocked'; content: T; method: UnlockMethod }
  | { kind: 'rejected'; error: RejectionError }
  | { kind: 'rate-limited'; error: RateLimited }
  | { kind: 'busy' }
  | { kind: 'aborted' };

/** What the visitor is told */
export type UserSignal =
  | { type: 'unlocked' }
  | { type: 'incorrect' }
  | { type: 'cooling'; secondsRemaining: number }
  | { type: 'busy' }
  | { type: 'aborted' };

export interface AttemptContext<T> {
  /** Encoded envelopes of the tier, tried in order */
  envelopes: string[];
  now: () => number;
  /** Validate decrypted JSON into the bundle type; throw to reject */
  parse: (value: JsonValue) => T;
  sessionTtlMs?: number;
  lockout?: LockoutConfig;
  onFormatError?: (error: FormatError) => void;
}

export function createGateState<T>(tier: string): GateState<T> {
  return { status: 'locked', tier, lockout: createLockoutState() };
}

function toSeconds(ms: number): number {
  return Math.ceil(ms / 1000);
}

/** Seconds left in the cooldown, 0 once attempts are accepted again */
export function getCooldownSeconds<T>(state: GateState<T>, now: number): number {
  return toSeconds(getCooldownRemaining(state.lockout, now));
}

/**
 * Expire the session lazily: an unlocked state read after `expiresAt`
 * drops its content and becomes locked.
 */
export function checkSession<T>(state: GateState<T>, now: number): GateState<T> {
  if (state.status === 'unlocked' && isSessionExpired(state.session, now)) {
    return { status: 'locked', tier: state.tier, lockout: state.lockout };
  }
  return state;
}

export function logout<T>(state: GateState<T>): GateState<T> {
  if (state.status !== 'unlocked') return state;
  return { status: 'locked', tier: state.tier, lockout: state.lockout };
}

/** Envelopes that carry an expiry belong to one-time codes */
function methodOf(envelope: EncryptedEnvelope): UnlockMethod {
  return envelope.expiresAt === null ? 'master' : 'one-time-code';
}

/** Most specific reason first */
function pickRejection(errors: RejectionError[]): RejectionError {
  return (
    errors.find((error) => error instanceof ExpiredMethod) ??
    errors.find((error) => error instanceof AuthenticationFailure) ??
    errors.find((error) => error instanceof FormatError) ??
    new AuthenticationFailure()
  );
}

async function tryEnvelope<T>(
  encoded: string,
  password: string,
  context: AttemptContext<T>
): Promise<{ ok: true; content: T; method: UnlockMethod } | { ok: false; error: RejectionError }> {
  let envelope: EncryptedEnvelope;
  try {
    envelope = decodeEnvelope(encoded);
  } catch (error) {
    if (error instanceof FormatError) {
      context.onFormatError?.(error);
      return { ok: false, error };
    }
    throw error;
  }

  if (envelope.expiresAt !== null && context.now() > envelope.expiresAt) {
    return { ok: false, error: new ExpiredMethod(envelope.expiresAt) };
  }

  let value: JsonValue;
  try {
    value = await openEnvelope(envelope, password);
  } catch (error) {
    if (error instanceof AuthenticationFailure) {
      return { ok: false, error };
    }
    if (error instanceof FormatError) {
      context.onFormatError?.(error);
      return { ok: false, error };
    }
    throw error;
  }

  try {
    return { ok: true, content: context.parse(value), method: methodOf(envelope) };
  } catch (error) {
    const formatError =
      error instanceof FormatError
        ? error
        : new FormatError(error instanceof Error ? error.message : 'Content rejected by parser');
    context.onFormatError?.(formatError);
    return { ok: false, error: formatError };
  }
}

/**
 * Apply one password attempt
 */
export async function attemptUnlock<T>(
  state: GateState<T>,
  password: string,
  context: AttemptContext<T>
): Promise<{ state: GateState<T>; result: AttemptResult<T> }> {
  const lockoutConfig = context.lockout ?? LOCKOUT_CONFIG;
  const current = checkSession(state, context.now());

  if (current.status === 'unlocked') {
    return {
      state: current,
      result: { kind: 'unlocked', content: current.content, method: current.method },
    };
  }

  let locked: GateState<T> = current;
  if (current.status === 'cooling') {
    const remaining = getCooldownRemaining(current.lockout, context.now());
    if (remaining > 0) {
      return {
        state: current,
        result: { kind: 'rate-limited', error: new RateLimited(toSeconds(remaining)) },
      };
    }
    locked = createGateState<T>(current.tier);
  }

  const errors: RejectionError[] = [];
  for (const encoded of context.envelopes) {
    const outcome = await tryEnvelope(encoded, password, context);
    if (outcome.ok) {
      const now = context.now();
      return {
        state: {
          status: 'unlocked',
          tier: locked.tier,
          lockout: resetFailedAttempts(),
          session: createSession(locked.tier, now, context.sessionTtlMs ?? GATE_DEFAULTS.sessionTtlMs),
          method: outcome.method,
          content: outcome.content,
        },
        result: { kind: 'unlocked', content: outcome.content, method: outcome.method },
      };
    }
    errors.push(outcome.error);
  }

  const now = context.now();
  const lockout = recordFailedAttempt(locked.lockout, now, lockoutConfig);
  const next: GateState<T> =
    lockout.cooldownUntil !== null
      ? { status: 'cooling', tier: locked.tier, lockout, until: lockout.cooldownUntil }
      : { status: 'locked', tier: locked.tier, lockout };

  return { state: next, result: { kind: 'rejected', error: pickRejection(errors) } };
}

/**
 * Collapse an attempt result into the visitor-facing signal.
 * Every failure except the cooldown reads as an incorrect password.
 */
export function toUserSignal<T>(result: AttemptResult<T>): UserSignal {
  switch (result.kind) {
    case 'unlocked':
      return { type: 'unlocked' };
    case 'rate-limited':
      return { type: 'cooling', secondsRemaining: result.error.secondsRemaining };
    case 'busy':
      return { type: 'busy' };
    case 'aborted':
      return { type: 'aborted' };
    case 'rejected':
      return { type: 'incorrect' };
  }
}
