/**
 * Content gate defaults
 */

export const GATE_DEFAULTS = {
  /** PBKDF2 iterations used when a build does not choose its own */
  iterations: 600_000,
  minIterations: 1_000,
  maxIterations: 10_000_000,
  /** How long an unlocked tier stays readable */
  sessionTtlMs: 60 * 60 * 1000, // 1 hour
  /** One-time code validity */
  oneTimeCodeTtlMs: 48 * 60 * 60 * 1000, // 48 hours
  oneTimeCodeLength: 8,
  /** Readable alphabet: no 0/O, 1/l/I */
  oneTimeCodeAlphabet: 'abcdefghjkmnpqrstuvwxyz23456789',
};

/**
 * Password lockout configuration
 */
export const LOCKOUT_CONFIG = {
  maxAttempts: 3,
  cooldownMs: 15 * 1000, // 15 seconds
};

export type LockoutConfig = typeof LOCKOUT_CONFIG;
