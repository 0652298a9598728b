/**
 * Content gate error types
 */

export type GateErrorCode =
  | 'FORMAT_ERROR'
  | 'AUTHENTICATION_FAILURE'
  | 'EXPIRED_METHOD'
  | 'RATE_LIMITED'
  | 'BUILD_ERROR';

export class GateError extends Error {
  code: GateErrorCode;

  constructor(message: string, code: GateErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Envelope or decrypted payload is malformed */
export class FormatError extends GateError {
  constructor(message: string = 'Malformed envelope') {
    super(message, 'FORMAT_ERROR');
  }
}

/** Wrong password or tampered ciphertext; the two are indistinguishable */
export class AuthenticationFailure extends GateError {
  constructor() {
    super('Incorrect password', 'AUTHENTICATION_FAILURE');
  }
}

/** One-time code past its validity window */
export class ExpiredMethod extends GateError {
  expiresAt: number;

  constructor(expiresAt: number) {
    super('Unlock method has expired', 'EXPIRED_METHOD');
    this.expiresAt = expiresAt;
  }
}

export class RateLimited extends GateError {
  secondsRemaining: number;

  constructor(secondsRemaining: number) {
    super(`Too many attempts. Try again in ${secondsRemaining}s`, 'RATE_LIMITED');
    this.secondsRemaining = secondsRemaining;
  }
}

/** Fatal: the artifact must not be produced */
export class BuildError extends GateError {
  constructor(message: string) {
    super(message, 'BUILD_ERROR');
  }
}
