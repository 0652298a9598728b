/**
 * Unlock sessions
 */

export interface Session {
  tier: string;
  unlockedAt: number;
  expiresAt: number;
}

export function createSession(tier: string, now: number, ttlMs: number): Session {
  return { tier, unlockedAt: now, expiresAt: now + ttlMs };
}

/** A session is readable up to and including `expiresAt` */
export function isSessionExpired(session: Session, now: number): boolean {
  return now > session.expiresAt;
}
