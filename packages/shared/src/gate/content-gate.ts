/**
 * Content gate
 * One instance per tier per page load. Owns the tier's state and
 * serialises password attempts against it.
 */

import type { JsonValue } from '../types';
import type { LockoutConfig } from '../config';
import { AuthenticationFailure } from '../errors';
import {
  attemptUnlock,
  checkSession,
  createGateState,
  getCooldownSeconds,
  logout,
} from './transitions';
import type { AttemptResult, GateState } from './transitions';

export interface ContentGateOptions<T> {
  tier: string;
  envelopes: string[];
  parse: (value: JsonValue) => T;
  now?: () => number;
  sessionTtlMs?: number;
  lockout?: LockoutConfig;
  logger?: Pick<Console, 'warn'>;
}

export interface AttemptOptions {
  /** Abandon the attempt; nothing is committed once aborted */
  signal?: AbortSignal;
}

type Listener<T> = (state: GateState<T>) => void;

export class ContentGate<T> {
  readonly tier: string;
  private state: GateState<T>;
  private readonly options: ContentGateOptions<T>;
  private readonly now: () => number;
  private readonly logger: Pick<Console, 'warn'>;
  private readonly listeners = new Set<Listener<T>>();
  private inflight: AbortController | null = null;
  private disposed = false;

  constructor(options: ContentGateOptions<T>) {
    this.tier = options.tier;
    this.options = options;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
    this.state = createGateState<T>(options.tier);
  }

  getState(): GateState<T> {
    return this.state;
  }

  get isBusy(): boolean {
    return this.inflight !== null;
  }

  /**
   * Try a password. Only one attempt runs at a time; a second call while
   * one is pending returns `busy` and leaves the state alone.
   */
  async attempt(password: string, options: AttemptOptions = {}): Promise<AttemptResult<T>> {
    if (this.disposed || options.signal?.aborted) {
      return { kind: 'aborted' };
    }
    if (this.inflight) {
      return { kind: 'busy' };
    }

    const controller = new AbortController();
    const abandon = () => controller.abort();
    options.signal?.addEventListener('abort', abandon, { once: true });
    this.inflight = controller;

    try {
      const { state, result } = await attemptUnlock(this.state, password, {
        envelopes: this.options.envelopes,
        now: this.now,
        parse: this.options.parse,
        sessionTtlMs: this.options.sessionTtlMs,
        lockout: this.options.lockout,
        onFormatError: (error) => {
          this.logger.warn(`[gate] ${this.tier}: ${error.message}`);
        },
      });

      if (controller.signal.aborted) {
        return { kind: 'aborted' };
      }
      this.setState(state);
      return result;
    } catch (error) {
      // Environment failure, e.g. no Web Crypto
      this.logger.warn(`[gate] ${this.tier}: attempt failed: ${error instanceof Error ? error.message : String(error)}`);
      return { kind: 'rejected', error: new AuthenticationFailure() };
    } finally {
      options.signal?.removeEventListener('abort', abandon);
      this.inflight = null;
    }
  }

  /**
   * Decrypted content, or null when locked. Counts as an interaction:
   * an expired session is dropped here.
   */
  getContent(): T | null {
    const state = this.checkSession();
    return state.status === 'unlocked' ? state.content : null;
  }

  checkSession(): GateState<T> {
    const next = checkSession(this.state, this.now());
    if (next !== this.state) {
      this.setState(next);
    }
    return this.state;
  }

  cooldownSeconds(): number {
    return getCooldownSeconds(this.state, this.now());
  }

  logout(): void {
    this.setState(logout(this.state));
  }

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Abandon any pending attempt and drop decrypted content */
  dispose(): void {
    this.inflight?.abort();
    this.setState(logout(this.state));
    this.listeners.clear();
    this.disposed = true;
  }

  private setState(state: GateState<T>): void {
    if (state === this.state) return;
    this.state = state;
    this.listeners.forEach((listener) => listener(state));
  }
}
