import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes
export const DEFAULT_LIMITER_SWEEP_INTERVAL_MS = 60_000;

export interface LoginRateLimitConfig {
  /** Failed logins tolerated per key within one window. Default: 5. */
  readonly maxAttempts?: number;
  /** Window length in milliseconds, counted from the first failure. Default: 15 minutes. */
  readonly windowMs?: number;
  /** How often expired windows are swept. Default: 60,000 ms. */
  readonly sweepIntervalMs?: number;
  /** Clock in milliseconds since epoch. Default: Date.now. */
  readonly now?: () => number;
}

interface FailureWindow {
  failures: number;
  readonly openedAt: number;
}

/**
 * Fixed-window lockout for failed logins.
 *
 * A login is usually guarded by several keys at once (`user:<name>` and
 * `ip:<address>`); the request is refused while any of them is locked.
 *
 * Callers reserve an attempt with {@link reserve} before verifying the
 * password and {@link release} it when the login succeeds, so concurrent
 * attempts count against the limit while they are still in flight.
 */
export class LoginRateLimiter {
  readonly #maxAttempts: number;
  readonly #windowMs: number;
  readonly #sweepIntervalMs: number;
  readonly #now: () => number;
  readonly #windows = new Map<string, FailureWindow>();
  #timer: ReturnType<typeof setInterval> | null = null;

  constructor(config: LoginRateLimitConfig = {}) {
    this.#maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.#windowMs = config.windowMs ?? DEFAULT_WINDOW_MS;
    this.#sweepIntervalMs = config.sweepIntervalMs ?? DEFAULT_LIMITER_SWEEP_INTERVAL_MS;
    this.#now = config.now ?? Date.now;
  }

  // ── Attempts ──────────────────────────────────────────────────

  /**
   * Throws RATE_LIMITED when any key is locked. `retryAfterMs` in the error
   * details is the longest remaining lockout among them.
   */
  assertAllowed(keys: readonly string[]): void {
    let retryAfterMs = 0;
    for (const key of keys) {
      retryAfterMs = Math.max(retryAfterMs, this.lockedFor(key));
    }
    if (retryAfterMs > 0) {
      throw new DndServerError(
        ErrorCode.RATE_LIMITED,
        'Too many failed login attempts. Try again later.',
        { retryAfterMs },
      );
    }
  }

  /**
   * Checks and counts one attempt against every key in a single step. The
   * attempt stays counted as a failure unless it is released.
   */
  reserve(keys: readonly string[]): void {
    this.assertAllowed(keys);
    this.recordFailure(keys);
  }

  /** Gives back an attempt taken by {@link reserve}. */
  release(keys: readonly string[]): void {
    for (const key of keys) {
      const window = this.#current(key);
      if (window === null) continue;
      window.failures--;
      if (window.failures <= 0) this.#windows.delete(key);
    }
  }

  /** Milliseconds until `key` unlocks, 0 when it is not locked. */
  lockedFor(key: string): number {
    const window = this.#current(key);
    if (window === null || window.failures < this.#maxAttempts) return 0;
    return window.openedAt + this.#windowMs - this.#now();
  }

  recordFailure(keys: readonly string[]): void {
    const now = this.#now();
    for (const key of keys) {
      const window = this.#current(key);
      if (window === null) {
        this.#windows.set(key, { failures: 1, openedAt: now });
      } else {
        window.failures++;
      }
    }
  }

  clear(key: string): void {
    this.#windows.delete(key);
  }

  // ── Sweep ─────────────────────────────────────────────────────

  /** Removes every window that has run out. */
  cleanup(): void {
    const now = this.#now();
    for (const [key, window] of this.#windows) {
      if (now - window.openedAt >= this.#windowMs) {
        this.#windows.delete(key);
      }
    }
  }

  /** Starts the periodic sweep. The timer does not keep the process alive. */
  start(): void {
    if (this.#timer !== null) return;
    this.#timer = setInterval(() => this.cleanup(), this.#sweepIntervalMs);
    this.#timer.unref();
  }

  stop(): void {
    if (this.#timer === null) return;
    clearInterval(this.#timer);
    this.#timer = null;
  }

  /** Number of keys with a failure window, including ones not yet swept. */
  get size(): number {
    return this.#windows.size;
  }

  // Drops the window for `key` once it has run out.
  #current(key: string): FailureWindow | null {
    const window = this.#windows.get(key);
    if (window === undefined) return null;
    if (this.#now() - window.openedAt >= this.#windowMs) {
      this.#windows.delete(key);
      return null;
    }
    return window;
  }
}
