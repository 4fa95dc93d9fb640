// ── Session Revocation ──────────────────────────────────────────
//
// In-memory denylist of revoked session ids. An entry only has to outlive
// the token it revokes, so each one expires together with its token.

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface RevocationConfig {
  /** How often expired entries are swept. Default: 60,000 ms. */
  readonly sweepIntervalMs?: number;
}

export interface RevokedEntry {
  readonly sessionId: string;
  readonly revokedAt: number;
  readonly expiresAt: number;
}

export class SessionDenylist {
  readonly #sweepIntervalMs: number;
  readonly #entries = new Map<string, RevokedEntry>();
  #timer: ReturnType<typeof setInterval> | null = null;

  constructor(config?: RevocationConfig) {
    this.#sweepIntervalMs = config?.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  }

  /** Revokes a session until `expiresAt` (the token's own expiry). */
  revoke(sessionId: string, expiresAt: number): void {
    const now = Date.now();
    if (expiresAt <= now) return;
    this.#entries.set(sessionId, { sessionId, revokedAt: now, expiresAt });
  }

  /** Returns true if the session is currently revoked. */
  isRevoked(sessionId: string): boolean {
    const entry = this.#entries.get(sessionId);
    if (entry === undefined) return false;
    if (entry.expiresAt <= Date.now()) {
      this.#entries.delete(sessionId);
      return false;
    }
    return true;
  }

  /** Removes all expired entries. */
  cleanup(): void {
    const now = Date.now();
    for (const [sessionId, entry] of this.#entries) {
      if (entry.expiresAt <= now) {
        this.#entries.delete(sessionId);
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

  /** Number of denylisted entries (including potentially expired ones). */
  get size(): number {
    return this.#entries.size;
  }
}
