import { randomBytes, randomUUID } from 'node:crypto';
import { EncryptJWT, jwtDecrypt, errors, type JWTPayload } from 'jose';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';
import { isRole, type IssuedSession, type Role, type SessionClaims } from './identity-types.js';

// ── Constants ────────────────────────────────────────────────────

export const SESSION_KEY_BYTES = 32;
export const DEFAULT_SESSION_TTL_MS = 360 * 60 * 1000; // 6 hours
export const DEFAULT_CLOCK_SKEW_MS = 30_000;

const KEY_MANAGEMENT_ALG = 'dir';
const CONTENT_ENCRYPTION_ALG = 'A256GCM';

// Compact JWE: header.encryptedKey.iv.ciphertext.tag
const COMPACT_SEGMENTS = 5;
const BASE64URL = /^[A-Za-z0-9_-]*$/;

// ── Types ────────────────────────────────────────────────────────

export interface SessionCodecOptions {
  /** 32-byte symmetric key. Generated when omitted. */
  readonly key?: Uint8Array;
  /** Default token lifetime. Default: 6 hours. */
  readonly ttlMs?: number;
  /** How far in the future `iat` may lie before a token is rejected. Default: 30 s. */
  readonly clockSkewMs?: number;
  /** Clock in milliseconds since epoch. Default: Date.now. */
  readonly now?: () => number;
}

export interface IssueOptions {
  readonly ttlMs?: number;
  readonly role?: Role;
}

export type SessionValidation =
  | { readonly ok: true; readonly claims: SessionClaims }
  | { readonly ok: false; readonly reason: 'invalid' | 'expired' };

// ── SessionCodec ─────────────────────────────────────────────────

/**
 * Issues and validates self-contained session tokens.
 *
 * Tokens are compact JWEs (`dir` + `A256GCM`): the payload is encrypted and
 * authenticated with a single server-held key. Nothing is stored server-side.
 */
export class SessionCodec {
  readonly #key: Uint8Array;
  readonly #ttlMs: number;
  readonly #clockSkewMs: number;
  readonly #now: () => number;

  constructor(options: SessionCodecOptions = {}) {
    const key = options.key ?? SessionCodec.generateKey();
    if (key.length !== SESSION_KEY_BYTES) {
      throw new DndServerError(
        ErrorCode.VALIDATION_ERROR,
        `Session key must be ${SESSION_KEY_BYTES} bytes, got ${key.length}`,
      );
    }
    this.#key = Uint8Array.from(key);
    this.#ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.#clockSkewMs = options.clockSkewMs ?? DEFAULT_CLOCK_SKEW_MS;
    this.#now = options.now ?? Date.now;
  }

  static generateKey(): Uint8Array {
    return new Uint8Array(randomBytes(SESSION_KEY_BYTES));
  }

  get ttlMs(): number {
    return this.#ttlMs;
  }

  async issue(subject: string, options: IssueOptions = {}): Promise<IssuedSession> {
    const ttlMs = options.ttlMs ?? this.#ttlMs;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new DndServerError(ErrorCode.VALIDATION_ERROR, 'Session TTL must be positive');
    }

    const iat = Math.floor(this.#now() / 1000);
    const exp = iat + Math.ceil(ttlMs / 1000);
    const sessionId = randomUUID();

    const token = await new EncryptJWT(options.role !== undefined ? { role: options.role } : {})
      .setProtectedHeader({ alg: KEY_MANAGEMENT_ALG, enc: CONTENT_ENCRYPTION_ALG })
      .setSubject(subject)
      .setJti(sessionId)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .encrypt(this.#key);

    return {
      token,
      claims: {
        subject,
        role: options.role ?? null,
        sessionId,
        issuedAt: iat * 1000,
        expiresAt: exp * 1000,
      },
    };
  }

  async validate(token: string): Promise<SessionValidation> {
    if (!isCanonicalCompact(token)) {
      return { ok: false, reason: 'invalid' };
    }

    const now = this.#now();
    let payload: JWTPayload;
    try {
      // Decryption authenticates the whole token before any claim is read.
      ({ payload } = await jwtDecrypt(token, this.#key, {
        keyManagementAlgorithms: [KEY_MANAGEMENT_ALG],
        contentEncryptionAlgorithms: [CONTENT_ENCRYPTION_ALG],
        currentDate: new Date(now),
        // jose expires at `exp` inclusive and in whole seconds; the exact
        // `now > expiresAt` check follows below.
        clockTolerance: 1,
      }));
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        return { ok: false, reason: 'expired' };
      }
      if (error instanceof errors.JOSEError) {
        return { ok: false, reason: 'invalid' };
      }
      throw error;
    }

    const claims = toClaims(payload);
    if (claims === null) {
      return { ok: false, reason: 'invalid' };
    }
    if (now > claims.expiresAt) {
      return { ok: false, reason: 'expired' };
    }
    if (claims.issuedAt > now + this.#clockSkewMs) {
      return { ok: false, reason: 'invalid' };
    }
    return { ok: true, claims };
  }
}

// ── Helpers ──────────────────────────────────────────────────────

/**
 * Rejects anything that is not five canonical base64url segments, so that no
 * two distinct strings decode to the same token bytes.
 */
function isCanonicalCompact(token: string): boolean {
  const segments = token.split('.');
  if (segments.length !== COMPACT_SEGMENTS) return false;

  return segments.every(
    (segment) =>
      BASE64URL.test(segment) &&
      Buffer.from(segment, 'base64url').toString('base64url') === segment,
  );
}

function toClaims(payload: JWTPayload): SessionClaims | null {
  const { sub, jti, iat, exp } = payload;
  const role = payload['role'];

  if (typeof sub !== 'string' || sub.length === 0) return null;
  if (typeof jti !== 'string' || jti.length === 0) return null;
  if (typeof iat !== 'number' || typeof exp !== 'number') return null;
  if (role !== undefined && !isRole(role)) return null;

  return {
    subject: sub,
    role: role ?? null,
    sessionId: jti,
    issuedAt: iat * 1000,
    expiresAt: exp * 1000,
  };
}

/** Decodes a base64 (or base64url) session key from configuration. */
export function decodeSessionKey(encoded: string): Uint8Array {
  const key = Buffer.from(encoded.trim(), 'base64');
  if (key.length !== SESSION_KEY_BYTES) {
    throw new DndServerError(
      ErrorCode.VALIDATION_ERROR,
      `Session key must decode to ${SESSION_KEY_BYTES} bytes, got ${key.length}`,
    );
  }
  return new Uint8Array(key);
}
