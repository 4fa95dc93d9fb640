// ── Identity Types ───────────────────────────────────────────────
//
// Accounts live in the `accounts` table of the embedded database.
// Session identities are derived from validated tokens and never persisted.

// ── Role ─────────────────────────────────────────────────────────

export const Role = {
  Root: 'root',
  Player: 'player',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

const ROLES: ReadonlySet<string> = new Set(Object.values(Role));

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.has(value);
}

// ── Account ──────────────────────────────────────────────────────

export interface Account {
  readonly username: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly createdAt: number;
}

/** Account info returned by public APIs (passwordHash stripped). */
export interface AccountInfo {
  readonly username: string;
  readonly role: Role;
  readonly createdAt: number;
}

export function toAccountInfo(account: Account): AccountInfo {
  return {
    username: account.username,
    role: account.role,
    createdAt: account.createdAt,
  };
}

// ── Session ──────────────────────────────────────────────────────

export interface SessionClaims {
  readonly subject: string;
  readonly role: Role | null;
  /** Random per-token identifier (the JWT `jti`). */
  readonly sessionId: string;
  /** Milliseconds since epoch, second precision. */
  readonly issuedAt: number;
  /** Milliseconds since epoch, second precision. */
  readonly expiresAt: number;
}

export interface IssuedSession {
  readonly token: string;
  readonly claims: SessionClaims;
}

/** The authenticated caller attached to a request. */
export interface Identity {
  readonly username: string;
  readonly role: Role;
  readonly sessionId: string;
  readonly expiresAt: number;
}

export type AnonymousReason =
  | 'missing'
  | 'invalid'
  | 'expired'
  | 'revoked'
  | 'unknown_subject'
  | 'role_mismatch';

export type AuthOutcome =
  | { readonly status: 'authenticated'; readonly identity: Identity }
  | { readonly status: 'anonymous'; readonly reason: AnonymousReason };

export interface LoginResult {
  readonly token: string;
  readonly identity: Identity;
}
