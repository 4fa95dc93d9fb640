import { randomBytes } from 'node:crypto';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';
import type { CredentialStore } from '../identity/credential-store.js';
import type { SessionCodec } from '../identity/session-codec.js';
import type { LoginRateLimiter } from '../identity/login-rate-limiter.js';
import { hashPassword, verifyPassword } from '../identity/password-hasher.js';
import {
  Role,
  toAccountInfo,
  type Account,
  type AccountInfo,
  type AuthOutcome,
  type Identity,
  type LoginResult,
} from '../identity/identity-types.js';
import type { SessionDenylist } from './session-revocation.js';

export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 1024;
export const MAX_USERNAME_LENGTH = 64;

// C0 controls, DEL and C1 controls.
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/;

export interface AuthServiceDeps {
  readonly store: CredentialStore;
  readonly codec: SessionCodec;
  readonly denylist: SessionDenylist;
  /** Brute-force protection for login. Null disables it. */
  readonly loginLimiter: LoginRateLimiter | null;
  readonly logger?: Logger;
}

export interface LoginMeta {
  readonly ip?: string;
}

// ── AuthService ──────────────────────────────────────────────────

export class AuthService {
  readonly #store: CredentialStore;
  readonly #codec: SessionCodec;
  readonly #denylist: SessionDenylist;
  readonly #loginLimiter: LoginRateLimiter | null;
  readonly #logger: Logger;
  #dummyHash: Promise<string> | null = null;

  constructor(deps: AuthServiceDeps) {
    this.#store = deps.store;
    this.#codec = deps.codec;
    this.#denylist = deps.denylist;
    this.#loginLimiter = deps.loginLimiter;
    this.#logger = (deps.logger ?? silentLogger()).child({ component: 'auth' });
  }

  /**
   * Authenticate with username and password.
   *
   * Unknown usernames and wrong passwords fail identically with
   * INVALID_CREDENTIALS; an unknown username still costs one scrypt run.
   */
  async login(
    username: string,
    password: string,
    meta: LoginMeta = {},
  ): Promise<LoginResult> {
    const userKey = `user:${username}`;
    const limiterKeys = meta.ip !== undefined ? [userKey, `ip:${meta.ip}`] : [userKey];

    // Counted before the first await so that parallel guesses share the limit.
    this.#loginLimiter?.reserve(limiterKeys);

    let account: Account | null;
    try {
      account = await this.#verifyCredentials(username, password);
    } catch (error) {
      this.#loginLimiter?.release(limiterKeys);
      throw error;
    }

    if (account === null) {
      this.#logger.info({ username, ip: meta.ip }, 'Login rejected');
      throw new DndServerError(ErrorCode.INVALID_CREDENTIALS, 'Invalid credentials');
    }

    this.#loginLimiter?.release(limiterKeys);
    this.#loginLimiter?.clear(userKey);

    const { token, claims } = await this.#codec.issue(account.username, {
      role: account.role,
    });
    this.#logger.info(
      { username: account.username, ip: meta.ip, sessionId: claims.sessionId },
      'Login succeeded',
    );

    return {
      token,
      identity: {
        username: account.username,
        role: account.role,
        sessionId: claims.sessionId,
        expiresAt: claims.expiresAt,
      },
    };
  }

  /**
   * Resolve a session token to an identity. Anything short of a fully valid
   * token for an existing account yields an anonymous outcome.
   */
  async authenticate(token: string | undefined): Promise<AuthOutcome> {
    if (token === undefined || token.length === 0) {
      return { status: 'anonymous', reason: 'missing' };
    }

    const result = await this.#codec.validate(token);
    if (!result.ok) {
      this.#logger.debug({ reason: result.reason }, 'Session token rejected');
      return { status: 'anonymous', reason: result.reason };
    }

    const { claims } = result;

    if (this.#denylist.isRevoked(claims.sessionId)) {
      return { status: 'anonymous', reason: 'revoked' };
    }

    const account = await this.#store.getAccount(claims.subject);
    if (account === null) {
      this.#logger.debug({ username: claims.subject }, 'Session subject no longer exists');
      return { status: 'anonymous', reason: 'unknown_subject' };
    }

    if (claims.role !== account.role) {
      this.#logger.debug(
        { username: claims.subject, tokenRole: claims.role, role: account.role },
        'Session role does not match account',
      );
      return { status: 'anonymous', reason: 'role_mismatch' };
    }

    const identity: Identity = {
      username: account.username,
      role: account.role,
      sessionId: claims.sessionId,
      expiresAt: claims.expiresAt,
    };
    return { status: 'authenticated', identity };
  }

  /**
   * Revokes the session carried by `token`, if it is still valid.
   * Returns true when a session was revoked.
   */
  async logout(token: string | undefined): Promise<boolean> {
    if (token === undefined || token.length === 0) return false;

    const result = await this.#codec.validate(token);
    if (!result.ok) return false;

    this.#denylist.revoke(result.claims.sessionId, result.claims.expiresAt);
    this.#logger.info(
      { username: result.claims.subject, sessionId: result.claims.sessionId },
      'Session revoked',
    );
    return true;
  }

  /** Creates an account on behalf of a root identity. */
  async createAccount(
    actor: Identity,
    username: string,
    password: string,
    role: Role = Role.Player,
  ): Promise<AccountInfo> {
    requireRoot(actor);
    validateUsername(username);

    if (password.length > MAX_PASSWORD_LENGTH) {
      throw new DndServerError(
        ErrorCode.VALIDATION_ERROR,
        `Password must be at most ${MAX_PASSWORD_LENGTH} characters`,
      );
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new DndServerError(
        ErrorCode.VALIDATION_ERROR,
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
      );
    }

    const passwordHash = await hashPassword(password);
    const account = await this.#store.createAccount(username, passwordHash, role);
    this.#logger.info({ username, role, createdBy: actor.username }, 'Account created');
    return toAccountInfo(account);
  }

  /** Lists all accounts on behalf of a root identity. */
  async listAccounts(actor: Identity): Promise<readonly AccountInfo[]> {
    requireRoot(actor);
    return this.#store.listAccounts();
  }

  // ── Private ─────────────────────────────────────────────────────

  // The matching account, or null for an unknown user or a wrong password.
  async #verifyCredentials(username: string, password: string): Promise<Account | null> {
    const account = await this.#store.getAccount(username);
    if (account === null) {
      await this.#burnVerification(password);
      return null;
    }
    return (await verifyPassword(password, account.passwordHash)) ? account : null;
  }

  async #burnVerification(password: string): Promise<void> {
    // A failed hash is not cached; the next unknown-user login retries it.
    const dummyHash = (this.#dummyHash ??= hashPassword(randomBytes(16).toString('hex')).catch(
      (error: unknown) => {
        this.#dummyHash = null;
        throw error;
      },
    ));
    await verifyPassword(password, await dummyHash);
  }
}

function requireRoot(actor: Identity): void {
  if (actor.role !== Role.Root) {
    throw new DndServerError(ErrorCode.FORBIDDEN, 'Root privileges required');
  }
}

function validateUsername(username: string): void {
  if (username.length === 0 || username.length > MAX_USERNAME_LENGTH) {
    throw new DndServerError(
      ErrorCode.VALIDATION_ERROR,
      `Username must be 1-${MAX_USERNAME_LENGTH} characters`,
    );
  }
  if (CONTROL_CHARS.test(username) || username.trim() !== username) {
    throw new DndServerError(
      ErrorCode.VALIDATION_ERROR,
      'Username must not contain control characters or surrounding whitespace',
    );
  }
}
