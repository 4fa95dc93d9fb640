import type { Context } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import { createMiddleware } from 'hono/factory';
import type { HttpBindings } from '@hono/node-server';
import type { Logger } from '../logger.js';
import type { AuthService } from '../auth/auth-service.js';
import { Role, type Identity } from '../identity/identity-types.js';
import { ErrorCode } from '../codes.js';
import { errorBody } from './responses.js';

export const LOGIN_TOKEN_COOKIE = 'login-token';

export interface AppEnv {
  Bindings: HttpBindings;
  Variables: {
    identity: Identity | null;
  };
}

// ── Cookies ───────────────────────────────────────────────────────

export function readSessionCookie(c: Context<AppEnv>): string | undefined {
  return getCookie(c, LOGIN_TOKEN_COOKIE);
}

export function writeSessionCookie(c: Context<AppEnv>, token: string, expiresAt: number): void {
  setCookie(c, LOGIN_TOKEN_COOKIE, token, {
    httpOnly: true,
    secure: true,
    sameSite: 'Strict',
    path: '/',
    maxAge: Math.max(0, Math.floor((expiresAt - Date.now()) / 1000)),
  });
}

export function clearSessionCookie(c: Context<AppEnv>): void {
  deleteCookie(c, LOGIN_TOKEN_COOKIE, {
    httpOnly: true,
    secure: true,
    sameSite: 'Strict',
    path: '/',
  });
}

/** Remote address of the TCP peer, or 'unknown' outside a real socket. */
export function clientAddress(c: Context<AppEnv>): string {
  return c.env?.incoming?.socket.remoteAddress ?? 'unknown';
}

// ── Middleware ────────────────────────────────────────────────────

/**
 * Resolves the session cookie on every request. The request proceeds with
 * `identity` set, or with `identity: null` and the cookie cleared when the
 * token is present but unusable.
 */
export function sessionMiddleware(auth: AuthService, logger: Logger) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const token = readSessionCookie(c);
    const outcome = await auth.authenticate(token);

    if (outcome.status === 'authenticated') {
      c.set('identity', outcome.identity);
    } else {
      c.set('identity', null);
      if (outcome.reason !== 'missing') {
        logger.debug(
          { reason: outcome.reason, path: c.req.path, ip: clientAddress(c) },
          'Session downgraded to anonymous',
        );
        clearSessionCookie(c);
      }
    }

    await next();
  });
}

/** Rejects anonymous requests with 401. */
export const requireAuth = createMiddleware<AppEnv>(async (c, next) => {
  if (c.get('identity') === null) {
    return c.json(errorBody(ErrorCode.UNAUTHORIZED, 'Authentication required'), 401);
  }
  await next();
});

/** Rejects anonymous requests with 401 and non-root identities with 403. */
export const requireRoot = createMiddleware<AppEnv>(async (c, next) => {
  const identity = c.get('identity');
  if (identity === null) {
    return c.json(errorBody(ErrorCode.UNAUTHORIZED, 'Authentication required'), 401);
  }
  if (identity.role !== Role.Root) {
    return c.json(errorBody(ErrorCode.FORBIDDEN, 'Root privileges required'), 403);
  }
  await next();
});
