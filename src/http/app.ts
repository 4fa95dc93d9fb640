import { relative } from 'node:path';
import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { HTTPException } from 'hono/http-exception';
import { serveStatic } from '@hono/node-server/serve-static';
import type { Logger } from '../logger.js';
import type { AuthService } from '../auth/auth-service.js';
import type { Identity } from '../identity/identity-types.js';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';
import { errorBody, toErrorResponse } from './responses.js';
import { parseCreateAccountRequest, parseLoginRequest } from './request-parser.js';
import {
  clearSessionCookie,
  clientAddress,
  readSessionCookie,
  requireAuth,
  requireRoot,
  sessionMiddleware,
  writeSessionCookie,
  type AppEnv,
} from './auth-middleware.js';

export const MAX_BODY_BYTES = 16 * 1024;

export interface AppDeps {
  readonly auth: AuthService;
  readonly logger: Logger;
  /** Directory of static client assets. Null disables static serving. */
  readonly clientPath: string | null;
  readonly name: string;
  readonly version: string;
}

export interface SessionInfo {
  readonly username: string;
  readonly role: string;
  readonly expiresAt: number;
}

function toSessionInfo(identity: Identity): SessionInfo {
  return {
    username: identity.username,
    role: identity.role,
    expiresAt: identity.expiresAt,
  };
}

// ── App ───────────────────────────────────────────────────────────

/**
 * Builds the request handler: JSON API under `/v1`, static client assets for
 * every other path. Every request passes the session middleware first.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const { auth } = deps;
  const logger = deps.logger.child({ component: 'http' });
  const app = new Hono<AppEnv>();

  app.use('*', sessionMiddleware(auth, logger));
  app.use(
    '/v1/*',
    bodyLimit({
      maxSize: MAX_BODY_BYTES,
      onError: (c) =>
        c.json(errorBody(ErrorCode.VALIDATION_ERROR, 'Request body too large'), 400),
    }),
  );

  // ── Public ──

  app.get('/v1/version', (c) => c.json({ name: deps.name, version: deps.version }));

  app.post('/v1/login', async (c) => {
    const parsed = parseLoginRequest(await c.req.text());
    if (!parsed.ok) {
      throw new DndServerError(parsed.code, parsed.message);
    }
    const { username, password } = parsed.value;

    const current = c.get('identity');
    if (current !== null && current.username === username) {
      return c.json(toSessionInfo(current), 200);
    }

    const result = await auth.login(username, password, { ip: clientAddress(c) });
    writeSessionCookie(c, result.token, result.identity.expiresAt);
    return c.json(toSessionInfo(result.identity), 200);
  });

  app.post('/v1/logout', async (c) => {
    await auth.logout(readSessionCookie(c));
    clearSessionCookie(c);
    return c.json({ ok: true }, 200);
  });

  // ── Authenticated ──

  app.get('/v1/whoami', requireAuth, (c) =>
    c.json(toSessionInfo(currentIdentity(c.get('identity'))), 200),
  );

  // ── Root only ──

  app.get('/v1/accounts', requireRoot, async (c) => {
    const accounts = await auth.listAccounts(currentIdentity(c.get('identity')));
    return c.json({ accounts }, 200);
  });

  app.post('/v1/accounts', requireRoot, async (c) => {
    const parsed = parseCreateAccountRequest(await c.req.text());
    if (!parsed.ok) {
      throw new DndServerError(parsed.code, parsed.message);
    }
    const { username, password, role } = parsed.value;
    const account = await auth.createAccount(
      currentIdentity(c.get('identity')),
      username,
      password,
      role,
    );
    return c.json(account, 201);
  });

  app.all('/v1/*', (c) =>
    c.json(errorBody(ErrorCode.NOT_FOUND, `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ── Static client ──

  if (deps.clientPath !== null) {
    // serveStatic resolves its root against the working directory.
    app.use('*', serveStatic({ root: relative(process.cwd(), deps.clientPath) || '.' }));
  }

  app.notFound((c) => c.json(errorBody(ErrorCode.NOT_FOUND, 'Not found'), 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }

    const response = toErrorResponse(error);
    if (response.status >= 500) {
      logger.error(
        { err: error, method: c.req.method, path: c.req.path },
        'Request failed',
      );
    }
    if (response.retryAfter !== null) {
      c.header('Retry-After', String(response.retryAfter));
    }
    return c.json(response.body, response.status);
  });

  return app;
}

function currentIdentity(identity: Identity | null): Identity {
  if (identity === null) {
    throw new DndServerError(ErrorCode.UNAUTHORIZED, 'Authentication required');
  }
  return identity;
}
