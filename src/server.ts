import { createServer, type Server as HttpsServer } from 'node:https';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getRequestListener } from '@hono/node-server';
import type { ServerConfig, ResolvedServerConfig } from './config.js';
import { resolveConfig, VERSION } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { ErrorCode } from './codes.js';
import { DndServerError } from './errors.js';
import { CredentialStore } from './identity/credential-store.js';
import { SessionCodec } from './identity/session-codec.js';
import { LoginRateLimiter } from './identity/login-rate-limiter.js';
import { SessionDenylist } from './auth/session-revocation.js';
import { AuthService } from './auth/auth-service.js';
import { bootstrapRoot, type BootstrapResult } from './bootstrap/bootstrap-loader.js';
import { loadTlsMaterial, validateTlsMaterial, type CertificateSummary } from './transport/tls.js';
import { createApp } from './http/app.js';

export const DEFAULT_STOP_GRACE_PERIOD_MS = 10_000;

export interface StopOptions {
  /**
   * How long in-flight requests may run before their sockets are destroyed.
   * 0 destroys them immediately. Default: 10,000 ms.
   */
  readonly gracePeriodMs?: number;
}

// ── DndServer ─────────────────────────────────────────────────────

export class DndServer {
  readonly #config: ResolvedServerConfig;
  readonly #httpsServer: HttpsServer;
  readonly #store: CredentialStore;
  readonly #denylist: SessionDenylist;
  readonly #loginLimiter: LoginRateLimiter | null;
  readonly #logger: Logger;
  readonly #certificate: CertificateSummary;
  readonly #bootstrap: BootstrapResult;
  #running: boolean;

  private constructor(
    config: ResolvedServerConfig,
    httpsServer: HttpsServer,
    store: CredentialStore,
    denylist: SessionDenylist,
    loginLimiter: LoginRateLimiter | null,
    logger: Logger,
    certificate: CertificateSummary,
    bootstrap: BootstrapResult,
  ) {
    this.#config = config;
    this.#httpsServer = httpsServer;
    this.#store = store;
    this.#denylist = denylist;
    this.#loginLimiter = loginLimiter;
    this.#logger = logger;
    this.#certificate = certificate;
    this.#bootstrap = bootstrap;
    this.#running = true;
  }

  /**
   * Starts a new DndServer instance.
   *
   * Validates the TLS material, opens the credential database, provisions the
   * root account and only then starts listening. Any failure before listening
   * releases what was acquired and rejects.
   */
  static async start(config: ServerConfig): Promise<DndServer> {
    const resolved = resolveConfig(config);
    const logger = resolved.logger ?? createLogger({ name: resolved.name });

    const material = await loadTlsMaterial(resolved.tls);
    const certificate = validateTlsMaterial(material);
    logger.debug(
      { subject: certificate.subject, validTo: certificate.validTo.toISOString() },
      'TLS certificate loaded',
    );

    await ensureDatabaseDirectory(resolved.databasePath);
    const store = await CredentialStore.open(resolved.databasePath, { logger });

    const denylist = new SessionDenylist(resolved.revocation);
    const loginLimiter =
      resolved.loginRateLimit !== null ? new LoginRateLimiter(resolved.loginRateLimit) : null;
    let httpsServer: HttpsServer;
    let bootstrap: BootstrapResult;
    try {
      bootstrap = await bootstrapRoot({
        store,
        descriptorPath: resolved.rootDescriptorPath,
        rootUsername: resolved.rootUsername,
        removeDescriptor: resolved.removeDescriptorAfterBootstrap,
        logger,
      });

      const codec = new SessionCodec({
        ...(resolved.sessionKey !== null ? { key: resolved.sessionKey } : {}),
        ttlMs: resolved.sessionTtlMs,
        clockSkewMs: resolved.clockSkewMs,
      });

      const auth = new AuthService({
        store,
        codec,
        denylist,
        loginLimiter,
        logger,
      });

      const app = createApp({
        auth,
        logger,
        clientPath: resolved.clientPath,
        name: resolved.name,
        version: VERSION,
      });

      httpsServer = createServer(
        { cert: material.cert, key: material.key },
        getRequestListener(app.fetch),
      );

      await new Promise<void>((resolve, reject) => {
        httpsServer.once('listening', resolve);
        httpsServer.once('error', reject);
        httpsServer.listen(resolved.port, resolved.host);
      });
    } catch (error) {
      await store.close();
      throw error;
    }

    denylist.start();
    loginLimiter?.start();

    const server = new DndServer(
      resolved,
      httpsServer,
      store,
      denylist,
      loginLimiter,
      logger,
      certificate,
      bootstrap,
    );
    logger.info({ host: resolved.host, port: server.port }, 'Listening');
    return server;
  }

  /**
   * Gracefully stops the server.
   *
   * 1. Stops accepting new connections and drops idle keep-alive sockets.
   * 2. Lets in-flight requests finish, destroying what is left once the
   *    grace period expires (immediately when it is 0).
   * 3. Stops the denylist and login limiter sweeps, then closes the
   *    credential database.
   */
  async stop(options?: StopOptions): Promise<void> {
    if (!this.#running) return;
    this.#running = false;

    const gracePeriodMs = options?.gracePeriodMs ?? DEFAULT_STOP_GRACE_PERIOD_MS;

    // 1. Stop accepting new connections.
    const httpsClosed = new Promise<void>((resolve, reject) => {
      this.#httpsServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.#httpsServer.closeIdleConnections();

    // 2. Drain, then force.
    if (gracePeriodMs > 0) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const expired = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, gracePeriodMs);
      });
      await Promise.race([httpsClosed, expired]);
      clearTimeout(timer);
    }
    this.#httpsServer.closeAllConnections();
    await httpsClosed;

    // 3. Release state.
    this.#denylist.stop();
    this.#loginLimiter?.stop();
    await this.#store.close();

    this.#logger.info('Stopped');
  }

  /** The port the server is listening on. */
  get port(): number {
    const addr = this.#httpsServer.address();
    if (addr !== null && typeof addr === 'object') {
      return addr.port;
    }
    return this.#config.port;
  }

  get host(): string {
    return this.#config.host;
  }

  /** Whether the server is currently running. */
  get isRunning(): boolean {
    return this.#running;
  }

  /** The leaf certificate being served. */
  get certificate(): CertificateSummary {
    return this.#certificate;
  }

  /** What startup bootstrap did with the root account. */
  get bootstrap(): BootstrapResult {
    return this.#bootstrap;
  }
}

// ── Helpers ──────────────────────────────────────────────────────

async function ensureDatabaseDirectory(path: string): Promise<void> {
  if (path === ':memory:') return;
  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    throw new DndServerError(
      ErrorCode.STORAGE_UNAVAILABLE,
      `Cannot create database directory for ${path}`,
      { cause: error instanceof Error ? error.message : String(error) },
    );
  }
}
