import type { Logger } from './logger.js';
import type { TlsSource } from './transport/tls.js';
import type { LoginRateLimitConfig } from './identity/login-rate-limiter.js';
import type { RevocationConfig } from './auth/session-revocation.js';
import { DEFAULT_CLOCK_SKEW_MS, DEFAULT_SESSION_TTL_MS } from './identity/session-codec.js';
import { DEFAULT_ROOT_USERNAME } from './bootstrap/root-descriptor.js';

export type { RevocationConfig, RevokedEntry } from './auth/session-revocation.js';
export type { LoginRateLimitConfig } from './identity/login-rate-limiter.js';
export type { TlsFiles, TlsMaterial, TlsSource } from './transport/tls.js';

// ── Defaults ──────────────────────────────────────────────────────

export const SERVER_NAME = 'dnd-server';
export const VERSION = '0.1.0';

export const DEFAULT_PORT = 8443;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_DATABASE_PATH = './data/dnd.db';
export const DEFAULT_ROOT_DESCRIPTOR_PATH = './config/root.toml';

// ── Server Config (user-facing) ──────────────────────────────────

export interface ServerConfig {
  /** Certificate and key, as files or inline PEM (required). */
  readonly tls: TlsSource;

  /** HTTPS port. 0 picks a free port. Default: 8443. */
  readonly port?: number;

  /** Bind address. Default: '0.0.0.0'. */
  readonly host?: string;

  /** SQLite file holding the accounts table. ':memory:' for a throwaway one. Default: './data/dnd.db'. */
  readonly databasePath?: string;

  /** Directory served for every non-API path. When omitted, static serving is disabled. */
  readonly clientPath?: string;

  /** Root credential descriptor (TOML). Default: './config/root.toml'. */
  readonly rootDescriptorPath?: string;

  /** Root account looked up when the descriptor is unusable. Default: 'root'. */
  readonly rootUsername?: string;

  /** Delete the descriptor after the root account is created. Default: false. */
  readonly removeDescriptorAfterBootstrap?: boolean;

  /** 32-byte session key. Generated at startup when omitted. */
  readonly sessionKey?: Uint8Array;

  /** Session lifetime in milliseconds. Default: 6 hours. */
  readonly sessionTtlMs?: number;

  /** Tolerance for `iat` in the future. Default: 30 s. */
  readonly clockSkewMs?: number;

  /** Login brute-force protection. `false` disables it. Default: 5 attempts / 15 min. */
  readonly loginRateLimit?: LoginRateLimitConfig | false;

  /** Session denylist sweep configuration. */
  readonly revocation?: RevocationConfig;

  /** Server name reported by /v1/version and in logs. Default: 'dnd-server'. */
  readonly name?: string;

  /** Logger. Default: pino at level 'info'. */
  readonly logger?: Logger;
}

// ── Resolved Config (all defaults applied) ────────────────────────

export interface ResolvedServerConfig {
  readonly tls: TlsSource;
  readonly port: number;
  readonly host: string;
  readonly databasePath: string;
  readonly clientPath: string | null;
  readonly rootDescriptorPath: string;
  readonly rootUsername: string;
  readonly removeDescriptorAfterBootstrap: boolean;
  readonly sessionKey: Uint8Array | null;
  readonly sessionTtlMs: number;
  readonly clockSkewMs: number;
  readonly loginRateLimit: LoginRateLimitConfig | null;
  readonly revocation: RevocationConfig;
  readonly name: string;
  readonly logger: Logger | null;
}

// ── Resolve ───────────────────────────────────────────────────────

export function resolveConfig(config: ServerConfig): ResolvedServerConfig {
  return {
    tls: config.tls,
    port: config.port ?? DEFAULT_PORT,
    host: config.host ?? DEFAULT_HOST,
    databasePath: config.databasePath ?? DEFAULT_DATABASE_PATH,
    clientPath: config.clientPath ?? null,
    rootDescriptorPath: config.rootDescriptorPath ?? DEFAULT_ROOT_DESCRIPTOR_PATH,
    rootUsername: config.rootUsername ?? DEFAULT_ROOT_USERNAME,
    removeDescriptorAfterBootstrap: config.removeDescriptorAfterBootstrap ?? false,
    sessionKey: config.sessionKey ?? null,
    sessionTtlMs: config.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS,
    clockSkewMs: config.clockSkewMs ?? DEFAULT_CLOCK_SKEW_MS,
    loginRateLimit: config.loginRateLimit === false ? null : (config.loginRateLimit ?? {}),
    revocation: config.revocation ?? {},
    name: config.name ?? SERVER_NAME,
    logger: config.logger ?? null,
  };
}
