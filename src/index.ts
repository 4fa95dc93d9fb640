// ── Main ─────────────────────────────────────────────────────────

export { DndServer } from './server.js';
export type { StopOptions } from './server.js';

// ── Configuration ────────────────────────────────────────────────

export { resolveConfig, SERVER_NAME, VERSION } from './config.js';
export type {
  ServerConfig,
  ResolvedServerConfig,
  LoginRateLimitConfig,
  RevocationConfig,
  RevokedEntry,
  TlsFiles,
  TlsMaterial,
  TlsSource,
} from './config.js';

// ── Identity ─────────────────────────────────────────────────────

export { CredentialStore } from './identity/credential-store.js';
export { hashPassword, verifyPassword } from './identity/password-hasher.js';
export { SessionCodec, decodeSessionKey } from './identity/session-codec.js';
export type { SessionCodecOptions, SessionValidation } from './identity/session-codec.js';
export { LoginRateLimiter } from './identity/login-rate-limiter.js';
export { Role, isRole } from './identity/identity-types.js';
export type {
  Account,
  AccountInfo,
  SessionClaims,
  Identity,
  AuthOutcome,
  AnonymousReason,
  LoginResult,
} from './identity/identity-types.js';

// ── Auth ─────────────────────────────────────────────────────────

export { AuthService } from './auth/auth-service.js';
export { SessionDenylist } from './auth/session-revocation.js';

// ── Bootstrap ────────────────────────────────────────────────────

export { bootstrapRoot } from './bootstrap/bootstrap-loader.js';
export type { BootstrapResult, BootstrapOptions } from './bootstrap/bootstrap-loader.js';
export { readRootDescriptor, generateRootDescriptor } from './bootstrap/root-descriptor.js';
export type { RootCredentials } from './bootstrap/root-descriptor.js';

// ── Transport ────────────────────────────────────────────────────

export { createApp } from './http/app.js';
export { LOGIN_TOKEN_COOKIE } from './http/auth-middleware.js';
export { loadTlsMaterial, validateTlsMaterial } from './transport/tls.js';

// ── Errors & logging ─────────────────────────────────────────────

export { DndServerError } from './errors.js';
export { ErrorCode } from './codes.js';
export { createLogger, silentLogger } from './logger.js';
