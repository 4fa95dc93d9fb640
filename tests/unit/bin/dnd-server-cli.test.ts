import { resolve } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  mergeConfig,
  validateConfig,
  toServerConfig,
  type CliValues,
  type FileConfig,
  type ResolvedCliConfig,
} from '../../../src/bin/dnd-server.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const EMPTY_CLI: CliValues = {
  port: undefined,
  host: undefined,
  clientPath: undefined,
  dataPath: undefined,
  cert: undefined,
  key: undefined,
  rootDescriptor: undefined,
  sessionKey: undefined,
  sessionTtl: undefined,
  removeDescriptor: undefined,
  verbose: undefined,
};

const EMPTY_FILE: FileConfig = {};

const VALID_KEY = Buffer.alloc(32, 9).toString('base64');

function defaults(): ResolvedCliConfig {
  return mergeConfig(EMPTY_CLI, EMPTY_FILE);
}

// ---------------------------------------------------------------------------
// mergeConfig
// ---------------------------------------------------------------------------

describe('mergeConfig', () => {
  it('returns all defaults when both CLI and file are empty', () => {
    expect(defaults()).toEqual({
      port: 8443,
      host: '0.0.0.0',
      clientPath: './client',
      dataPath: './data/dnd.db',
      cert: './config/tls/server.crt',
      key: './config/tls/server.key',
      rootDescriptor: './config/root.toml',
      sessionKey: undefined,
      sessionTtl: 360,
      removeDescriptor: false,
      verbose: false,
      loginRateLimit: undefined,
    });
  });

  it('file values override defaults', () => {
    const result = mergeConfig(EMPTY_CLI, {
      port: 9443,
      dataPath: '/var/lib/dnd/dnd.db',
      sessionTtl: 60,
      removeDescriptor: true,
    });

    expect(result.port).toBe(9443);
    expect(result.dataPath).toBe('/var/lib/dnd/dnd.db');
    expect(result.sessionTtl).toBe(60);
    expect(result.removeDescriptor).toBe(true);
    expect(result.host).toBe('0.0.0.0');
  });

  it('CLI values override file values', () => {
    const result = mergeConfig(
      { ...EMPTY_CLI, port: 7443, cert: './cli.crt', verbose: true, removeDescriptor: false },
      { port: 9443, cert: './file.crt', key: './file.key', verbose: false, removeDescriptor: true },
    );

    expect(result.port).toBe(7443);
    expect(result.cert).toBe('./cli.crt');
    expect(result.key).toBe('./file.key');
    expect(result.verbose).toBe(true);
    expect(result.removeDescriptor).toBe(false);
  });

  it('takes loginRateLimit from the file only', () => {
    const result = mergeConfig(EMPTY_CLI, { loginRateLimit: { maxAttempts: 3, windowMs: 60_000 } });
    expect(result.loginRateLimit).toEqual({ maxAttempts: 3, windowMs: 60_000 });
  });
});

// ---------------------------------------------------------------------------
// validateConfig
// ---------------------------------------------------------------------------

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(defaults())).toEqual([]);
  });

  it.each([-1, 65536, 1.5, Number.NaN])('rejects port %s', (port) => {
    const errors = validateConfig({ ...defaults(), port });
    expect(errors).toEqual([`Invalid port: ${port} (must be integer 0-65535)`]);
  });

  it('rejects a non-positive session TTL', () => {
    expect(validateConfig({ ...defaults(), sessionTtl: 0 })).toEqual([
      'Invalid session TTL: 0 (must be a positive number of minutes)',
    ]);
  });

  it('requires both cert and key', () => {
    expect(validateConfig({ ...defaults(), key: '' })).toEqual([
      '--cert and --key must both be set',
    ]);
  });

  it('accepts a 32-byte base64 session key', () => {
    expect(validateConfig({ ...defaults(), sessionKey: VALID_KEY })).toEqual([]);
  });

  it('rejects a session key of the wrong length', () => {
    const sessionKey = Buffer.alloc(16, 1).toString('base64');
    expect(validateConfig({ ...defaults(), sessionKey })).toEqual([
      'Session key must decode to 32 bytes, got 16',
    ]);
  });

  it('rejects a bad login rate limit', () => {
    const errors = validateConfig({
      ...defaults(),
      loginRateLimit: { maxAttempts: 0, windowMs: -5 },
    });
    expect(errors).toEqual([
      'Invalid loginRateLimit.maxAttempts: 0',
      'Invalid loginRateLimit.windowMs: -5',
    ]);
  });

  it('collects several errors at once', () => {
    const errors = validateConfig({ ...defaults(), port: -1, sessionTtl: -1 });
    expect(errors).toHaveLength(2);
  });
});

// ---------------------------------------------------------------------------
// toServerConfig
// ---------------------------------------------------------------------------

describe('toServerConfig', () => {
  it('resolves paths and converts minutes to milliseconds', () => {
    const config = toServerConfig({ ...defaults(), sessionTtl: 90 });

    expect(config.tls).toEqual({
      certPath: resolve('./config/tls/server.crt'),
      keyPath: resolve('./config/tls/server.key'),
    });
    expect(config.databasePath).toBe(resolve('./data/dnd.db'));
    expect(config.clientPath).toBe(resolve('./client'));
    expect(config.rootDescriptorPath).toBe(resolve('./config/root.toml'));
    expect(config.sessionTtlMs).toBe(90 * 60 * 1000);
    expect(config.sessionKey).toBeUndefined();
    expect(config.loginRateLimit).toBeUndefined();
  });

  it('keeps an in-memory database path as is', () => {
    expect(toServerConfig({ ...defaults(), dataPath: ':memory:' }).databasePath).toBe(':memory:');
  });

  it('decodes the session key', () => {
    const config = toServerConfig({ ...defaults(), sessionKey: VALID_KEY });
    expect(config.sessionKey).toEqual(new Uint8Array(32).fill(9));
  });
});
