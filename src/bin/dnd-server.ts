#!/usr/bin/env node

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { readFile, realpath } from 'node:fs/promises';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DndServer } from '../server.js';
import { SERVER_NAME, VERSION, type ServerConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { DndServerError } from '../errors.js';
import { decodeSessionKey } from '../identity/session-codec.js';
import { generateRootDescriptor } from '../bootstrap/root-descriptor.js';

// =============================================================================
// Types (exported for testing)
// =============================================================================

export interface CliValues {
  port: number | undefined;
  host: string | undefined;
  clientPath: string | undefined;
  dataPath: string | undefined;
  cert: string | undefined;
  key: string | undefined;
  rootDescriptor: string | undefined;
  sessionKey: string | undefined;
  sessionTtl: number | undefined;
  removeDescriptor: boolean | undefined;
  verbose: boolean | undefined;
}

export interface FileConfig {
  port?: number;
  host?: string;
  clientPath?: string;
  dataPath?: string;
  cert?: string;
  key?: string;
  rootDescriptor?: string;
  sessionKey?: string;
  /** Minutes. */
  sessionTtl?: number;
  removeDescriptor?: boolean;
  verbose?: boolean;
  loginRateLimit?: { maxAttempts: number; windowMs: number };
}

export interface ResolvedCliConfig {
  readonly port: number;
  readonly host: string;
  readonly clientPath: string;
  readonly dataPath: string;
  readonly cert: string;
  readonly key: string;
  readonly rootDescriptor: string;
  readonly sessionKey: string | undefined;
  /** Minutes. */
  readonly sessionTtl: number;
  readonly removeDescriptor: boolean;
  readonly verbose: boolean;
  readonly loginRateLimit: { maxAttempts: number; windowMs: number } | undefined;
}

// =============================================================================
// CLI Argument Definition
// =============================================================================

const argsConfig = {
  options: {
    port: { type: 'string', short: 'p' },
    host: { type: 'string', short: 'H' },
    config: { type: 'string', short: 'c' },
    'client-path': { type: 'string' },
    'data-path': { type: 'string', short: 'd' },
    cert: { type: 'string' },
    key: { type: 'string' },
    'root-descriptor': { type: 'string' },
    'session-key': { type: 'string' },
    'session-ttl': { type: 'string' },
    'remove-descriptor': { type: 'boolean' },
    verbose: { type: 'boolean' },
    'init-root': { type: 'string' },
    help: { type: 'boolean', short: 'h' },
    version: { type: 'boolean', short: 'v' },
  },
  strict: true,
  allowPositionals: false,
} satisfies ParseArgsConfig;

// =============================================================================
// Help & Version
// =============================================================================

function printHelp(): void {
  const help = `
dnd-server - TLS web server with password login and encrypted cookie sessions

USAGE:
  dnd-server [OPTIONS]
  dnd-server --init-root <path>

OPTIONS:
  -p, --port <number>          Port (default: 8443)
  -H, --host <address>         Host (default: 0.0.0.0)
  -c, --config <path>          JSON config file
      --client-path <dir>      Static client assets (default: ./client)
  -d, --data-path <path>       SQLite database file (default: ./data/dnd.db)

  TLS:
      --cert <path>            Certificate chain, PEM (default: ./config/tls/server.crt)
      --key <path>             Private key, PEM (default: ./config/tls/server.key)

  ROOT ACCOUNT:
      --root-descriptor <path> Root credential TOML (default: ./config/root.toml)
      --remove-descriptor      Delete the descriptor after the root account is created
      --init-root <path>       Write a new root descriptor with a random password and exit

  SESSIONS:
      --session-key <base64>   32-byte session key (default: random per process)
      --session-ttl <minutes>  Session lifetime (default: 360)

      --verbose                Debug logging
  -h, --help                   Show this help message
  -v, --version                Show version number

CLI flags override values from the config file.

EXAMPLES:
  # First run: create the root descriptor, then start
  dnd-server --init-root ./config/root.toml
  dnd-server --cert ./certs/site.crt --key ./certs/site.key

  # From config file, port override
  dnd-server --config server.json --port 9443
`.trim();

  console.log(help);
}

function printVersion(): void {
  console.log(`${SERVER_NAME} v${VERSION}`);
}

// =============================================================================
// Pure Functions (exported for testing)
// =============================================================================

const DEFAULTS: ResolvedCliConfig = {
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
};

export function mergeConfig(
  cli: CliValues,
  file: FileConfig,
): ResolvedCliConfig {
  return {
    port: cli.port ?? file.port ?? DEFAULTS.port,
    host: cli.host ?? file.host ?? DEFAULTS.host,
    clientPath: cli.clientPath ?? file.clientPath ?? DEFAULTS.clientPath,
    dataPath: cli.dataPath ?? file.dataPath ?? DEFAULTS.dataPath,
    cert: cli.cert ?? file.cert ?? DEFAULTS.cert,
    key: cli.key ?? file.key ?? DEFAULTS.key,
    rootDescriptor: cli.rootDescriptor ?? file.rootDescriptor ?? DEFAULTS.rootDescriptor,
    sessionKey: cli.sessionKey ?? file.sessionKey ?? DEFAULTS.sessionKey,
    sessionTtl: cli.sessionTtl ?? file.sessionTtl ?? DEFAULTS.sessionTtl,
    removeDescriptor: cli.removeDescriptor ?? file.removeDescriptor ?? DEFAULTS.removeDescriptor,
    verbose: cli.verbose ?? file.verbose ?? DEFAULTS.verbose,
    loginRateLimit: file.loginRateLimit,
  };
}

export function validateConfig(config: ResolvedCliConfig): string[] {
  const errors: string[] = [];

  if (
    !Number.isInteger(config.port) ||
    config.port < 0 ||
    config.port > 65535
  ) {
    errors.push(`Invalid port: ${config.port} (must be integer 0-65535)`);
  }

  if (!Number.isFinite(config.sessionTtl) || config.sessionTtl <= 0) {
    errors.push(`Invalid session TTL: ${config.sessionTtl} (must be a positive number of minutes)`);
  }

  if (config.cert === '' || config.key === '') {
    errors.push('--cert and --key must both be set');
  }

  if (config.sessionKey !== undefined) {
    try {
      decodeSessionKey(config.sessionKey);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (config.loginRateLimit !== undefined) {
    const { maxAttempts, windowMs } = config.loginRateLimit;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      errors.push(`Invalid loginRateLimit.maxAttempts: ${maxAttempts}`);
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      errors.push(`Invalid loginRateLimit.windowMs: ${windowMs}`);
    }
  }

  return errors;
}

export function toServerConfig(config: ResolvedCliConfig): ServerConfig {
  return {
    tls: { certPath: resolve(config.cert), keyPath: resolve(config.key) },
    port: config.port,
    host: config.host,
    databasePath: config.dataPath === ':memory:' ? ':memory:' : resolve(config.dataPath),
    clientPath: resolve(config.clientPath),
    rootDescriptorPath: resolve(config.rootDescriptor),
    removeDescriptorAfterBootstrap: config.removeDescriptor,
    sessionTtlMs: config.sessionTtl * 60 * 1000,
    ...(config.sessionKey !== undefined
      ? { sessionKey: decodeSessionKey(config.sessionKey) }
      : {}),
    ...(config.loginRateLimit !== undefined
      ? { loginRateLimit: config.loginRateLimit }
      : {}),
  };
}

function parseNumber(raw: string | undefined): number | undefined {
  return raw !== undefined ? Number(raw) : undefined;
}

// =============================================================================
// Banner
// =============================================================================

function printBanner(config: ResolvedCliConfig, server: DndServer): void {
  const banner = `
${SERVER_NAME} v${VERSION}
  URL:          https://${config.host}:${server.port}
  Database:     ${config.dataPath}
  Client:       ${config.clientPath}
  Certificate:  ${server.certificate.subject.replace(/\n/g, ', ')} (until ${server.certificate.validTo.toISOString()})
  Root:         ${server.bootstrap.username} (${server.bootstrap.status})
  Session TTL:  ${config.sessionTtl} min
  Session key:  ${config.sessionKey !== undefined ? 'configured' : 'ephemeral'}
`.trim();

  console.log(banner);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  let args: ReturnType<typeof parseArgs<typeof argsConfig>>;

  try {
    args = parseArgs(argsConfig);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error('Run "dnd-server --help" for usage information.');
    process.exit(1);
  }

  const { values } = args;

  if (values.help) {
    printHelp();
    return;
  }

  if (values.version) {
    printVersion();
    return;
  }

  if (values['init-root'] !== undefined) {
    const path = resolve(values['init-root']);
    const credentials = await generateRootDescriptor(path);
    console.log(`Root descriptor for "${credentials.name}" written to ${path}`);
    return;
  }

  // Load config file
  let fileConfig: FileConfig = {};
  if (values.config !== undefined) {
    const configPath = resolve(values.config);
    try {
      const raw = await readFile(configPath, 'utf-8');
      fileConfig = JSON.parse(raw) as FileConfig;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error loading config file: ${message}`);
      process.exit(1);
    }
  }

  const cliValues: CliValues = {
    port: parseNumber(values.port),
    host: values.host,
    clientPath: values['client-path'],
    dataPath: values['data-path'],
    cert: values.cert,
    key: values.key,
    rootDescriptor: values['root-descriptor'],
    sessionKey: values['session-key'],
    sessionTtl: parseNumber(values['session-ttl']),
    removeDescriptor: values['remove-descriptor'],
    verbose: values.verbose,
  };

  // Merge & validate
  const config = mergeConfig(cliValues, fileConfig);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const e of errors) console.error(`Error: ${e}`);
    process.exit(1);
  }

  const logger = createLogger({
    name: SERVER_NAME,
    level: config.verbose ? 'debug' : 'info',
  });

  let server: DndServer;
  try {
    server = await DndServer.start({ ...toServerConfig(config), logger });
  } catch (error) {
    if (error instanceof DndServerError) {
      logger.fatal({ code: error.code, details: error.details }, error.message);
      console.error(`Error [${error.code}]: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  printBanner(config, server);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');
    await server.stop({ gracePeriodMs: 5_000 });
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

// =============================================================================
// Execute (only when run directly, not when imported for testing)
// =============================================================================

export async function isMainModule(): Promise<boolean> {
  if (process.argv[1] === undefined) return false;
  const thisFile = fileURLToPath(import.meta.url);
  if (process.argv[1] === thisFile) return true;
  try {
    return (await realpath(process.argv[1])) === thisFile;
  } catch {
    return false;
  }
}

if (await isMainModule()) {
  main().catch((error: unknown) => {
    console.error(
      'Fatal:',
      error instanceof Error ? error.message : error,
    );
    process.exit(1);
  });
}
