import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

export interface LoggerOptions {
  /** Minimum level emitted. Default: 'info'. */
  readonly level?: LevelWithSilent;
  /** Logger name, attached to every line. */
  readonly name?: string;
}

// Credentials and session material must never reach the log stream.
const REDACT_PATHS = [
  'password',
  'pass',
  'passwordHash',
  'token',
  '*.password',
  '*.pass',
  '*.passwordHash',
  '*.token',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
];

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
    ...(options.name !== undefined ? { name: options.name } : {}),
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  });
}

/** A logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
