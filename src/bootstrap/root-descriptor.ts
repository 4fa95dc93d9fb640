import { randomBytes } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import { parse, stringify, TomlError } from 'smol-toml';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';

// ── Root Credential Descriptor ───────────────────────────────────
//
//   [credentials]
//   name = "root"
//   pass = "<64 hex chars>"

export const DEFAULT_ROOT_USERNAME = 'root';
export const GENERATED_PASSWORD_BYTES = 32;

export interface RootCredentials {
  readonly name: string;
  readonly pass: string;
}

export type DescriptorReadResult =
  | { readonly ok: true; readonly credentials: RootCredentials }
  | { readonly ok: false; readonly reason: 'missing' | 'malformed'; readonly message: string };

/**
 * Reads and validates the descriptor. Never throws for a missing or malformed
 * file; the caller decides whether that is fatal.
 */
export async function readRootDescriptor(path: string): Promise<DescriptorReadResult> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: 'missing', message: `Cannot read ${path}: ${message}` };
  }
  return parseRootDescriptor(raw);
}

export function parseRootDescriptor(raw: string): DescriptorReadResult {
  let doc: ReturnType<typeof parse>;
  try {
    doc = parse(raw);
  } catch (error) {
    const message = error instanceof TomlError ? error.message : String(error);
    return { ok: false, reason: 'malformed', message: `Invalid TOML: ${message}` };
  }

  const section = doc['credentials'];
  if (
    typeof section !== 'object' ||
    section === null ||
    Array.isArray(section) ||
    section instanceof Date
  ) {
    return malformed('Missing [credentials] table');
  }

  const name = section['name'];
  const pass = section['pass'];

  if (typeof name !== 'string' || name.length === 0) {
    return malformed('credentials.name must be a non-empty string');
  }
  if (typeof pass !== 'string' || pass.length === 0) {
    return malformed('credentials.pass must be a non-empty string');
  }

  return { ok: true, credentials: { name, pass } };
}

function malformed(message: string): DescriptorReadResult {
  return { ok: false, reason: 'malformed', message };
}

// ── Generator ────────────────────────────────────────────────────

export interface GenerateOptions {
  /** Root username. Default: 'root'. */
  readonly name?: string;
}

/**
 * Writes a fresh descriptor with a random hex password, readable by the owner
 * only. Refuses to overwrite an existing file.
 */
export async function generateRootDescriptor(
  path: string,
  options: GenerateOptions = {},
): Promise<RootCredentials> {
  const credentials: RootCredentials = {
    name: options.name ?? DEFAULT_ROOT_USERNAME,
    pass: randomBytes(GENERATED_PASSWORD_BYTES).toString('hex'),
  };

  const body = stringify({ credentials: { name: credentials.name, pass: credentials.pass } });

  try {
    await writeFile(path, `${body}\n`, { mode: 0o600, flag: 'wx' });
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'EEXIST') {
      throw new DndServerError(
        ErrorCode.CONFLICT,
        `Root descriptor ${path} already exists`,
      );
    }
    throw new DndServerError(
      ErrorCode.BOOTSTRAP_FAILURE,
      `Cannot write root descriptor ${path}`,
      { cause: error instanceof Error ? error.message : String(error) },
    );
  }

  return credentials;
}
