import { ErrorCode } from '../codes.js';
import { isRole, Role } from '../identity/identity-types.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface LoginRequest {
  readonly username: string;
  readonly password: string;
}

export interface CreateAccountRequest {
  readonly username: string;
  readonly password: string;
  readonly role: Role;
}

export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ParseFailure {
  readonly ok: false;
  readonly code: typeof ErrorCode.VALIDATION_ERROR;
  readonly message: string;
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

// Input cap for every field. Account rules are enforced by AuthService.
const MAX_FIELD_LENGTH = 1024;

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export function parseLoginRequest(raw: string): ParseResult<LoginRequest> {
  const obj = parseObject(raw);
  if (!obj.ok) return obj;

  const username = requireString(obj.value, 'username');
  if (!username.ok) return username;
  const password = requireString(obj.value, 'password');
  if (!password.ok) return password;

  return { ok: true, value: { username: username.value, password: password.value } };
}

export function parseCreateAccountRequest(raw: string): ParseResult<CreateAccountRequest> {
  const obj = parseObject(raw);
  if (!obj.ok) return obj;

  const username = requireString(obj.value, 'username');
  if (!username.ok) return username;
  const password = requireString(obj.value, 'password');
  if (!password.ok) return password;

  const role = obj.value['role'];
  if (role !== undefined && !isRole(role)) {
    return failure(`"role" must be one of: ${Object.values(Role).join(', ')}`);
  }

  return {
    ok: true,
    value: {
      username: username.value,
      password: password.value,
      role: role ?? Role.Player,
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseObject(raw: string): ParseResult<Record<string, unknown>> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    return failure('Invalid JSON');
  }

  if (!isRecord(parsed)) {
    return failure('Body must be a JSON object');
  }
  return { ok: true, value: parsed };
}

function requireString(
  obj: Record<string, unknown>,
  field: string,
): ParseResult<string> {
  const value = obj[field];
  if (typeof value !== 'string' || value.length === 0) {
    return failure(`"${field}" must be a non-empty string`);
  }
  if (value.length > MAX_FIELD_LENGTH) {
    return failure(`"${field}" must be at most ${MAX_FIELD_LENGTH} characters`);
  }
  return { ok: true, value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function failure(message: string): ParseFailure {
  return { ok: false, code: ErrorCode.VALIDATION_ERROR, message };
}
