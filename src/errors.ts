import type { ErrorCode } from './codes.js';

export class DndServerError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DndServerError';
    this.code = code;
    this.details = details;
  }
}
