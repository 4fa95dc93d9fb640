import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 429 | 500 | 503;

export interface ErrorBody {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: unknown;
  };
}

const STATUS_BY_CODE: Readonly<Record<ErrorCode, ErrorStatus>> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_CREDENTIALS]: 401,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.STORAGE_UNAVAILABLE]: 503,
  // Startup-only codes; reaching a request means a server bug.
  [ErrorCode.BOOTSTRAP_FAILURE]: 500,
  [ErrorCode.TLS_CONFIG_ERROR]: 500,
};

export function statusForCode(code: ErrorCode): ErrorStatus {
  return STATUS_BY_CODE[code];
}

export function errorBody(code: ErrorCode, message: string, details?: unknown): ErrorBody {
  return {
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
    },
  };
}

export interface ErrorResponse {
  readonly status: ErrorStatus;
  readonly body: ErrorBody;
  /** Seconds, set for RATE_LIMITED. */
  readonly retryAfter: number | null;
}

/**
 * Maps a thrown value to the response the client sees. Anything that is not a
 * DndServerError becomes a generic INTERNAL_ERROR.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (!(error instanceof DndServerError)) {
    return {
      status: 500,
      body: errorBody(ErrorCode.INTERNAL_ERROR, 'Internal server error'),
      retryAfter: null,
    };
  }

  const status = statusForCode(error.code);
  if (status === 500) {
    return {
      status,
      body: errorBody(ErrorCode.INTERNAL_ERROR, 'Internal server error'),
      retryAfter: null,
    };
  }

  return {
    status,
    body: errorBody(error.code, error.message, error.details),
    retryAfter: error.code === ErrorCode.RATE_LIMITED ? retryAfterSeconds(error.details) : null,
  };
}

function retryAfterSeconds(details: unknown): number {
  if (
    typeof details === 'object' &&
    details !== null &&
    'retryAfterMs' in details &&
    typeof details.retryAfterMs === 'number'
  ) {
    return Math.max(1, Math.ceil(details.retryAfterMs / 1000));
  }
  return 1;
}
