/**
 * Upstream API errors
 *
 * Every non-2xx response from the Deputy API is turned into an ApiError that
 * carries the HTTP status and a machine-readable error code. The codes here are
 * the wire strings used in the JSON error envelope.
 */

import { findInChain } from '../errors/chain.js';

/**
 * Machine-readable error codes (independent of transport).
 */
export const ErrorCode = {
  AUTH_REQUIRED: 'AUTH_REQUIRED',
  AUTH_FORBIDDEN: 'AUTH_FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_FLAG: 'INVALID_FLAG',
  CONFLICT: 'CONFLICT',
  RATE_LIMITED: 'RATE_LIMITED',
  SERVER_ERROR: 'SERVER_ERROR',
  TIMEOUT: 'TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ApiErrorInit {
  /** Explicit error code; derived from the status when omitted */
  code?: string;
  statusCode: number;
  /** Message reported by the API (or a generic one for the status) */
  detail: string;
  retryable?: boolean;
  /** Seconds to wait before retrying, from the Retry-After header */
  retryAfter?: number;
  /** Offending field, when the API names one */
  field?: string;
  cause?: unknown;
}

/**
 * An error response returned by the Deputy API.
 */
export class ApiError extends Error {
  public readonly code?: string;
  public readonly statusCode: number;
  public readonly detail: string;
  public readonly retryable: boolean;
  public readonly retryAfter?: number;
  public readonly field?: string;

  constructor(init: ApiErrorInit) {
    super(`API error ${init.statusCode}: ${init.detail}`, { cause: init.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ApiError';
    this.code = init.code;
    this.statusCode = init.statusCode;
    this.detail = init.detail;
    this.retryable = init.retryable ?? isRetryableStatus(init.statusCode);
    this.retryAfter = init.retryAfter;
    this.field = init.field;
  }

  /** The explicit code, or the one implied by the HTTP status */
  get resolvedCode(): string {
    return this.code !== undefined && this.code !== '' ? this.code : codeFromStatus(this.statusCode);
  }
}

/**
 * Map an HTTP status to an error code.
 */
export function codeFromStatus(status: number): ErrorCode {
  switch (status) {
    case 401:
      return ErrorCode.AUTH_REQUIRED;
    case 403:
      return ErrorCode.AUTH_FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 408:
      return ErrorCode.TIMEOUT;
    case 409:
      return ErrorCode.CONFLICT;
    case 422:
      return ErrorCode.VALIDATION_FAILED;
    case 429:
      return ErrorCode.RATE_LIMITED;
    default:
      return status >= 500 ? ErrorCode.SERVER_ERROR : ErrorCode.INVALID_INPUT;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Find an ApiError in an error's cause chain.
 */
export function findApiError(error: unknown): ApiError | undefined {
  return findInChain(error, (e): e is ApiError => e instanceof ApiError);
}

/**
 * True when `error` is (or wraps) an ApiError with the given status.
 */
export function isStatus(error: unknown, status: number): boolean {
  return findApiError(error)?.statusCode === status;
}

export function isNotFound(error: unknown): boolean {
  return isStatus(error, 404);
}
