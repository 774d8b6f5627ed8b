/**
 * Exit codes and error classification
 *
 * The exit codes are a public contract: automation branches on these exact
 * values, so their meanings never change.
 */

import { ErrorCode, findApiError } from '../api/errors.js';
import { findInChain, messageOf } from './chain.js';
import { CLIError, EmptyResultError } from './types.js';

export const ExitCode = {
  OK: 0,
  General: 1,
  InputError: 2,
  AuthError: 3,
  NotFound: 4,
  RateLimit: 5,
  TempError: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const INPUT_ERROR_PATTERNS = [
  'unknown flag',
  'required flag',
  'missing required argument',
  'invalid --output',
  'too many arguments',
] as const;

const TEMP_ERROR_PATTERNS = ['connection refused', 'no such host', 'timeout'] as const;

/**
 * Map a machine error code to its exit code.
 */
export function exitCodeForErrorCode(code: string): ExitCode {
  switch (code) {
    case ErrorCode.AUTH_REQUIRED:
    case ErrorCode.AUTH_FORBIDDEN:
      return ExitCode.AuthError;
    case ErrorCode.NOT_FOUND:
      return ExitCode.NotFound;
    case ErrorCode.VALIDATION_FAILED:
    case ErrorCode.INVALID_INPUT:
    case ErrorCode.INVALID_FLAG:
    case ErrorCode.CONFLICT:
      return ExitCode.InputError;
    case ErrorCode.RATE_LIMITED:
      return ExitCode.RateLimit;
    case ErrorCode.SERVER_ERROR:
    case ErrorCode.TIMEOUT:
    case ErrorCode.NETWORK_ERROR:
      return ExitCode.TempError;
    default:
      return ExitCode.General;
  }
}

export function isInputErrorMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return INPUT_ERROR_PATTERNS.some((pattern) => lower.includes(pattern));
}

export function isTempErrorMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return TEMP_ERROR_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Get the exit code for any error value.
 *
 * Order matters: the empty-result sentinel, then API errors, then typed CLI
 * errors, and only then the message text.
 */
export function getExitCode(error: unknown): ExitCode {
  if (error === null || error === undefined) {
    return ExitCode.OK;
  }

  if (findInChain(error, (e): e is EmptyResultError => e instanceof EmptyResultError)) {
    return ExitCode.NotFound;
  }

  const apiError = findApiError(error);
  if (apiError) {
    return exitCodeForErrorCode(apiError.resolvedCode);
  }

  const cliError = findInChain(error, (e): e is CLIError => e instanceof CLIError);
  if (cliError && cliError.kind !== ErrorCode.UNKNOWN) {
    return exitCodeForErrorCode(cliError.kind);
  }

  const message = messageOf(error);
  if (isInputErrorMessage(message)) {
    return ExitCode.InputError;
  }
  if (isTempErrorMessage(message)) {
    return ExitCode.TempError;
  }

  return ExitCode.General;
}
