/**
 * Error type definitions for the deputy CLI
 *
 * These error classes carry:
 * - an actionable recovery hint for humans
 * - a machine error code (kind) that decides the exit code and the
 *   `code` field of the JSON error envelope
 *
 * Commands throw these (or let ApiError propagate); they never choose an exit
 * code themselves.
 */

import { ErrorCode } from '../api/errors.js';

export interface CLIErrorOptions {
  cause?: unknown;
  /** Whether retrying the same invocation may succeed */
  retryable?: boolean;
}

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Machine error code; UNKNOWN leaves classification to the message text */
  public readonly kind: string;

  public readonly retryable: boolean;

  constructor(
    message: string,
    hint?: string,
    kind: string = ErrorCode.UNKNOWN,
    options: CLIErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    // Keeps `instanceof` working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Bad arguments or flag values (exit code 2).
 */
export class InvalidInputError extends CLIError {
  constructor(message: string, hint?: string, options?: CLIErrorOptions) {
    super(message, hint, ErrorCode.INVALID_INPUT, options);
    this.name = 'InvalidInputError';
  }
}

/**
 * Unknown or malformed flags (exit code 2).
 */
export class InvalidFlagError extends CLIError {
  constructor(message: string, hint = 'Run --help to see valid flags for this command') {
    super(message, hint, ErrorCode.INVALID_FLAG);
    this.name = 'InvalidFlagError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, ErrorCode.INVALID_INPUT);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown for configuration-related errors (environment variables, .env files).
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: deputy auth status  to see the resolved configuration', ErrorCode.INVALID_INPUT);
    this.name = 'ConfigError';
  }
}

/**
 * No usable credentials (exit code 3).
 */
export class AuthenticationError extends CLIError {
  constructor(message = 'not authenticated - set DEPUTY_TOKEN and DEPUTY_INSTALL (or DEPUTY_BASE_URL)') {
    super(
      message,
      'Export the variables or put them in a .env file, then run: deputy auth test',
      ErrorCode.AUTH_REQUIRED
    );
    this.name = 'AuthenticationError';
  }
}

/**
 * A request never got an HTTP response (exit code 6).
 */
export class NetworkError extends CLIError {
  constructor(message: string, kind: typeof ErrorCode.NETWORK_ERROR | typeof ErrorCode.TIMEOUT, cause?: unknown) {
    super(
      message,
      kind === ErrorCode.TIMEOUT ? 'Request timed out, retry' : 'Check network connection',
      kind,
      { cause, retryable: true }
    );
    this.name = 'NetworkError';
  }
}

/**
 * Sentinel for `--fail-empty`: a JSON-mode result had no rows.
 *
 * Shares exit code 4 with "not found".
 */
export class EmptyResultError extends CLIError {
  constructor() {
    super('empty result', 'No results matched; drop --fail-empty to accept an empty result', ErrorCode.NOT_FOUND);
    this.name = 'EmptyResultError';
  }
}
