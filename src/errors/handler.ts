/**
 * Error formatting for the deputy CLI
 *
 * Two renderings of the same classified error:
 * - text: the message plus an actionable hint, for humans
 * - JSON: a `{"error": {...}}` envelope, for agents
 *
 * `--debug` bypasses the embellishments and shows the raw error message.
 */

import { Chalk } from 'chalk';
import { ErrorCode, findApiError, type ApiError } from '../api/errors.js';
import { findInChain, messageOf } from './chain.js';
import { ExitCode, exitCodeForErrorCode, getExitCode, isTempErrorMessage } from './exit-codes.js';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show the raw error message instead of hints */
  debug?: boolean;
  /** Output the JSON envelope instead of text */
  json?: boolean;
  /** Suppress ANSI styling in text output */
  noColor?: boolean;
}

/**
 * Body of the JSON error envelope
 */
export interface ErrorEnvelopeBody {
  code: string;
  status?: number;
  message: string;
  retryable: boolean;
  retryAfter?: number;
  field?: string;
  hint?: string;
}

export interface ErrorEnvelope {
  error: ErrorEnvelopeBody;
}

/** Anything with a `write` method: process.stderr, or a buffer in tests */
export interface ErrorStream {
  write(chunk: string): unknown;
}

const DEBUG_SUFFIX = 'Use --debug for details. Avoid piping stderr into jq (omit 2>&1).';

/**
 * Human-readable hint for an HTTP status; shared by both formatters.
 */
export function hintForStatus(status: number): string | undefined {
  switch (status) {
    case 400:
      return "Check field names against the resource schema (see 'deputy resource info <Resource>')";
    case 401:
      return "Re-authenticate: check DEPUTY_TOKEN, then run 'deputy auth test'";
    case 403:
      return 'Check role permissions for this endpoint';
    case 404:
      return "Resource not found, list known resources with 'deputy resource list'";
    case 409:
      return 'Conflict with existing data, verify the resource state';
    case 412:
      return "Precondition failed, verify credentials with 'deputy auth test'";
    case 417:
      return 'Data format error, check the JSON structure (arrays vs objects)';
    case 422:
      return 'Validation failed, check required fields and formats';
    case 429:
      return 'Rate limited, wait and retry';
    default:
      return status >= 500 ? 'Server error, retry later' : undefined;
  }
}

function formatApiError(apiError: ApiError): string {
  const base = `API error ${apiError.statusCode}: ${apiError.detail}`;
  const hint = hintForStatus(apiError.statusCode);
  return hint ? `${base}\nHint: ${hint}. ${DEBUG_SUFFIX}` : `${base}\nHint: ${DEBUG_SUFFIX}`;
}

/**
 * Format an error for a human reader.
 *
 * With `debug`, returns the raw error message exactly.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  if (error === null || error === undefined) return '';

  const message = messageOf(error);
  if (options.debug) return message;

  const apiError = findApiError(error);
  if (apiError) return formatApiError(apiError);

  if (message.includes('invalid jq query')) {
    return `${message}\nHint: Check the --query expression or drop it.`;
  }
  if (message.includes('unknown flag')) {
    return `${message}\nHint: Run --help to see valid flags for this command.`;
  }
  if (message.includes('invalid --output')) {
    return `${message}\nHint: Use --output text or --output json.`;
  }

  const cliError = findInChain(error, (e): e is CLIError => e instanceof CLIError);
  if (cliError?.hint) {
    return `${message}\nHint: ${cliError.hint}`;
  }

  return `${message}\nHint: Use --debug for full details.`;
}

/**
 * Build the JSON error envelope for an error.
 */
export function buildErrorEnvelope(error: unknown, options: ErrorHandlerOptions = {}): ErrorEnvelope {
  const message = messageOf(error);
  const apiError = findApiError(error);

  if (apiError) {
    return {
      error: {
        code: apiError.resolvedCode,
        status: apiError.statusCode,
        message: options.debug ? message : apiError.detail,
        retryable: apiError.retryable,
        retryAfter: apiError.retryAfter,
        field: apiError.field,
        hint: options.debug ? undefined : hintForStatus(apiError.statusCode),
      },
    };
  }

  const cliError = findInChain(error, (e): e is CLIError => e instanceof CLIError);
  // A typed kind already decided the exit code; message text only refines its hint.
  const typedKind = cliError && cliError.kind !== ErrorCode.UNKNOWN ? cliError.kind : undefined;
  const inputKind = typedKind === undefined || exitCodeForErrorCode(typedKind) === ExitCode.InputError;
  const body: ErrorEnvelopeBody = {
    code: typedKind ?? ErrorCode.INVALID_INPUT,
    message,
    retryable: cliError?.retryable ?? false,
    hint: cliError?.hint,
  };

  const lower = message.toLowerCase();
  if (lower.includes('invalid jq query')) {
    if (inputKind) {
      body.code = typedKind ?? ErrorCode.INVALID_INPUT;
      body.hint = 'Check the --query expression';
    }
  } else if (lower.includes('unknown flag')) {
    if (inputKind) {
      body.code = typedKind ?? ErrorCode.INVALID_FLAG;
      body.hint = 'Run --help to see valid flags';
    }
  } else if (typedKind === undefined && isTempErrorMessage(message)) {
    body.retryable = true;
    if (lower.includes('connection refused') || lower.includes('no such host')) {
      body.code = ErrorCode.NETWORK_ERROR;
      body.hint = 'Check network connection';
    } else {
      body.code = ErrorCode.TIMEOUT;
      body.hint = 'Request timed out, retry';
    }
  }

  if (options.debug) {
    body.hint = undefined;
  }

  return { error: body };
}

/**
 * Format an error as a compact JSON envelope; empty string for no error.
 */
export function formatErrorJSON(error: unknown, options: ErrorHandlerOptions = {}): string {
  if (error === null || error === undefined) return '';
  return JSON.stringify(buildErrorEnvelope(error, options));
}

/**
 * Write an error to `stream` in the requested form and return its exit code.
 *
 * Separate from process exit so it can be tested.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions,
  stream: ErrorStream
): ExitCode {
  if (options.json) {
    stream.write(formatErrorJSON(error, options) + '\n');
  } else {
    const paint = new Chalk(options.noColor ? { level: 0 } : {});
    stream.write(paint.red('Error: ') + formatError(error, options) + '\n');
  }
  return getExitCode(error);
}

/**
 * Create a handler for errors that escape every try/catch.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ debug: false }, process.stderr);
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions,
  stream: ErrorStream
): (error: unknown) => never {
  return (error: unknown) => {
    const code = handleError(error, options, stream);
    process.exit(code);
  };
}
