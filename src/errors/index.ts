/**
 * Error handling module for the deputy CLI
 *
 * This module exports:
 * - Custom error classes for different error kinds
 * - The exit-code classifier
 * - Text and JSON error formatters
 *
 * Usage:
 *   import { InvalidInputError, handleError } from './errors/index.js';
 *
 *   throw new InvalidInputError('invalid employee ID: abc');
 */

// Error types
export {
  CLIError,
  InvalidInputError,
  InvalidFlagError,
  ValidationError,
  ConfigError,
  AuthenticationError,
  NetworkError,
  EmptyResultError,
  type CLIErrorOptions,
} from './types.js';

// Classification
export {
  ExitCode,
  exitCodeForErrorCode,
  getExitCode,
  isInputErrorMessage,
  isTempErrorMessage,
} from './exit-codes.js';

// Formatting and handling
export {
  formatError,
  formatErrorJSON,
  buildErrorEnvelope,
  hintForStatus,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorEnvelope,
  type ErrorEnvelopeBody,
  type ErrorStream,
} from './handler.js';

export { findInChain, messageOf } from './chain.js';
