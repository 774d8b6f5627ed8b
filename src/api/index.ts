/**
 * Deputy API module: client, error taxonomy and response schemas.
 */

export {
  DeputyClient,
  createDefaultClient,
  sanitizeErrorResponse,
  parseRetryAfter,
  toNetworkError,
  KNOWN_RESOURCES,
  MAX_ERROR_BODY_LENGTH,
  type DeputyApi,
  type DeputyClientOptions,
  type ClientFactory,
  type ClientContext,
  type ListOptions,
  type QueryInput,
  type QueryFilter,
  type QueryOperator,
  type SanitizeOptions,
} from './client.js';

export {
  ApiError,
  ErrorCode,
  codeFromStatus,
  isRetryableStatus,
  findApiError,
  isStatus,
  isNotFound,
  type ApiErrorInit,
} from './errors.js';

export * from './schemas.js';
