import { describe, it, expect } from 'vitest';
import { ApiError, ErrorCode, codeFromStatus, findApiError, isNotFound, isRetryableStatus, isStatus } from '../errors.js';

describe('ApiError', () => {
  it('formats its message from status and detail', () => {
    const error = new ApiError({ statusCode: 403, detail: 'forbidden' });

    expect(error.message).toBe('API error 403: forbidden');
    expect(error.name).toBe('ApiError');
    expect(error).toBeInstanceOf(Error);
  });

  it('derives the code from the status unless one is given', () => {
    expect(new ApiError({ statusCode: 403, detail: 'x' }).resolvedCode).toBe(ErrorCode.AUTH_FORBIDDEN);
    expect(new ApiError({ statusCode: 403, detail: 'x', code: '' }).resolvedCode).toBe(ErrorCode.AUTH_FORBIDDEN);
    expect(new ApiError({ statusCode: 400, detail: 'x', code: 'CONFLICT' }).resolvedCode).toBe('CONFLICT');
  });

  it('is retryable for 429 and server errors unless overridden', () => {
    expect(new ApiError({ statusCode: 503, detail: 'x' }).retryable).toBe(true);
    expect(new ApiError({ statusCode: 503, detail: 'x', retryable: false }).retryable).toBe(false);
  });
});

describe('codeFromStatus', () => {
  it.each([
    [401, 'AUTH_REQUIRED'],
    [403, 'AUTH_FORBIDDEN'],
    [404, 'NOT_FOUND'],
    [408, 'TIMEOUT'],
    [409, 'CONFLICT'],
    [422, 'VALIDATION_FAILED'],
    [429, 'RATE_LIMITED'],
    [500, 'SERVER_ERROR'],
    [400, 'INVALID_INPUT'],
    [418, 'INVALID_INPUT'],
  ])('%i -> %s', (status, code) => {
    expect(codeFromStatus(status)).toBe(code);
  });
});

describe('status helpers', () => {
  const wrapped = new Error('outer', { cause: new ApiError({ statusCode: 404, detail: 'not found' }) });

  it('find an API error through wrappers', () => {
    expect(findApiError(wrapped)?.statusCode).toBe(404);
    expect(findApiError(new Error('plain'))).toBeUndefined();
  });

  it('test the status', () => {
    expect(isStatus(wrapped, 404)).toBe(true);
    expect(isNotFound(wrapped)).toBe(true);
    expect(isNotFound(new Error('404'))).toBe(false);
  });

  it('isRetryableStatus', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(500)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
  });
});
