/**
 * Tests for safe JSON parsing utility
 */

import { describe, it, expect, vi } from 'vitest';
import { safeJsonParse } from '../json.js';

describe('safeJsonParse', () => {
  describe('valid JSON', () => {
    it('parses an error body object', () => {
      const result = safeJsonParse('{"error":{"code":401,"message":"bad token"}}');
      expect(result).toEqual({ error: { code: 401, message: 'bad token' } });
    });

    it('parses an array', () => {
      expect(safeJsonParse('[1,2,3]')).toEqual([1, 2, 3]);
    });

    it('keeps JSON null distinct from a failure', () => {
      expect(safeJsonParse('null')).toBeNull();
    });
  });

  describe('missing or invalid input', () => {
    it('returns undefined for null and undefined', () => {
      expect(safeJsonParse(null)).toBeUndefined();
      expect(safeJsonParse(undefined)).toBeUndefined();
    });

    it('returns undefined for an HTML error page', () => {
      expect(safeJsonParse('<html><body>Bad Gateway</body></html>')).toBeUndefined();
    });

    it('returns undefined for an empty body', () => {
      expect(safeJsonParse('')).toBeUndefined();
    });

    it('returns undefined for truncated JSON', () => {
      expect(safeJsonParse('{"message": "rate')).toBeUndefined();
    });
  });

  describe('onError callback', () => {
    it('receives the error and the raw value on failure', () => {
      const onError = vi.fn();
      const invalidJson = '{bad: json}';

      safeJsonParse(invalidJson, onError);

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(Error), invalidJson);
    });

    it('is not called on success or for null input', () => {
      const onError = vi.fn();
      safeJsonParse('{"valid": true}', onError);
      safeJsonParse(null, onError);
      expect(onError).not.toHaveBeenCalled();
    });
  });
});
