/**
 * JSON Utilities
 *
 * Parsing for bodies from external sources (API responses, .env-supplied
 * values) where malformed input is expected.
 */

/**
 * Parse a JSON string, returning `undefined` when it is not valid JSON.
 *
 * JSON never yields `undefined`, so a parsed `null` stays distinguishable
 * from a failure. Validate the result (zod) before using it.
 *
 * @param onError - Optional callback for logging parse errors
 *
 * @example
 * ```typescript
 * const body = safeJsonParse(text, (err) => logger.debug?.(err.message));
 * const parsed = ErrorBodySchema.safeParse(body);
 * ```
 */
export function safeJsonParse(
  json: string | null | undefined,
  onError?: (error: Error, rawValue: string) => void
): unknown {
  if (json === null || json === undefined) {
    return undefined;
  }

  try {
    const value: unknown = JSON.parse(json);
    return value;
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return undefined;
  }
}
