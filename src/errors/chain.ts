/**
 * Walk an error's `cause` chain.
 *
 * Errors may be wrapped any number of times (`new Error(msg, { cause })`);
 * classification looks through every layer. The walk stops on cycles.
 */
export function findInChain<T>(
  error: unknown,
  guard: (value: unknown) => value is T
): T | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== null && current !== undefined && !seen.has(current)) {
    if (guard(current)) return current;
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return undefined;
}

/**
 * The message of an error value, whatever its type.
 */
export function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
