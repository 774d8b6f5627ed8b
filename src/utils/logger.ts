/**
 * Logger Interface for Library Code
 *
 * Library code (the API client, the .env loader) accepts a Logger through its
 * constructor or options. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a spy.
 *
 * Everything a logger writes goes to stderr, so stdout stays parseable.
 */

import { createPaint } from './color.js';

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

export interface StreamLoggerOptions {
  /** Emit debug lines */
  debug: boolean;
  noColor: boolean;
}

/**
 * Logger writing `Warning:` and `[debug]` lines to a stream (stderr).
 */
export function createStreamLogger(
  stream: { write(chunk: string): unknown },
  options: StreamLoggerOptions
): Required<Logger> {
  const paint = createPaint(options.noColor);
  return {
    warn: (message: string) => {
      stream.write(paint.yellow(`Warning: ${message}`) + '\n');
    },
    debug: (message: string) => {
      if (options.debug) {
        stream.write(paint.dim(`[debug] ${message}`) + '\n');
      }
    },
  };
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
