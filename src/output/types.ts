/**
 * Output contract types
 *
 * The resolved output settings for one invocation, and the shapes the
 * renderer writes.
 */

import type { Column, Row } from '../utils/table.js';

export type OutputMode = 'text' | 'json';

export const OUTPUT_MODES: readonly OutputMode[] = ['text', 'json'];

/**
 * Settings resolved once by the root command's pre-action hook.
 *
 * Frozen after resolution; every command reads the same object.
 */
export interface GlobalSettings {
  readonly mode: OutputMode;
  /** JSON Lines instead of the pretty envelope */
  readonly raw: boolean;
  /** jq filter applied to JSON output */
  readonly query?: string;
  readonly debug: boolean;
  readonly noColor: boolean;
}

/**
 * Per-command list flags: `--limit`, `--offset`, `--fail-empty`.
 *
 * A limit or offset of 0 means "not requested".
 */
export interface ListFlags {
  limit: number;
  offset: number;
  failEmpty: boolean;
}

/**
 * Everything the renderer needs for one result.
 */
export interface RenderOptions {
  readonly mode: OutputMode;
  readonly raw: boolean;
  readonly query?: string;
  readonly limit?: number;
  readonly offset?: number;
  readonly failOnEmpty: boolean;
  readonly noColor: boolean;
}

/** Anything with a `write` method: process.stdout, or a buffer in tests */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * How a list of `T` becomes a text table.
 */
export interface TableSpec<T> {
  columns: Column[];
  row: (item: T) => Row;
}

/**
 * Pagination metadata in the JSON list envelope.
 */
export interface ListMeta {
  count: number;
  limit?: number;
  offset?: number;
}

export interface ListEnvelope<T> {
  items: T[];
  meta: ListMeta;
}
