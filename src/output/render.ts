/**
 * Output rendering
 *
 * One renderer for every command result:
 * - text: aligned table, or a caller-formatted `Key: Value` block
 * - json: pretty document, with a `{items, meta}` envelope for lists
 * - json + raw: JSON Lines, one compact item per write
 *
 * `--query` filters JSON output through the query engine; text mode ignores
 * it. `--fail-empty` turns an empty JSON result into EmptyResultError before
 * anything is written.
 */

import { EmptyResultError } from '../errors/index.js';
import { formatTable } from '../utils/table.js';
import { jqEngine, type QueryEngine } from './query.js';
import type { ListEnvelope, ListMeta, OutputStream, RenderOptions, TableSpec } from './types.js';

/**
 * Client-side paging for endpoints that ignore paging parameters.
 *
 * An offset past the end yields `[]`; a limit of 0 means no limit.
 */
export function applyPagination<T>(items: readonly T[], offset: number, limit: number): T[] {
  let result = [...items];
  if (offset > 0) {
    if (offset >= result.length) return [];
    result = result.slice(offset);
  }
  if (limit > 0 && limit < result.length) {
    result = result.slice(0, limit);
  }
  return result;
}

/**
 * Wrap list items with pagination metadata.
 *
 * `limit` and `offset` appear only when they were requested.
 */
export function buildListEnvelope<T>(
  items: readonly T[],
  options: Pick<RenderOptions, 'limit' | 'offset'>
): ListEnvelope<T> {
  const meta: ListMeta = { count: items.length };
  if (options.limit !== undefined && options.limit > 0) meta.limit = options.limit;
  if (options.offset !== undefined && options.offset > 0) meta.offset = options.offset;
  return { items: [...items], meta };
}

/**
 * Whether a single result counts as empty for `--fail-empty`.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

function serialize(value: unknown, pretty: boolean): string {
  return JSON.stringify(value ?? null, null, pretty ? 2 : undefined);
}

export class OutputRenderer {
  constructor(
    private readonly out: OutputStream,
    private readonly queryEngine: QueryEngine = jqEngine
  ) {}

  /**
   * Render a list result.
   */
  async renderList<T>(options: RenderOptions, items: readonly T[], table: TableSpec<T>): Promise<void> {
    if (options.mode === 'text') {
      const rows = items.map((item) => table.row(item));
      this.writeLine(formatTable(table.columns, rows, { noColor: options.noColor }));
      return;
    }

    if (options.failOnEmpty && items.length === 0) {
      throw new EmptyResultError();
    }

    if (options.raw) {
      if (options.query) {
        await this.writeQueryResults(items, options);
        return;
      }
      for (const item of items) {
        this.writeLine(serialize(item, false));
      }
      return;
    }

    const envelope = buildListEnvelope(items, options);
    if (options.query) {
      await this.writeQueryResults(envelope, options);
      return;
    }
    this.writeLine(serialize(envelope, true));
  }

  /**
   * Render a single object. `formatText` builds the text-mode block.
   */
  async renderSingle<T>(options: RenderOptions, value: T, formatText: (value: T) => string): Promise<void> {
    if (options.mode === 'text') {
      this.writeLine(formatText(value));
      return;
    }

    if (options.failOnEmpty && isEmptyValue(value)) {
      throw new EmptyResultError();
    }

    if (options.query) {
      await this.writeQueryResults(value, options);
      return;
    }
    this.writeLine(serialize(value, !options.raw));
  }

  /**
   * Write plain text lines, in any mode (confirmations, messages).
   */
  writeText(text: string): void {
    this.writeLine(text);
  }

  private async writeQueryResults(document: unknown, options: RenderOptions): Promise<void> {
    const results = await this.queryEngine.evaluate(document, options.query ?? '.');
    for (const result of results) {
      this.writeLine(serialize(result, !options.raw));
    }
  }

  private writeLine(text: string): void {
    this.out.write(text + '\n');
  }
}
