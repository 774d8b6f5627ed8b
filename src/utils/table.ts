/**
 * Table Formatting Utility
 *
 * Column-aligned text output for the CLI: list tables with a header row, and
 * `Key: Value` blocks for single records. Columns are separated by two spaces
 * and the last column is never padded.
 */

import { createPaint } from './color.js';

/**
 * Column alignment options
 */
export type Alignment = 'left' | 'right';

/**
 * Column definition for table
 */
export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Minimum width */
  minWidth?: number;
}

/**
 * Table row data - key-value pairs
 */
export type Row = Record<string, string | number | boolean | null | undefined>;

export interface TableFormatOptions {
  /** Render the header without ANSI styling */
  noColor?: boolean;
}

const COLUMN_GAP = 2;

/**
 * Strip ANSI escape codes from string (for length calculation)
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

/**
 * Pad a string to a given width with specified alignment
 */
function padString(str: string, width: number, align: Alignment = 'left'): string {
  const padding = width - stripAnsi(str).length;

  if (padding <= 0) return str;

  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

function cellText(value: Row[string]): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Calculate column widths based on data
 */
function calculateWidths(columns: Column[], rows: Row[]): number[] {
  return columns.map((col) => {
    let maxWidth = col.header.length;

    for (const row of rows) {
      const len = stripAnsi(cellText(row[col.key])).length;
      if (len > maxWidth) maxWidth = len;
    }

    if (col.minWidth !== undefined && maxWidth < col.minWidth) {
      maxWidth = col.minWidth;
    }

    return maxWidth;
  });
}

/**
 * Format data as an aligned text table
 *
 * @example
 * ```ts
 * const columns: Column[] = [
 *   { header: 'ID', key: 'id' },
 *   { header: 'NAME', key: 'name' },
 * ];
 * formatTable(columns, [{ id: 7, name: 'Ana Lee' }]);
 * ```
 *
 * Output:
 * ```
 * ID  NAME
 * 7   Ana Lee
 * ```
 */
export function formatTable(columns: Column[], rows: Row[], options: TableFormatOptions = {}): string {
  if (columns.length === 0) return '';

  const paint = createPaint(options.noColor ?? false);
  const widths = calculateWidths(columns, rows);
  const last = columns.length - 1;

  const buildLine = (values: string[]): string =>
    columns
      .map((col, i) => {
        const value = values[i] ?? '';
        const width = widths[i] ?? 0;
        if (i === last) {
          return col.align === 'right' ? padString(value, width, 'right') : value;
        }
        return padString(padString(value, width, col.align), width + COLUMN_GAP);
      })
      .join('')
      .trimEnd();

  const lines = [buildLine(columns.map((c) => paint.bold(c.header)))];
  for (const row of rows) {
    lines.push(buildLine(columns.map((col) => cellText(row[col.key]))));
  }

  return lines.join('\n');
}

/**
 * A label and its value for a `Key: Value` block
 */
export type KeyValue = readonly [label: string, value: string | number | boolean | null | undefined];

/**
 * Format a single record as aligned `Label: value` lines
 *
 * Values start in the same column; labels are bold unless `noColor`.
 */
export function formatKeyValue(pairs: readonly KeyValue[], options: TableFormatOptions = {}): string {
  const paint = createPaint(options.noColor ?? false);
  const labelWidth = Math.max(0, ...pairs.map(([label]) => label.length + 1));

  return pairs
    .map(([label, value]) => {
      const padding = ' '.repeat(labelWidth - label.length);
      return `${paint.bold(`${label}:`)}${padding}${cellText(value)}`.trimEnd();
    })
    .join('\n');
}
