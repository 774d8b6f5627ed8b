/**
 * Building blocks shared by the resource commands
 *
 * Every list command takes `--limit`, `--offset` and `--fail-empty`, and
 * every result goes through the context's renderer, so all commands share
 * one output contract.
 */

import { Command } from 'commander';
import type { DeputyApi } from '../../api/index.js';
import { applyPagination, type ListFlags, type TableSpec } from '../../output/index.js';
import { formatKeyValue, type KeyValue } from '../../utils/table.js';
import { countParser, parseId, parseListFlags } from '../validation.js';
import type { GetContext } from '../types.js';

// ============================================================================
// FLAGS
// ============================================================================

/**
 * Add the pagination and empty-result flags to a list command.
 */
export function addListFlags(command: Command): Command {
  return command
    .option('--limit <n>', 'Maximum number of results (0 = unlimited)', countParser('--limit'), 0)
    .option('--offset <n>', 'Number of results to skip', countParser('--offset'), 0)
    .option('--fail-empty', 'Exit 4 when results are empty (JSON mode)', false);
}

// ============================================================================
// CELL FORMATTING
// ============================================================================

export function yesNo(value: boolean | null | undefined): string {
  return value ? 'Yes' : 'No';
}

/**
 * `HH:MM` for a Unix timestamp in seconds, or `-` when unset.
 *
 * Uses the local time zone unless one is given.
 */
export function formatClock(seconds: number | null | undefined, timeZone?: string): string {
  if (!seconds) return '-';
  return new Intl.DateTimeFormat('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone,
  }).format(new Date(seconds * 1000));
}

const LEAVE_STATUSES = ['Awaiting', 'Approved', 'Declined', 'Cancelled', 'Pay Pending', 'Pay Approved'];

export function leaveStatusText(status: number | null | undefined): string {
  const known = status === null || status === undefined ? undefined : LEAVE_STATUSES[status];
  return known ?? `Unknown (${status ?? '-'})`;
}

/**
 * One decimal place, as hours and days are shown.
 */
export function formatDecimal(value: number | null | undefined): string {
  return (value ?? 0).toFixed(1);
}

/**
 * `YYYY-MM-DDTHH:MM:SSZ` (UTC) for a Unix timestamp in seconds, or `-`.
 */
export function formatTimestamp(seconds: number | null | undefined): string {
  if (!seconds) return '-';
  return `${new Date(seconds * 1000).toISOString().slice(0, 19)}Z`;
}

/**
 * `YYYY-MM-DD` (UTC) for a Unix timestamp in seconds, or `-`.
 */
export function formatDay(seconds: number | null | undefined): string {
  if (!seconds) return '-';
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}

/** Longest free text shown in a table cell */
export const MAX_CELL_TEXT = 50;

export function truncateText(value: string | null | undefined, max = MAX_CELL_TEXT): string {
  const text = value ?? '';
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

// ============================================================================
// COMMAND FACTORIES
// ============================================================================

export interface ListCommandSpec<T> {
  /** Subcommand name (default "list", aliased "ls") */
  name?: string;
  description: string;
  /** Plural noun for debug output, e.g. "employees" */
  noun: string;
  /** `options` holds the raw commander options, filter flags included */
  fetch: (api: DeputyApi, flags: ListFlags, options: unknown) => Promise<T[]>;
  table: TableSpec<T>;
  /** Slice locally: the endpoint ignores paging parameters */
  paginateLocally?: boolean;
  /** Declare filter flags beyond the shared list flags */
  addOptions?: (command: Command) => Command;
}

/**
 * A `list` subcommand: fetch, optionally page locally, render.
 */
export function createListSubcommand<T>(getContext: GetContext, spec: ListCommandSpec<T>): Command {
  const command = new Command(spec.name ?? 'list').description(spec.description);
  if (!spec.name) command.alias('ls');
  spec.addOptions?.(command);

  return addListFlags(command).action(
    async (options: unknown) => {
      const ctx = getContext();
      const flags = parseListFlags(options);

      let items = await spec.fetch(ctx.client(), flags, options);
      ctx.debug(`Fetched ${items.length} ${spec.noun}`);
      if (spec.paginateLocally) {
        items = applyPagination(items, flags.offset, flags.limit);
      }

      await ctx.renderer.renderList(ctx.renderOptions(flags), items, spec.table);
    }
  );
}

export interface GetCommandSpec<T> {
  description: string;
  /** How the ID is named in errors, e.g. "employee ID" */
  idLabel: string;
  fetch: (api: DeputyApi, id: number) => Promise<T>;
  details: (item: T) => readonly KeyValue[];
}

/**
 * A `get <id>` subcommand: fetch one record and render it.
 */
export function createGetSubcommand<T>(getContext: GetContext, spec: GetCommandSpec<T>): Command {
  return new Command('get')
    .description(spec.description)
    .argument('<id>', spec.idLabel)
    .action(async (rawId: string) => {
      const ctx = getContext();
      const id = parseId(rawId, spec.idLabel);
      const item = await spec.fetch(ctx.client(), id);
      const options = ctx.renderOptions();
      await ctx.renderer.renderSingle(options, item, (value) =>
        formatKeyValue(spec.details(value), { noColor: options.noColor })
      );
    });
}
