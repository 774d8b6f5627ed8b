/**
 * Timesheets Command - recorded shifts
 *
 * Usage:
 *   deputy timesheets list [--employee <id>] [--from <date>] [--to <date>] [list flags]
 *   deputy timesheets get <id>
 *
 * Without `--employee` the list covers the authenticated user's own
 * timesheets. With it, the list comes from the Timesheet QUERY endpoint,
 * which needs supervisor permission.
 */

import { Command } from 'commander';
import type { DeputyApi, QueryFilter, QueryInput, Timesheet } from '../../api/index.js';
import { InvalidInputError } from '../../errors/index.js';
import type { ListFlags, TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import { idParser, parseDate, parseListFlags } from '../validation.js';
import type { GetContext } from '../types.js';
import { addListFlags, createGetSubcommand, formatClock, yesNo } from './shared.js';

export const TIMESHEET_TABLE: TableSpec<Timesheet> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'DATE', key: 'date' },
    { header: 'START', key: 'start' },
    { header: 'END', key: 'end' },
    { header: 'TOTAL', key: 'total' },
    { header: 'STATUS', key: 'status' },
  ],
  row: (timesheet) => ({
    id: timesheet.Id,
    date: timesheet.Date,
    start: formatClock(timesheet.StartTime),
    end: formatClock(timesheet.EndTime),
    total: timesheet.TotalTimeStr,
    status: timesheet.EndTime ? 'Complete' : 'In Progress',
  }),
};

function timesheetDetails(timesheet: Timesheet): KeyValue[] {
  return [
    ['ID', timesheet.Id],
    ['Employee', timesheet.Employee],
    ['Date', timesheet.Date],
    ['Start', formatClock(timesheet.StartTime)],
    ['End', formatClock(timesheet.EndTime)],
    ['Total', timesheet.TotalTimeStr],
    ['In Progress', yesNo(timesheet.IsInProgress)],
    ['Comment', timesheet.Comment],
  ];
}

export interface TimesheetFilters {
  employee?: number;
  /** YYYY-MM-DD, inclusive */
  from?: string;
  /** YYYY-MM-DD, inclusive */
  to?: string;
}

interface TimesheetListOptions {
  employee?: number;
  from?: string;
  to?: string;
}

/**
 * Validate the date filters.
 *
 * @throws InvalidInputError for a malformed date, or `--from` after `--to`
 */
export function parseTimesheetFilters(options: TimesheetListOptions): TimesheetFilters {
  const from = options.from === undefined ? undefined : parseDate(options.from, '--from');
  const to = options.to === undefined ? undefined : parseDate(options.to, '--to');
  if (from && to && from > to) {
    throw new InvalidInputError('--from must be on or before --to');
  }
  return { employee: options.employee, from, to };
}

/**
 * Timesheet QUERY body for one employee, optionally bounded by date.
 */
export function buildTimesheetQuery(employee: number, filters: TimesheetFilters, flags: ListFlags): QueryInput {
  const conditions: QueryFilter[] = [{ field: 'Employee', type: 'eq', data: employee }];
  if (filters.from) conditions.push({ field: 'Date', type: 'ge', data: filters.from });
  if (filters.to) conditions.push({ field: 'Date', type: 'le', data: filters.to });

  const search: Record<string, QueryFilter> = {};
  conditions.forEach((condition, index) => {
    search[`f${index + 1}`] = condition;
  });

  const input: QueryInput = { search };
  if (flags.limit > 0) input.max = flags.limit;
  if (flags.offset > 0) input.start = flags.offset;
  return input;
}

/**
 * Keep timesheets whose date falls within the filter range.
 *
 * @throws InvalidInputError when a timesheet's Date is not a date
 */
export function filterTimesheetsByDate(timesheets: Timesheet[], filters: TimesheetFilters): Timesheet[] {
  if (!filters.from && !filters.to) return timesheets;

  return timesheets.filter((timesheet) => {
    if (!timesheet.Date) return false;
    const day = timesheet.Date.slice(0, 10);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(day)) {
      throw new InvalidInputError(`timesheet ${timesheet.Id} has invalid Date "${timesheet.Date}"`);
    }
    if (filters.from && day < filters.from) return false;
    if (filters.to && day > filters.to) return false;
    return true;
  });
}

async function fetchTimesheets(api: DeputyApi, filters: TimesheetFilters, flags: ListFlags): Promise<Timesheet[]> {
  if (filters.employee !== undefined) {
    return api.queryTimesheets(buildTimesheetQuery(filters.employee, filters, flags));
  }
  const timesheets = await api.listTimesheets({ limit: flags.limit, offset: flags.offset });
  return filterTimesheetsByDate(timesheets, filters);
}

function createListSubcommand(getContext: GetContext): Command {
  return addListFlags(new Command('list').alias('ls').description('List timesheets (your own unless --employee is given)'))
    .option('--employee <id>', 'Employee ID (uses the resource query)', idParser('employee ID'))
    .option('--from <date>', 'Start date (YYYY-MM-DD)')
    .option('--to <date>', 'End date (YYYY-MM-DD)')
    .action(async (options: TimesheetListOptions) => {
      const ctx = getContext();
      const flags = parseListFlags(options);
      const filters = parseTimesheetFilters(options);

      const timesheets = await fetchTimesheets(ctx.client(), filters, flags);
      ctx.debug(`Fetched ${timesheets.length} timesheets`);

      await ctx.renderer.renderList(ctx.renderOptions(flags), timesheets, TIMESHEET_TABLE);
    });
}

export function createTimesheetsCommand(getContext: GetContext): Command {
  return new Command('timesheets')
    .aliases(['timesheet', 'ts'])
    .description('List and inspect timesheets')
    .addCommand(createListSubcommand(getContext))
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one timesheet',
        idLabel: 'timesheet ID',
        fetch: (api, id) => api.getTimesheet(id),
        details: timesheetDetails,
      })
    );
}
