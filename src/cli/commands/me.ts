/**
 * Me Command - the authenticated user
 *
 * Usage:
 *   deputy me                  Show user info
 *   deputy me timesheets       List my timesheets
 *   deputy me rosters          List my rosters
 *   deputy me leave            List my leave requests
 *
 * The /my endpoints return everything at once, so --limit and --offset are
 * applied locally.
 */

import { Command } from 'commander';
import type { Leave, MeInfo, Roster, Timesheet } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import { formatKeyValue, type KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createListSubcommand, formatClock, formatDecimal, leaveStatusText } from './shared.js';

export function meDetails(info: MeInfo): KeyValue[] {
  return [
    ['User ID', info.UserId],
    ['Employee ID', info.EmployeeId],
    ['Login', info.Login],
    ['Name', info.Name],
    ['First Name', info.FirstName],
    ['Last Name', info.LastName],
    ['Email', info.PrimaryEmail],
    ['Phone', info.PrimaryPhone],
    ['Company', info.Company],
    ['Portfolio', info.Portfolio],
  ];
}

const MY_TIMESHEET_TABLE: TableSpec<Timesheet> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'DATE', key: 'date' },
    { header: 'START', key: 'start' },
    { header: 'END', key: 'end' },
    { header: 'TOTAL', key: 'total' },
  ],
  row: (timesheet) => ({
    id: timesheet.Id,
    date: timesheet.Date,
    start: formatClock(timesheet.StartTime),
    end: formatClock(timesheet.EndTime),
    total: timesheet.TotalTimeStr,
  }),
};

const MY_ROSTER_TABLE: TableSpec<Roster> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'DATE', key: 'date' },
    { header: 'START', key: 'start' },
    { header: 'END', key: 'end' },
  ],
  row: (roster) => ({
    id: roster.Id,
    date: roster.Date,
    start: formatClock(roster.StartTime),
    end: formatClock(roster.EndTime),
  }),
};

const MY_LEAVE_TABLE: TableSpec<Leave> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'START', key: 'start' },
    { header: 'END', key: 'end' },
    { header: 'STATUS', key: 'status' },
    { header: 'HOURS', key: 'hours', align: 'right' },
  ],
  row: (leave) => ({
    id: leave.Id,
    start: leave.DateStart,
    end: leave.DateEnd,
    status: leaveStatusText(leave.Status),
    hours: formatDecimal(leave.Hours),
  }),
};

export function createMeCommand(getContext: GetContext): Command {
  const command = new Command('me')
    .description('Show the authenticated user and their own records')
    .action(async () => {
      const ctx = getContext();
      const info = await ctx.client().me();
      const options = ctx.renderOptions();
      await ctx.renderer.renderSingle(options, info, (value) =>
        formatKeyValue(meDetails(value), { noColor: options.noColor })
      );
    });

  command.addCommand(
    createListSubcommand(getContext, {
      name: 'timesheets',
      description: 'List my timesheets',
      noun: 'timesheets',
      fetch: (api) => api.myTimesheets(),
      table: MY_TIMESHEET_TABLE,
      paginateLocally: true,
    })
  );

  command.addCommand(
    createListSubcommand(getContext, {
      name: 'rosters',
      description: 'List my rosters',
      noun: 'rosters',
      fetch: (api) => api.myRosters(),
      table: MY_ROSTER_TABLE,
      paginateLocally: true,
    })
  );

  command.addCommand(
    createListSubcommand(getContext, {
      name: 'leave',
      description: 'List my leave requests',
      noun: 'leave requests',
      fetch: (api) => api.myLeave(),
      table: MY_LEAVE_TABLE,
      paginateLocally: true,
    })
  );

  return command;
}
