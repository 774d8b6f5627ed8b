/**
 * Rosters Command - scheduled shifts
 */

import { Command } from 'commander';
import type { Roster } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createGetSubcommand, createListSubcommand, formatClock, yesNo } from './shared.js';

export const ROSTER_TABLE: TableSpec<Roster> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'DATE', key: 'date' },
    { header: 'START', key: 'start' },
    { header: 'END', key: 'end' },
    { header: 'EMPLOYEE', key: 'employee' },
    { header: 'PUBLISHED', key: 'published' },
  ],
  row: (roster) => ({
    id: roster.Id,
    date: roster.Date,
    start: formatClock(roster.StartTime),
    end: formatClock(roster.EndTime),
    employee: roster.Employee,
    published: yesNo(roster.Published),
  }),
};

function rosterDetails(roster: Roster): KeyValue[] {
  return [
    ['ID', roster.Id],
    ['Date', roster.Date],
    ['Start', formatClock(roster.StartTime)],
    ['End', formatClock(roster.EndTime)],
    ['Employee', roster.Employee],
    ['Area', roster.OperationalUnit],
    ['Open', yesNo(roster.Open)],
    ['Published', yesNo(roster.Published)],
    ['Comment', roster.Comment],
  ];
}

export function createRostersCommand(getContext: GetContext): Command {
  return new Command('rosters')
    .aliases(['roster', 'shifts'])
    .description('List and inspect rostered shifts')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List rosters',
        noun: 'rosters',
        fetch: (api, flags) => api.listRosters({ limit: flags.limit, offset: flags.offset }),
        table: ROSTER_TABLE,
      })
    )
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one roster',
        idLabel: 'roster ID',
        fetch: (api, id) => api.getRoster(id),
        details: rosterDetails,
      })
    );
}
