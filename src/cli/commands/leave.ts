/**
 * Leave Command - leave requests
 */

import { Command } from 'commander';
import type { Leave } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createGetSubcommand, createListSubcommand, formatDecimal, leaveStatusText } from './shared.js';

export const LEAVE_TABLE: TableSpec<Leave> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'EMPLOYEE', key: 'employee' },
    { header: 'START', key: 'start' },
    { header: 'END', key: 'end' },
    { header: 'DAYS', key: 'days', align: 'right' },
    { header: 'STATUS', key: 'status' },
  ],
  row: (leave) => ({
    id: leave.Id,
    employee: leave.Employee,
    start: leave.DateStart,
    end: leave.DateEnd,
    days: formatDecimal(leave.Days),
    status: leaveStatusText(leave.Status),
  }),
};

function leaveDetails(leave: Leave): KeyValue[] {
  return [
    ['ID', leave.Id],
    ['Employee', leave.Employee],
    ['Start', leave.DateStart],
    ['End', leave.DateEnd],
    ['Days', formatDecimal(leave.Days)],
    ['Hours', formatDecimal(leave.Hours)],
    ['Status', leaveStatusText(leave.Status)],
    ['Comment', leave.Comment],
  ];
}

export function createLeaveCommand(getContext: GetContext): Command {
  return new Command('leave')
    .description('List and inspect leave requests')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List leave requests',
        noun: 'leave requests',
        fetch: (api, flags) => api.listLeave({ limit: flags.limit, offset: flags.offset }),
        table: LEAVE_TABLE,
      })
    )
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one leave request',
        idLabel: 'leave ID',
        fetch: (api, id) => api.getLeave(id),
        details: leaveDetails,
      })
    );
}
