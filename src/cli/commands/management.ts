/**
 * Management Command - memos and journals
 *
 * Usage:
 *   deputy management memo list --company <id> [list flags]
 *   deputy management journal list --employee <id> [list flags]
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { Journal, Memo } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import { idParser, validateInput } from '../validation.js';
import type { GetContext } from '../types.js';
import { createListSubcommand, formatDay, truncateText } from './shared.js';

export const MEMO_TABLE: TableSpec<Memo> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'CREATED', key: 'created' },
    { header: 'CONTENT', key: 'content' },
  ],
  row: (memo) => ({
    id: memo.Id,
    created: formatDay(memo.Created),
    content: truncateText(memo.Content),
  }),
};

export const JOURNAL_TABLE: TableSpec<Journal> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'CREATED', key: 'created' },
    { header: 'COMMENT', key: 'comment' },
  ],
  row: (journal) => ({
    id: journal.Id,
    created: formatDay(journal.Created),
    comment: truncateText(journal.Comment),
  }),
};

const CompanyFilterSchema = z.object({ company: z.number().int().positive() });
const EmployeeFilterSchema = z.object({ employee: z.number().int().positive() });

export function createManagementCommand(getContext: GetContext): Command {
  const memo = new Command('memo')
    .alias('memos')
    .description('Memos posted to a location')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List memos for a location',
        noun: 'memos',
        addOptions: (command) => command.requiredOption('--company <id>', 'Location ID', idParser('company ID')),
        fetch: (api, _flags, options) =>
          api.listMemos(validateInput(CompanyFilterSchema, options, 'invalid memo filters').company),
        table: MEMO_TABLE,
        paginateLocally: true,
      })
    );

  const journal = new Command('journal')
    .alias('journals')
    .description('Employee journal entries')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List journal entries for an employee',
        noun: 'journal entries',
        addOptions: (command) => command.requiredOption('--employee <id>', 'Employee ID', idParser('employee ID')),
        fetch: (api, _flags, options) =>
          api.listJournals(validateInput(EmployeeFilterSchema, options, 'invalid journal filters').employee),
        table: JOURNAL_TABLE,
        paginateLocally: true,
      })
    );

  return new Command('management').description('Memos and journals').addCommand(memo).addCommand(journal);
}
