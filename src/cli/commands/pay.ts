/**
 * Pay Command - award library and employee agreements
 *
 * Usage:
 *   deputy pay awards list [list flags]
 *   deputy pay agreements list --employee <id> [--active-only] [list flags]
 *
 * Neither endpoint pages, so `--limit` and `--offset` slice the full result.
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { Agreement, Award } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import { idParser, validateInput } from '../validation.js';
import type { GetContext } from '../types.js';
import { createListSubcommand, yesNo } from './shared.js';

export const AWARD_TABLE: TableSpec<Award> = {
  columns: [
    { header: 'CODE', key: 'code' },
    { header: 'NAME', key: 'name' },
    { header: 'COUNTRY', key: 'country' },
  ],
  row: (award) => ({
    code: award.AwardCode || award.Code || award.Id,
    name: award.Name || award.AwardName,
    country: award.CountryCode || award.Country,
  }),
};

export const AGREEMENT_TABLE: TableSpec<Agreement> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'EMPLOYEE', key: 'employee' },
    { header: 'ACTIVE', key: 'active' },
    { header: 'BASE RATE', key: 'baseRate', align: 'right' },
  ],
  row: (agreement) => ({
    id: agreement.Id,
    employee: agreement.Employee,
    active: yesNo(agreement.Active),
    baseRate: agreement.BaseRate === null || agreement.BaseRate === undefined ? '' : agreement.BaseRate.toFixed(2),
  }),
};

const AgreementFiltersSchema = z.object({
  employee: z.number().int().positive(),
  activeOnly: z.boolean().default(false),
});

export function createPayCommand(getContext: GetContext): Command {
  const awards = new Command('awards')
    .alias('award')
    .description('Award library pay rates')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List awards from the pay rate library',
        noun: 'awards',
        fetch: (api) => api.listAwards(),
        table: AWARD_TABLE,
        paginateLocally: true,
      })
    );

  const agreements = new Command('agreements')
    .alias('agreement')
    .description('Employee agreements (base rate and pay configuration)')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List agreements for an employee',
        noun: 'agreements',
        addOptions: (command) =>
          command
            .requiredOption('--employee <id>', 'Employee ID', idParser('employee ID'))
            .option('--active-only', 'Only show active agreements', false),
        fetch: (api, _flags, options) => {
          const filters = validateInput(AgreementFiltersSchema, options, 'invalid agreement filters');
          return api.listAgreements(filters.employee, filters.activeOnly);
        },
        table: AGREEMENT_TABLE,
        paginateLocally: true,
      })
    );

  return new Command('pay')
    .aliases(['payroll', 'rates'])
    .description('Pay rates and agreements')
    .addCommand(awards)
    .addCommand(agreements);
}
