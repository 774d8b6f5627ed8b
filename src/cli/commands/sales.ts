/**
 * Sales Command - sales metrics
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { SalesData } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import { idParser, validateInput } from '../validation.js';
import type { GetContext } from '../types.js';
import { createListSubcommand, formatTimestamp } from './shared.js';

export const SALES_TABLE: TableSpec<SalesData> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'COMPANY', key: 'company' },
    { header: 'TIMESTAMP', key: 'timestamp' },
    { header: 'VALUE', key: 'value', align: 'right' },
    { header: 'TYPE', key: 'type' },
  ],
  row: (sale) => ({
    id: sale.Id,
    company: sale.Company,
    timestamp: formatTimestamp(sale.Timestamp),
    value: (sale.Value ?? 0).toFixed(2),
    type: sale.Type,
  }),
};

const SalesFiltersSchema = z.object({
  company: z.number().int().positive().optional(),
});

export function createSalesCommand(getContext: GetContext): Command {
  return new Command('sales')
    .alias('metrics')
    .description('Sales data')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List sales data',
        noun: 'sales records',
        addOptions: (command) => command.option('--company <id>', 'Filter by location ID', idParser('company ID')),
        fetch: (api, _flags, options) =>
          api.listSales(validateInput(SalesFiltersSchema, options, 'invalid sales filters').company),
        table: SALES_TABLE,
        paginateLocally: true,
      })
    );
}
