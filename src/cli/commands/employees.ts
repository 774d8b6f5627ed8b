/**
 * Employees Command - list and inspect employees
 *
 * Usage:
 *   deputy employees list [--limit N] [--offset N] [--fail-empty]
 *   deputy employees get <id>
 */

import { Command } from 'commander';
import type { Employee } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createGetSubcommand, createListSubcommand, yesNo } from './shared.js';

export const EMPLOYEE_TABLE: TableSpec<Employee> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'NAME', key: 'name' },
    { header: 'EMAIL', key: 'email' },
    { header: 'ACTIVE', key: 'active' },
  ],
  row: (employee) => ({
    id: employee.Id,
    name: employee.DisplayName,
    email: employee.Email,
    active: yesNo(employee.Active),
  }),
};

export function employeeDetails(employee: Employee): KeyValue[] {
  return [
    ['ID', employee.Id],
    ['Name', employee.DisplayName],
    ['First Name', employee.FirstName],
    ['Last Name', employee.LastName],
    ['Email', employee.Email],
    ['Mobile', employee.Mobile],
    ['Active', yesNo(employee.Active)],
    ['Company', employee.Company],
  ];
}

export function createEmployeesCommand(getContext: GetContext): Command {
  return new Command('employees')
    .aliases(['employee', 'emp'])
    .description('List and inspect employees')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List employees',
        noun: 'employees',
        fetch: (api, flags) => api.listEmployees({ limit: flags.limit, offset: flags.offset }),
        table: EMPLOYEE_TABLE,
      })
    )
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one employee',
        idLabel: 'employee ID',
        fetch: (api, id) => api.getEmployee(id),
        details: employeeDetails,
      })
    );
}
