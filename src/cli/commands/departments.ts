/**
 * Departments Command - operational units (areas)
 */

import { Command } from 'commander';
import type { Department } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createGetSubcommand, createListSubcommand, yesNo } from './shared.js';

export const DEPARTMENT_TABLE: TableSpec<Department> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'NAME', key: 'name' },
    { header: 'CODE', key: 'code' },
    { header: 'COMPANY', key: 'company' },
    { header: 'ACTIVE', key: 'active' },
  ],
  row: (department) => ({
    id: department.Id,
    name: department.CompanyName,
    code: department.CompanyCode,
    company: department.Company,
    active: yesNo(department.Active),
  }),
};

function departmentDetails(department: Department): KeyValue[] {
  return [
    ['ID', department.Id],
    ['Name', department.CompanyName],
    ['Code', department.CompanyCode],
    ['Company', department.Company],
    ['Parent', department.ParentId],
    ['Active', yesNo(department.Active)],
  ];
}

export function createDepartmentsCommand(getContext: GetContext): Command {
  return new Command('departments')
    .aliases(['department', 'dept', 'areas'])
    .description('List and inspect departments (operational units)')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List departments',
        noun: 'departments',
        fetch: (api, flags) => api.listDepartments({ limit: flags.limit, offset: flags.offset }),
        table: DEPARTMENT_TABLE,
      })
    )
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one department',
        idLabel: 'department ID',
        fetch: (api, id) => api.getDepartment(id),
        details: departmentDetails,
      })
    );
}
