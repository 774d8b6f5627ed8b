/**
 * Locations Command - workplaces (companies, in API terms)
 */

import { Command } from 'commander';
import type { Location } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createGetSubcommand, createListSubcommand, yesNo } from './shared.js';

export const LOCATION_TABLE: TableSpec<Location> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'NAME', key: 'name' },
    { header: 'CODE', key: 'code' },
    { header: 'ACTIVE', key: 'active' },
  ],
  row: (location) => ({
    id: location.Id,
    name: location.CompanyName,
    code: location.Code ?? location.CompanyCode,
    active: yesNo(location.Active),
  }),
};

function locationDetails(location: Location): KeyValue[] {
  return [
    ['ID', location.Id],
    ['Name', location.CompanyName],
    ['Code', location.Code ?? location.CompanyCode],
    ['Address', location.Address],
    ['Timezone', location.Timezone],
    ['Active', yesNo(location.Active)],
  ];
}

export function createLocationsCommand(getContext: GetContext): Command {
  return new Command('locations')
    .aliases(['location', 'loc'])
    .description('List and inspect locations')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List locations',
        noun: 'locations',
        fetch: (api, flags) => api.listLocations({ limit: flags.limit, offset: flags.offset }),
        table: LOCATION_TABLE,
      })
    )
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one location',
        idLabel: 'location ID',
        fetch: (api, id) => api.getLocation(id),
        details: locationDetails,
      })
    );
}
