/**
 * Resource Command - the generic resource API
 *
 * Usage:
 *   deputy resource list                    Known resource names
 *   deputy resource info <Resource>         Field and association schema
 *   deputy resource get <Resource> <id>     One record of any resource
 */

import { Command } from 'commander';
import { KNOWN_RESOURCES, type ResourceInfo, type ResourceRecord } from '../../api/index.js';
import { applyPagination, type TableSpec } from '../../output/index.js';
import { parseId, parseListFlags, parseResourceName } from '../validation.js';
import type { GetContext } from '../types.js';
import { addListFlags } from './shared.js';

const RESOURCE_TABLE: TableSpec<string> = {
  columns: [{ header: 'RESOURCE', key: 'resource' }],
  row: (resource) => ({ resource }),
};

/**
 * A field value as plain text; objects and arrays as compact JSON.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function sortedEntries(record: Record<string, unknown>): [string, unknown][] {
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * `Resource: X`, its fields sorted by name, then any associations.
 */
export function formatResourceInfo(info: ResourceInfo): string {
  const lines = [`Resource: ${info.name}`, '', 'Fields:'];
  for (const [name, type] of sortedEntries(info.fields)) {
    lines.push(`  ${name}: ${formatValue(type)}`);
  }

  const assocs = info.assocs;
  if (Array.isArray(assocs)) {
    if (assocs.length > 0) {
      lines.push('', 'Associations:');
      for (const name of assocs) lines.push(`  ${formatValue(name)}`);
    }
  } else if (assocs && Object.keys(assocs).length > 0) {
    lines.push('', 'Associations:');
    for (const [name, target] of sortedEntries(assocs)) {
      lines.push(`  ${name}: ${formatValue(target)}`);
    }
  }

  return lines.join('\n');
}

/**
 * `key: value` lines, keys sorted.
 */
export function formatResourceRecord(record: ResourceRecord): string {
  return sortedEntries(record)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join('\n');
}

function createListSubcommand(getContext: GetContext): Command {
  return addListFlags(new Command('list').alias('ls').description('List known resource names')).action(
    async (options: unknown) => {
      const ctx = getContext();
      const flags = parseListFlags(options);
      const names = applyPagination(KNOWN_RESOURCES, flags.offset, flags.limit);
      await ctx.renderer.renderList(ctx.renderOptions(flags), names, RESOURCE_TABLE);
    }
  );
}

function createInfoSubcommand(getContext: GetContext): Command {
  return new Command('info')
    .description('Show the fields and associations of a resource')
    .argument('<Resource>', 'Resource name, e.g. Employee')
    .action(async (rawName: string) => {
      const ctx = getContext();
      const name = parseResourceName(rawName);
      const info = await ctx.client().resourceInfo(name);
      await ctx.renderer.renderSingle(ctx.renderOptions(), info, formatResourceInfo);
    });
}

function createGetSubcommand(getContext: GetContext): Command {
  return new Command('get')
    .description('Get one record of a resource by ID')
    .argument('<Resource>', 'Resource name, e.g. Employee')
    .argument('<id>', 'Record ID')
    .action(async (rawName: string, rawId: string) => {
      const ctx = getContext();
      const name = parseResourceName(rawName);
      const id = parseId(rawId);
      const record = await ctx.client().getResource(name, id);
      await ctx.renderer.renderSingle(ctx.renderOptions(), record, formatResourceRecord);
    });
}

export function createResourceCommand(getContext: GetContext): Command {
  return new Command('resource')
    .alias('res')
    .description('Work with any API resource by name')
    .addCommand(createListSubcommand(getContext))
    .addCommand(createInfoSubcommand(getContext))
    .addCommand(createGetSubcommand(getContext));
}
