/**
 * Version Command
 */

import { Command } from 'commander';
import type { GetContext } from '../types.js';

export function createVersionCommand(getContext: GetContext, version: string): Command {
  return new Command('version').description('Print version information').action(async () => {
    const ctx = getContext();
    await ctx.renderer.renderSingle(ctx.renderOptions(), { Version: version }, (value) => `deputy version ${value.Version}`);
  });
}
