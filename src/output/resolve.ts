/**
 * Output mode resolution
 *
 * Precedence: an explicit `--output` flag, then `DEPUTY_OUTPUT`, then TTY
 * detection (non-TTY stdout means JSON). `--raw` upgrades text to JSON last.
 */

import { InvalidInputError } from '../errors/index.js';
import type { GlobalSettings, ListFlags, OutputMode, RenderOptions } from './types.js';

export interface FormatInputs {
  /** Value of `--output` (its default when not given) */
  output: string;
  /** True only when the user typed `--output` */
  outputExplicit: boolean;
  /** Value of DEPUTY_OUTPUT, if any */
  envOutput?: string;
  stdoutIsTTY: boolean;
  raw: boolean;
}

export interface ResolvedFormat {
  mode: OutputMode;
  raw: boolean;
}

function parseMode(value: string): OutputMode | undefined {
  const lower = value.toLowerCase();
  return lower === 'text' || lower === 'json' ? lower : undefined;
}

/**
 * Resolve the effective output mode for this invocation.
 *
 * @throws InvalidInputError for an unknown `--output` or DEPUTY_OUTPUT value
 */
export function resolveOutputFormat(inputs: FormatInputs): ResolvedFormat {
  let mode: OutputMode;

  if (inputs.outputExplicit) {
    const parsed = parseMode(inputs.output);
    if (!parsed) {
      throw new InvalidInputError(`invalid --output "${inputs.output}" (expected text or json)`);
    }
    mode = parsed;
  } else if (inputs.envOutput) {
    const parsed = parseMode(inputs.envOutput);
    if (!parsed) {
      throw new InvalidInputError(
        `invalid DEPUTY_OUTPUT "${inputs.envOutput}" (expected text or json)`,
        'Set DEPUTY_OUTPUT to text or json, or unset it'
      );
    }
    mode = parsed;
  } else {
    mode = inputs.stdoutIsTTY ? 'text' : 'json';
  }

  if (inputs.raw && mode === 'text') {
    mode = 'json';
  }

  return { mode, raw: inputs.raw };
}

export interface SettingsInputs extends FormatInputs {
  query?: string;
  debug: boolean;
  noColor: boolean;
}

/**
 * Resolve and freeze the global settings.
 */
export function createGlobalSettings(inputs: SettingsInputs): GlobalSettings {
  const { mode, raw } = resolveOutputFormat(inputs);
  const query = inputs.query?.trim();
  return Object.freeze({
    mode,
    raw,
    query: query ? query : undefined,
    debug: inputs.debug,
    noColor: inputs.noColor,
  });
}

/**
 * Combine the global settings with a command's own list flags.
 */
export function toRenderOptions(settings: GlobalSettings, flags?: Partial<ListFlags>): RenderOptions {
  const limit = flags?.limit ?? 0;
  const offset = flags?.offset ?? 0;
  return Object.freeze({
    mode: settings.mode,
    raw: settings.raw,
    query: settings.query,
    limit: limit > 0 ? limit : undefined,
    offset: offset > 0 ? offset : undefined,
    failOnEmpty: flags?.failEmpty ?? false,
    noColor: settings.noColor,
  });
}
