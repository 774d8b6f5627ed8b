/**
 * Commander parse failures as CLI errors
 *
 * With `exitOverride`, commander throws a CommanderError instead of exiting.
 * These are rewritten into typed errors whose messages carry the phrases the
 * classifier and formatter key on (`unknown flag`, `missing required
 * argument`, `too many arguments`, `required flag`).
 */

import { CommanderError } from 'commander';
import { ErrorCode } from '../api/errors.js';
import { CLIError, InvalidFlagError, InvalidInputError } from '../errors/index.js';

/** Commander codes that mean help or the version was printed */
const INFORMATIONAL_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

const USAGE_HINT = 'Run --help for usage';

/**
 * True when commander stopped only to print help or the version.
 */
export function isInformationalExit(error: unknown): error is CommanderError {
  return error instanceof CommanderError && INFORMATIONAL_CODES.has(error.code);
}

function firstQuoted(text: string): string {
  const match = /'([^']*)'/.exec(text);
  return match?.[1] ?? text;
}

/**
 * Translate a CommanderError; any other value is returned unchanged.
 */
export function translateCommanderError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) return error;

  // "error: unknown option '--x'\n(Did you mean --y?)" -> first line, no prefix
  const detail = (error.message.split('\n')[0] ?? '').replace(/^error: /, '');

  switch (error.code) {
    case 'commander.unknownOption':
      return new InvalidFlagError(`unknown flag: ${firstQuoted(detail)}`);
    case 'commander.optionMissingArgument':
      return new InvalidFlagError(`required flag value missing: ${firstQuoted(detail)}`);
    case 'commander.missingMandatoryOptionValue':
      return new InvalidFlagError(`required flag not specified: ${firstQuoted(detail)}`);
    case 'commander.conflictingOption':
      return new InvalidFlagError(detail);
    case 'commander.missingArgument':
      return new InvalidInputError(`missing required argument: <${firstQuoted(detail)}>`, USAGE_HINT);
    case 'commander.excessArguments':
      return new InvalidInputError(detail, USAGE_HINT);
    case 'commander.unknownCommand':
      return new InvalidInputError(
        `unknown command: ${firstQuoted(detail)}`,
        'Run: deputy --help  to see available commands'
      );
    case 'commander.invalidArgument':
      return new InvalidInputError(detail, USAGE_HINT);
    default:
      return new CLIError(detail, undefined, ErrorCode.UNKNOWN, { cause: error });
  }
}
