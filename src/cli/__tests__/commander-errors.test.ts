import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { CLIError, InvalidFlagError, InvalidInputError, getExitCode } from '../../errors/index.js';
import { isInformationalExit, translateCommanderError } from '../commander-errors.js';

function commanderError(code: string, message: string): CommanderError {
  return new CommanderError(1, code, message);
}

describe('isInformationalExit', () => {
  it('is true for help and version', () => {
    expect(isInformationalExit(commanderError('commander.helpDisplayed', '(outputHelp)'))).toBe(true);
    expect(isInformationalExit(commanderError('commander.help', '(outputHelp)'))).toBe(true);
    expect(isInformationalExit(commanderError('commander.version', '1.2.3'))).toBe(true);
  });

  it('is false for parse errors and other errors', () => {
    expect(isInformationalExit(commanderError('commander.unknownOption', "error: unknown option '--x'"))).toBe(false);
    expect(isInformationalExit(new Error('commander.help'))).toBe(false);
  });
});

describe('translateCommanderError', () => {
  it('turns an unknown option into an unknown flag', () => {
    const error = translateCommanderError(
      commanderError('commander.unknownOption', "error: unknown option '--bogus'\n(Did you mean --debug?)")
    );

    expect(error).toBeInstanceOf(InvalidFlagError);
    expect(error).toHaveProperty('message', 'unknown flag: --bogus');
  });

  it.each([
    [
      'commander.optionMissingArgument',
      "error: option '-o, --output <format>' argument missing",
      'required flag value missing: -o, --output <format>',
    ],
    [
      'commander.missingMandatoryOptionValue',
      "error: required option '--employee <id>' not specified",
      'required flag not specified: --employee <id>',
    ],
    ['commander.missingArgument', "error: missing required argument 'id'", 'missing required argument: <id>'],
    [
      'commander.excessArguments',
      "error: too many arguments for 'list'. Expected 0 arguments but got 1.",
      "too many arguments for 'list'. Expected 0 arguments but got 1.",
    ],
    ['commander.unknownCommand', "error: unknown command 'bogus'", 'unknown command: bogus'],
  ])('%s becomes an input error', (code, message, expected) => {
    const error = translateCommanderError(commanderError(code, message));

    expect(error).toHaveProperty('message', expected);
    expect(getExitCode(error)).toBe(2);
  });

  it('points unknown commands at the command list', () => {
    const error = translateCommanderError(commanderError('commander.unknownCommand', "error: unknown command 'bogus'"));

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toHaveProperty('hint', 'Run: deputy --help  to see available commands');
  });

  it('wraps other commander errors', () => {
    const original = commanderError('commander.executeSubCommandAsync', 'error: failed');
    const error = translateCommanderError(original);

    expect(error).toBeInstanceOf(CLIError);
    expect(error).toHaveProperty('message', 'failed');
    expect(error).toHaveProperty('cause', original);
    expect(getExitCode(error)).toBe(1);
  });

  it('returns other errors unchanged', () => {
    const error = new Error('boom');

    expect(translateCommanderError(error)).toBe(error);
  });
});
