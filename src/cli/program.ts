/**
 * Root command
 *
 * Builds the `deputy` program around injected dependencies so the same tree
 * runs from the entry point and from tests. Global options are resolved once,
 * in the root pre-action hook, into frozen settings that every command reads
 * through its CommandContext.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { DeputyApi } from '../api/index.js';
import { loadDotenv, readEnv, type DeputyEnv } from '../config/index.js';
import { ExitCode, handleError } from '../errors/index.js';
import {
  OutputRenderer,
  createGlobalSettings,
  jqEngine,
  toRenderOptions,
  type GlobalSettings,
  type SettingsInputs,
} from '../output/index.js';
import { createStreamLogger } from '../utils/logger.js';
import { isInformationalExit, translateCommanderError } from './commander-errors.js';
import type { CliDependencies, CommandContext, RootOptions } from './types.js';
import { createAuthCommand } from './commands/auth.js';
import { createDepartmentsCommand } from './commands/departments.js';
import { createEmployeesCommand } from './commands/employees.js';
import { createLeaveCommand } from './commands/leave.js';
import { createLocationsCommand } from './commands/locations.js';
import { createManagementCommand } from './commands/management.js';
import { createMeCommand } from './commands/me.js';
import { createPayCommand } from './commands/pay.js';
import { createResourceCommand } from './commands/resource.js';
import { createRostersCommand } from './commands/rosters.js';
import { createSalesCommand } from './commands/sales.js';
import { createTimesheetsCommand } from './commands/timesheets.js';
import { createVersionCommand } from './commands/version.js';
import { createWebhooksCommand } from './commands/webhooks.js';

export interface DeputyProgram {
  readonly command: Command;
  /** Parse and run `argv` (user arguments only); resolves to the exit code */
  run(argv: readonly string[]): Promise<ExitCode>;
}

/**
 * Apply settings commander does not pass from a parent to commands added
 * with `addCommand`.
 */
function configureTree(command: Command, deps: CliDependencies): void {
  command
    .exitOverride()
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: (text) => {
        deps.io.stdout.write(text);
      },
      writeErr: (text) => {
        deps.io.stderr.write(text);
      },
      // parse errors are reported by run() through the error handler
      outputError: () => undefined,
    });

  for (const child of command.commands) {
    configureTree(child, deps);
  }
}

export function createProgram(deps: CliDependencies): DeputyProgram {
  const renderer = new OutputRenderer(deps.io.stdout, deps.queryEngine ?? jqEngine);
  const program = new Command();

  let settings: GlobalSettings | undefined;
  let env: DeputyEnv | undefined;
  let client: DeputyApi | undefined;

  program
    .name('deputy')
    .description('CLI for Deputy workforce management API')
    .version(deps.version, '-v, --version', 'Display version number')
    .option('-o, --output <format>', 'Output format: text or json', 'text')
    .option('--debug', 'Log requests and show full error details', false)
    .option('-q, --query <expr>', 'jq filter applied to JSON output')
    .option('--raw', 'Output JSON Lines (one compact object per line)', false)
    .option('--no-color', 'Disable colored output')
    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('deputy me')}                                 Show the authenticated user
  ${chalk.cyan('deputy employees list --limit 20')}          First 20 employees
  ${chalk.cyan('deputy timesheets list -o json')}            Timesheets as a JSON envelope
  ${chalk.cyan("deputy rosters list -q '.items[].Id'")}      Filter JSON output with jq
  ${chalk.cyan('deputy leave list --raw')}                   One JSON object per line

${chalk.dim('Environment:')}
  DEPUTY_TOKEN, DEPUTY_INSTALL, DEPUTY_GEO, DEPUTY_BASE_URL, DEPUTY_OUTPUT
`
    );

  const rootOptions = (): SettingsInputs => {
    const opts = program.opts<RootOptions>();
    return {
      output: opts.output,
      outputExplicit: program.getOptionValueSource('output') === 'cli',
      envOutput: deps.env['DEPUTY_OUTPUT']?.trim(),
      stdoutIsTTY: deps.stdoutIsTTY,
      raw: opts.raw,
      query: opts.query,
      debug: opts.debug,
      noColor: !opts.color,
    };
  };

  const logger = () => {
    const opts = program.opts<RootOptions>();
    return createStreamLogger(deps.io.stderr, { debug: opts.debug, noColor: !opts.color });
  };

  program.hook('preAction', () => {
    loadDotenv(deps.env, logger(), deps.dotenvPaths);
    settings = createGlobalSettings(rootOptions());
    env = readEnv(deps.env);
  });

  const getContext = (): CommandContext => {
    if (!settings || !env) {
      throw new Error('command context requested before global options were resolved');
    }
    const resolvedSettings = settings;
    const resolvedEnv = env;
    const log = logger();

    return {
      settings: resolvedSettings,
      env: resolvedEnv,
      renderer,
      client: () => {
        client ??= deps.clientFactory({ env: resolvedEnv, debug: resolvedSettings.debug, logger: log });
        return client;
      },
      renderOptions: (flags) => toRenderOptions(resolvedSettings, flags),
      debug: log.debug,
      warn: log.warn,
    };
  };

  program.addCommand(createMeCommand(getContext));
  program.addCommand(createAuthCommand(getContext));
  program.addCommand(createEmployeesCommand(getContext));
  program.addCommand(createTimesheetsCommand(getContext));
  program.addCommand(createRostersCommand(getContext));
  program.addCommand(createLeaveCommand(getContext));
  program.addCommand(createLocationsCommand(getContext));
  program.addCommand(createDepartmentsCommand(getContext));
  program.addCommand(createWebhooksCommand(getContext));
  program.addCommand(createPayCommand(getContext));
  program.addCommand(createSalesCommand(getContext));
  program.addCommand(createManagementCommand(getContext));
  program.addCommand(createResourceCommand(getContext));
  program.addCommand(createVersionCommand(getContext, deps.version));

  configureTree(program, deps);

  /**
   * Settings for reporting an error. Parse errors happen before the hook
   * runs, so the output mode is resolved here on a best-effort basis; an
   * invalid `--output` falls back to text.
   */
  const errorSettings = (): GlobalSettings => {
    if (settings) return settings;
    const inputs = rootOptions();
    try {
      return createGlobalSettings(inputs);
    } catch {
      const fallback: GlobalSettings = { mode: 'text', raw: false, debug: inputs.debug, noColor: inputs.noColor };
      return Object.freeze(fallback);
    }
  };

  return {
    command: program,
    async run(argv) {
      try {
        await program.parseAsync([...argv], { from: 'user' });
        return ExitCode.OK;
      } catch (error) {
        if (isInformationalExit(error)) {
          return ExitCode.OK;
        }
        const current = errorSettings();
        return handleError(
          translateCommanderError(error),
          { json: current.mode === 'json', debug: current.debug, noColor: current.noColor },
          deps.io.stderr
        );
      }
    },
  };
}
