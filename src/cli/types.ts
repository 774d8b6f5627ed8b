import type { ClientFactory, DeputyApi } from '../api/index.js';
import type { DeputyEnv, EnvSource } from '../config/index.js';
import type {
  GlobalSettings,
  ListFlags,
  OutputRenderer,
  OutputStream,
  QueryEngine,
  RenderOptions,
} from '../output/index.js';

/**
 * Raw global options as commander parses them
 */
export interface RootOptions {
  output: string;
  debug: boolean;
  query?: string;
  raw: boolean;
  /** false when --no-color is given */
  color: boolean;
}

/**
 * The streams a program writes to
 */
export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
}

/**
 * Everything the program takes from its host process. The entry point passes
 * the real process; tests pass buffers and a stub client.
 */
export interface CliDependencies {
  /** Builds the API client; only called by commands that hit the API */
  clientFactory: ClientFactory;
  io: CliIO;
  /** Environment; .env values are merged into it */
  env: EnvSource;
  stdoutIsTTY: boolean;
  version: string;
  queryEngine?: QueryEngine;
  /** .env files to try when DEPUTY_ENV_FILE is unset (defaults: ./.env, ~/.config/deputy/.env) */
  dotenvPaths?: string[];
}

/**
 * Context passed to all command handlers
 * Combines the resolved settings with runtime utilities; satisfies Logger.
 */
export interface CommandContext {
  readonly settings: GlobalSettings;
  readonly env: DeputyEnv;
  readonly renderer: OutputRenderer;
  /** The API client, built on first use */
  client(): DeputyApi;
  /** Render options for this command's flags */
  renderOptions(flags?: Partial<ListFlags>): RenderOptions;
  /** Log a debug message to stderr (only shown with --debug) */
  debug: (message: string) => void;
  /** Log a warning to stderr */
  warn: (message: string) => void;
}

export type GetContext = () => CommandContext;
