/**
 * deputy-cli - Library Entry Point
 *
 * The CLI (`deputy`) is the primary interface. This module exports the
 * output/error contract and the API client for scripts that embed them.
 *
 * @example Running the program against a custom client
 * ```typescript
 * import { createProgram } from 'deputy-cli';
 *
 * const program = createProgram({
 *   clientFactory: () => myClient,
 *   io: { stdout: process.stdout, stderr: process.stderr },
 *   env: process.env,
 *   stdoutIsTTY: false,
 *   version: 'dev',
 * });
 * process.exitCode = await program.run(['employees', 'list', '--limit', '5']);
 * ```
 *
 * @packageDocumentation
 */

export { createProgram, type DeputyProgram } from './cli/program.js';
export type { CliDependencies, CliIO, CommandContext, GetContext } from './cli/types.js';

export * from './errors/index.js';
export * from './output/index.js';
export * from './api/index.js';
export * from './config/index.js';
