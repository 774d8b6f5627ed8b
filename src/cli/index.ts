/**
 * deputy CLI Entry Point
 *
 * Wires the program to the real process: stdio, environment, TTY probe and
 * the HTTP client. Everything else lives in program.ts.
 */

import { createDefaultClient } from '../api/index.js';
import { createGlobalErrorHandler } from '../errors/index.js';
import { createProgram } from './program.js';

// Version injected at build time via tsup env
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  // Errors that escape the program are reported in text form
  const globalHandler = createGlobalErrorHandler(
    { debug: argv.includes('--debug'), noColor: argv.includes('--no-color') },
    process.stderr
  );
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  const program = createProgram({
    clientFactory: createDefaultClient,
    io: { stdout: process.stdout, stderr: process.stderr },
    env: process.env,
    stdoutIsTTY: process.stdout.isTTY === true,
    version: VERSION,
  });

  process.exitCode = await program.run(argv);
}

main().catch(createGlobalErrorHandler({}, process.stderr));
