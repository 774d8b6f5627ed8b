/**
 * Run the program in process, the way the entry point does, against a stub
 * API and in-memory streams.
 */

import type { ClientContext, DeputyApi } from '../api/index.js';
import { createProgram } from '../cli/program.js';
import type { EnvSource } from '../config/index.js';
import type { ExitCode } from '../errors/index.js';
import type { QueryEngine } from '../output/index.js';
import { MemoryStream } from './streams.js';
import { createStubApi } from './stub-api.js';

/** Credentials every test run starts with unless `env` replaces them */
export const TEST_ENV: Readonly<EnvSource> = {
  DEPUTY_TOKEN: 'test-secret',
  DEPUTY_INSTALL: 'acme',
  DEPUTY_GEO: 'au',
};

export interface RunCliOptions {
  api?: DeputyApi;
  env?: EnvSource;
  /** Whether stdout is a terminal (default false, so JSON is the default mode) */
  tty?: boolean;
  queryEngine?: QueryEngine;
  /** .env files to consult (default none) */
  dotenvPaths?: string[];
}

export interface CliRun {
  code: ExitCode;
  stdout: string;
  stderr: string;
  /** Contexts the client factory was called with */
  clientContexts: ClientContext[];
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<CliRun> {
  const stdout = new MemoryStream();
  const stderr = new MemoryStream();
  const api = options.api ?? createStubApi();
  const clientContexts: ClientContext[] = [];

  const program = createProgram({
    clientFactory: (context) => {
      clientContexts.push(context);
      return api;
    },
    io: { stdout, stderr },
    env: { ...(options.env ?? TEST_ENV) },
    stdoutIsTTY: options.tty ?? false,
    version: '1.2.3',
    queryEngine: options.queryEngine,
    dotenvPaths: options.dotenvPaths ?? [],
  });

  const code = await program.run(argv);
  return { code, stdout: stdout.text, stderr: stderr.text, clientContexts };
}
