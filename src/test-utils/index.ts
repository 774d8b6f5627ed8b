/**
 * Test Utilities Module
 *
 * Shared helpers for tests across the codebase.
 *
 * @example
 * ```typescript
 * import { createStubApi, runCli } from '../../test-utils/index.js';
 *
 * const api = createStubApi({ listEmployees: async () => [] });
 * const { code, stdout } = await runCli(['employees', 'list'], { api });
 * ```
 */

export { MemoryStream } from './streams.js';
export { createStubApi } from './stub-api.js';
export { runCli, TEST_ENV, type CliRun, type RunCliOptions } from './cli.js';
