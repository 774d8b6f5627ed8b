/**
 * jq query engine
 *
 * Applies a `--query` filter to a JSON document. Evaluation is delegated to
 * jq-wasm; this module only maps its failures onto CLI errors.
 */

import * as jq from 'jq-wasm';
import { InvalidInputError } from '../errors/index.js';

/**
 * Evaluates a jq filter against a document, returning every result.
 */
export interface QueryEngine {
  evaluate(document: unknown, expression: string): Promise<unknown[]>;
}

/** jq exits with 3 when the filter does not compile */
const JQ_COMPILE_EXIT_CODE = 3;

function isCompileFailure(exitCode: number, stderr: string): boolean {
  return (
    exitCode === JQ_COMPILE_EXIT_CODE ||
    stderr.includes('compile error') ||
    stderr.includes('syntax error')
  );
}

function parseResults(stdout: string): unknown[] {
  const results: unknown[] = [];
  for (const line of stdout.split('\n')) {
    if (line.trim() === '') continue;
    const value: unknown = JSON.parse(line);
    results.push(value);
  }
  return results;
}

export const jqEngine: QueryEngine = {
  async evaluate(document: unknown, expression: string): Promise<unknown[]> {
    const { stdout, stderr, exitCode } = await jq.raw(JSON.stringify(document ?? null), expression, ['-c']);
    const detail = stderr.trim().replace(/^jq: (error: )?/, '');

    if (exitCode !== 0) {
      if (isCompileFailure(exitCode, stderr)) {
        throw new InvalidInputError(`invalid jq query: ${detail}`);
      }
      throw new InvalidInputError(`jq query failed: ${detail}`);
    }

    return parseResults(stdout);
  },
};
