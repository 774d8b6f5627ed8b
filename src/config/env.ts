/**
 * Environment Variable Handler
 *
 * Reads the DEPUTY_* variables, after merging any .env files into the
 * environment. Real environment variables always win over .env values.
 *
 * SECURITY NOTES:
 * - The token is NEVER logged, even with --debug
 * - Only the presence of a token is reported; `auth status` masks it
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { defaultDotenvPaths } from './paths.js';

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Trimmed string; blank counts as unset */
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const lowercaseString = optionalString.transform((value) => value?.toLowerCase());

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Environment variables read by the CLI. Every key is optional; commands
 * that need credentials check for them when they build a client.
 */
export const EnvSchema = z.object({
  DEPUTY_OUTPUT: optionalString,
  DEPUTY_TOKEN: optionalString,
  DEPUTY_INSTALL: lowercaseString,
  DEPUTY_GEO: lowercaseString,
  DEPUTY_BASE_URL: optionalString,
  DEPUTY_AUTH_SCHEME: optionalString,
  DEPUTY_ENV_FILE: optionalString,
  DEPUTY_TIMEOUT_MS: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce
      .number({ invalid_type_error: 'must be a number of milliseconds' })
      .int('must be a whole number of milliseconds')
      .positive('must be greater than 0')
      .default(DEFAULT_TIMEOUT_MS)
  ),
});

export type DeputyEnv = z.infer<typeof EnvSchema>;

/** A mutable environment: process.env, or a plain object in tests */
export type EnvSource = Record<string, string | undefined>;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse the DEPUTY_* variables from an environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function readEnv(source: EnvSource): DeputyEnv {
  const result = EnvSchema.safeParse({
    DEPUTY_OUTPUT: source['DEPUTY_OUTPUT'],
    DEPUTY_TOKEN: source['DEPUTY_TOKEN'],
    DEPUTY_INSTALL: source['DEPUTY_INSTALL'],
    DEPUTY_GEO: source['DEPUTY_GEO'],
    DEPUTY_BASE_URL: source['DEPUTY_BASE_URL'],
    DEPUTY_AUTH_SCHEME: source['DEPUTY_AUTH_SCHEME'],
    DEPUTY_ENV_FILE: source['DEPUTY_ENV_FILE'],
    DEPUTY_TIMEOUT_MS: source['DEPUTY_TIMEOUT_MS'],
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(
      `invalid environment: ${issues.join('; ')}`,
      'Fix the variables above (check your shell and .env files)'
    );
  }

  return result.data;
}

/**
 * Merge .env files into `env` without overriding variables already set.
 *
 * DEPUTY_ENV_FILE names the only file to load; otherwise ./.env and then
 * ~/.config/deputy/.env are tried. Returns the files that were loaded.
 */
export function loadDotenv(
  env: EnvSource,
  logger: Logger,
  paths: string[] = defaultDotenvPaths()
): string[] {
  const explicit = env['DEPUTY_ENV_FILE']?.trim();
  const candidates = explicit ? [explicit] : paths;
  const loaded: string[] = [];

  for (const path of candidates) {
    if (!existsSync(path)) {
      if (explicit) {
        logger.warn(`DEPUTY_ENV_FILE not found: ${path}`);
      }
      continue;
    }

    const parsed = parseDotenv(readFileSync(path));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    loaded.push(path);
    logger.debug?.(`loaded environment from ${path}`);
  }

  return loaded;
}
