/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.config/deputy/
 * └── .env      (credentials, loaded after ./.env)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const CONFIG_DIR_NAME = join('.config', 'deputy');

/**
 * Get the deputy config directory (~/.config/deputy)
 */
export function getConfigDir(home: string = homedir()): string {
  return join(home, CONFIG_DIR_NAME);
}

/**
 * The .env files tried when DEPUTY_ENV_FILE is not set, in load order.
 */
export function defaultDotenvPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
  return [join(cwd, '.env'), join(getConfigDir(home), '.env')];
}
