/**
 * Config Module
 *
 * Environment variables, .env loading and API credentials.
 */

export {
  EnvSchema,
  DEFAULT_TIMEOUT_MS,
  readEnv,
  loadDotenv,
  type DeputyEnv,
  type EnvSource,
} from './env.js';

export {
  credentialsFromEnv,
  requireCredentials,
  normalizeBaseUrl,
  resolveBaseUrl,
  authorizationHeader,
  maskToken,
  type Credentials,
} from './credentials.js';

export { getConfigDir, defaultDotenvPaths, CONFIG_DIR_NAME } from './paths.js';
