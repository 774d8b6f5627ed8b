/**
 * API credentials from the environment
 */

import { AuthenticationError } from '../errors/index.js';
import type { DeputyEnv } from './env.js';

export interface Credentials {
  token: string;
  /** Install (tenant) name, e.g. "acme" */
  install?: string;
  /** Region subdomain, e.g. "au" */
  geo?: string;
  /** Full base URL; wins over install/geo */
  baseUrlOverride?: string;
  /** Authorization scheme (default "Bearer") */
  authScheme?: string;
}

const API_VERSION_PATTERN = /\/api\/v\d+/;

/**
 * Build credentials from DEPUTY_TOKEN and friends.
 *
 * Returns undefined when no token is set.
 *
 * @throws AuthenticationError when a token is set without an install or base URL
 */
export function credentialsFromEnv(env: DeputyEnv): Credentials | undefined {
  if (!env.DEPUTY_TOKEN) return undefined;

  if (!env.DEPUTY_INSTALL && !env.DEPUTY_BASE_URL) {
    throw new AuthenticationError('DEPUTY_TOKEN is set, but neither DEPUTY_BASE_URL nor DEPUTY_INSTALL is set');
  }

  return {
    token: env.DEPUTY_TOKEN,
    install: env.DEPUTY_INSTALL,
    geo: env.DEPUTY_GEO,
    baseUrlOverride: env.DEPUTY_BASE_URL,
    authScheme: env.DEPUTY_AUTH_SCHEME,
  };
}

/**
 * Credentials or an AuthenticationError; for commands that call the API.
 */
export function requireCredentials(env: DeputyEnv): Credentials {
  const credentials = credentialsFromEnv(env);
  if (!credentials) {
    throw new AuthenticationError();
  }
  return credentials;
}

/**
 * Point a base URL at `/api/<version>`.
 *
 * Accepts a bare host, a URL without a path, or a URL with any `/api/vN`.
 */
export function normalizeBaseUrl(baseUrl: string, version = 'v1'): string {
  let url = baseUrl.trim().replace(/\/+$/, '');
  if (url === '') return '';

  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    url = `https://${url}`;
  }

  if (API_VERSION_PATTERN.test(url)) {
    return url.replace(API_VERSION_PATTERN, `/api/${version}`);
  }
  return `${url}/api/${version}`;
}

/**
 * The v1 API base URL for a set of credentials ('' when unknown).
 */
export function resolveBaseUrl(credentials: Credentials): string {
  if (credentials.baseUrlOverride) {
    return normalizeBaseUrl(credentials.baseUrlOverride);
  }
  if (!credentials.install) return '';
  const host = credentials.geo
    ? `${credentials.install}.${credentials.geo}.deputy.com`
    : `${credentials.install}.deputy.com`;
  return `https://${host}/api/v1`;
}

export function authorizationHeader(credentials: Credentials): string {
  const scheme = credentials.authScheme?.trim() || 'Bearer';
  return `${scheme} ${credentials.token}`;
}

/**
 * First and last four characters of a token, or `****` for short ones.
 */
export function maskToken(token: string): string {
  if (token.length <= 8) return '****';
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}
