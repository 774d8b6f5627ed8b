import { describe, it, expect } from 'vitest';
import { AuthenticationError } from '../../errors/index.js';
import {
  authorizationHeader,
  credentialsFromEnv,
  maskToken,
  normalizeBaseUrl,
  requireCredentials,
  resolveBaseUrl,
} from '../credentials.js';
import { readEnv } from '../env.js';

describe('credentialsFromEnv', () => {
  it('returns undefined without a token', () => {
    expect(credentialsFromEnv(readEnv({ DEPUTY_INSTALL: 'acme' }))).toBeUndefined();
  });

  it('builds credentials from install and region', () => {
    expect(credentialsFromEnv(readEnv({ DEPUTY_TOKEN: 'test-secret', DEPUTY_INSTALL: 'acme', DEPUTY_GEO: 'au' }))).toEqual({
      token: 'test-secret',
      install: 'acme',
      geo: 'au',
      baseUrlOverride: undefined,
      authScheme: undefined,
    });
  });

  it('rejects a token with nowhere to send it', () => {
    const read = () => credentialsFromEnv(readEnv({ DEPUTY_TOKEN: 'test-secret' }));

    expect(read).toThrow(AuthenticationError);
    expect(read).toThrow('DEPUTY_TOKEN is set, but neither DEPUTY_BASE_URL nor DEPUTY_INSTALL is set');
  });

  it('requireCredentials throws the not-authenticated error', () => {
    expect(() => requireCredentials(readEnv({}))).toThrow(
      'not authenticated - set DEPUTY_TOKEN and DEPUTY_INSTALL (or DEPUTY_BASE_URL)'
    );
  });
});

describe('normalizeBaseUrl', () => {
  it.each([
    ['acme.au.deputy.com', 'https://acme.au.deputy.com/api/v1'],
    ['https://acme.au.deputy.com/', 'https://acme.au.deputy.com/api/v1'],
    ['https://acme.au.deputy.com/api/v2', 'https://acme.au.deputy.com/api/v1'],
    ['http://localhost:8080/api/v1/', 'http://localhost:8080/api/v1'],
  ])('%s -> %s', (input, expected) => {
    expect(normalizeBaseUrl(input)).toBe(expected);
  });

  it('returns empty string for a blank URL', () => {
    expect(normalizeBaseUrl('  ')).toBe('');
  });
});

describe('resolveBaseUrl', () => {
  it('builds the host from install and region', () => {
    expect(resolveBaseUrl({ token: 't', install: 'acme', geo: 'au' })).toBe('https://acme.au.deputy.com/api/v1');
    expect(resolveBaseUrl({ token: 't', install: 'acme' })).toBe('https://acme.deputy.com/api/v1');
  });

  it('prefers an explicit base URL', () => {
    expect(resolveBaseUrl({ token: 't', install: 'acme', baseUrlOverride: 'https://proxy.test' })).toBe(
      'https://proxy.test/api/v1'
    );
  });
});

describe('authorizationHeader', () => {
  it('defaults to a bearer token', () => {
    expect(authorizationHeader({ token: 'test-secret' })).toBe('Bearer test-secret');
    expect(authorizationHeader({ token: 'test-secret', authScheme: 'OAuth' })).toBe('OAuth test-secret');
  });
});

describe('maskToken', () => {
  it('shows the first and last four characters', () => {
    expect(maskToken('test-secret-value')).toBe('test...alue');
  });

  it('hides short tokens entirely', () => {
    expect(maskToken('short')).toBe('****');
    expect(maskToken('12345678')).toBe('****');
  });
});
