/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts. Environments are plain objects; .env files
 * are written to a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../errors/index.js';
import { DEFAULT_TIMEOUT_MS, loadDotenv, readEnv, type EnvSource } from '../env.js';
import { defaultDotenvPaths, getConfigDir } from '../paths.js';

describe('readEnv()', () => {
  it('reads the DEPUTY_* variables', () => {
    const env = readEnv({
      DEPUTY_TOKEN: 'test-secret',
      DEPUTY_INSTALL: 'acme',
      DEPUTY_GEO: 'au',
      DEPUTY_OUTPUT: 'json',
      UNRELATED: 'ignored',
    });

    expect(env).toEqual({
      DEPUTY_TOKEN: 'test-secret',
      DEPUTY_INSTALL: 'acme',
      DEPUTY_GEO: 'au',
      DEPUTY_OUTPUT: 'json',
      DEPUTY_TIMEOUT_MS: DEFAULT_TIMEOUT_MS,
    });
  });

  it('trims values and treats blank ones as unset', () => {
    const env = readEnv({ DEPUTY_TOKEN: '  test-secret  ', DEPUTY_BASE_URL: '   ' });

    expect(env.DEPUTY_TOKEN).toBe('test-secret');
    expect(env.DEPUTY_BASE_URL).toBeUndefined();
  });

  it('lowercases install and region', () => {
    const env = readEnv({ DEPUTY_INSTALL: 'ACME', DEPUTY_GEO: 'Na' });

    expect(env.DEPUTY_INSTALL).toBe('acme');
    expect(env.DEPUTY_GEO).toBe('na');
  });

  describe('DEPUTY_TIMEOUT_MS', () => {
    it('defaults when unset or blank', () => {
      expect(readEnv({}).DEPUTY_TIMEOUT_MS).toBe(30_000);
      expect(readEnv({ DEPUTY_TIMEOUT_MS: ' ' }).DEPUTY_TIMEOUT_MS).toBe(30_000);
    });

    it('parses a number of milliseconds', () => {
      expect(readEnv({ DEPUTY_TIMEOUT_MS: '5000' }).DEPUTY_TIMEOUT_MS).toBe(5000);
    });

    it.each([
      ['abc', 'must be a number of milliseconds'],
      ['1.5', 'must be a whole number of milliseconds'],
      ['0', 'must be greater than 0'],
    ])('rejects %j', (value, message) => {
      const read = () => readEnv({ DEPUTY_TIMEOUT_MS: value });

      expect(read).toThrow(ConfigError);
      expect(read).toThrow(`invalid environment: DEPUTY_TIMEOUT_MS: ${message}`);
    });
  });
});

describe('loadDotenv()', () => {
  let dir: string;
  const logger = { warn: vi.fn<(message: string) => void>(), debug: vi.fn<(message: string) => void>() };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'deputy-env-'));
    logger.warn.mockClear();
    logger.debug.mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeEnvFile(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  it('merges a .env file without overriding set variables', () => {
    const path = writeEnvFile('.env', 'DEPUTY_TOKEN=file-token\nDEPUTY_INSTALL=fromfile\n');
    const env: EnvSource = { DEPUTY_INSTALL: 'acme' };

    const loaded = loadDotenv(env, logger, [path]);

    expect(loaded).toEqual([path]);
    expect(env).toEqual({ DEPUTY_TOKEN: 'file-token', DEPUTY_INSTALL: 'acme' });
    expect(logger.debug).toHaveBeenCalledWith(`loaded environment from ${path}`);
  });

  it('lets earlier files win', () => {
    const first = writeEnvFile('first.env', 'DEPUTY_GEO=au\n');
    const second = writeEnvFile('second.env', 'DEPUTY_GEO=uk\nDEPUTY_OUTPUT=json\n');
    const env: EnvSource = {};

    loadDotenv(env, logger, [first, second]);

    expect(env).toEqual({ DEPUTY_GEO: 'au', DEPUTY_OUTPUT: 'json' });
  });

  it('skips missing default files silently', () => {
    const env: EnvSource = {};

    expect(loadDotenv(env, logger, [join(dir, 'missing.env')])).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('loads only DEPUTY_ENV_FILE when it is set', () => {
    const explicit = writeEnvFile('custom.env', 'DEPUTY_TOKEN=custom-token\n');
    const ignored = writeEnvFile('.env', 'DEPUTY_INSTALL=ignored\n');
    const env: EnvSource = { DEPUTY_ENV_FILE: explicit };

    expect(loadDotenv(env, logger, [ignored])).toEqual([explicit]);
    expect(env['DEPUTY_TOKEN']).toBe('custom-token');
    expect(env['DEPUTY_INSTALL']).toBeUndefined();
  });

  it('warns when DEPUTY_ENV_FILE does not exist', () => {
    const missing = join(dir, 'nope.env');

    expect(loadDotenv({ DEPUTY_ENV_FILE: missing }, logger, [])).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(`DEPUTY_ENV_FILE not found: ${missing}`);
  });
});

describe('paths', () => {
  it('looks in the working directory, then the config directory', () => {
    expect(getConfigDir('/home/ana')).toBe(join('/home/ana', '.config', 'deputy'));
    expect(defaultDotenvPaths('/work', '/home/ana')).toEqual([
      join('/work', '.env'),
      join('/home/ana', '.config', 'deputy', '.env'),
    ]);
  });
});
