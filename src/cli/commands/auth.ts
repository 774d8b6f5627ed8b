/**
 * Auth Command - inspect and verify credentials
 *
 * Credentials come from the environment (or a .env file); these commands only
 * report on them and check them against the API.
 *
 * Usage:
 *   deputy auth status
 *   deputy auth test
 */

import { Command } from 'commander';
import { credentialsFromEnv, maskToken, requireCredentials, resolveBaseUrl } from '../../config/index.js';
import { messageOf } from '../../errors/index.js';
import { formatKeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';

export const NOT_AUTHENTICATED_MESSAGE = 'Not authenticated. Set DEPUTY_TOKEN (env/.env) to configure.';

export interface AuthStatus {
  Authenticated: boolean;
  Install?: string;
  Region?: string;
  BaseURL?: string;
  TokenMasked?: string;
}

function createStatusCommand(getContext: GetContext): Command {
  return new Command('status').description('Show the configured credentials').action(async () => {
    const ctx = getContext();
    const options = ctx.renderOptions();
    const credentials = credentialsFromEnv(ctx.env);

    if (!credentials) {
      const status: AuthStatus = { Authenticated: false };
      await ctx.renderer.renderSingle(options, status, () => NOT_AUTHENTICATED_MESSAGE);
      return;
    }

    const status: AuthStatus = {
      Authenticated: true,
      Install: credentials.install ?? '',
      Region: (credentials.geo ?? '').toUpperCase(),
      BaseURL: resolveBaseUrl(credentials),
      TokenMasked: maskToken(credentials.token),
    };

    await ctx.renderer.renderSingle(options, status, (value) =>
      formatKeyValue(
        [
          ['Install', value.Install],
          ['Region', value.Region],
          ['Base URL', value.BaseURL],
          ['Token', value.TokenMasked],
        ],
        { noColor: options.noColor }
      )
    );
  });
}

function createTestCommand(getContext: GetContext): Command {
  return new Command('test').description('Verify the credentials by calling /me').action(async () => {
    const ctx = getContext();
    requireCredentials(ctx.env);

    const info = await ctx
      .client()
      .me()
      .catch((error: unknown) => {
        throw new Error(`authentication failed: ${messageOf(error)}`, { cause: error });
      });

    const result = {
      Authenticated: true,
      Name: info.Name,
      PrimaryEmail: info.PrimaryEmail,
      EmployeeId: info.EmployeeId,
    };

    await ctx.renderer.renderSingle(ctx.renderOptions(), result, (value) =>
      [
        'Authentication successful!',
        `User: ${value.Name ?? ''} (${value.PrimaryEmail ?? ''})`,
        `ID:   ${value.EmployeeId ?? ''}`,
      ].join('\n')
    );
  });
}

export function createAuthCommand(getContext: GetContext): Command {
  return new Command('auth')
    .description('Inspect and verify API credentials')
    .addCommand(createStatusCommand(getContext))
    .addCommand(createTestCommand(getContext));
}
