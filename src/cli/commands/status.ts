/**
 * CLI status command: token, credential check and configured defaults.
 */

import { Command } from 'commander';
import { maskSecret } from '../../core/config.js';
import { failCommand, getCliConfig, requireClient } from '../context.js';
import { cliOutput } from '../renderers/index.js';
import type { StatusPayload } from '../renderers/system.js';

export async function collectStatus(options: { check: boolean }): Promise<StatusPayload> {
  const config = getCliConfig();
  const token = config.getApiToken();
  return {
    configPath: config.getPath(),
    token: token === undefined ? null : maskSecret(token),
    auth: options.check && config.hasCredentials() ? await requireClient().validateAuth() : null,
    defaults: {
      team: config.getDefaultTeamId() ?? null,
      space: config.getDefaultSpaceId() ?? null,
      list: config.getDefaultListId() ?? null,
    },
    defaultLists: config.getDefaultLists(),
  };
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show configuration and authentication status')
    .option('--no-check', 'Skip the authentication check')
    .action(async (opts: { check: boolean }) => {
      try {
        cliOutput(await collectStatus(opts), { command: 'status' });
      } catch (err) {
        failCommand(err);
      }
    });
}
