/**
 * Per-invocation CLI state: the loaded Config and the way clients are
 * built. The preAction hook fills it in; tests replace the client factory.
 */

import { ClickUpClient } from '../core/client.js';
import { Config } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { cliError } from './renderers/index.js';

export type ClientFactory = (config: Config) => ClickUpClient;

let currentConfig: Config | null = null;
let clientFactory: ClientFactory = (config) => new ClickUpClient(config);

export function setCliConfig(config: Config): void {
  currentConfig = config;
}

export function getCliConfig(): Config {
  currentConfig ??= new Config();
  return currentConfig;
}

export function setClientFactory(factory: ClientFactory): void {
  clientFactory = factory;
}

/**
 * Client for commands that talk to ClickUp.
 *
 * @throws ConfigurationError when no credentials are configured
 */
export function requireClient(): ClickUpClient {
  const config = getCliConfig();
  if (!config.hasCredentials()) {
    throw new ConfigurationError("Not configured. Run 'clickup setup wizard' or 'clickup config set-token'.", {
      fix: 'clickup setup wizard',
    });
  }
  return clientFactory(config);
}

/** An explicit list id or alias, else the default list. */
export function resolveListOption(ref: string | undefined): string {
  const config = getCliConfig();
  if (ref !== undefined && ref !== '') return config.resolveListId(ref);
  const fallback = config.getDefaultListId();
  if (fallback === undefined) {
    throw new ConfigurationError('No list ID provided and no default list configured.', {
      fix: 'clickup config set default_list_id <id>',
    });
  }
  return fallback;
}

export function resolveTeamOption(teamId: string | undefined): string {
  if (teamId !== undefined && teamId !== '') return teamId;
  const fallback = getCliConfig().getDefaultTeamId();
  if (fallback === undefined) {
    throw new ConfigurationError('No team ID provided and no default workspace configured.', {
      fix: 'clickup config switch-workspace <team-id>',
    });
  }
  return fallback;
}

export function resolveSpaceOption(spaceId: string | undefined): string {
  if (spaceId !== undefined && spaceId !== '') return spaceId;
  const fallback = getCliConfig().getDefaultSpaceId();
  if (fallback === undefined) {
    throw new ConfigurationError('No space ID provided and no default space configured.', {
      fix: 'clickup config switch-space <space-id>',
    });
  }
  return fallback;
}

/** Print the error once and exit 1. */
export function failCommand(err: unknown): never {
  cliError(err);
  process.exit(ExitCode.GENERAL_ERROR);
}
