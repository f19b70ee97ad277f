/**
 * Interactive setup wizard: token, credential check, default workspace
 * and default space.
 */

import { Command } from 'commander';
import type { ClickUpClient } from '../../core/client.js';
import type { Config } from '../../core/config.js';
import { ClickUpError, ConfigurationError } from '../../core/errors.js';
import { userLabel } from '../../core/models.js';
import { failCommand, getCliConfig, requireClient } from '../context.js';
import { askSecret, choose } from '../prompt.js';
import { dim } from '../renderers/colors.js';
import { cliOutput } from '../renderers/index.js';
import type { SetupPayload } from '../renderers/system.js';

export interface SetupPrompts {
  token(): Promise<string>;
  /** Index of the chosen item. */
  choose(prompt: string, choices: readonly string[]): Promise<number>;
  /** Progress notes; stderr in the CLI. */
  note(message: string): void;
}

export interface SetupOptions {
  token?: string;
  teamId?: string;
  spaceId?: string;
}

function pick<T extends { id: string; name: string }>(
  items: readonly T[],
  preferredId: string | undefined,
  kind: string,
): T | undefined {
  if (preferredId === undefined) return undefined;
  const found = items.find((item) => item.id === preferredId);
  if (!found) throw new ClickUpError(`${kind} ${preferredId} not found`);
  return found;
}

/**
 * Run the wizard against a config and a client factory. Options given on
 * the command line skip the matching prompt.
 */
export async function runSetupWizard(
  config: Config,
  connect: () => ClickUpClient,
  prompts: SetupPrompts,
  options: SetupOptions = {},
): Promise<SetupPayload> {
  if (options.token !== undefined) {
    config.setApiToken(options.token);
  } else if (!config.hasCredentials()) {
    prompts.note('No API credentials found. Get a token from https://app.clickup.com/settings/apps');
    const token = await prompts.token();
    if (token === '') throw new ConfigurationError('API token is required.');
    config.setApiToken(token);
  }

  const client = connect();
  const auth = await client.validateAuth();
  if (!auth.valid) throw new ConfigurationError(auth.message, { fix: 'clickup config set-token' });
  const user = userLabel(auth.user);

  const workspaces = await client.getTeams();
  if (workspaces.length === 0) {
    throw new ClickUpError('No workspaces found. Check your API token permissions.');
  }
  const workspace =
    pick(workspaces, options.teamId, 'Workspace') ??
    (workspaces.length === 1
      ? workspaces[0]
      : workspaces[await prompts.choose(`Select a workspace [1-${workspaces.length}]`, workspaces.map((w) => w.name))]);
  if (!workspace) throw new ClickUpError('No workspace selected');
  config.set('default_team_id', workspace.id);
  config.set('default_workspace_name', workspace.name);
  prompts.note(`Using ${workspace.name} as your default workspace.`);

  const spaces = await client.getSpaces(workspace.id);
  if (spaces.length === 0) {
    prompts.note('No spaces found in this workspace.');
    return { user, workspace: { id: workspace.id, name: workspace.name }, space: null, configPath: config.getPath() };
  }
  const space =
    pick(spaces, options.spaceId, 'Space') ??
    (spaces.length === 1
      ? spaces[0]
      : spaces[await prompts.choose(`Select a space [1-${spaces.length}]`, spaces.map((s) => s.name))]);
  if (!space) throw new ClickUpError('No space selected');
  config.set('default_space_id', space.id);
  config.set('default_space_name', space.name);
  prompts.note(`Using ${space.name} as your default space.`);

  return {
    user,
    workspace: { id: workspace.id, name: workspace.name },
    space: { id: space.id, name: space.name },
    configPath: config.getPath(),
  };
}

export const terminalPrompts: SetupPrompts = {
  token: () => askSecret('Enter your ClickUp API token:'),
  choose: (prompt, choices) => choose(prompt, choices),
  note: (message) => process.stderr.write(dim(message) + '\n'),
};

export function registerSetupCommand(program: Command): void {
  const setup = program.command('setup').description('Setup and configuration wizard');

  setup
    .command('wizard')
    .description('Configure your token, default workspace and default space')
    .option('--token <token>', 'API token (skips the prompt)')
    .option('-t, --team-id <id>', 'Default workspace (skips the prompt)')
    .option('-s, --space-id <id>', 'Default space (skips the prompt)')
    .action(async (opts: SetupOptions) => {
      try {
        const result = await runSetupWizard(getCliConfig(), requireClient, terminalPrompts, opts);
        cliOutput(result, { command: 'setup.wizard' });
      } catch (err) {
        failCommand(err);
      }
    });
}
