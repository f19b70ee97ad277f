/**
 * CLI config commands: credentials, settings, defaults and list aliases.
 */

import { Command } from 'commander';
import { maskSecret } from '../../core/config.js';
import { ClickUpError, ConfigurationError } from '../../core/errors.js';
import { BOOLEAN_SETTING_KEYS, NUMERIC_SETTING_KEYS, SECRET_SETTING_KEYS } from '../../types/config.js';
import { failCommand, getCliConfig, requireClient } from '../context.js';
import { askSecret, confirmAction } from '../prompt.js';
import { cliOutput } from '../renderers/index.js';

/**
 * Turn a command-line string into the stored value: numbers and booleans
 * for keys of that type, JSON for values that look like an object, the
 * string itself otherwise.
 */
export function coerceSettingValue(key: string, raw: string): unknown {
  if (NUMERIC_SETTING_KEYS.has(key)) {
    const n = Number(raw);
    if (raw.trim() === '' || Number.isNaN(n)) {
      throw new ConfigurationError(`Invalid value for ${key}: expected a number, got '${raw}'`);
    }
    return n;
  }
  if (BOOLEAN_SETTING_KEYS.has(key)) {
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    throw new ConfigurationError(`Invalid value for ${key}: expected true or false, got '${raw}'`);
  }
  if (raw.trimStart().startsWith('{')) {
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
  return raw;
}

/** Value for display; secrets are masked. */
export function displayValue(key: string, value: unknown): unknown {
  if (SECRET_SETTING_KEYS.has(key) && typeof value === 'string' && value !== '') return maskSecret(value);
  return value;
}

/** The token argument, or a masked prompt for it. */
export async function readToken(token: string | undefined): Promise<string> {
  const value = token ?? (await askSecret('ClickUp API token:'));
  if (value === '') throw new ConfigurationError('No token given.');
  return value;
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Manage configuration and credentials');

  config
    .command('set-token [token]')
    .description('Save your ClickUp API token (prompts when omitted)')
    .action(async (token: string | undefined) => {
      try {
        const value = await readToken(token);
        getCliConfig().setApiToken(value);
        cliOutput({ message: `API token saved (${maskSecret(value)})` }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('set-client-id <clientId>')
    .description('Save a ClickUp OAuth client ID (legacy)')
    .action((clientId: string) => {
      try {
        getCliConfig().setClientId(clientId);
        cliOutput({ message: 'Client ID configured' }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('set-client-secret <clientSecret>')
    .description('Save a ClickUp OAuth client secret (legacy)')
    .action((clientSecret: string) => {
      try {
        getCliConfig().setClientSecret(clientSecret);
        cliOutput({ message: 'Client secret configured' }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value (dotted keys allowed)')
    .action((key: string, raw: string) => {
      try {
        const value = coerceSettingValue(key, raw);
        getCliConfig().set(key, value);
        const shown = displayValue(key, value);
        cliOutput({ message: `Set ${key} = ${typeof shown === 'string' ? shown : JSON.stringify(shown)}` }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string) => {
      try {
        cliOutput({ key, value: displayValue(key, getCliConfig().get(key)) }, { command: 'config.get' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('show')
    .description('Show all settings (secrets masked)')
    .action(() => {
      try {
        const current = getCliConfig();
        cliOutput({ path: current.getPath(), settings: current.toMaskedObject() }, { command: 'config.show' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('path')
    .description('Print the settings file path')
    .action(() => {
      console.log(getCliConfig().getPath());
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (opts: { yes?: boolean }) => {
      try {
        if (!opts.yes && !(await confirmAction('Reset all configuration to defaults?'))) {
          console.error('Reset cancelled.');
          return;
        }
        getCliConfig().reset();
        cliOutput({ message: 'Configuration reset to defaults' }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('validate')
    .description('Check the configured credentials against ClickUp')
    .action(async () => {
      try {
        const check = await requireClient().validateAuth();
        cliOutput(check, { command: 'config.validate' });
        if (!check.valid) process.exitCode = 1;
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('switch-workspace <teamId>')
    .description('Make a workspace the default')
    .action(async (teamId: string) => {
      try {
        const team = await requireClient().getTeam(teamId);
        const current = getCliConfig();
        current.set('default_team_id', team.id);
        current.set('default_workspace_name', team.name);
        current.set('current_workspace', team.id);
        cliOutput({ message: `Switched to workspace ${team.name} (${team.id})` }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('switch-space <spaceId>')
    .description('Make a space the default')
    .action(async (spaceId: string) => {
      try {
        const space = await requireClient().getSpace(spaceId);
        const current = getCliConfig();
        current.set('default_space_id', space.id);
        current.set('default_space_name', space.name);
        cliOutput({ message: `Switched to space ${space.name} (${space.id})` }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('set-default-list <alias> <listId>')
    .description('Name a list so commands accept the alias in place of its ID')
    .action((alias: string, listId: string) => {
      try {
        if (!/^\d+$/.test(listId)) {
          throw new ClickUpError(`List IDs are numeric: '${listId}'`);
        }
        getCliConfig().setDefaultList(alias, listId);
        cliOutput({ message: `Alias '${alias}' now points to list ${listId}` }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('remove-default-list <alias>')
    .description('Remove a list alias')
    .action((alias: string) => {
      try {
        if (!getCliConfig().removeDefaultList(alias)) {
          throw new ConfigurationError(`No default list named '${alias}'`);
        }
        cliOutput({ message: `Removed alias '${alias}'` }, { command: 'message' });
      } catch (err) {
        failCommand(err);
      }
    });

  config
    .command('default-lists')
    .description('Show list aliases')
    .action(() => {
      cliOutput({ lists: getCliConfig().getDefaultLists() }, { command: 'config.default-lists' });
    });
}
