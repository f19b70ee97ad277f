/**
 * Commander program for the `clickup` CLI: global flags, command
 * registration and the startup hook.
 */

import { Command } from 'commander';
import { Config } from '../core/config.js';
import { loadEnvironment } from '../core/env.js';
import { errorMessage } from '../core/errors.js';
import { getLogger, initLogger } from '../core/logger.js';
import { getConfigDir } from '../core/paths.js';
import { getPackageVersion } from '../core/version.js';
import { registerBulkCommand } from './commands/bulk.js';
import { registerConfigCommand } from './commands/config.js';
import { registerDiscoverCommand } from './commands/discover.js';
import { registerListCommand } from './commands/list.js';
import { registerSetupCommand } from './commands/setup.js';
import { registerStatusCommand } from './commands/status.js';
import { registerTaskCommand } from './commands/task.js';
import { registerTemplateCommand } from './commands/template.js';
import { registerWorkspaceCommand } from './commands/workspace.js';
import { setCliConfig } from './context.js';
import { setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';
import { applyColorSetting } from './renderers/colors.js';

/**
 * Load environment overlays and settings, then start file logging.
 * Logging is best-effort: on failure the stderr fallback logger stays.
 */
function initRuntime(actionCommand: Command): void {
  loadEnvironment();
  const config = new Config();
  setCliConfig(config);

  try {
    initLogger(getConfigDir(), config.getLoggingConfig());
  } catch (err) {
    getLogger('cli').warn({ err: errorMessage(err) }, 'File logging unavailable');
  }

  setFormatContext(resolveFormat(actionCommand.optsWithGlobals(), config.getOutputFormat()));
  applyColorSetting(config.getColorsEnabled());
  getLogger('cli').debug({ command: actionCommand.name() }, 'Command start');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('clickup')
    .description('ClickUp from the terminal: tasks, lists, workspaces, templates and bulk operations')
    .version(getPackageVersion())
    .option('--json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format (default)')
    .option('--quiet', 'Suppress non-essential output for scripting');

  registerTaskCommand(program);
  registerListCommand(program);
  registerWorkspaceCommand(program);
  registerConfigCommand(program);
  registerDiscoverCommand(program);
  registerBulkCommand(program);
  registerTemplateCommand(program);
  registerSetupCommand(program);
  registerStatusCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    initRuntime(actionCommand);
  });

  return program;
}
