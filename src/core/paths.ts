/**
 * Per-user path resolution.
 *
 * Environment variables:
 *   CLICKUP_TOOLKIT_HOME - Config directory (default: ~/.config/clickup-toolkit)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/** Directory holding config.json, .env, templates and logs. */
export function getConfigDir(): string {
  return process.env['CLICKUP_TOOLKIT_HOME'] ?? join(homedir(), '.config', 'clickup-toolkit');
}

export function getConfigPath(configDir: string = getConfigDir()): string {
  return join(configDir, 'config.json');
}

export function getUserEnvPath(configDir: string = getConfigDir()): string {
  return join(configDir, '.env');
}

/** Custom task templates, one JSON file per template. */
export function getTemplatesDir(configDir: string = getConfigDir()): string {
  return join(configDir, 'templates');
}

/** Data files shipped with the package (built-in templates). */
export function getPackageDataDir(): string {
  // src/core and dist/core both sit two levels below the package root
  return join(import.meta.dirname, '..', '..', 'data');
}
