/**
 * Environment overlay loading.
 *
 * Runs once at startup, before any Config is built. The per-user .env is
 * applied first without overriding the real environment; a .env in the
 * working directory is applied last and wins over both.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'dotenv';
import { getConfigDir, getUserEnvPath } from './paths.js';
import { errorMessage } from './errors.js';
import { getLogger } from './logger.js';

export interface EnvLoadOptions {
  configDir?: string;
  cwd?: string;
  /** Target environment, process.env by default. */
  env?: NodeJS.ProcessEnv;
}

export interface EnvLoadSummary {
  /** Files that existed and were applied, in order. */
  files: string[];
  keys: string[];
}

export function loadEnvironment(options: EnvLoadOptions = {}): EnvLoadSummary {
  const log = getLogger('env');
  const env = options.env ?? process.env;
  const layers = [
    { path: getUserEnvPath(options.configDir ?? getConfigDir()), override: false },
    { path: join(options.cwd ?? process.cwd(), '.env'), override: true },
  ];

  const summary: EnvLoadSummary = { files: [], keys: [] };
  for (const layer of layers) {
    if (!existsSync(layer.path)) continue;

    let parsed: Record<string, string>;
    try {
      parsed = parse(readFileSync(layer.path, 'utf-8'));
    } catch (err) {
      log.warn({ path: layer.path, err: errorMessage(err) }, 'Failed to read .env file');
      continue;
    }

    for (const [key, value] of Object.entries(parsed)) {
      if (layer.override || env[key] === undefined) {
        env[key] = value;
      }
      if (!summary.keys.includes(key)) summary.keys.push(key);
    }
    summary.files.push(layer.path);
  }

  log.debug({ files: summary.files, count: summary.keys.length }, 'Environment overlays loaded');
  return summary;
}
