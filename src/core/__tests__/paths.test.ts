/**
 * Tests for path resolution and .env overlays.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { getConfigDir, getConfigPath, getTemplatesDir, getUserEnvPath } from '../paths.js';
import { loadEnvironment } from '../env.js';

describe('getConfigDir', () => {
  const origEnv = process.env['CLICKUP_TOOLKIT_HOME'];

  afterEach(() => {
    if (origEnv !== undefined) {
      process.env['CLICKUP_TOOLKIT_HOME'] = origEnv;
    } else {
      delete process.env['CLICKUP_TOOLKIT_HOME'];
    }
  });

  it('defaults to ~/.config/clickup-toolkit', () => {
    delete process.env['CLICKUP_TOOLKIT_HOME'];
    expect(getConfigDir()).toBe(join(homedir(), '.config', 'clickup-toolkit'));
  });

  it('respects CLICKUP_TOOLKIT_HOME', () => {
    process.env['CLICKUP_TOOLKIT_HOME'] = '/tmp/clickup-home';
    expect(getConfigDir()).toBe('/tmp/clickup-home');
    expect(getConfigPath()).toBe('/tmp/clickup-home/config.json');
  });

  it('places files below a given directory', () => {
    expect(getUserEnvPath('/x')).toBe('/x/.env');
    expect(getTemplatesDir('/x')).toBe('/x/templates');
  });
});

describe('loadEnvironment', () => {
  let tempDir: string;
  let configDir: string;
  let cwd: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'clickup-env-test-'));
    configDir = join(tempDir, 'config');
    cwd = join(tempDir, 'project');
    mkdirSync(configDir);
    mkdirSync(cwd);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('does nothing without .env files', () => {
    const env: NodeJS.ProcessEnv = {};
    expect(loadEnvironment({ configDir, cwd, env })).toEqual({ files: [], keys: [] });
    expect(env).toEqual({});
  });

  it('keeps the real environment over the user file', () => {
    writeFileSync(join(configDir, '.env'), 'CLICKUP_API_TOKEN=user-token\nCLICKUP_TEAM_ID=42\n');
    const env: NodeJS.ProcessEnv = { CLICKUP_API_TOKEN: 'shell-token' };
    loadEnvironment({ configDir, cwd, env });
    expect(env).toEqual({ CLICKUP_API_TOKEN: 'shell-token', CLICKUP_TEAM_ID: '42' });
  });

  it('lets the project file override everything', () => {
    writeFileSync(join(configDir, '.env'), 'CLICKUP_API_TOKEN=user-token\n');
    writeFileSync(join(cwd, '.env'), 'CLICKUP_API_TOKEN=project-token\n');
    const env: NodeJS.ProcessEnv = { CLICKUP_API_TOKEN: 'shell-token' };
    const summary = loadEnvironment({ configDir, cwd, env });

    expect(env['CLICKUP_API_TOKEN']).toBe('project-token');
    expect(summary.files).toEqual([join(configDir, '.env'), join(cwd, '.env')]);
    expect(summary.keys).toEqual(['CLICKUP_API_TOKEN']);
  });
});
