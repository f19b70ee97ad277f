/**
 * Tests for the settings store: precedence, validation, aliases and
 * persistence.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Config, maskSecret, resolveCredential } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_LOGGER_CONFIG } from '../logger.js';

describe('Config', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'clickup-config-test-'));
    configPath = join(tempDir, 'config.json');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeSettings(settings: Record<string, unknown>): void {
    writeFileSync(configPath, JSON.stringify(settings));
  }

  describe('defaults', () => {
    it('starts from built-in defaults when no file exists', () => {
      const config = new Config({ configPath, env: {} });
      expect(config.getBaseUrl()).toBe('https://api.clickup.com/api/v2');
      expect(config.getTimeout()).toBe(30);
      expect(config.getMaxRetries()).toBe(3);
      expect(config.getOutputFormat()).toBe('table');
      expect(config.getColorsEnabled()).toBe(true);
      expect(config.getDefaultLists()).toEqual({});
      expect(config.getLoggingConfig()).toEqual(DEFAULT_LOGGER_CONFIG);
    });

    it('ignores a file that is not JSON', () => {
      writeFileSync(configPath, 'not json');
      const config = new Config({ configPath, env: {} });
      expect(config.getTimeout()).toBe(30);
    });

    it('keeps unknown keys from the file', () => {
      writeSettings({ custom_flag: 'on' });
      expect(new Config({ configPath, env: {} }).get('custom_flag')).toBe('on');
    });
  });

  describe('credentials', () => {
    it('reads the token from the environment', () => {
      const config = new Config({ configPath, env: { CLICKUP_API_TOKEN: 'env-token' } });
      expect(config.getApiToken()).toBe('env-token');
    });

    it('accepts the legacy variable name', () => {
      const config = new Config({ configPath, env: { CLICKUP_API_KEY: 'legacy-token' } });
      expect(config.getApiToken()).toBe('legacy-token');
    });

    it('skips empty environment values', () => {
      const config = new Config({ configPath, env: { CLICKUP_API_TOKEN: '', CLICKUP_API_KEY: 'second' } });
      expect(config.getApiToken()).toBe('second');
    });

    it('prefers the environment over the file', () => {
      writeSettings({ api_token: 'file-token' });
      expect(new Config({ configPath, env: { CLICKUP_API_TOKEN: 'env-token' } }).getApiToken()).toBe('env-token');
      expect(new Config({ configPath, env: {} }).getApiToken()).toBe('file-token');
    });

    it('prefers a token set through the instance over the environment', () => {
      const config = new Config({ configPath, env: { CLICKUP_API_TOKEN: 'env-token' } });
      config.setApiToken('explicit-token');
      expect(config.getApiToken()).toBe('explicit-token');
    });

    it('counts a client id and secret pair as credentials', () => {
      const config = new Config({ configPath, env: { CLICKUP_CLIENT_ID: 'test-id' } });
      expect(config.hasCredentials()).toBe(false);
      config.setClientSecret('test-secret');
      expect(config.hasCredentials()).toBe(true);
    });

    it('builds headers from the token', () => {
      const config = new Config({ configPath, env: { CLICKUP_API_TOKEN: 'test-token' } });
      expect(config.getHeaders()).toEqual({ Authorization: 'test-token', 'Content-Type': 'application/json' });
    });

    it('falls back to a raw access token for headers', () => {
      const config = new Config({ configPath, env: { CLICKUP_ACCESS_TOKEN: 'access-token' } });
      expect(config.getHeaders()['Authorization']).toBe('access-token');
    });

    it('refuses to build headers without a token', () => {
      const config = new Config({ configPath, env: {} });
      expect(() => config.getHeaders()).toThrow(ConfigurationError);
    });

    it('sees a token saved by another instance after reload', () => {
      const config = new Config({ configPath, env: {} });
      expect(config.hasCredentials()).toBe(false);

      new Config({ configPath, env: {} }).setApiToken('late-token');
      expect(config.getApiToken()).toBeUndefined();

      config.reload();
      expect(config.getApiToken()).toBe('late-token');
    });
  });

  describe('default ids', () => {
    it('prefers the file over the environment', () => {
      writeSettings({ default_team_id: '111' });
      const config = new Config({ configPath, env: { CLICKUP_TEAM_ID: '222' } });
      expect(config.getDefaultTeamId()).toBe('111');
    });

    it('falls back to the environment', () => {
      const config = new Config({ configPath, env: { CLICKUP_DEFAULT_LIST_ID: '333' } });
      expect(config.getDefaultListId()).toBe('333');
      expect(config.getDefaultSpaceId()).toBeUndefined();
    });
  });

  describe('get and set', () => {
    it('persists dotted keys', () => {
      const config = new Config({ configPath, env: {} });
      config.set('custom.nested.key', 'value');
      expect(config.get('custom.nested.key')).toBe('value');
      expect(new Config({ configPath, env: {} }).get('custom.nested.key')).toBe('value');
    });

    it('returns the fallback for a missing key', () => {
      const config = new Config({ configPath, env: {} });
      expect(config.get('missing.key', 'fallback')).toBe('fallback');
    });

    it('rejects a value of the wrong type', () => {
      const config = new Config({ configPath, env: {} });
      expect(() => config.set('timeout', 'soon')).toThrow(/Invalid value for timeout/);
      expect(config.getTimeout()).toBe(30);
    });

    it('rejects reserved key segments', () => {
      const config = new Config({ configPath, env: {} });
      expect(() => config.set('__proto__.polluted', true)).toThrow('Unknown configuration key: __proto__.polluted');
    });

    it('removes a key with unset', () => {
      const config = new Config({ configPath, env: {} });
      config.set('extra', 1);
      expect(config.unset('extra')).toBe(true);
      expect(config.unset('extra')).toBe(false);
      expect(config.get('extra')).toBeUndefined();
    });

    it('writes the whole document as indented JSON', () => {
      const config = new Config({ configPath, env: {} });
      config.set('timeout', 10);
      const written: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      expect(written).toMatchObject({ timeout: 10, max_retries: 3, output_format: 'table' });
      expect(readFileSync(configPath, 'utf-8').endsWith('}\n')).toBe(true);
    });

    it('goes back to defaults on reset', () => {
      const config = new Config({ configPath, env: {} });
      config.set('timeout', 5);
      config.setApiToken('test-token');
      config.reset();
      expect(config.getTimeout()).toBe(30);
      expect(config.getApiToken()).toBeUndefined();
    });
  });

  describe('list aliases', () => {
    it('resolves aliases and passes numeric ids through', () => {
      const config = new Config({ configPath, env: {} });
      config.setDefaultList('backlog', '900');
      expect(config.resolveListId('backlog')).toBe('900');
      expect(config.resolveListId('12345')).toBe('12345');
      expect(config.getDefaultList('backlog')).toBe('900');
    });

    it('names the known aliases for an unknown one', () => {
      const config = new Config({ configPath, env: {} });
      config.setDefaultList('backlog', '900');
      config.setDefaultList('sprint', '901');
      expect(() => config.resolveListId('nope')).toThrow("Unknown list alias 'nope'. Available aliases: backlog, sprint");
    });

    it('explains how to add aliases when there are none', () => {
      const config = new Config({ configPath, env: {} });
      expect(() => config.resolveListId('nope')).toThrow(/No default lists configured/);
    });

    it('removes aliases', () => {
      const config = new Config({ configPath, env: {} });
      config.setDefaultList('backlog', '900');
      expect(config.removeDefaultList('backlog')).toBe(true);
      expect(config.removeDefaultList('backlog')).toBe(false);
      expect(config.getDefaultLists()).toEqual({});
    });

    it('rejects blank aliases', () => {
      const config = new Config({ configPath, env: {} });
      expect(() => config.setDefaultList('  ', '900')).toThrow(ConfigurationError);
    });
  });

  it('masks secrets in the display copy', () => {
    const config = new Config({ configPath, env: {} });
    config.setApiToken('pk_12345678_ABCDEFGHIJ');
    expect(config.toMaskedObject()['api_token']).toBe('pk_12345...GHIJ');
    expect(config.get('api_token')).toBe('pk_12345678_ABCDEFGHIJ');
  });
});

describe('maskSecret', () => {
  it('keeps the first eight and last four characters', () => {
    expect(maskSecret('pk_12345678_ABCDEFGHIJ')).toBe('pk_12345...GHIJ');
  });

  it('hides short values entirely', () => {
    expect(maskSecret('short')).toBe('***');
  });
});

describe('resolveCredential', () => {
  it('takes the first non-empty tier', () => {
    expect(resolveCredential(undefined, 'env', 'file')).toBe('env');
    expect(resolveCredential('explicit', 'env', 'file')).toBe('explicit');
    expect(resolveCredential('', ' ', 'file')).toBe('file');
    expect(resolveCredential(undefined, undefined, undefined)).toBeUndefined();
  });
});
