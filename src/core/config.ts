/**
 * Configuration store for the ClickUp toolkit.
 *
 * Settings live in a single JSON file under the per-user config directory.
 * Credentials resolve explicit > environment > file; default hierarchy ids
 * resolve file > environment; everything else comes from the file or the
 * built-in defaults. Every mutation rewrites the whole file. Write failures
 * are logged and dropped: the in-memory value stays authoritative for the
 * life of the process.
 */

import type { z } from 'zod/v4';
import type { LoggerConfig } from './logger.js';
import { DEFAULT_LOGGER_CONFIG, getLogger } from './logger.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { getConfigPath } from './paths.js';
import { isJsonObject, readJsonSync, saveJsonSync, type JsonObject } from '../store/json.js';
import {
  SECRET_SETTING_KEYS,
  SETTING_SCHEMAS,
  defaultSettings,
  type CredentialKey,
  type DefaultIdKey,
  type OutputFormat,
  type TypedSettingKey,
} from '../types/config.js';

/** Environment variables per credential, primary name first. */
export const CREDENTIAL_ENV: Record<CredentialKey, readonly string[]> = {
  api_token: ['CLICKUP_API_TOKEN', 'CLICKUP_API_KEY'],
  client_id: ['CLICKUP_CLIENT_ID', 'CLICKUP_OAUTH_CLIENT_ID'],
  client_secret: ['CLICKUP_CLIENT_SECRET', 'CLICKUP_OAUTH_CLIENT_SECRET'],
};

export const DEFAULT_ID_ENV: Record<DefaultIdKey, readonly string[]> = {
  default_team_id: ['CLICKUP_DEFAULT_TEAM_ID', 'CLICKUP_TEAM_ID'],
  default_space_id: ['CLICKUP_DEFAULT_SPACE_ID', 'CLICKUP_SPACE_ID'],
  default_list_id: ['CLICKUP_DEFAULT_LIST_ID', 'CLICKUP_LIST_ID'],
};

/** Raw access tokens accepted by getHeaders() when no API token is configured. */
const ACCESS_TOKEN_ENV = ['CLICKUP_TOKEN', 'CLICKUP_ACCESS_TOKEN'] as const;

/** Path segments that may never be written. */
const DENIED_KEY_SEGMENTS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

const NUMERIC_ID = /^\d+$/;

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Three-tier credential resolution: explicit > environment > file.
 * Empty strings count as absent at every tier.
 */
export function resolveCredential(
  explicit: string | undefined,
  environment: string | undefined,
  file: string | undefined,
): string | undefined {
  return present(explicit) ?? present(environment) ?? present(file);
}

/** First non-empty value among the given environment variables. */
export function readEnv(env: NodeJS.ProcessEnv, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = present(env[name]);
    if (value !== undefined) return value;
  }
  return undefined;
}

/** `abcd1234...wxyz` for long secrets, `***` for short ones. */
export function maskSecret(value: string): string {
  if (value.length <= 12) return '***';
  return `${value.slice(0, 8)}...${value.slice(-4)}`;
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: JsonObject, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isJsonObject(current) || !Object.hasOwn(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path (mutates), replacing non-object intermediates.
 */
function setNestedValue(obj: JsonObject, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: JsonObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

function isCredentialKey(key: string): key is CredentialKey {
  return Object.hasOwn(CREDENTIAL_ENV, key);
}

function isTypedKey(key: string): key is TypedSettingKey {
  return Object.hasOwn(SETTING_SCHEMAS, key);
}

export interface ConfigOptions {
  /** Settings file, defaults to ~/.config/clickup-toolkit/config.json. */
  configPath?: string;
  /** Environment to read, defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export class Config {
  private readonly path: string;
  private readonly env: NodeJS.ProcessEnv;
  private settings: JsonObject;
  /** Credentials written through this instance; they outrank the environment. */
  private readonly explicit = new Map<CredentialKey, string>();

  constructor(options: ConfigOptions = {}) {
    this.path = options.configPath ?? getConfigPath();
    this.env = options.env ?? process.env;
    this.settings = this.load();
  }

  private get log() {
    return getLogger('config');
  }

  private load(): JsonObject {
    const settings = defaultSettings();
    let stored: unknown;
    try {
      stored = readJsonSync(this.path);
    } catch (err) {
      this.log.warn({ path: this.path, err: errorMessage(err) }, 'Ignoring unreadable config file');
      return settings;
    }
    if (stored === null) return settings;
    if (!isJsonObject(stored)) {
      this.log.warn({ path: this.path }, 'Ignoring config file that is not a JSON object');
      return settings;
    }
    return { ...settings, ...stored };
  }

  private save(): void {
    try {
      saveJsonSync(this.path, this.settings, { mode: 0o600 });
    } catch (err) {
      this.log.warn({ path: this.path, err: errorMessage(err) }, 'Could not persist config');
    }
  }

  /** Re-read the settings file; credentials set through this instance stay. */
  reload(): void {
    this.settings = this.load();
  }

  /** Path of the settings file. */
  getPath(): string {
    return this.path;
  }

  /**
   * Read a setting by dotted path. Missing keys give `defaultValue`.
   */
  get(key: string, defaultValue?: unknown): unknown {
    const value = getNestedValue(this.settings, key);
    return value === undefined ? defaultValue : value;
  }

  /**
   * Write a setting by dotted path and persist.
   *
   * @throws ConfigurationError for reserved key names or a value of the wrong type
   */
  set(key: string, value: unknown): void {
    const segments = key.split('.');
    if (segments.some((s) => s === '' || DENIED_KEY_SEGMENTS.has(s))) {
      throw new ConfigurationError(`Unknown configuration key: ${key}`);
    }
    if (isTypedKey(key)) {
      const schema: z.ZodType = SETTING_SCHEMAS[key];
      const result = schema.safeParse(value);
      if (!result.success) {
        const issue = result.error.issues[0]?.message ?? 'invalid value';
        throw new ConfigurationError(`Invalid value for ${key}: ${issue}`);
      }
    }
    if (isCredentialKey(key) && typeof value === 'string') {
      this.explicit.set(key, value);
    }
    setNestedValue(this.settings, key, value);
    this.save();
  }

  /** Remove a setting by dotted path and persist. Returns whether it existed. */
  unset(key: string): boolean {
    const parts = key.split('.');
    const last = parts.pop() ?? key;
    const parent = parts.length > 0 ? getNestedValue(this.settings, parts.join('.')) : this.settings;
    if (!isJsonObject(parent) || !Object.hasOwn(parent, last)) return false;
    delete parent[last];
    if (isCredentialKey(key)) this.explicit.delete(key);
    this.save();
    return true;
  }

  /** A setting from the file, or undefined when missing or malformed. */
  private read<T>(key: TypedSettingKey, schema: z.ZodType<T>): T | undefined {
    const result = schema.safeParse(this.get(key));
    return result.success ? result.data : undefined;
  }

  private credential(key: CredentialKey): string | undefined {
    const file = this.read(key, SETTING_SCHEMAS[key]);
    return resolveCredential(this.explicit.get(key), readEnv(this.env, CREDENTIAL_ENV[key]), file);
  }

  private defaultId(key: DefaultIdKey): string | undefined {
    return this.read(key, SETTING_SCHEMAS[key]) ?? readEnv(this.env, DEFAULT_ID_ENV[key]);
  }

  getApiToken(): string | undefined {
    return this.credential('api_token');
  }

  setApiToken(token: string): void {
    this.set('api_token', token);
  }

  getClientId(): string | undefined {
    return this.credential('client_id');
  }

  setClientId(clientId: string): void {
    this.set('client_id', clientId);
  }

  getClientSecret(): string | undefined {
    return this.credential('client_secret');
  }

  setClientSecret(clientSecret: string): void {
    this.set('client_secret', clientSecret);
  }

  getBaseUrl(): string {
    return this.read('base_url', SETTING_SCHEMAS.base_url) ?? String(defaultSettings()['base_url']);
  }

  /** Request timeout in seconds. */
  getTimeout(): number {
    return this.read('timeout', SETTING_SCHEMAS.timeout) ?? 30;
  }

  getMaxRetries(): number {
    return this.read('max_retries', SETTING_SCHEMAS.max_retries) ?? 3;
  }

  getOutputFormat(): OutputFormat {
    return this.read('output_format', SETTING_SCHEMAS.output_format) ?? 'table';
  }

  getColorsEnabled(): boolean {
    return this.read('colors', SETTING_SCHEMAS.colors) ?? true;
  }

  getDefaultTeamId(): string | undefined {
    return this.defaultId('default_team_id');
  }

  getDefaultSpaceId(): string | undefined {
    return this.defaultId('default_space_id');
  }

  getDefaultListId(): string | undefined {
    return this.defaultId('default_list_id');
  }

  getLoggingConfig(): LoggerConfig {
    return {
      level: this.read('logging.level', SETTING_SCHEMAS['logging.level']) ?? DEFAULT_LOGGER_CONFIG.level,
      file: this.read('logging.file', SETTING_SCHEMAS['logging.file']) ?? DEFAULT_LOGGER_CONFIG.file,
      maxFileSize: this.read('logging.maxFileSize', SETTING_SCHEMAS['logging.maxFileSize']) ?? DEFAULT_LOGGER_CONFIG.maxFileSize,
      maxFiles: this.read('logging.maxFiles', SETTING_SCHEMAS['logging.maxFiles']) ?? DEFAULT_LOGGER_CONFIG.maxFiles,
    };
  }

  /** A bearer token, or the legacy client id + secret pair. */
  hasCredentials(): boolean {
    if (this.getApiToken() !== undefined) return true;
    return this.getClientId() !== undefined && this.getClientSecret() !== undefined;
  }

  /**
   * Request headers for the ClickUp API.
   *
   * @throws ConfigurationError when no token is configured
   */
  getHeaders(): Record<string, string> {
    const token = this.getApiToken() ?? readEnv(this.env, ACCESS_TOKEN_ENV);
    if (token === undefined) {
      throw new ConfigurationError(
        "ClickUp API token not configured. Set CLICKUP_API_TOKEN or use 'clickup config set-token'.",
        { fix: 'clickup config set-token <token>' },
      );
    }
    return {
      Authorization: token,
      'Content-Type': 'application/json',
    };
  }

  // ---------------------------------------------------------------------------
  // Default list aliases
  // ---------------------------------------------------------------------------

  getDefaultLists(): Record<string, string> {
    return { ...(this.read('default_lists', SETTING_SCHEMAS.default_lists) ?? {}) };
  }

  getDefaultList(alias: string): string | undefined {
    const lists = this.getDefaultLists();
    return Object.hasOwn(lists, alias) ? lists[alias] : undefined;
  }

  setDefaultList(alias: string, listId: string): void {
    if (alias.trim() === '' || DENIED_KEY_SEGMENTS.has(alias)) {
      throw new ConfigurationError(`Invalid list alias: '${alias}'`);
    }
    this.set('default_lists', { ...this.getDefaultLists(), [alias]: listId });
  }

  removeDefaultList(alias: string): boolean {
    const lists = this.getDefaultLists();
    if (!Object.hasOwn(lists, alias)) return false;
    delete lists[alias];
    this.set('default_lists', lists);
    return true;
  }

  /**
   * Turn a list reference into a list id.
   * All-digit refs are ids already; anything else must be a known alias.
   *
   * @throws ConfigurationError for an unknown alias
   */
  resolveListId(ref: string): string {
    if (NUMERIC_ID.test(ref)) return ref;

    const lists = this.getDefaultLists();
    if (Object.hasOwn(lists, ref)) {
      const id = lists[ref];
      if (id !== undefined) return id;
    }

    const aliases = Object.keys(lists);
    if (aliases.length > 0) {
      throw new ConfigurationError(`Unknown list alias '${ref}'. Available aliases: ${aliases.join(', ')}`);
    }
    throw new ConfigurationError(
      `Unknown list alias '${ref}'. No default lists configured. Use 'clickup config set-default-list' to configure aliases.`,
      { fix: 'clickup config set-default-list <alias> <list-id>' },
    );
  }

  /** Back to built-in defaults, persisted. Explicit credentials are forgotten. */
  reset(): void {
    this.settings = defaultSettings();
    this.explicit.clear();
    this.save();
  }

  /** Copy of the stored settings with secrets masked, for display. */
  toMaskedObject(): JsonObject {
    const copy: JsonObject = structuredClone(this.settings);
    for (const key of SECRET_SETTING_KEYS) {
      const value = copy[key];
      if (typeof value === 'string' && value !== '') copy[key] = maskSecret(value);
    }
    return copy;
  }
}
