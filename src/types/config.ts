/**
 * Settings file types and value schemas.
 *
 * The settings object is an open JSON document: keys below have a fixed
 * type and a default, anything else is stored and written back untouched.
 */

import { z } from 'zod/v4';

export const DEFAULT_BASE_URL = 'https://api.clickup.com/api/v2';

export const OUTPUT_FORMATS = ['table', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

/** Credential fields that follow explicit > environment > file precedence. */
export type CredentialKey = 'api_token' | 'client_id' | 'client_secret';

/** Default hierarchy ids that follow file > environment precedence. */
export type DefaultIdKey = 'default_team_id' | 'default_space_id' | 'default_list_id';

/**
 * Validators for keys with a fixed type, addressed by dotted path.
 * Used both when setting a value and when reading one back.
 */
export const SETTING_SCHEMAS = {
  api_token: z.string().min(1),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  base_url: z.url(),
  default_team_id: z.string().min(1),
  default_space_id: z.string().min(1),
  default_list_id: z.string().min(1),
  default_workspace_name: z.string(),
  default_space_name: z.string(),
  current_workspace: z.string(),
  default_lists: z.record(z.string(), z.string()),
  timeout: z.number().positive(),
  max_retries: z.number().int().min(0),
  output_format: z.enum(OUTPUT_FORMATS),
  colors: z.boolean(),
  'logging.level': z.enum(LOG_LEVELS),
  'logging.file': z.string().min(1),
  'logging.maxFileSize': z.number().int().positive(),
  'logging.maxFiles': z.number().int().positive(),
} satisfies Record<string, z.ZodType>;

export type TypedSettingKey = keyof typeof SETTING_SCHEMAS;
export type SettingValue<K extends TypedSettingKey> = z.infer<(typeof SETTING_SCHEMAS)[K]>;

/** Keys whose string form from the command line is a number. */
export const NUMERIC_SETTING_KEYS: ReadonlySet<string> = new Set([
  'timeout',
  'max_retries',
  'logging.maxFileSize',
  'logging.maxFiles',
]);

/** Keys whose string form from the command line is a boolean. */
export const BOOLEAN_SETTING_KEYS: ReadonlySet<string> = new Set(['colors']);

/** Keys masked by `config show` and the status command. */
export const SECRET_SETTING_KEYS: ReadonlySet<string> = new Set(['api_token', 'client_secret']);

/** Built-in defaults; also the state `config reset` returns to. */
export function defaultSettings(): Record<string, unknown> {
  return {
    base_url: DEFAULT_BASE_URL,
    timeout: 30,
    max_retries: 3,
    output_format: 'table',
    colors: true,
    default_lists: {},
  };
}
