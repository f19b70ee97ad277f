/**
 * Task templates.
 *
 * A template is a name pattern, a description pattern and a default
 * priority. Patterns hold `{word}` placeholders that are filled in when a
 * task is created from the template. Built-in templates ship in
 * data/builtin-templates.json; custom ones live one per file under the
 * config directory's templates/ folder and shadow a built-in of the same key.
 */

import { readdirSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { z } from 'zod/v4';
import { ClickUpError, ConfigurationError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import type { Task } from './models.js';
import { getPackageDataDir, getTemplatesDir } from './paths.js';
import { isJsonObject, readJsonSync, saveJson } from '../store/json.js';

export const TemplateSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  priority: z.number().int().min(1).max(4).default(3),
  variables: z.array(z.string()).default([]),
});
export type TaskTemplate = z.infer<typeof TemplateSchema>;

export type TemplateSource = 'builtin' | 'custom';

export interface TemplateEntry {
  key: string;
  source: TemplateSource;
  template: TaskTemplate;
}

export interface TemplateLocations {
  /** Directory holding builtin-templates.json. */
  dataDir?: string;
  /** Directory of custom template files. */
  templatesDir?: string;
}

export interface RenderedTemplate {
  name: string;
  description: string;
  priority: number;
  /** Placeholders with no value; rendered as empty text. */
  missing: string[];
}

const PLACEHOLDER = /\{(\w+)\}/g;
const TEMPLATE_KEY = /^[\w-]+$/;

export function loadBuiltInTemplates(dataDir: string = getPackageDataDir()): Record<string, TaskTemplate> {
  const raw = readJsonSync(join(dataDir, 'builtin-templates.json'));
  if (!isJsonObject(raw)) return {};
  const templates: Record<string, TaskTemplate> = {};
  for (const [key, value] of Object.entries(raw)) {
    templates[key] = TemplateSchema.parse(value);
  }
  return templates;
}

/**
 * Custom templates keyed by file name. Unreadable or malformed files are
 * logged and skipped.
 */
export function loadCustomTemplates(templatesDir: string = getTemplatesDir()): Record<string, TaskTemplate> {
  let files: string[];
  try {
    files = readdirSync(templatesDir).filter((f) => extname(f) === '.json');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }

  const templates: Record<string, TaskTemplate> = {};
  for (const file of files.sort()) {
    const path = join(templatesDir, file);
    try {
      templates[basename(file, '.json')] = TemplateSchema.parse(readJsonSync(path));
    } catch (err) {
      getLogger('templates').warn({ path, err: errorMessage(err) }, 'Skipping invalid template file');
    }
  }
  return templates;
}

/** Built-ins first, then custom templates; a custom key replaces a built-in. */
export function listTemplates(locations: TemplateLocations = {}): TemplateEntry[] {
  const entries = new Map<string, TemplateEntry>();
  for (const [key, template] of Object.entries(loadBuiltInTemplates(locations.dataDir))) {
    entries.set(key, { key, source: 'builtin', template });
  }
  for (const [key, template] of Object.entries(loadCustomTemplates(locations.templatesDir))) {
    entries.set(key, { key, source: 'custom', template });
  }
  return [...entries.values()];
}

export function findTemplate(key: string, locations: TemplateLocations = {}): TemplateEntry | undefined {
  return listTemplates(locations).find((entry) => entry.key === key);
}

/** Placeholder names across the given patterns, sorted, without duplicates. */
export function extractVariables(...patterns: string[]): string[] {
  const names = new Set<string>();
  for (const pattern of patterns) {
    for (const match of pattern.matchAll(PLACEHOLDER)) {
      const name = match[1];
      if (name !== undefined) names.add(name);
    }
  }
  return [...names].sort();
}

function fill(pattern: string, values: Record<string, string>, missing: Set<string>): string {
  return pattern.replace(PLACEHOLDER, (_whole, name: string) => {
    if (Object.hasOwn(values, name)) return values[name] ?? '';
    missing.add(name);
    return '';
  });
}

export function renderTemplate(template: TaskTemplate, values: Record<string, string>): RenderedTemplate {
  const missing = new Set<string>();
  const name = fill(template.name, values, missing);
  const description = fill(template.description, values, missing);
  return { name, description, priority: template.priority, missing: [...missing].sort() };
}

/**
 * Parse `key=value` pairs from the command line. Only the first `=`
 * splits, so values may contain more of them.
 */
export function parseVariableAssignments(pairs: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const pair of pairs) {
    const at = pair.indexOf('=');
    if (at <= 0) {
      throw new ClickUpError(`Invalid variable '${pair}'. Expected key=value.`);
    }
    values[pair.slice(0, at)] = pair.slice(at + 1);
  }
  return values;
}

/** Values read from a JSON variables file; non-string values are stringified. */
export function variablesFromJson(data: unknown): Record<string, string> {
  if (!isJsonObject(data)) {
    throw new ClickUpError('Variables file must contain a JSON object');
  }
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    values[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return values;
}

/**
 * Build a template from an existing task. The patterns default to the
 * task's own name and description; their placeholders become the
 * template's variables.
 */
export function templateFromTask(
  task: Task,
  patterns: { name?: string; description?: string } = {},
): TaskTemplate {
  const name = patterns.name ?? task.name;
  const description = patterns.description ?? task.description ?? '';
  const priorityId = Number(task.priority?.id);
  const priority = Number.isInteger(priorityId) && priorityId >= 1 && priorityId <= 4 ? priorityId : 3;
  return { name, description, priority, variables: extractVariables(name, description) };
}

/**
 * Write a custom template to `<templatesDir>/<key>.json`.
 *
 * @returns the file path written
 */
export async function saveTemplate(
  key: string,
  template: TaskTemplate,
  templatesDir: string = getTemplatesDir(),
): Promise<string> {
  if (!TEMPLATE_KEY.test(key)) {
    throw new ConfigurationError(`Invalid template name '${key}'. Use letters, digits, '_' or '-'.`);
  }
  const path = join(templatesDir, `${key}.json`);
  await saveJson(path, TemplateSchema.parse(template));
  getLogger('templates').debug({ key, path }, 'Template saved');
  return path;
}
