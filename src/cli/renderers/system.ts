/**
 * Human-readable renderers for config, status, template, bulk and setup
 * commands, plus the generic key/value fallback.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { AuthCheck, TaskFields } from '../../core/client.js';
import type { BulkUpdateSummary, ImportRow, ImportSummary } from '../../core/bulk.js';
import type { Task } from '../../core/models.js';
import type { RenderedTemplate, TaskTemplate, TemplateEntry } from '../../core/templates.js';
import { dim, heading, statusText, success, truncate, warning } from './colors.js';

function formatLabel(key: string): string {
  return key.replace(/_/g, ' ').replace(/([a-z])([A-Z])/g, '$1 $2').replace(/^\w/, (c) => c.toUpperCase());
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return dim('not set');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Fallback: one `Label: value` line per top-level key. */
export function renderGeneric(data: Record<string, unknown>, quiet: boolean): string {
  if (quiet) return '';
  return Object.entries(data)
    .map(([key, value]) => `${dim(`${formatLabel(key)}:`)} ${formatValue(value)}`)
    .join('\n');
}

export function renderMessage(data: { message: string }, quiet: boolean): string {
  return quiet ? '' : success(data.message);
}

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

function flatten(obj: Record<string, unknown>, prefix = ''): [string, unknown][] {
  const entries: [string, unknown][] = [];
  for (const [key, value] of Object.entries(obj)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (value !== null && typeof value === 'object' && !Array.isArray(value) && Object.keys(value).length > 0) {
      entries.push(...flatten(Object.fromEntries(Object.entries(value)), path));
    } else {
      entries.push([path, value]);
    }
  }
  return entries;
}

export function renderConfigShow(data: { path: string; settings: Record<string, unknown> }, quiet: boolean): string {
  if (quiet) return data.path;
  const table = new Table({ head: [chalk.bold('Key'), chalk.bold('Value')] });
  for (const [key, value] of flatten(data.settings)) table.push([key, formatValue(value)]);
  return [heading('Configuration'), dim(data.path), table.toString()].join('\n');
}

export function renderConfigGet(data: { key: string; value: unknown }, quiet: boolean): string {
  if (data.value === undefined) return quiet ? '' : warning(`${data.key} is not set`);
  if (quiet || typeof data.value !== 'object') return formatValue(data.value);
  return JSON.stringify(data.value, null, 2);
}

export function renderDefaultLists(data: { lists: Record<string, string> }, quiet: boolean): string {
  const entries = Object.entries(data.lists);
  if (quiet) return entries.map(([alias, id]) => `${alias}=${id}`).join('\n');
  if (entries.length === 0) {
    return warning("No default lists configured. Use 'clickup config set-default-list <alias> <list-id>'.");
  }
  const table = new Table({ head: [chalk.bold('Alias'), chalk.bold('List ID')] });
  for (const [alias, id] of entries) table.push([alias, id]);
  return table.toString();
}

export function renderAuthCheck(data: AuthCheck, quiet: boolean): string {
  if (quiet) return data.valid ? 'valid' : 'invalid';
  return data.valid ? success(data.message) : chalk.red(`✗ ${data.message}`);
}

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

export interface StatusPayload {
  configPath: string;
  /** Masked token, or null when none is configured. */
  token: string | null;
  auth: AuthCheck | null;
  defaults: { team: string | null; space: string | null; list: string | null };
  defaultLists: Record<string, string>;
}

export function renderStatus(data: StatusPayload, quiet: boolean): string {
  if (quiet) return data.auth?.valid ? 'ok' : 'not-ok';
  const authLine =
    data.auth === null ? dim('not checked') : data.auth.valid ? chalk.green(data.auth.message) : chalk.red(data.auth.message);
  const lines = [
    heading('ClickUp Toolkit Status'),
    `  ${dim('Config:')}        ${data.configPath}`,
    `  ${dim('API token:')}     ${data.token ?? chalk.red('not configured')}`,
    `  ${dim('Auth:')}          ${authLine}`,
    `  ${dim('Default team:')}  ${data.defaults.team ?? '-'}`,
    `  ${dim('Default space:')} ${data.defaults.space ?? '-'}`,
    `  ${dim('Default list:')}  ${data.defaults.list ?? '-'}`,
  ];
  const aliases = Object.keys(data.defaultLists);
  if (aliases.length > 0) lines.push(`  ${dim('List aliases:')}  ${aliases.join(', ')}`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// templates
// ---------------------------------------------------------------------------

export function renderTemplateList(data: { templates: TemplateEntry[] }, quiet: boolean): string {
  if (quiet) return data.templates.map((t) => t.key).join('\n');
  if (data.templates.length === 0) return warning('No templates found.');
  const table = new Table({ head: ['Name', 'Source', 'Task name', 'Variables'].map((h) => chalk.bold(h)) });
  for (const entry of data.templates) {
    table.push([entry.key, entry.source, truncate(entry.template.name, 40), String(entry.template.variables.length)]);
  }
  return table.toString();
}

export function renderTemplateShow(data: TemplateEntry, quiet: boolean): string {
  if (quiet) return data.template.variables.join('\n');
  const t: TaskTemplate = data.template;
  return [
    heading(`${data.key} (${data.source})`),
    `  ${dim('Name:')}      ${t.name}`,
    `  ${dim('Priority:')}  ${t.priority}`,
    `  ${dim('Variables:')} ${t.variables.join(', ') || '-'}`,
    '',
    t.description,
  ].join('\n');
}

export interface TemplateCreatePayload {
  template: string;
  rendered: RenderedTemplate;
  task: Task | null;
  dryRun: boolean;
}

export function renderTemplateCreate(data: TemplateCreatePayload, quiet: boolean): string {
  if (quiet) return data.task?.id ?? '';
  const lines: string[] = [];
  if (data.rendered.missing.length > 0) {
    lines.push(warning(`Variables left empty: ${data.rendered.missing.join(', ')}`));
  }
  if (data.task === null) {
    lines.push(heading(data.rendered.name), '', data.rendered.description, '', dim('Dry run: no task created.'));
  } else {
    lines.push(success(`Created task from template '${data.template}': ${data.task.name}`), `  ID: ${data.task.id}`);
  }
  return lines.join('\n');
}

export function renderTemplateSaved(data: { key: string; path: string; template: TaskTemplate }, quiet: boolean): string {
  if (quiet) return data.path;
  return [success(`Saved template '${data.key}'`), `  ${dim('File:')} ${data.path}`, `  ${dim('Variables:')} ${data.template.variables.join(', ') || '-'}`].join('\n');
}

// ---------------------------------------------------------------------------
// bulk
// ---------------------------------------------------------------------------

export function renderExportDone(data: { file: string; format: string; count: number }, quiet: boolean): string {
  if (quiet) return data.file;
  return success(`Exported ${data.count} tasks to ${data.file}`);
}

const PREVIEW_ROWS = 10;

export function renderImportPreview(data: { file: string; listId: string; rows: ImportRow[] }, quiet: boolean): string {
  if (quiet) return String(data.rows.length);
  const table = new Table({ head: ['Name', 'Description', 'Priority', 'Due'].map((h) => chalk.bold(h)) });
  for (const row of data.rows.slice(0, PREVIEW_ROWS)) {
    table.push([row.name, truncate(row.description ?? '', 50), row.priority !== undefined ? String(row.priority) : '-', row.due_date !== undefined ? String(row.due_date) : '-']);
  }
  const lines = [heading(`Import preview: ${data.rows.length} tasks into list ${data.listId}`), table.toString()];
  if (data.rows.length > PREVIEW_ROWS) lines.push(dim(`... and ${data.rows.length - PREVIEW_ROWS} more tasks`));
  lines.push(warning('Dry run: no tasks created.'));
  return lines.join('\n');
}

export function renderImportDone(data: { listId: string; summary: ImportSummary }, quiet: boolean): string {
  const { created, failed, failures } = data.summary;
  if (quiet) return `${created} ${failed}`;
  const lines = failures.map((f) => warning(`Failed to create task '${f.name}': ${f.error}`));
  lines.push(success(`Import completed: ${created} created, ${failed} failed`));
  return lines.join('\n');
}

export function renderUpdatePreview(data: { listId: string; tasks: Task[]; fields: TaskFields }, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => t.id).join('\n');
  if (data.tasks.length === 0) return warning('No tasks found matching criteria.');
  const newStatus = typeof data.fields.status === 'string' ? data.fields.status : undefined;
  const table = new Table({ head: ['Task', 'Current status', 'New status'].map((h) => chalk.bold(h)) });
  for (const task of data.tasks.slice(0, PREVIEW_ROWS)) {
    table.push([truncate(task.name, 30), statusText(task.status), newStatus ?? dim('unchanged')]);
  }
  const lines = [heading(`Bulk update preview: ${data.tasks.length} tasks`), table.toString()];
  if (data.tasks.length > PREVIEW_ROWS) lines.push(dim(`... and ${data.tasks.length - PREVIEW_ROWS} more tasks`));
  return lines.join('\n');
}

export function renderUpdateDone(data: { listId: string; summary: BulkUpdateSummary }, quiet: boolean): string {
  const { updated, failed, failures } = data.summary;
  if (quiet) return `${updated} ${failed}`;
  const lines = failures.map((f) => warning(`Failed to update task '${f.name}': ${f.error}`));
  lines.push(success(`Bulk update completed: ${updated} updated, ${failed} failed`));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// setup
// ---------------------------------------------------------------------------

export interface SetupPayload {
  user: string;
  workspace: { id: string; name: string } | null;
  space: { id: string; name: string } | null;
  configPath: string;
}

export function renderSetup(data: SetupPayload, quiet: boolean): string {
  if (quiet) return '';
  return [
    success('Setup complete'),
    `  ${dim('User:')}      ${data.user}`,
    `  ${dim('Workspace:')} ${data.workspace ? `${data.workspace.name} (${data.workspace.id})` : '-'}`,
    `  ${dim('Space:')}     ${data.space ? `${data.space.name} (${data.space.id})` : '-'}`,
    `  ${dim('Saved to:')}  ${data.configPath}`,
  ].join('\n');
}
