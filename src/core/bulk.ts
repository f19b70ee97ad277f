/**
 * Bulk task operations: export to CSV/JSON, import from CSV/JSON, and
 * filtered mass updates.
 *
 * Import and update issue one request per task through a p-queue bounded
 * by the batch size. A failed item is counted and reported; it never stops
 * the rest of the batch.
 */

import { extname } from 'node:path';
import PQueue from 'p-queue';
import type { ClickUpClient, TaskFields } from './client.js';
import { toCsv, parseCsv } from './csv.js';
import { ClickUpError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import { userLabel, type Task } from './models.js';
import { isJsonObject, type JsonObject } from '../store/json.js';

export const EXPORT_FIELDS = [
  'id',
  'name',
  'description',
  'status',
  'priority',
  'assignees',
  'due_date',
  'date_created',
  'date_updated',
  'url',
] as const;
export type ExportField = (typeof EXPORT_FIELDS)[number];

export const EXPORT_FORMATS = ['csv', 'json'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const DEFAULT_BATCH_SIZE = 10;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/** Flat, string-only view of a task for CSV. */
export function taskToExportRow(task: Task): Record<ExportField, string> {
  return {
    id: task.id,
    name: task.name,
    description: task.description ?? '',
    status: task.status?.status ?? '',
    priority: task.priority?.priority ?? '',
    assignees: task.assignees.map(userLabel).join(', '),
    due_date: task.due_date ?? '',
    date_created: task.date_created ?? '',
    date_updated: task.date_updated ?? '',
    url: task.url ?? '',
  };
}

/**
 * Serialize tasks. JSON keeps every task field but flattens status,
 * priority and assignees to labels.
 */
export function exportTasks(tasks: readonly Task[], format: ExportFormat): string {
  if (format === 'csv') {
    return toCsv(EXPORT_FIELDS, tasks.map(taskToExportRow));
  }
  const flattened = tasks.map((task) => ({
    ...task,
    status: task.status?.status ?? '',
    priority: task.priority?.priority ?? '',
    assignees: task.assignees.map(userLabel),
  }));
  return JSON.stringify(flattened, null, 2) + '\n';
}

// ---------------------------------------------------------------------------
// Import
// ---------------------------------------------------------------------------

export interface ImportRow {
  name: string;
  description?: string;
  priority?: number;
  /** Unix milliseconds. */
  due_date?: number;
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() === '' ? undefined : value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/** Priority 1-4 from a number or numeric string; anything else is dropped. */
function priorityOf(value: unknown): number | undefined {
  const raw = text(value);
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) return undefined;
  const n = Number.parseInt(raw, 10);
  return n >= 1 && n <= 4 ? n : undefined;
}

function timestampOf(value: unknown): number | undefined {
  const raw = text(value);
  return raw !== undefined && /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : undefined;
}

export function toImportRow(record: JsonObject): ImportRow {
  const row: ImportRow = { name: text(record['name']) ?? 'Untitled Task' };
  const description = text(record['description']);
  if (description !== undefined) row.description = description;
  const priority = priorityOf(record['priority']);
  if (priority !== undefined) row.priority = priority;
  const dueDate = timestampOf(record['due_date']);
  if (dueDate !== undefined) row.due_date = dueDate;
  return row;
}

/**
 * Parse an import file by extension: `.csv` with a header line, or `.json`
 * holding an array of objects.
 */
export function parseImportFile(path: string, content: string): ImportRow[] {
  const ext = extname(path).toLowerCase();
  if (ext === '.csv') {
    return parseCsv(content).map(toImportRow);
  }
  if (ext === '.json') {
    const data: unknown = JSON.parse(content);
    if (!Array.isArray(data)) {
      throw new ClickUpError('Import file must contain a JSON array of tasks');
    }
    return data.filter(isJsonObject).map(toImportRow);
  }
  throw new ClickUpError(`Unsupported file format: ${ext || '(none)'}. Use .csv or .json.`);
}

export function importRowFields(row: ImportRow): TaskFields {
  const fields: TaskFields = {};
  if (row.description !== undefined) fields.description = row.description;
  if (row.priority !== undefined) fields.priority = row.priority;
  if (row.due_date !== undefined) fields.due_date = row.due_date;
  return fields;
}

export interface BulkFailure {
  name: string;
  error: string;
}

export interface BulkRunOptions {
  /** Requests in flight at once. */
  concurrency?: number;
  onProgress?: (done: number, total: number) => void;
}

export interface ImportSummary {
  created: number;
  failed: number;
  tasks: Task[];
  failures: BulkFailure[];
}

export async function importTasks(
  client: Pick<ClickUpClient, 'createTask'>,
  listId: string,
  rows: readonly ImportRow[],
  options: BulkRunOptions = {},
): Promise<ImportSummary> {
  const log = getLogger('bulk');
  const queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? DEFAULT_BATCH_SIZE) });
  const summary: ImportSummary = { created: 0, failed: 0, tasks: [], failures: [] };
  let done = 0;

  await Promise.all(
    rows.map((row) =>
      queue.add(async () => {
        try {
          summary.tasks.push(await client.createTask(listId, row.name, importRowFields(row)));
          summary.created++;
        } catch (err) {
          summary.failed++;
          summary.failures.push({ name: row.name, error: errorMessage(err) });
          log.warn({ listId, name: row.name, err: errorMessage(err) }, 'Failed to create task');
        }
        options.onProgress?.(++done, rows.length);
      }),
    ),
  );

  log.info({ listId, created: summary.created, failed: summary.failed }, 'Import finished');
  return summary;
}

// ---------------------------------------------------------------------------
// Mass update
// ---------------------------------------------------------------------------

export interface BulkUpdateChanges {
  status?: string;
  priority?: number;
  /** User id to add as assignee. */
  assignee?: string;
}

/**
 * Update body for the requested changes.
 *
 * @throws ClickUpError when no change is requested
 */
export function buildUpdateFields(changes: BulkUpdateChanges): TaskFields {
  const fields: TaskFields = {};
  if (changes.status !== undefined && changes.status !== '') fields.status = changes.status;
  if (changes.priority !== undefined) fields.priority = changes.priority;
  if (changes.assignee !== undefined && changes.assignee !== '') {
    const id = Number(changes.assignee);
    if (!Number.isInteger(id)) {
      throw new ClickUpError(`Invalid assignee id: ${changes.assignee}`);
    }
    fields.assignees = { add: [id] };
  }
  if (Object.keys(fields).length === 0) {
    throw new ClickUpError('Must specify at least one update (--status, --priority, or --assignee)');
  }
  return fields;
}

/** Tasks whose status equals `status`, ignoring case. No filter keeps all. */
export function filterByStatus(tasks: readonly Task[], status: string | undefined): Task[] {
  if (status === undefined || status === '') return [...tasks];
  const wanted = status.toLowerCase();
  return tasks.filter((task) => task.status?.status.toLowerCase() === wanted);
}

/**
 * Fetch the tasks of a list that a bulk update would touch. The status
 * filter is sent to ClickUp and applied again locally.
 */
export async function selectTasksForUpdate(
  client: Pick<ClickUpClient, 'getTasks'>,
  listId: string,
  filterStatus?: string,
): Promise<Task[]> {
  const tasks = await client.getTasks(listId, filterStatus ? { statuses: [filterStatus] } : {});
  return filterByStatus(tasks, filterStatus);
}

export interface BulkUpdateSummary {
  updated: number;
  failed: number;
  failures: BulkFailure[];
}

export async function applyBulkUpdate(
  client: Pick<ClickUpClient, 'updateTask'>,
  tasks: readonly Task[],
  fields: TaskFields,
  options: BulkRunOptions = {},
): Promise<BulkUpdateSummary> {
  const log = getLogger('bulk');
  const queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? DEFAULT_BATCH_SIZE) });
  const summary: BulkUpdateSummary = { updated: 0, failed: 0, failures: [] };
  let done = 0;

  await Promise.all(
    tasks.map((task) =>
      queue.add(async () => {
        try {
          await client.updateTask(task.id, fields);
          summary.updated++;
        } catch (err) {
          summary.failed++;
          summary.failures.push({ name: task.name, error: errorMessage(err) });
          log.warn({ taskId: task.id, err: errorMessage(err) }, 'Failed to update task');
        }
        options.onProgress?.(++done, tasks.length);
      }),
    ),
  );

  log.info({ updated: summary.updated, failed: summary.failed }, 'Bulk update finished');
  return summary;
}
