/**
 * CLI bulk commands: export-tasks, import-tasks and update.
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import {
  DEFAULT_BATCH_SIZE,
  applyBulkUpdate,
  buildUpdateFields,
  exportTasks,
  importTasks,
  isExportFormat,
  parseImportFile,
  selectTasksForUpdate,
} from '../../core/bulk.js';
import { ClickUpError } from '../../core/errors.js';
import { isQuiet } from '../format-context.js';
import { failCommand, requireClient, resolveListOption } from '../context.js';
import { parsePositiveInt, parsePriority } from '../options.js';
import { confirmAction } from '../prompt.js';
import { warning } from '../renderers/colors.js';
import { cliOutput } from '../renderers/index.js';

interface ExportOptions {
  listId?: string;
  format: string;
  output: string;
  includeClosed?: boolean;
}

interface ImportOptions {
  listId?: string;
  dryRun?: boolean;
  batchSize: number;
  yes?: boolean;
}

interface UpdateOptions {
  listId?: string;
  filterStatus?: string;
  status?: string;
  priority?: number;
  assignee?: string;
  batchSize: number;
  dryRun?: boolean;
  yes?: boolean;
}

function progress(label: string): (done: number, total: number) => void {
  return (done, total) => {
    if (!isQuiet() && process.stderr.isTTY) {
      process.stderr.write(`\r${label} ${done}/${total}${done === total ? '\n' : ''}`);
    }
  };
}

export function registerBulkCommand(program: Command): void {
  const bulk = program.command('bulk').description('Bulk operations and import/export');

  bulk
    .command('export-tasks')
    .description('Export the tasks of a list to a CSV or JSON file')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('-f, --format <format>', 'Output format: csv, json', 'csv')
    .requiredOption('-o, --output <file>', 'Output file path')
    .option('--include-closed', 'Include closed tasks')
    .action(async (opts: ExportOptions) => {
      try {
        if (!isExportFormat(opts.format)) {
          throw new ClickUpError(`Unsupported format: ${opts.format}. Use csv or json.`);
        }
        const listId = resolveListOption(opts.listId);
        const tasks = await requireClient().getTasks(listId, opts.includeClosed ? { include_closed: true } : {});
        await writeFile(opts.output, exportTasks(tasks, opts.format), 'utf-8');
        cliOutput({ file: opts.output, format: opts.format, count: tasks.length }, { command: 'bulk.export' });
      } catch (err) {
        failCommand(err);
      }
    });

  bulk
    .command('import-tasks <file>')
    .description('Create tasks from a CSV or JSON file')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('--dry-run', 'Preview without creating tasks')
    .option('--batch-size <n>', 'Tasks created in parallel', parsePositiveInt, DEFAULT_BATCH_SIZE)
    .option('-y, --yes', 'Skip confirmation')
    .action(async (file: string, opts: ImportOptions) => {
      try {
        const listId = resolveListOption(opts.listId);
        const rows = parseImportFile(file, await readFile(file, 'utf-8'));
        if (rows.length === 0) {
          console.error(warning('No tasks found in file.'));
          return;
        }
        if (opts.dryRun) {
          cliOutput({ file, listId, rows }, { command: 'bulk.import-preview' });
          return;
        }
        if (!opts.yes && !(await confirmAction(`Import ${rows.length} tasks into list ${listId}?`))) {
          console.error('Import cancelled.');
          return;
        }
        const summary = await importTasks(requireClient(), listId, rows, {
          concurrency: opts.batchSize,
          onProgress: progress('Importing'),
        });
        cliOutput({ listId, summary }, { command: 'bulk.import' });
      } catch (err) {
        failCommand(err);
      }
    });

  bulk
    .command('update')
    .description('Update every task in a list that matches a status filter')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('--filter-status <status>', 'Only update tasks with this status')
    .option('-s, --status <status>', 'New status')
    .option('-p, --priority <n>', 'New priority (1-4)', parsePriority)
    .option('-a, --assignee <userId>', 'User ID to add as assignee')
    .option('--batch-size <n>', 'Tasks updated in parallel', parsePositiveInt, DEFAULT_BATCH_SIZE)
    .option('--dry-run', 'Preview without applying')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (opts: UpdateOptions) => {
      try {
        const fields = buildUpdateFields({ status: opts.status, priority: opts.priority, assignee: opts.assignee });
        const listId = resolveListOption(opts.listId);
        const client = requireClient();
        const tasks = await selectTasksForUpdate(client, listId, opts.filterStatus);

        if (tasks.length === 0 || opts.dryRun) {
          cliOutput({ listId, tasks, fields }, { command: 'bulk.update-preview' });
          return;
        }
        if (!opts.yes) {
          cliOutput({ listId, tasks, fields }, { command: 'bulk.update-preview' });
          if (!(await confirmAction(`Apply updates to ${tasks.length} tasks?`))) {
            console.error('Bulk update cancelled.');
            return;
          }
        }
        const summary = await applyBulkUpdate(client, tasks, fields, {
          concurrency: opts.batchSize,
          onProgress: progress('Updating'),
        });
        cliOutput({ listId, summary }, { command: 'bulk.update' });
      } catch (err) {
        failCommand(err);
      }
    });
}
