/**
 * CLI task commands: list, get, create, update, status, delete, search,
 * comment and export.
 */

import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { exportTasks, isExportFormat } from '../../core/bulk.js';
import type { TaskFields, TaskFilters } from '../../core/client.js';
import { ClickUpError } from '../../core/errors.js';
import { failCommand, requireClient, resolveListOption, resolveTeamOption } from '../context.js';
import { collect, parseDueDate, parsePositiveInt, parsePriority, parseUserId } from '../options.js';
import { confirmAction } from '../prompt.js';
import { warning } from '../renderers/colors.js';
import { cliOutput } from '../renderers/index.js';

interface ListOptions {
  listId?: string;
  status: string[];
  assignee: string[];
  limit: number;
  includeClosed?: boolean;
}

interface CreateOptions {
  listId?: string;
  description?: string;
  priority?: number;
  assignee: number[];
  dueDate?: number;
  tag: string[];
  status?: string;
}

interface UpdateOptions {
  name?: string;
  description?: string;
  status?: string;
  priority?: number;
}

interface ExportOptions {
  listId?: string;
  format: string;
  output?: string;
  includeClosed?: boolean;
}

function collectUserIds(value: string, previous: number[] = []): number[] {
  return [...previous, parseUserId(value)];
}

/** Build the create body from command-line options. */
export function createFields(opts: CreateOptions): TaskFields {
  const fields: TaskFields = {};
  if (opts.description !== undefined) fields.description = opts.description;
  if (opts.priority !== undefined) fields.priority = opts.priority;
  if (opts.assignee.length > 0) fields.assignees = opts.assignee;
  if (opts.dueDate !== undefined) fields.due_date = opts.dueDate;
  if (opts.tag.length > 0) fields.tags = opts.tag;
  if (opts.status !== undefined) fields.status = opts.status;
  return fields;
}

/** Build a partial update body; empty when nothing was asked for. */
export function updateFields(opts: UpdateOptions): TaskFields {
  const fields: TaskFields = {};
  if (opts.name !== undefined) fields.name = opts.name;
  if (opts.description !== undefined) fields.description = opts.description;
  if (opts.status !== undefined) fields.status = opts.status;
  if (opts.priority !== undefined) fields.priority = opts.priority;
  return fields;
}

export function registerTaskCommand(program: Command): void {
  const task = program.command('task').description('Create, read, update and delete tasks');

  task
    .command('list')
    .description('List tasks in a list')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('-s, --status <status>', 'Filter by status (repeatable)', collect, [])
    .option('-a, --assignee <userId>', 'Filter by assignee user ID (repeatable)', collect, [])
    .option('--limit <n>', 'Maximum number of tasks to show', parsePositiveInt, 50)
    .option('--include-closed', 'Include closed tasks')
    .action(async (opts: ListOptions) => {
      try {
        const listId = resolveListOption(opts.listId);
        const filters: TaskFilters = {};
        if (opts.status.length > 0) filters.statuses = opts.status;
        if (opts.assignee.length > 0) filters.assignees = opts.assignee;
        if (opts.includeClosed) filters.include_closed = true;

        const tasks = await requireClient().getTasks(listId, filters);
        cliOutput({ listId, tasks: tasks.slice(0, opts.limit), total: tasks.length }, { command: 'task.list' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('get <taskId>')
    .description('Show a task')
    .option('--comments', 'Include comments')
    .action(async (taskId: string, opts: { comments?: boolean }) => {
      try {
        const client = requireClient();
        const found = await client.getTask(taskId);
        const comments = opts.comments ? await client.getTaskComments(taskId) : undefined;
        cliOutput(comments ? { task: found, comments } : { task: found }, { command: 'task.get' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('create <name>')
    .description('Create a task')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('-d, --description <text>', 'Task description')
    .option('-p, --priority <n>', 'Priority (1=urgent, 4=low)', parsePriority)
    .option('-a, --assignee <userId>', 'Assignee user ID (repeatable)', collectUserIds, [])
    .option('--due-date <date>', 'Due date (YYYY-MM-DD)', parseDueDate)
    .option('--tag <tag>', 'Tag name (repeatable)', collect, [])
    .option('-s, --status <status>', 'Initial status')
    .action(async (name: string, opts: CreateOptions) => {
      try {
        const listId = resolveListOption(opts.listId);
        const created = await requireClient().createTask(listId, name, createFields(opts));
        cliOutput({ task: created }, { command: 'task.create' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('update <taskId>')
    .description('Update task fields')
    .option('-n, --name <name>', 'New name')
    .option('-d, --description <text>', 'New description')
    .option('-s, --status <status>', 'New status')
    .option('-p, --priority <n>', 'New priority (1-4)', parsePriority)
    .action(async (taskId: string, opts: UpdateOptions) => {
      const fields = updateFields(opts);
      if (Object.keys(fields).length === 0) {
        console.error(warning('No updates specified.'));
        return;
      }
      try {
        const updated = await requireClient().updateTask(taskId, fields);
        cliOutput({ task: updated, changes: Object.keys(fields) }, { command: 'task.update' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('status <taskId> <status>')
    .description('Change the status of a task')
    .action(async (taskId: string, status: string) => {
      try {
        const updated = await requireClient().updateTask(taskId, { status });
        cliOutput({ task: updated }, { command: 'task.status' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('delete <taskId>')
    .description('Delete a task')
    .option('-f, --force', 'Skip confirmation')
    .action(async (taskId: string, opts: { force?: boolean }) => {
      try {
        const client = requireClient();
        if (!opts.force) {
          const target = await client.getTask(taskId);
          if (!(await confirmAction(`Delete task '${target.name}' (${taskId})?`))) {
            console.error('Deletion cancelled.');
            return;
          }
        }
        await client.deleteTask(taskId);
        cliOutput({ taskId, deleted: true }, { command: 'task.delete' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('search <query>')
    .description('Search tasks across a workspace')
    .option('-t, --team-id <id>', 'Workspace (team) ID (default: configured default team)')
    .action(async (query: string, opts: { teamId?: string }) => {
      try {
        const teamId = resolveTeamOption(opts.teamId);
        const tasks = await requireClient().searchTasks(teamId, query);
        cliOutput({ teamId, query, tasks }, { command: 'task.search' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('comment <taskId> <text>')
    .description('Add a comment to a task')
    .action(async (taskId: string, text: string) => {
      try {
        const comment = await requireClient().createComment(taskId, text);
        cliOutput({ taskId, comment }, { command: 'task.comment' });
      } catch (err) {
        failCommand(err);
      }
    });

  task
    .command('export')
    .description('Export the tasks of a list as JSON or CSV')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('-f, --format <format>', 'Output format: json, csv', 'json')
    .option('-o, --output <file>', 'Output file (stdout if omitted)')
    .option('--include-closed', 'Include closed tasks')
    .action(async (opts: ExportOptions) => {
      try {
        if (!isExportFormat(opts.format)) {
          throw new ClickUpError(`Unsupported format: ${opts.format}. Use json or csv.`);
        }
        const listId = resolveListOption(opts.listId);
        const tasks = await requireClient().getTasks(listId, opts.includeClosed ? { include_closed: true } : {});
        const content = exportTasks(tasks, opts.format);

        if (opts.output) {
          await writeFile(opts.output, content, 'utf-8');
          cliOutput({ file: opts.output, format: opts.format, count: tasks.length }, { command: 'task.export' });
        } else {
          process.stdout.write(content);
        }
      } catch (err) {
        failCommand(err);
      }
    });
}
