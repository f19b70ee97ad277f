/**
 * Human-readable renderers for task commands.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { CreatedComment, Comment, Task } from '../../core/models.js';
import { userLabel } from '../../core/models.js';
import { dim, formatTimestamp, heading, priorityText, statusText, success, truncate, warning } from './colors.js';

export interface TaskListPayload {
  listId: string;
  tasks: Task[];
  /** Tasks returned by ClickUp before the --limit cut. */
  total: number;
}

export interface TaskDetailPayload {
  task: Task;
  comments?: Comment[];
}

export interface TaskSearchPayload {
  teamId: string;
  query: string;
  tasks: Task[];
}

function assigneesText(task: Task): string {
  return task.assignees.length > 0 ? task.assignees.map(userLabel).join(', ') : dim('unassigned');
}

function taskTable(tasks: readonly Task[]): string {
  const table = new Table({
    head: ['ID', 'Name', 'Status', 'Priority', 'Assignees', 'Due'].map((h) => chalk.bold(h)),
  });
  for (const task of tasks) {
    table.push([
      task.id,
      truncate(task.name, 50),
      statusText(task.status),
      priorityText(task.priority),
      assigneesText(task),
      formatTimestamp(task.due_date),
    ]);
  }
  return table.toString();
}

export function renderTaskList(data: TaskListPayload, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => t.id).join('\n');
  if (data.tasks.length === 0) return warning('No tasks found.');
  const lines = [taskTable(data.tasks)];
  if (data.total > data.tasks.length) {
    lines.push(dim(`Showing ${data.tasks.length} of ${data.total} tasks`));
  }
  return lines.join('\n');
}

export function renderTaskDetail(data: TaskDetailPayload, quiet: boolean): string {
  const { task } = data;
  if (quiet) return task.id;

  const lines = [
    heading(task.name),
    `  ${dim('ID:')}        ${task.id}`,
    `  ${dim('Status:')}    ${statusText(task.status)}`,
    `  ${dim('Priority:')}  ${priorityText(task.priority)}`,
    `  ${dim('Assignees:')} ${assigneesText(task)}`,
    `  ${dim('Due:')}       ${formatTimestamp(task.due_date)}`,
    `  ${dim('Created:')}   ${formatTimestamp(task.date_created)}`,
    `  ${dim('URL:')}       ${task.url ?? '-'}`,
  ];
  if (task.tags.length > 0) {
    lines.push(`  ${dim('Tags:')}      ${task.tags.map((t) => t.name).join(', ')}`);
  }
  if (task.description) {
    lines.push('', task.description);
  }
  if (data.comments) {
    lines.push('', heading(`Comments (${data.comments.length})`));
    for (const comment of data.comments) {
      const author = comment.user ? userLabel(comment.user) : 'unknown';
      lines.push(`  ${chalk.cyan(author)} ${dim(formatTimestamp(comment.date))}`, `    ${comment.comment_text}`);
    }
  }
  return lines.join('\n');
}

export function renderTaskCreated(data: { task: Task }, quiet: boolean): string {
  if (quiet) return data.task.id;
  return [success(`Created task: ${data.task.name}`), `  ID:  ${data.task.id}`, `  URL: ${data.task.url ?? 'N/A'}`].join('\n');
}

export function renderTaskUpdated(data: { task: Task; changes: string[] }, quiet: boolean): string {
  if (quiet) return data.task.id;
  const changed = data.changes.length > 0 ? dim(` (${data.changes.join(', ')})`) : '';
  return success(`Updated task: ${data.task.name}`) + changed;
}

export function renderTaskStatus(data: { task: Task }, quiet: boolean): string {
  if (quiet) return data.task.status?.status ?? '';
  return success(`${data.task.name} is now ${statusText(data.task.status)}`);
}

export function renderTaskDeleted(data: { taskId: string }, quiet: boolean): string {
  if (quiet) return data.taskId;
  return success(`Deleted task ${data.taskId}`);
}

export function renderTaskSearch(data: TaskSearchPayload, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => t.id).join('\n');
  if (data.tasks.length === 0) return warning(`No tasks found for query: ${data.query}`);
  return [heading(`Found ${data.tasks.length} tasks for '${data.query}'`), taskTable(data.tasks)].join('\n');
}

export function renderCommentAdded(data: { taskId: string; comment: CreatedComment }, quiet: boolean): string {
  if (quiet) return data.comment.id;
  return success(`Added comment to task ${data.taskId}`);
}
