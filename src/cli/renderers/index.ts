/**
 * Central output dispatch for CLI commands.
 *
 * Commands call:
 *   cliOutput(data, { command: 'task.list' })
 *
 * The resolved format decides between the human renderer registered for
 * the command and the JSON envelope `{ success, command, result }`.
 * Errors go to stderr through cliError().
 */

import type { AuthCheck, TaskFields } from '../../core/client.js';
import { ClickUpError, errorMessage, isLocalError, isRemoteError } from '../../core/errors.js';
import type { HierarchyNode, IdListing, PathSegment } from '../../core/hierarchy.js';
import type { Comment, CreatedComment, Folder, List, Space, Task, Team, User } from '../../core/models.js';
import type { TaskTemplate, TemplateEntry } from '../../core/templates.js';
import type { BulkUpdateSummary, ImportRow, ImportSummary } from '../../core/bulk.js';
import { getFormatContext } from '../format-context.js';

import {
  renderCommentAdded,
  renderTaskCreated,
  renderTaskDeleted,
  renderTaskDetail,
  renderTaskList,
  renderTaskSearch,
  renderTaskStatus,
  renderTaskUpdated,
  type TaskListPayload,
  type TaskSearchPayload,
} from './tasks.js';
import {
  renderFolders,
  renderListCreated,
  renderListDetail,
  renderLists,
  renderMembers,
  renderSpaces,
  renderWorkspaces,
  type ListShowPayload,
} from './workspace.js';
import { renderHierarchy, renderIdListing, renderListPath } from './tree.js';
import {
  renderAuthCheck,
  renderConfigGet,
  renderConfigShow,
  renderDefaultLists,
  renderExportDone,
  renderGeneric,
  renderImportDone,
  renderImportPreview,
  renderMessage,
  renderSetup,
  renderStatus,
  renderTemplateCreate,
  renderTemplateList,
  renderTemplateSaved,
  renderTemplateShow,
  renderUpdateDone,
  renderUpdatePreview,
  type SetupPayload,
  type StatusPayload,
  type TemplateCreatePayload,
} from './system.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to its payload and human renderer
// ---------------------------------------------------------------------------

export interface CommandPayloads {
  'task.list': TaskListPayload;
  'task.get': { task: Task; comments?: Comment[] };
  'task.create': { task: Task };
  'task.update': { task: Task; changes: string[] };
  'task.status': { task: Task };
  'task.delete': { taskId: string; deleted: true };
  'task.search': TaskSearchPayload;
  'task.comment': { taskId: string; comment: CreatedComment };
  'task.export': { file: string; format: string; count: number };
  'list.show': ListShowPayload;
  'list.get': { list: List };
  'list.create': { list: List };
  'workspace.list': { workspaces: Team[] };
  'workspace.spaces': { teamId: string; spaces: Space[] };
  'workspace.folders': { spaceId: string; folders: Folder[] };
  'workspace.members': { teamId: string; members: User[] };
  'config.show': { path: string; settings: Record<string, unknown> };
  'config.get': { key: string; value: unknown };
  'config.validate': AuthCheck;
  'config.default-lists': { lists: Record<string, string> };
  'discover.hierarchy': { roots: HierarchyNode[]; depth: number };
  'discover.ids': IdListing;
  'discover.path': { listId: string; path: PathSegment[] | null };
  'bulk.export': { file: string; format: string; count: number };
  'bulk.import-preview': { file: string; listId: string; rows: ImportRow[] };
  'bulk.import': { listId: string; summary: ImportSummary };
  'bulk.update-preview': { listId: string; tasks: Task[]; fields: TaskFields };
  'bulk.update': { listId: string; summary: BulkUpdateSummary };
  'template.list': { templates: TemplateEntry[] };
  'template.show': TemplateEntry;
  'template.create': TemplateCreatePayload;
  'template.save': { key: string; path: string; template: TaskTemplate };
  'setup.wizard': SetupPayload;
  status: StatusPayload;
  message: { message: string };
  generic: Record<string, unknown>;
}

export type CommandName = keyof CommandPayloads;

type HumanRenderer<K extends CommandName> = (data: CommandPayloads[K], quiet: boolean) => string;
type RendererMap = { [K in CommandName]: HumanRenderer<K> };

const renderers: RendererMap = {
  'task.list': renderTaskList,
  'task.get': renderTaskDetail,
  'task.create': renderTaskCreated,
  'task.update': renderTaskUpdated,
  'task.status': renderTaskStatus,
  'task.delete': renderTaskDeleted,
  'task.search': renderTaskSearch,
  'task.comment': renderCommentAdded,
  'task.export': renderExportDone,
  'list.show': renderLists,
  'list.get': renderListDetail,
  'list.create': renderListCreated,
  'workspace.list': renderWorkspaces,
  'workspace.spaces': renderSpaces,
  'workspace.folders': renderFolders,
  'workspace.members': renderMembers,
  'config.show': renderConfigShow,
  'config.get': renderConfigGet,
  'config.validate': renderAuthCheck,
  'config.default-lists': renderDefaultLists,
  'discover.hierarchy': renderHierarchy,
  'discover.ids': renderIdListing,
  'discover.path': renderListPath,
  'bulk.export': renderExportDone,
  'bulk.import-preview': renderImportPreview,
  'bulk.import': renderImportDone,
  'bulk.update-preview': renderUpdatePreview,
  'bulk.update': renderUpdateDone,
  'template.list': renderTemplateList,
  'template.show': renderTemplateShow,
  'template.create': renderTemplateCreate,
  'template.save': renderTemplateSaved,
  'setup.wizard': renderSetup,
  status: renderStatus,
  message: renderMessage,
  generic: renderGeneric,
};

/** Human rendering of a payload, without printing it. */
export function renderHuman<K extends CommandName>(command: K, data: CommandPayloads[K], quiet = false): string {
  const renderer: HumanRenderer<K> = renderers[command];
  return renderer(data, quiet);
}

export interface CliOutputOptions<K extends CommandName> {
  command: K;
}

/**
 * Write a command result to stdout in the resolved format.
 */
export function cliOutput<K extends CommandName>(data: CommandPayloads[K], opts: CliOutputOptions<K>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = renderHuman(opts.command, data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(JSON.stringify({ success: true, command: opts.command, result: data }, null, 2));
}

/** Human label telling local misconfiguration apart from API failures. */
function errorLabel(err: unknown): string {
  if (isLocalError(err)) return 'Configuration Error';
  if (isRemoteError(err)) return 'ClickUp API Error';
  return 'Error';
}

/**
 * Write an error to stderr in the resolved format: a labelled message plus a
 * `Fix:` line for humans, the structured error body for JSON.
 */
export function cliError(err: unknown): void {
  const ctx = getFormatContext();

  if (ctx.format === 'json') {
    const body =
      err instanceof ClickUpError
        ? err.toJSON()
        : { success: false, error: { code: 'E_GENERAL', message: errorMessage(err) } };
    console.error(JSON.stringify(body, null, 2));
    return;
  }

  console.error(`${errorLabel(err)}: ${errorMessage(err)}`);
  if (err instanceof ClickUpError && err.fix) {
    console.error(`Fix: ${err.fix}`);
  }
}
