/**
 * Human-readable renderers for workspace and list commands.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { Folder, List, Space, Team, User } from '../../core/models.js';
import { dim, heading, success, warning } from './colors.js';

function table(head: string[], rows: string[][]): string {
  const t = new Table({ head: head.map((h) => chalk.bold(h)) });
  for (const row of rows) t.push(row);
  return t.toString();
}

export function renderWorkspaces(data: { workspaces: Team[] }, quiet: boolean): string {
  if (quiet) return data.workspaces.map((w) => w.id).join('\n');
  if (data.workspaces.length === 0) return warning('No workspaces found.');
  return table(
    ['ID', 'Name', 'Members'],
    data.workspaces.map((w) => [w.id, w.name, String(w.members.length)]),
  );
}

export function renderSpaces(data: { teamId: string; spaces: Space[] }, quiet: boolean): string {
  if (quiet) return data.spaces.map((s) => s.id).join('\n');
  if (data.spaces.length === 0) return warning('No spaces found in this workspace.');
  return [
    heading(`Spaces in workspace ${data.teamId}`),
    table(
      ['ID', 'Name', 'Private', 'Statuses'],
      data.spaces.map((s) => [s.id, s.name, s.private ? 'yes' : 'no', s.statuses.map((st) => st.status).join(', ')]),
    ),
  ].join('\n');
}

export function renderFolders(data: { spaceId: string; folders: Folder[] }, quiet: boolean): string {
  if (quiet) return data.folders.map((f) => f.id).join('\n');
  if (data.folders.length === 0) return warning('No folders found in this space.');
  return [
    heading(`Folders in space ${data.spaceId}`),
    table(
      ['ID', 'Name', 'Lists', 'Tasks'],
      data.folders.map((f) => [f.id, f.name, String(f.lists.length), f.task_count ?? '0']),
    ),
  ].join('\n');
}

export function renderMembers(data: { teamId: string; members: User[] }, quiet: boolean): string {
  if (quiet) return data.members.map((m) => String(m.id)).join('\n');
  if (data.members.length === 0) return warning('No members found.');
  return table(
    ['ID', 'Username', 'Email'],
    data.members.map((m) => [String(m.id), m.username ?? '-', m.email ?? '-']),
  );
}

export interface ListShowPayload {
  scope: 'folder' | 'space';
  scopeId: string;
  lists: List[];
}

export function renderLists(data: ListShowPayload, quiet: boolean): string {
  if (quiet) return data.lists.map((l) => l.id).join('\n');
  if (data.lists.length === 0) return warning(`No lists found in this ${data.scope}.`);
  return [
    heading(`Lists in ${data.scope} ${data.scopeId}`),
    table(
      ['ID', 'Name', 'Tasks'],
      data.lists.map((l) => [l.id, l.name, String(l.task_count ?? 0)]),
    ),
  ].join('\n');
}

export function renderListDetail(data: { list: List }, quiet: boolean): string {
  const { list } = data;
  if (quiet) return list.id;
  const lines = [
    heading(list.name),
    `  ${dim('ID:')}     ${list.id}`,
    `  ${dim('Tasks:')}  ${list.task_count ?? 0}`,
    `  ${dim('Folder:')} ${list.folder && !list.folder.hidden ? `${list.folder.name ?? ''} (${list.folder.id})` : '-'}`,
    `  ${dim('Space:')}  ${list.space ? `${list.space.name ?? ''} (${list.space.id})` : '-'}`,
  ];
  if (list.content) lines.push('', list.content);
  return lines.join('\n');
}

export function renderListCreated(data: { list: List }, quiet: boolean): string {
  if (quiet) return data.list.id;
  return [success(`Created list: ${data.list.name}`), `  ID: ${data.list.id}`].join('\n');
}
