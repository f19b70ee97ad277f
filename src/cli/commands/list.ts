/**
 * CLI list commands: show the lists of a folder or space, show one list,
 * create a list.
 */

import { Command } from 'commander';
import { ClickUpError } from '../../core/errors.js';
import { failCommand, getCliConfig, requireClient } from '../context.js';
import { cliOutput } from '../renderers/index.js';

interface ScopeOptions {
  folderId?: string;
  spaceId?: string;
}

/** Exactly one of --folder-id / --space-id; show falls back to the default space. */
function scopeOf(opts: ScopeOptions, allowDefault: boolean): { scope: 'folder' | 'space'; id: string } {
  if (opts.folderId && opts.spaceId) {
    throw new ClickUpError('Use either --folder-id or --space-id, not both.');
  }
  if (opts.folderId) return { scope: 'folder', id: opts.folderId };
  if (opts.spaceId) return { scope: 'space', id: opts.spaceId };
  const fallback = allowDefault ? getCliConfig().getDefaultSpaceId() : undefined;
  if (fallback !== undefined) return { scope: 'space', id: fallback };
  throw new ClickUpError('Specify --folder-id or --space-id.');
}

export function registerListCommand(program: Command): void {
  const list = program.command('list').description('Work with ClickUp lists');

  list
    .command('show')
    .description('Show lists in a folder or space (folderless lists)')
    .option('--folder-id <id>', 'Folder ID')
    .option('--space-id <id>', 'Space ID (default: configured default space)')
    .action(async (opts: ScopeOptions) => {
      try {
        const { scope, id } = scopeOf(opts, true);
        const client = requireClient();
        const lists = scope === 'folder' ? await client.getLists(id) : await client.getFolderlessLists(id);
        cliOutput({ scope, scopeId: id, lists }, { command: 'list.show' });
      } catch (err) {
        failCommand(err);
      }
    });

  list
    .command('get <listId>')
    .description('Show a list by ID or alias')
    .action(async (ref: string) => {
      try {
        const listId = getCliConfig().resolveListId(ref);
        const found = await requireClient().getList(listId);
        cliOutput({ list: found }, { command: 'list.get' });
      } catch (err) {
        failCommand(err);
      }
    });

  list
    .command('create <name>')
    .description('Create a list in a folder, or directly in a space')
    .option('--folder-id <id>', 'Folder to create the list in')
    .option('--space-id <id>', 'Space to create a folderless list in')
    .option('--content <text>', 'List description')
    .action(async (name: string, opts: ScopeOptions & { content?: string }) => {
      try {
        const { scope, id } = scopeOf(opts, false);
        const fields = opts.content !== undefined ? { content: opts.content } : {};
        const client = requireClient();
        const created =
          scope === 'folder'
            ? await client.createList(id, name, fields)
            : await client.createFolderlessList(id, name, fields);
        cliOutput({ list: created }, { command: 'list.create' });
      } catch (err) {
        failCommand(err);
      }
    });
}
