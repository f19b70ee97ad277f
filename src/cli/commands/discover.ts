/**
 * CLI discover commands: hierarchy tree, id listings and list paths.
 */

import { Command, InvalidArgumentError } from 'commander';
import { buildHierarchy, DEFAULT_DEPTH, findListPath, listIds, MAX_DEPTH, MIN_DEPTH } from '../../core/hierarchy.js';
import { failCommand, getCliConfig, requireClient } from '../context.js';
import { cliOutput } from '../renderers/index.js';

function parseDepth(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < MIN_DEPTH || n > MAX_DEPTH) {
    throw new InvalidArgumentError(`Depth must be between ${MIN_DEPTH} and ${MAX_DEPTH}.`);
  }
  return n;
}

export function registerDiscoverCommand(program: Command): void {
  const discover = program.command('discover').description('Discover and navigate the ClickUp hierarchy');

  discover
    .command('hierarchy')
    .description('Show the workspace > space > folder > list tree')
    .option('-t, --team-id <id>', 'Only this workspace (default: all)')
    .option('-d, --depth <n>', 'Levels to explore (1-4)', parseDepth, DEFAULT_DEPTH)
    .action(async (opts: { teamId?: string; depth: number }) => {
      try {
        const roots = await buildHierarchy(requireClient(), { teamId: opts.teamId, depth: opts.depth });
        cliOutput({ roots, depth: opts.depth }, { command: 'discover.hierarchy' });
      } catch (err) {
        failCommand(err);
      }
    });

  discover
    .command('ids')
    .description('Show IDs for copy-paste: workspaces, or the contents of a team, space or folder')
    .option('-t, --team-id <id>', 'Spaces in this workspace')
    .option('-s, --space-id <id>', 'Folders and folderless lists in this space')
    .option('-f, --folder-id <id>', 'Lists in this folder')
    .action(async (opts: { teamId?: string; spaceId?: string; folderId?: string }) => {
      try {
        const listing = await listIds(requireClient(), opts);
        cliOutput(listing, { command: 'discover.ids' });
      } catch (err) {
        failCommand(err);
      }
    });

  discover
    .command('path <listId>')
    .description('Show the path from the workspace to a list')
    .action(async (ref: string) => {
      try {
        const listId = getCliConfig().resolveListId(ref);
        const path = await findListPath(requireClient(), listId);
        cliOutput({ listId, path }, { command: 'discover.path' });
        if (path === null) process.exitCode = 1;
      } catch (err) {
        failCommand(err);
      }
    });
}
