/**
 * Workspace hierarchy discovery: the workspace > space > folder > list tree,
 * flat id listings for copy-paste, and the path from a workspace to a list.
 */

import type { ClickUpClient } from './client.js';
import { ClickUpError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import type { List } from './models.js';

export type HierarchyKind = 'workspace' | 'space' | 'folder' | 'list' | 'group';

export interface HierarchyNode {
  kind: HierarchyKind;
  /** Null for synthetic grouping nodes. */
  id: string | null;
  name: string;
  taskCount?: number | string | null;
  /** Set when the children of this node could not be loaded. */
  error?: string;
  children: HierarchyNode[];
}

export const MIN_DEPTH = 1;
export const MAX_DEPTH = 4;
export const DEFAULT_DEPTH = 3;

export type HierarchyClient = Pick<
  ClickUpClient,
  'getTeams' | 'getTeam' | 'getSpaces' | 'getFolders' | 'getLists' | 'getFolderlessLists' | 'getList'
>;

function listNode(list: List): HierarchyNode {
  return { kind: 'list', id: list.id, name: list.name, taskCount: list.task_count, children: [] };
}

/** Load children, recording a failure on the parent instead of throwing. */
async function loadInto<T>(parent: HierarchyNode, what: string, load: () => Promise<T[]>): Promise<T[]> {
  try {
    return await load();
  } catch (err) {
    if (!(err instanceof ClickUpError)) throw err;
    parent.error = `Error loading ${what}: ${err.message}`;
    getLogger('hierarchy').warn({ parent: parent.id, what, err: errorMessage(err) }, 'Hierarchy branch failed');
    return [];
  }
}

/**
 * Build the hierarchy tree.
 *
 * Depth 1 stops at workspaces, 2 adds spaces, 3 adds folders and a
 * "Folderless Lists" group per space, 4 adds the lists inside folders.
 */
export async function buildHierarchy(
  client: HierarchyClient,
  options: { teamId?: string; depth?: number } = {},
): Promise<HierarchyNode[]> {
  const depth = options.depth ?? DEFAULT_DEPTH;
  if (!Number.isInteger(depth) || depth < MIN_DEPTH || depth > MAX_DEPTH) {
    throw new ClickUpError(`Depth must be between ${MIN_DEPTH} and ${MAX_DEPTH}`);
  }

  const teams = options.teamId ? [await client.getTeam(options.teamId)] : await client.getTeams();
  const roots: HierarchyNode[] = [];

  for (const team of teams) {
    const workspace: HierarchyNode = { kind: 'workspace', id: team.id, name: team.name, children: [] };
    roots.push(workspace);
    if (depth < 2) continue;

    const spaces = await loadInto(workspace, 'spaces', () => client.getSpaces(team.id));
    for (const space of spaces) {
      const spaceNode: HierarchyNode = { kind: 'space', id: space.id, name: space.name, children: [] };
      workspace.children.push(spaceNode);
      if (depth < 3) continue;

      const folders = await loadInto(spaceNode, 'folders', () => client.getFolders(space.id));
      for (const folder of folders) {
        const folderNode: HierarchyNode = {
          kind: 'folder',
          id: folder.id,
          name: folder.name,
          taskCount: folder.task_count,
          children: [],
        };
        spaceNode.children.push(folderNode);
        if (depth < 4) continue;

        const lists = await loadInto(folderNode, 'lists', () => client.getLists(folder.id));
        folderNode.children.push(...lists.map(listNode));
      }

      const folderless = await loadInto(spaceNode, 'folderless lists', () => client.getFolderlessLists(space.id));
      if (folderless.length > 0) {
        spaceNode.children.push({
          kind: 'group',
          id: null,
          name: 'Folderless Lists',
          children: folderless.map(listNode),
        });
      }
    }
  }

  return roots;
}

// ---------------------------------------------------------------------------
// Id listings
// ---------------------------------------------------------------------------

export interface IdRow {
  kind: Exclude<HierarchyKind, 'group'>;
  name: string;
  id: string;
  info: string;
}

export interface IdListing {
  /** What the rows are, e.g. "Spaces in Workspace 123". */
  title: string;
  rows: IdRow[];
}

/**
 * One level of the hierarchy with ids. The most specific scope given wins:
 * folder lists its lists, space its folders and folderless lists, team its
 * spaces, and no scope lists workspaces.
 */
export async function listIds(
  client: HierarchyClient,
  scope: { teamId?: string; spaceId?: string; folderId?: string } = {},
): Promise<IdListing> {
  if (scope.folderId) {
    const lists = await client.getLists(scope.folderId);
    return {
      title: `Lists in Folder ${scope.folderId}`,
      rows: lists.map((l) => ({ kind: 'list', name: l.name, id: l.id, info: `${l.task_count ?? 0} tasks` })),
    };
  }

  if (scope.spaceId) {
    const [folders, lists] = await Promise.all([
      client.getFolders(scope.spaceId),
      client.getFolderlessLists(scope.spaceId),
    ]);
    return {
      title: `Folders and Lists in Space ${scope.spaceId}`,
      rows: [
        ...folders.map((f): IdRow => ({ kind: 'folder', name: f.name, id: f.id, info: `${f.task_count ?? 0} tasks` })),
        ...lists.map((l): IdRow => ({ kind: 'list', name: l.name, id: l.id, info: `${l.task_count ?? 0} tasks` })),
      ],
    };
  }

  if (scope.teamId) {
    const spaces = await client.getSpaces(scope.teamId);
    return {
      title: `Spaces in Workspace ${scope.teamId}`,
      rows: spaces.map((s) => ({
        kind: 'space',
        name: s.name,
        id: s.id,
        info: `${s.private ? 'private' : 'public'}, ${s.statuses.length} statuses`,
      })),
    };
  }

  const teams = await client.getTeams();
  return {
    title: 'Workspaces',
    rows: teams.map((t) => ({ kind: 'workspace', name: t.name, id: t.id, info: `${t.members.length} members` })),
  };
}

// ---------------------------------------------------------------------------
// Path to a list
// ---------------------------------------------------------------------------

export interface PathSegment {
  kind: Exclude<HierarchyKind, 'group'>;
  id: string;
  name: string;
}

/**
 * Workspace > space > [folder >] list for a list id, or null when no
 * accessible workspace contains it. The list's own space and folder
 * references narrow the search when ClickUp sends them.
 */
export async function findListPath(client: HierarchyClient, listId: string): Promise<PathSegment[] | null> {
  const list = await client.getList(listId);
  const target: PathSegment = { kind: 'list', id: list.id, name: list.name };

  for (const team of await client.getTeams()) {
    const spaces = await client.getSpaces(team.id);
    const candidates = list.space ? spaces.filter((s) => s.id === list.space?.id) : spaces;

    for (const space of candidates) {
      const prefix: PathSegment[] = [
        { kind: 'workspace', id: team.id, name: team.name },
        { kind: 'space', id: space.id, name: space.name },
      ];

      // ClickUp files folderless lists under a hidden folder
      if (list.space && list.folder && !list.folder.hidden) {
        return [...prefix, { kind: 'folder', id: list.folder.id, name: list.folder.name ?? list.folder.id }, target];
      }
      if (list.space && (!list.folder || list.folder.hidden)) {
        return [...prefix, target];
      }

      const folderless = await client.getFolderlessLists(space.id);
      if (folderless.some((l) => l.id === listId)) return [...prefix, target];

      for (const folder of await client.getFolders(space.id)) {
        const lists = await client.getLists(folder.id);
        if (lists.some((l) => l.id === listId)) {
          return [...prefix, { kind: 'folder', id: folder.id, name: folder.name }, target];
        }
      }
    }
  }

  return null;
}
