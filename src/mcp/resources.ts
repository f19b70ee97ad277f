/**
 * Read-only JSON resources: workspaces, plus spaces, folders, lists and
 * members addressed by parent id.
 */

import type { ClickUpClient } from '../core/client.js';
import { getLogger } from '../core/logger.js';
import { errorToText } from './errors.js';
import type { ToolContext } from './tools.js';

export const RESOURCE_MIME_TYPE = 'application/json';

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceTemplateDescriptor {
  uriTemplate: string;
  name: string;
  description: string;
  mimeType: string;
}

export const RESOURCES: readonly ResourceDescriptor[] = [
  {
    uri: 'clickup://workspaces',
    name: 'Workspaces',
    description: 'All workspaces (teams) the token can see',
    mimeType: RESOURCE_MIME_TYPE,
  },
];

export const RESOURCE_TEMPLATES: readonly ResourceTemplateDescriptor[] = [
  {
    uriTemplate: 'clickup://spaces/{team_id}',
    name: 'Spaces',
    description: 'Spaces in a workspace',
    mimeType: RESOURCE_MIME_TYPE,
  },
  {
    uriTemplate: 'clickup://folders/{space_id}',
    name: 'Folders',
    description: 'Folders in a space',
    mimeType: RESOURCE_MIME_TYPE,
  },
  {
    uriTemplate: 'clickup://lists/{folder_id}',
    name: 'Lists',
    description: 'Lists in a folder',
    mimeType: RESOURCE_MIME_TYPE,
  },
  {
    uriTemplate: 'clickup://members/{team_id}',
    name: 'Team Members',
    description: 'Members of a workspace',
    mimeType: RESOURCE_MIME_TYPE,
  },
];

export type ResourceRef =
  | { kind: 'workspaces' }
  | { kind: 'spaces' | 'folders' | 'lists' | 'members'; id: string };

const SCOPED_URI = /^clickup:\/\/(spaces|folders|lists|members)\/([^/?#]+)$/;

function decodeId(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

/** Parse a resource URI; null when it names no known resource. */
export function parseResourceUri(uri: string): ResourceRef | null {
  if (uri === 'clickup://workspaces') return { kind: 'workspaces' };
  const match = SCOPED_URI.exec(uri);
  const kind = match?.[1];
  const raw = match?.[2];
  const id = raw === undefined ? null : decodeId(raw);
  if (id === null) return null;
  switch (kind) {
    case 'spaces':
    case 'folders':
    case 'lists':
    case 'members':
      return { kind, id };
    default:
      return null;
  }
}

async function loadResource(client: ClickUpClient, ref: ResourceRef): Promise<unknown> {
  switch (ref.kind) {
    case 'workspaces':
      return (await client.getTeams()).map((team) => ({
        id: team.id,
        name: team.name,
        color: team.color,
        member_count: team.members.length,
      }));
    case 'spaces':
      return (await client.getSpaces(ref.id)).map((space) => ({
        id: space.id,
        name: space.name,
        private: space.private,
        status_count: space.statuses.length,
      }));
    case 'folders':
      return (await client.getFolders(ref.id)).map((folder) => ({
        id: folder.id,
        name: folder.name,
        hidden: folder.hidden,
        task_count: folder.task_count,
      }));
    case 'lists':
      return (await client.getLists(ref.id)).map((list) => ({
        id: list.id,
        name: list.name,
        task_count: list.task_count,
        archived: list.archived,
      }));
    case 'members':
      return (await client.getTeamMembers(ref.id)).map((user) => ({
        id: user.id,
        username: user.username,
        email: user.email,
        color: user.color,
      }));
  }
}

/**
 * Resource body as pretty JSON. Failures come back as `{ "error": ... }`
 * in the body rather than as protocol errors.
 */
export async function readResource(uri: string, ctx: ToolContext): Promise<string> {
  const ref = parseResourceUri(uri);
  if (ref === null) {
    return JSON.stringify({ error: `Unknown resource: ${uri}` }, null, 2);
  }
  try {
    return JSON.stringify(await loadResource(ctx.getClient(), ref), null, 2);
  } catch (err) {
    getLogger('mcp').warn({ uri, err }, 'Resource read failed');
    return JSON.stringify({ error: errorToText(err).replace(/^❌ /, '') }, null, 2);
  }
}
