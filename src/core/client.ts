/**
 * Typed client for the ClickUp REST API (v2).
 *
 * Each operation is one logical remote call. Rate limits are waited out
 * and retried, connect failures are retried with exponential backoff, and
 * timeouts are retried only for idempotent methods: a POST that timed out
 * may already have been applied.
 */

import {
  ClickUpError,
  ConfigurationError,
  NetworkError,
  RateLimitError,
  AuthenticationError,
  AuthorizationError,
  errorMessage,
} from './errors.js';
import {
  IDEMPOTENT_METHODS,
  TransportFailure,
  buildQuery,
  classifyTransportFailure,
  interpretResponse,
  joinUrl,
  type HttpMethod,
  type QueryParams,
} from './http.js';
import { getLogger } from './logger.js';
import {
  CommentSchema,
  CreatedCommentSchema,
  FolderSchema,
  ListSchema,
  SpaceSchema,
  TaskSchema,
  TeamSchema,
  UserSchema,
  parseRecord,
  parseRecords,
  userLabel,
  type Comment,
  type CreatedComment,
  type Folder,
  type List,
  type Space,
  type Task,
  type Team,
  type User,
} from './models.js';
import { isJsonObject } from '../store/json.js';

/** What the client needs from the configuration store. */
export interface ClientConfig {
  getBaseUrl(): string;
  /** Seconds. */
  getTimeout(): number;
  getMaxRetries(): number;
  getHeaders(): Record<string, string>;
}

export interface ClientOptions {
  fetch?: typeof fetch;
  /** Injected for tests; defaults to a real timer. */
  sleep?: (ms: number) => Promise<void>;
}

/** Filters for task listings; keys are passed to ClickUp unchanged. */
export interface TaskFilters extends QueryParams {
  archived?: boolean;
  page?: number;
  order_by?: string;
  reverse?: boolean;
  subtasks?: boolean;
  include_closed?: boolean;
  statuses?: readonly string[];
  assignees?: readonly (string | number)[];
  tags?: readonly string[];
}

/** Body fields for task creation and updates; ClickUp validates them. */
export interface TaskFields {
  [key: string]: unknown;
  name?: string;
  description?: string;
  status?: string;
  priority?: number | null;
  assignees?: number[] | { add?: number[]; rem?: number[] };
  tags?: string[];
  due_date?: number;
  due_date_time?: boolean;
  start_date?: number;
  parent?: string;
}

export interface ListFields {
  [key: string]: unknown;
  content?: string;
  due_date?: number;
  priority?: number;
  assignee?: number;
  status?: string;
}

export type AuthFailureReason = 'not_configured' | 'invalid_token' | 'forbidden' | 'network' | 'api_error';

export type AuthCheck =
  | { valid: true; user: User; message: string }
  | { valid: false; reason: AuthFailureReason; message: string };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Array under `key` in a collection response; missing means empty. */
function collection(body: unknown, key: string): unknown[] {
  if (!isJsonObject(body)) return [];
  const items = body[key];
  return Array.isArray(items) ? items : [];
}

function field(body: unknown, key: string): unknown {
  return isJsonObject(body) ? body[key] : undefined;
}

const enc = encodeURIComponent;

export class ClickUpClient {
  private readonly log = getLogger('client');
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: ClientConfig,
    options: ClientOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  // ---------------------------------------------------------------------------
  // Request pipeline
  // ---------------------------------------------------------------------------

  /**
   * Issue one request with the configured timeout. The body is read inside
   * the timed window so a stalled response also counts as a timeout.
   */
  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body: unknown,
  ): Promise<{ status: number; headers: Headers; text: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.getTimeout() * 1000);

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, headers: response.headers, text };
    } catch (err) {
      throw new TransportFailure(classifyTransportFailure(err, timedOut), err);
    } finally {
      clearTimeout(timer);
    }
  }

  private async request(
    method: HttpMethod,
    path: string,
    options: { params?: QueryParams; body?: unknown } = {},
  ): Promise<unknown> {
    const url = joinUrl(this.config.getBaseUrl(), path) + buildQuery(options.params);
    const headers = this.config.getHeaders();
    const maxRetries = this.config.getMaxRetries();
    let lastFailure: TransportFailure | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      this.log.debug({ method, path, attempt }, 'ClickUp request');

      let raw: { status: number; headers: Headers; text: string };
      try {
        raw = await this.send(method, url, headers, options.body);
      } catch (err) {
        if (!(err instanceof TransportFailure)) throw err;
        lastFailure = err;
        if (err.kind !== 'connect' && !IDEMPOTENT_METHODS.has(method)) {
          throw new NetworkError(`Network error (${err.kind}) on ${method} ${path}: ${err.message}`, { cause: err.cause });
        }
        if (attempt === maxRetries) break;
        const delay = 2 ** attempt * 1000;
        this.log.warn({ method, path, attempt, kind: err.kind, delay }, 'Network failure, retrying');
        await this.sleep(delay);
        continue;
      }

      this.log.debug({ method, path, status: raw.status }, 'ClickUp response');
      try {
        return interpretResponse(raw.status, raw.headers, raw.text);
      } catch (err) {
        if (err instanceof RateLimitError && attempt < maxRetries) {
          this.log.warn({ method, path, attempt, retryAfter: err.retryAfter }, 'Rate limited, waiting');
          await this.sleep(err.retryAfter * 1000);
          continue;
        }
        throw err;
      }
    }

    if (lastFailure) {
      throw new NetworkError(
        `Network error after ${maxRetries + 1} attempts on ${method} ${path}: ${lastFailure.message}`,
        { cause: lastFailure.cause },
      );
    }
    throw new ClickUpError('Max retries exceeded');
  }

  // ---------------------------------------------------------------------------
  // Workspaces (teams) and users
  // ---------------------------------------------------------------------------

  async getTeams(): Promise<Team[]> {
    const body = await this.request('GET', '/team');
    return parseRecords(TeamSchema, 'team', collection(body, 'teams'));
  }

  async getTeam(teamId: string): Promise<Team> {
    const body = await this.request('GET', `/team/${enc(teamId)}`);
    return parseRecord(TeamSchema, 'team', field(body, 'team'));
  }

  async getTeamMembers(teamId: string): Promise<User[]> {
    const body = await this.request('GET', `/team/${enc(teamId)}/member`);
    return collection(body, 'members').map((member) => parseRecord(UserSchema, 'user', field(member, 'user')));
  }

  /** The user the token belongs to. */
  async getUser(): Promise<User> {
    const body = await this.request('GET', '/user');
    return parseRecord(UserSchema, 'user', field(body, 'user'));
  }

  // ---------------------------------------------------------------------------
  // Hierarchy
  // ---------------------------------------------------------------------------

  async getSpaces(teamId: string, options: { archived?: boolean } = {}): Promise<Space[]> {
    const body = await this.request('GET', `/team/${enc(teamId)}/space`, { params: { archived: options.archived ?? false } });
    return parseRecords(SpaceSchema, 'space', collection(body, 'spaces'));
  }

  async getSpace(spaceId: string): Promise<Space> {
    return parseRecord(SpaceSchema, 'space', await this.request('GET', `/space/${enc(spaceId)}`));
  }

  async getFolders(spaceId: string, options: { archived?: boolean } = {}): Promise<Folder[]> {
    const body = await this.request('GET', `/space/${enc(spaceId)}/folder`, { params: { archived: options.archived ?? false } });
    return parseRecords(FolderSchema, 'folder', collection(body, 'folders'));
  }

  async getFolder(folderId: string): Promise<Folder> {
    return parseRecord(FolderSchema, 'folder', await this.request('GET', `/folder/${enc(folderId)}`));
  }

  async getLists(folderId: string, options: { archived?: boolean } = {}): Promise<List[]> {
    const body = await this.request('GET', `/folder/${enc(folderId)}/list`, { params: { archived: options.archived ?? false } });
    return parseRecords(ListSchema, 'list', collection(body, 'lists'));
  }

  /** Lists that sit directly under a space, outside any folder. */
  async getFolderlessLists(spaceId: string, options: { archived?: boolean } = {}): Promise<List[]> {
    const body = await this.request('GET', `/space/${enc(spaceId)}/list`, { params: { archived: options.archived ?? false } });
    return parseRecords(ListSchema, 'list', collection(body, 'lists'));
  }

  async getList(listId: string): Promise<List> {
    return parseRecord(ListSchema, 'list', await this.request('GET', `/list/${enc(listId)}`));
  }

  async createList(folderId: string, name: string, fields: ListFields = {}): Promise<List> {
    const body = await this.request('POST', `/folder/${enc(folderId)}/list`, { body: { ...fields, name } });
    return parseRecord(ListSchema, 'list', body);
  }

  async createFolderlessList(spaceId: string, name: string, fields: ListFields = {}): Promise<List> {
    const body = await this.request('POST', `/space/${enc(spaceId)}/list`, { body: { ...fields, name } });
    return parseRecord(ListSchema, 'list', body);
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  async getTasks(listId: string, filters: TaskFilters = {}): Promise<Task[]> {
    const body = await this.request('GET', `/list/${enc(listId)}/task`, { params: filters });
    return parseRecords(TaskSchema, 'task', collection(body, 'tasks'));
  }

  async getTask(taskId: string): Promise<Task> {
    return parseRecord(TaskSchema, 'task', await this.request('GET', `/task/${enc(taskId)}`));
  }

  async createTask(listId: string, name: string, fields: TaskFields = {}): Promise<Task> {
    const body = await this.request('POST', `/list/${enc(listId)}/task`, { body: { ...fields, name } });
    return parseRecord(TaskSchema, 'task', body);
  }

  /** Partial update: only the supplied fields change. */
  async updateTask(taskId: string, fields: TaskFields): Promise<Task> {
    const body = await this.request('PUT', `/task/${enc(taskId)}`, { body: fields });
    return parseRecord(TaskSchema, 'task', body);
  }

  async deleteTask(taskId: string): Promise<true> {
    await this.request('DELETE', `/task/${enc(taskId)}`);
    return true;
  }

  /** Full-text task search across a workspace. */
  async searchTasks(teamId: string, query: string, filters: TaskFilters = {}): Promise<Task[]> {
    const body = await this.request('GET', `/team/${enc(teamId)}/task`, { params: { ...filters, query } });
    return parseRecords(TaskSchema, 'task', collection(body, 'tasks'));
  }

  // ---------------------------------------------------------------------------
  // Comments
  // ---------------------------------------------------------------------------

  async getTaskComments(taskId: string): Promise<Comment[]> {
    const body = await this.request('GET', `/task/${enc(taskId)}/comment`);
    return parseRecords(CommentSchema, 'comment', collection(body, 'comments'));
  }

  async createComment(taskId: string, text: string): Promise<CreatedComment> {
    const body = await this.request('POST', `/task/${enc(taskId)}/comment`, { body: { comment_text: text } });
    return parseRecord(CreatedCommentSchema, 'comment', body);
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  /**
   * Check the configured token with a "who am I" call. Never throws.
   */
  async validateAuth(): Promise<AuthCheck> {
    try {
      const user = await this.getUser();
      const email = user.email ?? 'no email';
      return { valid: true, user, message: `Authentication valid for ${userLabel(user)} (${email})` };
    } catch (err) {
      if (err instanceof ConfigurationError) {
        return { valid: false, reason: 'not_configured', message: err.message };
      }
      if (err instanceof AuthenticationError) {
        return { valid: false, reason: 'invalid_token', message: 'Invalid API token' };
      }
      if (err instanceof AuthorizationError) {
        return { valid: false, reason: 'forbidden', message: 'API token lacks required permissions' };
      }
      if (err instanceof NetworkError) {
        return { valid: false, reason: 'network', message: `Network error: ${err.message}` };
      }
      return { valid: false, reason: 'api_error', message: `API error: ${errorMessage(err)}` };
    }
  }
}
