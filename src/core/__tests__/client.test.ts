/**
 * Tests for the ClickUp client: request shape, status mapping and the
 * retry policy, all against the in-process fake API.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ClickUpClient } from '../client.js';
import {
  AuthenticationError,
  AuthorizationError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
} from '../errors.js';
import { clientFor, fakeApi, networkError, taskBody, tempConfig, userBody, type TempConfig } from './fake-api.js';

/** A fetch that never answers and fails once its request is aborted. */
function stalledFetch(methods: string[]): typeof fetch {
  return (_input, init) => {
    methods.push(init?.method ?? 'GET');
    return new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    });
  };
}

describe('ClickUpClient', () => {
  let env: TempConfig;

  beforeEach(() => {
    env = tempConfig();
  });

  afterEach(() => {
    env.cleanup();
  });

  describe('requests', () => {
    it('sends the token and encodes list filters', async () => {
      const api = fakeApi({
        'GET /list/901/task': { body: { tasks: [taskBody('t1', 'Write docs'), taskBody('t2', 'Ship it')] } },
      });
      const tasks = await clientFor(env.config, api).getTasks('901', {
        statuses: ['open', 'review'],
        include_closed: true,
      });

      expect(tasks.map((t) => t.name)).toEqual(['Write docs', 'Ship it']);
      const [call] = api.calls;
      expect(call?.headers.get('Authorization')).toBe('test-token');
      expect(call?.query.getAll('statuses[]')).toEqual(['open', 'review']);
      expect(call?.query.get('include_closed')).toBe('true');
    });

    it('posts the name together with the other fields on create', async () => {
      const api = fakeApi({ 'POST /list/901/task': { body: taskBody('t9', 'New task') } });
      const task = await clientFor(env.config, api).createTask('901', 'New task', { priority: 2, description: 'Body' });

      expect(task.id).toBe('t9');
      expect(api.calls[0]?.body).toEqual({ priority: 2, description: 'Body', name: 'New task' });
    });

    it('reads back a task created with only a name', async () => {
      const api = fakeApi({
        'POST /list/901/task': { body: { id: 't5', name: 'Only a name' } },
        'GET /task/t5': { body: { id: 't5', name: 'Only a name', description: null } },
      });
      const client = clientFor(env.config, api);
      const created = await client.createTask('901', 'Only a name');
      const fetched = await client.getTask(created.id);

      expect(api.calls[0]?.body).toEqual({ name: 'Only a name' });
      expect(fetched.id).toBe('t5');
      expect(fetched.name).toBe('Only a name');
      expect(fetched.description).toBeNull();
      expect(fetched.archived).toBe(false);
    });

    it('treats an empty 2xx body as success', async () => {
      const api = fakeApi({ 'DELETE /task/t1': { status: 204 } });
      await expect(clientFor(env.config, api).deleteTask('t1')).resolves.toBe(true);
    });

    it('unwraps workspace members', async () => {
      const api = fakeApi({
        'GET /team/42/member': { body: { members: [{ user: userBody(7, 'alice') }, { user: userBody(8, 'bob') }] } },
      });
      const members = await clientFor(env.config, api).getTeamMembers('42');
      expect(members.map((m) => m.username)).toEqual(['alice', 'bob']);
    });

    it('asks for non-archived spaces by default', async () => {
      const api = fakeApi({ 'GET /team/42/space': { body: { spaces: [{ id: 's1', name: 'Engineering' }] } } });
      const spaces = await clientFor(env.config, api).getSpaces('42');
      expect(spaces[0]?.name).toBe('Engineering');
      expect(api.calls[0]?.query.get('archived')).toBe('false');
    });
  });

  describe('status mapping', () => {
    it('maps 401 to AuthenticationError', async () => {
      const api = fakeApi({ 'GET /task/t1': { status: 401, body: { err: 'Token invalid' } } });
      await expect(clientFor(env.config, api).getTask('t1')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('maps 403 to AuthorizationError', async () => {
      const api = fakeApi({ 'GET /team/42/space': { status: 403, body: { err: 'Team not authorized' } } });
      const err = await clientFor(env.config, api)
        .getSpaces('42')
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AuthorizationError);
      expect(err).toHaveProperty('message', 'Insufficient permissions');
      expect(api.calls).toHaveLength(1);
    });

    it('maps 404 to NotFoundError', async () => {
      const api = fakeApi({});
      await expect(clientFor(env.config, api).getTask('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('uses the remote message for 400', async () => {
      const api = fakeApi({ 'POST /list/901/task': { status: 400, body: { err: 'Task name invalid' } } });
      const err = await clientFor(env.config, api)
        .createTask('901', '')
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toHaveProperty('message', 'Task name invalid');
      expect(err).toHaveProperty('statusCode', 400);
    });

    it('does not retry server errors', async () => {
      const api = fakeApi({ 'GET /team': { status: 502, body: {} } });
      const err = await clientFor(env.config, api)
        .getTeams()
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ServerError);
      expect(err).toHaveProperty('message', 'Server error: 502');
      expect(api.calls).toHaveLength(1);
    });
  });

  describe('retry policy', () => {
    it('waits out Retry-After and repeats the request', async () => {
      const api = fakeApi({
        'GET /team': [
          { status: 429, headers: { 'Retry-After': '2' } },
          { body: { teams: [{ id: '42', name: 'Acme' }] } },
        ],
      });
      const teams = await clientFor(env.config, api).getTeams();

      expect(teams.map((t) => t.name)).toEqual(['Acme']);
      expect(api.sleeps).toEqual([2000]);
      expect(api.calls).toHaveLength(2);
    });

    it('gives up on rate limiting after max_retries', async () => {
      const api = fakeApi({ 'GET /team': { status: 429, headers: { 'Retry-After': '30' } } });
      const err = await clientFor(env.config, api)
        .getTeams()
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RateLimitError);
      expect(err).toHaveProperty('retryAfter', 30);
      expect(api.sleeps).toEqual([30000, 30000, 30000]);
      expect(api.calls).toHaveLength(4);
    });

    it('retries a POST that never connected', async () => {
      const api = fakeApi({
        'POST /list/901/task': [networkError('ECONNREFUSED'), { body: taskBody('t3', 'Retried') }],
      });
      const task = await clientFor(env.config, api).createTask('901', 'Retried');

      expect(task.id).toBe('t3');
      expect(api.sleeps).toEqual([1000]);
      expect(api.calls).toHaveLength(2);
    });

    it('recovers after several refused connections', async () => {
      env.config.set('max_retries', 5);
      const refused = networkError('ECONNREFUSED');
      const api = fakeApi({
        'GET /team': [refused, refused, refused, { body: { teams: [{ id: '42', name: 'Acme' }] } }],
      });
      const teams = await clientFor(env.config, api).getTeams();

      expect(teams.map((t) => t.id)).toEqual(['42']);
      expect(api.calls).toHaveLength(4);
      expect(api.sleeps).toEqual([1000, 2000, 4000]);
    });

    it('does not replay a POST that failed mid-flight', async () => {
      const api = fakeApi({ 'POST /list/901/task': networkError('ECONNRESET') });
      const err = await clientFor(env.config, api)
        .createTask('901', 'Once only')
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NetworkError);
      expect(err).toHaveProperty('message', 'Network error (transport) on POST /list/901/task: request failed: ECONNRESET');
      expect(api.calls).toHaveLength(1);
      expect(api.sleeps).toEqual([]);
    });

    it('backs off exponentially for idempotent requests', async () => {
      const api = fakeApi({ 'GET /task/abc': networkError('ECONNRESET') });
      const err = await clientFor(env.config, api)
        .getTask('abc')
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NetworkError);
      expect(err).toHaveProperty('message', 'Network error after 4 attempts on GET /task/abc: request failed: ECONNRESET');
      expect(api.sleeps).toEqual([1000, 2000, 4000]);
      expect(api.calls).toHaveLength(4);
    });

    it('honours a lower max_retries', async () => {
      env.config.set('max_retries', 1);
      const api = fakeApi({ 'GET /task/abc': networkError('ECONNREFUSED') });
      await expect(clientFor(env.config, api).getTask('abc')).rejects.toBeInstanceOf(NetworkError);
      expect(api.calls).toHaveLength(2);
      expect(api.sleeps).toEqual([1000]);
    });
  });

  describe('timeouts', () => {
    beforeEach(() => {
      env.config.set('timeout', 0.01);
    });

    it('aborts a stalled POST once and does not replay it', async () => {
      const methods: string[] = [];
      const sleeps: number[] = [];
      const client = new ClickUpClient(env.config, {
        fetch: stalledFetch(methods),
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      });
      const err = await client.createTask('901', 'Slow').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NetworkError);
      expect(err).toHaveProperty('message', 'Network error (timeout) on POST /list/901/task: This operation was aborted');
      expect(methods).toEqual(['POST']);
      expect(sleeps).toEqual([]);
    });

    it('retries a stalled GET with backoff', async () => {
      const methods: string[] = [];
      const sleeps: number[] = [];
      const client = new ClickUpClient(env.config, {
        fetch: stalledFetch(methods),
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      });
      const err = await client.getTeams().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NetworkError);
      expect(err).toHaveProperty('message', 'Network error after 4 attempts on GET /team: This operation was aborted');
      expect(methods).toEqual(['GET', 'GET', 'GET', 'GET']);
      expect(sleeps).toEqual([1000, 2000, 4000]);
    });
  });

  describe('validateAuth', () => {
    it('reports the user on success', async () => {
      const api = fakeApi({ 'GET /user': { body: { user: userBody(1, 'alice') } } });
      const check = await clientFor(env.config, api).validateAuth();
      expect(check).toMatchObject({ valid: true, message: 'Authentication valid for alice (alice@example.com)' });
    });

    it('reports a rejected token without throwing', async () => {
      const api = fakeApi({ 'GET /user': { status: 401 } });
      const check = await clientFor(env.config, api).validateAuth();
      expect(check).toEqual({ valid: false, reason: 'invalid_token', message: 'Invalid API token' });
    });

    it('reports missing credentials as not configured', async () => {
      const bare = tempConfig({});
      try {
        const api = fakeApi({});
        const check = await clientFor(bare.config, api).validateAuth();
        expect(check).toMatchObject({ valid: false, reason: 'not_configured' });
        expect(api.calls).toHaveLength(0);
      } finally {
        bare.cleanup();
      }
    });
  });
});
