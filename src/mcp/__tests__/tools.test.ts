/**
 * Tool catalog tests: argument validation, result texts and error texts,
 * with the client running against the in-process fake API.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { clientFor, fakeApi, taskBody, tempConfig, type FakeApi, type FakeRoute, type TempConfig } from '../../core/__tests__/fake-api.js';
import { Config } from '../../core/config.js';
import { TaskSchema } from '../../core/models.js';
import { createToolContext } from '../server.js';
import { callTool, formatTaskDetail, TOOLS, type ToolContext } from '../tools.js';

describe('tools', () => {
  let env: TempConfig;

  beforeEach(() => {
    env = tempConfig();
  });

  afterEach(() => {
    env.cleanup();
  });

  function contextFor(routes: Record<string, FakeRoute | FakeRoute[]>): { api: FakeApi; ctx: ToolContext } {
    const api = fakeApi(routes);
    return { api, ctx: createToolContext({ config: env.config, createClient: (config) => clientFor(config, api) }) };
  }

  describe('catalog', () => {
    it('advertises the seven tools', () => {
      expect(TOOLS.map((t) => t.name)).toEqual([
        'create_task',
        'get_task',
        'update_task',
        'list_tasks',
        'search_tasks',
        'delete_task',
        'create_comment',
      ]);
    });

    it('derives JSON schemas with the required arguments', () => {
      const create = TOOLS.find((t) => t.name === 'create_task');
      expect(create?.inputSchema.type).toBe('object');
      expect(create?.inputSchema.required).toEqual(['name', 'list_id']);
      expect(Object.keys(create?.inputSchema.properties ?? {})).toEqual([
        'name',
        'list_id',
        'description',
        'priority',
        'assignee',
        'due_date',
      ]);
    });
  });

  describe('create_task', () => {
    it('converts the assignee and due date', async () => {
      const { api, ctx } = contextFor({ 'POST /list/901/task': { body: taskBody('t1', 'Write docs') } });
      const outcome = await callTool(
        'create_task',
        { name: 'Write docs', list_id: '901', priority: 2, assignee: '7', due_date: '2024-03-01' },
        ctx,
      );

      expect(outcome).toEqual({
        text: '✅ Created task: Write docs\nID: t1\nURL: https://app.clickup.com/t/t1',
        isError: false,
      });
      expect(api.calls[0]?.body).toEqual({ name: 'Write docs', priority: 2, assignees: [7], due_date: 1709251200000 });
    });

    it('rejects arguments that fail validation', async () => {
      const { api, ctx } = contextFor({});
      const outcome = await callTool('create_task', { name: 'No list' }, ctx);

      expect(outcome.isError).toBe(true);
      expect(outcome.text.startsWith('❌ Invalid arguments for create_task:')).toBe(true);
      expect(outcome.text).toContain('list_id');
      expect(api.calls).toHaveLength(0);
    });
  });

  describe('get_task', () => {
    it('formats the task details', async () => {
      const { ctx } = contextFor({
        'GET /task/t1': {
          body: taskBody('t1', 'Fix login', {
            assignees: [{ id: 7, username: 'alice' }],
            priority: { id: '2', priority: 'high' },
            due_date: '1709251200000',
            description: 'Users cannot sign in',
          }),
        },
      });
      const outcome = await callTool('get_task', { task_id: 't1' }, ctx);

      expect(outcome.text).toBe(
        [
          '📋 Task: Fix login',
          'ID: t1',
          'Status: to do',
          'Assignees: alice',
          'Priority: high',
          'Due Date: 2024-03-01',
          'Description: Users cannot sign in',
          'URL: https://app.clickup.com/t/t1',
        ].join('\n'),
      );
    });

    it('maps a missing task to API error text', async () => {
      const { ctx } = contextFor({ 'GET /task/gone': { status: 404, body: { err: 'Task not found' } } });
      const outcome = await callTool('get_task', { task_id: 'gone' }, ctx);
      expect(outcome).toEqual({ text: '❌ ClickUp API Error: Resource not found', isError: true });
    });
  });

  it('fills in placeholders for a bare task', () => {
    const task = TaskSchema.parse({ id: 't2', name: 'Bare' });
    expect(formatTaskDetail(task)).toBe(
      [
        '📋 Task: Bare',
        'ID: t2',
        'Status: Unknown',
        'Assignees: Unassigned',
        'Priority: None',
        'Due Date: None',
        'Description: None',
        'URL: N/A',
      ].join('\n'),
    );
  });

  describe('update_task', () => {
    it('sends only the given fields', async () => {
      const { api, ctx } = contextFor({ 'PUT /task/t1': { body: taskBody('t1', 'Renamed') } });
      const outcome = await callTool('update_task', { task_id: 't1', name: 'Renamed', status: 'done' }, ctx);

      expect(outcome.text).toBe('✅ Updated task: Renamed\nID: t1');
      expect(api.calls[0]?.body).toEqual({ name: 'Renamed', status: 'done' });
    });

    it('refuses an empty update', async () => {
      const { api, ctx } = contextFor({});
      const outcome = await callTool('update_task', { task_id: 't1' }, ctx);
      expect(outcome).toEqual({ text: '❌ No updates provided', isError: true });
      expect(api.calls).toHaveLength(0);
    });
  });

  describe('list_tasks', () => {
    it('lists tasks with status and assignees up to the limit', async () => {
      const { api, ctx } = contextFor({
        'GET /list/901/task': {
          body: {
            tasks: [
              taskBody('t1', 'First', { assignees: [{ id: 7, username: 'alice' }] }),
              taskBody('t2', 'Second'),
              taskBody('t3', 'Third'),
            ],
          },
        },
      });
      const outcome = await callTool('list_tasks', { list_id: '901', status: 'to do', limit: 2 }, ctx);

      expect(outcome.text).toBe(
        '📝 Found 2 tasks:\n\n• First (ID: t1) - to do - alice\n• Second (ID: t2) - to do - Unassigned',
      );
      expect(api.calls[0]?.query.getAll('statuses[]')).toEqual(['to do']);
    });

    it('says when the list is empty', async () => {
      const { ctx } = contextFor({ 'GET /list/901/task': { body: { tasks: [] } } });
      expect((await callTool('list_tasks', { list_id: '901' }, ctx)).text).toBe('📝 No tasks found');
    });
  });

  describe('search_tasks', () => {
    it('passes the query to the workspace search', async () => {
      const { api, ctx } = contextFor({ 'GET /team/42/task': { body: { tasks: [taskBody('t1', 'Login bug')] } } });
      const outcome = await callTool('search_tasks', { team_id: '42', query: 'login' }, ctx);

      expect(outcome.text).toBe("🔍 Found 1 tasks for 'login':\n\n• Login bug (ID: t1) - to do");
      expect(api.calls[0]?.query.get('query')).toBe('login');
    });

    it('returns up to 50 results by default', async () => {
      const found = Array.from({ length: 60 }, (_, i) => taskBody(`t${i + 1}`, `Task ${i + 1}`));
      const { ctx } = contextFor({ 'GET /team/42/task': { body: { tasks: found } } });
      const outcome = await callTool('search_tasks', { team_id: '42', query: 'Task' }, ctx);
      const lines = outcome.text.split('\n');

      expect(lines[0]).toBe("🔍 Found 50 tasks for 'Task':");
      expect(lines.at(-1)).toBe('• Task 50 (ID: t50) - to do');
    });

    it('says when nothing matches', async () => {
      const { ctx } = contextFor({ 'GET /team/42/task': { body: { tasks: [] } } });
      const outcome = await callTool('search_tasks', { team_id: '42', query: 'nothing' }, ctx);
      expect(outcome.text).toBe('🔍 No tasks found for query: nothing');
    });
  });

  it('deletes a task', async () => {
    const { api, ctx } = contextFor({ 'DELETE /task/t1': { status: 204 } });
    expect((await callTool('delete_task', { task_id: 't1' }, ctx)).text).toBe('🗑️ Deleted task t1');
    expect(api.calls[0]?.method).toBe('DELETE');
  });

  it('adds a comment', async () => {
    const { api, ctx } = contextFor({ 'POST /task/t1/comment': { body: { id: 555, hist_id: 'h1', date: 1709251200000 } } });
    expect((await callTool('create_comment', { task_id: 't1', comment: 'Looks good' }, ctx)).text).toBe(
      '💬 Added comment to task t1',
    );
    expect(api.calls[0]?.body).toEqual({ comment_text: 'Looks good' });
  });

  it('reports an unknown tool', async () => {
    const { ctx } = contextFor({});
    expect(await callTool('archive_task', {}, ctx)).toEqual({ text: '❌ Unknown tool: archive_task', isError: true });
  });

  it('reports missing credentials as a configuration error', async () => {
    const bare = tempConfig({});
    try {
      const ctx = createToolContext({ config: bare.config });
      const outcome = await callTool('get_task', { task_id: 't1' }, ctx);
      expect(outcome).toEqual({
        text: '❌ Configuration Error: ClickUp API token not configured',
        isError: true,
      });
    } finally {
      bare.cleanup();
    }
  });

  it('picks up a token saved to the settings file after startup', async () => {
    const bare = tempConfig({});
    try {
      const api = fakeApi({ 'GET /task/t1': { body: taskBody('t1', 'Fix login') } });
      const ctx = createToolContext({ config: bare.config, createClient: (config) => clientFor(config, api) });
      expect((await callTool('get_task', { task_id: 't1' }, ctx)).isError).toBe(true);

      new Config({ configPath: bare.config.getPath(), env: {} }).setApiToken('late-token');

      const outcome = await callTool('get_task', { task_id: 't1' }, ctx);
      expect(outcome.isError).toBe(false);
      expect(outcome.text.split('\n')[0]).toBe('📋 Task: Fix login');
      expect(api.calls[0]?.headers.get('Authorization')).toBe('late-token');
    } finally {
      bare.cleanup();
    }
  });
});
