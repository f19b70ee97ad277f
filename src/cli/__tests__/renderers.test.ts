/**
 * Output dispatch and human renderer tests. Colors are switched off so
 * the assertions see plain text.
 */

import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { AuthorizationError, ClickUpError, ConfigurationError, NetworkError, ServerError } from '../../core/errors.js';
import type { HierarchyNode } from '../../core/hierarchy.js';
import { TaskSchema } from '../../core/models.js';
import { setFormatContext } from '../format-context.js';
import { applyColorSetting, formatTimestamp, truncate } from '../renderers/colors.js';
import { cliError, cliOutput, renderHuman } from '../renderers/index.js';
import { treeLines } from '../renderers/tree.js';

const task = TaskSchema.parse({
  id: 't1',
  name: 'Fix login',
  status: { status: 'in progress' },
  url: 'https://app.clickup.com/t/t1',
});

describe('renderers', () => {
  beforeAll(() => {
    applyColorSetting(false);
  });

  afterEach(() => {
    setFormatContext({ format: 'human', source: 'default', quiet: false });
    vi.restoreAllMocks();
  });

  describe('cliOutput', () => {
    it('wraps the payload in a JSON envelope', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      setFormatContext({ format: 'json', source: 'flag', quiet: false });
      cliOutput({ taskId: 't1', deleted: true }, { command: 'task.delete' });

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
        success: true,
        command: 'task.delete',
        result: { taskId: 't1', deleted: true },
      });
    });

    it('prints the human rendering', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      cliOutput({ taskId: 't1', deleted: true }, { command: 'task.delete' });
      expect(log).toHaveBeenCalledWith('✓ Deleted task t1');
    });

    it('prints nothing when the quiet rendering is empty', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      setFormatContext({ format: 'human', source: 'flag', quiet: true });
      cliOutput({ message: 'Saved' }, { command: 'message' });
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('cliError', () => {
    it('labels local misconfiguration and prints the fix', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      cliError(new ConfigurationError('Not configured.', { fix: 'clickup setup wizard' }));
      expect(error.mock.calls).toEqual([['Configuration Error: Not configured.'], ['Fix: clickup setup wizard']]);
    });

    it('labels failures reported by the API', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      cliError(new AuthorizationError());
      cliError(new ServerError('Server error: 503', { statusCode: 503 }));
      cliError(new NetworkError('Network error (connect) on GET /team: refused'));
      expect(error.mock.calls).toEqual([
        ['ClickUp API Error: Insufficient permissions'],
        ['ClickUp API Error: Server error: 503'],
        ['ClickUp API Error: Network error (connect) on GET /team: refused'],
      ]);
    });

    it('keeps a plain label for other failures', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      cliError(new ClickUpError('Specify --folder-id or --space-id.'));
      cliError(new Error('boom'));
      expect(error.mock.calls).toEqual([['Error: Specify --folder-id or --space-id.'], ['Error: boom']]);
    });

    it('prints the structured error body as JSON', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      setFormatContext({ format: 'json', source: 'flag', quiet: false });
      cliError(new ConfigurationError('Not configured.'));
      expect(JSON.parse(String(error.mock.calls[0]?.[0]))).toEqual({
        success: false,
        error: { code: 'E_CONFIGURATION', name: 'ConfigurationError', message: 'Not configured.' },
      });
    });

    it('gives plain errors a general code', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      setFormatContext({ format: 'json', source: 'flag', quiet: false });
      cliError(new Error('boom'));
      expect(JSON.parse(String(error.mock.calls[0]?.[0]))).toEqual({
        success: false,
        error: { code: 'E_GENERAL', message: 'boom' },
      });
    });
  });

  describe('human renderings', () => {
    it('renders task results', () => {
      expect(renderHuman('task.create', { task })).toBe(
        '✓ Created task: Fix login\n  ID:  t1\n  URL: https://app.clickup.com/t/t1',
      );
      expect(renderHuman('task.status', { task })).toBe('✓ Fix login is now in progress');
      expect(renderHuman('task.update', { task, changes: ['status', 'priority'] })).toBe(
        '✓ Updated task: Fix login (status, priority)',
      );
    });

    it('renders ids only when quiet', () => {
      expect(renderHuman('task.list', { listId: '901', tasks: [task], total: 1 }, true)).toBe('t1');
      expect(renderHuman('task.status', { task }, true)).toBe('in progress');
    });

    it('warns about empty results', () => {
      expect(renderHuman('task.search', { teamId: '42', query: 'login', tasks: [] })).toBe(
        'No tasks found for query: login',
      );
    });

    it('summarizes a bulk import with its failures', () => {
      expect(
        renderHuman('bulk.import', {
          listId: '901',
          summary: { created: 2, failed: 1, tasks: [], failures: [{ name: 'Broken', error: 'Bad name' }] },
        }),
      ).toBe("Failed to create task 'Broken': Bad name\n✓ Import completed: 2 created, 1 failed");
    });

    it('renders a list path as breadcrumbs when quiet', () => {
      const path = [
        { kind: 'workspace' as const, id: '42', name: 'Acme' },
        { kind: 'space' as const, id: 's1', name: 'Engineering' },
        { kind: 'list' as const, id: 'l1', name: 'Backlog' },
      ];
      expect(renderHuman('discover.path', { listId: 'l1', path }, true)).toBe('Acme > Engineering > Backlog');
      expect(renderHuman('discover.path', { listId: 'l9', path: null })).toBe('Could not find path for list l9');
    });

    it('renders status with an unchecked token', () => {
      expect(
        renderHuman('status', {
          configPath: '/tmp/config.json',
          token: null,
          auth: null,
          defaults: { team: '42', space: null, list: null },
          defaultLists: {},
        }),
      ).toBe(
        [
          'ClickUp Toolkit Status',
          '  Config:        /tmp/config.json',
          '  API token:     not configured',
          '  Auth:          not checked',
          '  Default team:  42',
          '  Default space: -',
          '  Default list:  -',
        ].join('\n'),
      );
    });

    it('renders a generic payload as labelled lines', () => {
      expect(renderHuman('generic', { defaultTeamId: '42', extra: null })).toBe('Default Team Id: 42\nExtra: not set');
    });
  });

  it('draws the hierarchy as a tree', () => {
    const roots: HierarchyNode[] = [
      {
        kind: 'workspace',
        id: '42',
        name: 'Acme',
        children: [
          {
            kind: 'space',
            id: 's1',
            name: 'Engineering',
            children: [{ kind: 'list', id: 'l1', name: 'Backlog', taskCount: 3, children: [] }],
          },
          { kind: 'space', id: 's2', name: 'Marketing', error: 'Error loading folders: Server error: 500', children: [] },
        ],
      },
    ];
    expect(treeLines(roots)).toEqual([
      '└── 🏢 Acme (42)',
      '    ├── 📁 Engineering (s1)',
      '    │   └── 📋 Backlog (l1) - 3 tasks',
      '    └── 📁 Marketing (s2)',
      '        ❌ Error loading folders: Server error: 500',
    ]);
  });

  it('formats timestamps and truncates text', () => {
    expect(formatTimestamp('1709251200000')).toBe('2024-03-01');
    expect(formatTimestamp(null)).toBe('-');
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });
});
