/**
 * Tests for task templates: loading, shadowing, rendering and saving.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ClickUpError, ConfigurationError } from '../errors.js';
import { TaskSchema } from '../models.js';
import {
  extractVariables,
  findTemplate,
  listTemplates,
  loadBuiltInTemplates,
  loadCustomTemplates,
  parseVariableAssignments,
  renderTemplate,
  saveTemplate,
  templateFromTask,
  variablesFromJson,
} from '../templates.js';

describe('templates', () => {
  let tempDir: string;
  let templatesDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'clickup-templates-test-'));
    templatesDir = join(tempDir, 'templates');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loading', () => {
    it('ships the four built-in templates', () => {
      const builtins = loadBuiltInTemplates();
      expect(Object.keys(builtins).sort()).toEqual(['bug_report', 'feature_request', 'meeting_notes', 'sprint_task']);
      expect(builtins['bug_report']?.name).toBe('[Bug] {title}');
      expect(builtins['bug_report']?.priority).toBe(2);
    });

    it('has no custom templates when the directory is missing', () => {
      expect(loadCustomTemplates(templatesDir)).toEqual({});
    });

    it('skips malformed custom files', () => {
      mkdirSync(templatesDir);
      writeFileSync(join(templatesDir, 'good.json'), JSON.stringify({ name: 'Good {x}' }));
      writeFileSync(join(templatesDir, 'bad.json'), JSON.stringify({ description: 'no name' }));
      writeFileSync(join(templatesDir, 'notes.txt'), 'ignored');

      const custom = loadCustomTemplates(templatesDir);
      expect(Object.keys(custom)).toEqual(['good']);
      expect(custom['good']).toEqual({ name: 'Good {x}', description: '', priority: 3, variables: [] });
    });

    it('lets a custom template shadow a built-in', () => {
      mkdirSync(templatesDir);
      writeFileSync(join(templatesDir, 'bug_report.json'), JSON.stringify({ name: 'Our bug: {title}', priority: 1 }));

      const entries = listTemplates({ templatesDir });
      expect(entries.filter((e) => e.key === 'bug_report')).toHaveLength(1);
      const entry = findTemplate('bug_report', { templatesDir });
      expect(entry?.source).toBe('custom');
      expect(entry?.template.name).toBe('Our bug: {title}');
      expect(findTemplate('feature_request', { templatesDir })?.source).toBe('builtin');
      expect(findTemplate('nothing', { templatesDir })).toBeUndefined();
    });
  });

  describe('rendering', () => {
    it('fills placeholders and reports the missing ones', () => {
      const rendered = renderTemplate(
        { name: '{epic} - {task_name}', description: 'Estimate: {estimate}', priority: 3, variables: [] },
        { epic: 'Billing', task_name: 'Invoices' },
      );
      expect(rendered).toEqual({
        name: 'Billing - Invoices',
        description: 'Estimate: ',
        priority: 3,
        missing: ['estimate'],
      });
    });

    it('leaves text without placeholders alone', () => {
      const rendered = renderTemplate({ name: 'Plain {', description: '', priority: 4, variables: [] }, {});
      expect(rendered.name).toBe('Plain {');
      expect(rendered.missing).toEqual([]);
    });

    it('extracts sorted unique variable names', () => {
      expect(extractVariables('{b} and {a}', '{a} again {c_1}')).toEqual(['a', 'b', 'c_1']);
    });
  });

  describe('variables', () => {
    it('splits assignments on the first equals sign', () => {
      expect(parseVariableAssignments(['title=Login fails', 'query=a=b'])).toEqual({
        title: 'Login fails',
        query: 'a=b',
      });
    });

    it('rejects an assignment without a key', () => {
      expect(() => parseVariableAssignments(['=value'])).toThrow("Invalid variable '=value'. Expected key=value.");
      expect(() => parseVariableAssignments(['novalue'])).toThrow(ClickUpError);
    });

    it('stringifies non-string JSON values', () => {
      expect(variablesFromJson({ title: 'Crash', estimate: 5, flag: true })).toEqual({
        title: 'Crash',
        estimate: '5',
        flag: 'true',
      });
    });

    it('requires a JSON object', () => {
      expect(() => variablesFromJson(['a'])).toThrow('Variables file must contain a JSON object');
    });
  });

  describe('saving', () => {
    it('derives a template from a task', () => {
      const task = TaskSchema.parse({
        id: 't1',
        name: 'Release {version}',
        description: 'Ship {version} to {env}',
        priority: { id: '2', priority: 'high' },
      });
      expect(templateFromTask(task)).toEqual({
        name: 'Release {version}',
        description: 'Ship {version} to {env}',
        priority: 2,
        variables: ['env', 'version'],
      });
    });

    it('uses the given patterns and a default priority', () => {
      const task = TaskSchema.parse({ id: 't2', name: 'Deploy api' });
      expect(templateFromTask(task, { name: 'Deploy {service}' })).toEqual({
        name: 'Deploy {service}',
        description: '',
        priority: 3,
        variables: ['service'],
      });
    });

    it('writes the template file', async () => {
      const path = await saveTemplate(
        'deploy',
        { name: 'Deploy {service}', description: '', priority: 3, variables: ['service'] },
        templatesDir,
      );
      expect(path).toBe(join(templatesDir, 'deploy.json'));
      expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
        name: 'Deploy {service}',
        description: '',
        priority: 3,
        variables: ['service'],
      });
      expect(loadCustomTemplates(templatesDir)['deploy']?.name).toBe('Deploy {service}');
    });

    it('rejects template names that are not plain words', async () => {
      await expect(
        saveTemplate('../escape', { name: 'x', description: '', priority: 3, variables: [] }, templatesDir),
      ).rejects.toBeInstanceOf(ConfigurationError);
      expect(existsSync(templatesDir)).toBe(false);
    });
  });
});
