/**
 * CLI template commands: list, show, create and save.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { ClickUpError } from '../../core/errors.js';
import {
  findTemplate,
  listTemplates,
  parseVariableAssignments,
  renderTemplate,
  saveTemplate,
  templateFromTask,
  variablesFromJson,
  type TemplateEntry,
} from '../../core/templates.js';
import { failCommand, requireClient, resolveListOption } from '../context.js';
import { collect } from '../options.js';
import { ask } from '../prompt.js';
import { cliOutput } from '../renderers/index.js';

interface CreateOptions {
  listId?: string;
  var: string[];
  variables?: string;
  dryRun?: boolean;
}

interface SaveOptions {
  fromTask: string;
  namePattern?: string;
  descriptionPattern?: string;
}

function requireTemplate(name: string): TemplateEntry {
  const entry = findTemplate(name);
  if (!entry) {
    throw new ClickUpError(`Template '${name}' not found`, { fix: 'clickup template list' });
  }
  return entry;
}

/**
 * Variable values for a template: the variables file first, then
 * `--var` pairs on top. On a terminal the remaining variables are asked for.
 */
export async function gatherVariables(
  entry: TemplateEntry,
  opts: Pick<CreateOptions, 'var' | 'variables'>,
  interactive: boolean = process.stdin.isTTY === true,
): Promise<Record<string, string>> {
  const values: Record<string, string> = {};
  if (opts.variables !== undefined) {
    Object.assign(values, variablesFromJson(JSON.parse(await readFile(opts.variables, 'utf-8'))));
  }
  Object.assign(values, parseVariableAssignments(opts.var));

  if (interactive) {
    for (const name of entry.template.variables) {
      if (!Object.hasOwn(values, name)) values[name] = await ask(`${name}:`);
    }
  }
  return values;
}

export function registerTemplateCommand(program: Command): void {
  const template = program.command('template').description('Create tasks from reusable templates');

  template
    .command('list')
    .description('List built-in and custom templates')
    .action(() => {
      try {
        cliOutput({ templates: listTemplates() }, { command: 'template.list' });
      } catch (err) {
        failCommand(err);
      }
    });

  template
    .command('show <name>')
    .description('Show a template and its variables')
    .action((name: string) => {
      try {
        cliOutput(requireTemplate(name), { command: 'template.show' });
      } catch (err) {
        failCommand(err);
      }
    });

  template
    .command('create <name>')
    .description('Create a task from a template')
    .option('-l, --list-id <id>', 'List ID or alias (default: configured default list)')
    .option('--var <key=value>', 'Template variable (repeatable)', collect, [])
    .option('--variables <file>', 'JSON file of template variables')
    .option('--dry-run', 'Render the template without creating a task')
    .action(async (name: string, opts: CreateOptions) => {
      try {
        const entry = requireTemplate(name);
        const rendered = renderTemplate(entry.template, await gatherVariables(entry, opts));

        if (opts.dryRun) {
          cliOutput({ template: entry.key, rendered, task: null, dryRun: true }, { command: 'template.create' });
          return;
        }
        const listId = resolveListOption(opts.listId);
        const task = await requireClient().createTask(listId, rendered.name, {
          description: rendered.description,
          priority: rendered.priority,
        });
        cliOutput({ template: entry.key, rendered, task, dryRun: false }, { command: 'template.create' });
      } catch (err) {
        failCommand(err);
      }
    });

  template
    .command('save <name>')
    .description('Save an existing task as a custom template')
    .requiredOption('--from-task <taskId>', 'Task to copy name, description and priority from')
    .option('--name-pattern <pattern>', 'Name with {variable} placeholders (default: the task name)')
    .option('--description-pattern <pattern>', 'Description with {variable} placeholders')
    .action(async (name: string, opts: SaveOptions) => {
      try {
        const task = await requireClient().getTask(opts.fromTask);
        const saved = templateFromTask(task, { name: opts.namePattern, description: opts.descriptionPattern });
        const path = await saveTemplate(name, saved);
        cliOutput({ key: name, path, template: saved }, { command: 'template.save' });
      } catch (err) {
        failCommand(err);
      }
    });
}
