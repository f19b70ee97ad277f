/**
 * Tool registry for the stdio server.
 *
 * Each tool declares a zod input schema and a handler that returns the
 * result text. The registry derives the advertised JSON schema from the
 * zod schema, validates arguments before a handler runs and turns every
 * failure into error text.
 */

import { z } from 'zod/v4';
import type { ClickUpClient, TaskFields, TaskFilters } from '../core/client.js';
import { getLogger } from '../core/logger.js';
import { userLabel, type Task } from '../core/models.js';
import { errorToText, ToolInputError } from './errors.js';

export interface ToolContext {
  /** @throws ConfigurationError when no credentials are configured */
  getClient(): ClickUpClient;
}

export interface ToolDefinition<S extends z.ZodType> {
  name: string;
  description: string;
  inputSchema: S;
  handler(args: z.output<S>, ctx: ToolContext): Promise<string>;
}

/** Advertised input schema, in the shape the protocol's tool listing takes. */
export interface ToolInputJsonSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
}

export interface ToolOutcome {
  text: string;
  isError: boolean;
}

export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ToolInputJsonSchema;
  call(args: unknown, ctx: ToolContext): Promise<ToolOutcome>;
}

export function defineTool<S extends z.ZodType>(def: ToolDefinition<S>): RegisteredTool {
  const jsonSchema = z.toJSONSchema(def.inputSchema);
  return {
    name: def.name,
    description: def.description,
    inputSchema: {
      type: 'object',
      properties: jsonSchema.properties ?? {},
      required: jsonSchema.required ?? [],
    },
    async call(args, ctx) {
      const parsed = def.inputSchema.safeParse(args);
      if (!parsed.success) {
        return { text: `❌ Invalid arguments for ${def.name}: ${z.prettifyError(parsed.error)}`, isError: true };
      }
      try {
        return { text: await def.handler(parsed.data, ctx), isError: false };
      } catch (err) {
        getLogger('mcp').warn({ tool: def.name, err }, 'Tool call failed');
        return { text: errorToText(err), isError: true };
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

const priority = z.number().int().min(1).max(4);
const userId = z.string().regex(/^\d+$/, 'user ids are numeric');
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'use YYYY-MM-DD');

const CreateTaskArgs = z.object({
  name: z.string().min(1).describe('Task name'),
  list_id: z.string().min(1).describe('List ID to create the task in'),
  description: z.string().optional().describe('Task description'),
  priority: priority.optional().describe('Priority 1-4 (1=urgent, 4=low)'),
  assignee: userId.optional().describe('Assignee user ID'),
  due_date: isoDate.optional().describe('Due date, YYYY-MM-DD'),
});

const TaskIdArgs = z.object({
  task_id: z.string().min(1).describe('Task ID'),
});

const UpdateTaskArgs = z.object({
  task_id: z.string().min(1).describe('Task ID'),
  name: z.string().min(1).optional().describe('New task name'),
  description: z.string().optional().describe('New description'),
  status: z.string().min(1).optional().describe('New status'),
  priority: priority.optional().describe('New priority 1-4'),
});

const ListTasksArgs = z.object({
  list_id: z.string().min(1).describe('List ID'),
  status: z.string().min(1).optional().describe('Only tasks with this status'),
  assignee: z.string().min(1).optional().describe('Only tasks assigned to this user ID'),
  limit: z.number().int().positive().optional().describe('Maximum number of tasks (default: 50)'),
});

const SearchTasksArgs = z.object({
  team_id: z.string().min(1).describe('Workspace (team) ID'),
  query: z.string().min(1).describe('Search text'),
  limit: z.number().int().positive().optional().describe('Maximum number of results (default: 50)'),
});

const CreateCommentArgs = z.object({
  task_id: z.string().min(1).describe('Task ID'),
  comment: z.string().min(1).describe('Comment text'),
});

// ---------------------------------------------------------------------------
// Result texts
// ---------------------------------------------------------------------------

function statusLabel(task: Task): string {
  return task.status?.status ?? 'Unknown';
}

function assigneeLabel(task: Task): string {
  return task.assignees.length > 0 ? task.assignees.map(userLabel).join(', ') : 'Unassigned';
}

/** ClickUp due dates are millisecond epochs; shown as YYYY-MM-DD. */
function dueDateLabel(task: Task): string {
  if (task.due_date === null) return 'None';
  return /^\d+$/.test(task.due_date) ? new Date(Number(task.due_date)).toISOString().slice(0, 10) : task.due_date;
}

export function formatTaskDetail(task: Task): string {
  return [
    `📋 Task: ${task.name}`,
    `ID: ${task.id}`,
    `Status: ${statusLabel(task)}`,
    `Assignees: ${assigneeLabel(task)}`,
    `Priority: ${task.priority?.priority ?? 'None'}`,
    `Due Date: ${dueDateLabel(task)}`,
    `Description: ${task.description || 'None'}`,
    `URL: ${task.url ?? 'N/A'}`,
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const TOOLS: readonly RegisteredTool[] = [
  defineTool({
    name: 'create_task',
    description: 'Create a new task in a ClickUp list',
    inputSchema: CreateTaskArgs,
    async handler(args, ctx) {
      const fields: TaskFields = {};
      if (args.description !== undefined) fields.description = args.description;
      if (args.priority !== undefined) fields.priority = args.priority;
      if (args.assignee !== undefined) fields.assignees = [Number(args.assignee)];
      if (args.due_date !== undefined) fields.due_date = Date.parse(`${args.due_date}T00:00:00Z`);
      const task = await ctx.getClient().createTask(args.list_id, args.name, fields);
      return `✅ Created task: ${task.name}\nID: ${task.id}\nURL: ${task.url ?? 'N/A'}`;
    },
  }),

  defineTool({
    name: 'get_task',
    description: 'Get detailed information about a task',
    inputSchema: TaskIdArgs,
    async handler(args, ctx) {
      return formatTaskDetail(await ctx.getClient().getTask(args.task_id));
    },
  }),

  defineTool({
    name: 'update_task',
    description: 'Update the name, description, status or priority of a task',
    inputSchema: UpdateTaskArgs,
    async handler(args, ctx) {
      const { task_id: taskId, ...changes } = args;
      const fields: TaskFields = {};
      if (changes.name !== undefined) fields.name = changes.name;
      if (changes.description !== undefined) fields.description = changes.description;
      if (changes.status !== undefined) fields.status = changes.status;
      if (changes.priority !== undefined) fields.priority = changes.priority;
      if (Object.keys(fields).length === 0) throw new ToolInputError('No updates provided');
      const task = await ctx.getClient().updateTask(taskId, fields);
      return `✅ Updated task: ${task.name}\nID: ${task.id}`;
    },
  }),

  defineTool({
    name: 'list_tasks',
    description: 'List the tasks in a ClickUp list',
    inputSchema: ListTasksArgs,
    async handler(args, ctx) {
      const filters: TaskFilters = {};
      if (args.status !== undefined) filters.statuses = [args.status];
      if (args.assignee !== undefined) filters.assignees = [args.assignee];
      const tasks = (await ctx.getClient().getTasks(args.list_id, filters)).slice(0, args.limit ?? 50);
      if (tasks.length === 0) return '📝 No tasks found';
      const lines = tasks.map((t) => `• ${t.name} (ID: ${t.id}) - ${statusLabel(t)} - ${assigneeLabel(t)}`);
      return `📝 Found ${tasks.length} tasks:\n\n${lines.join('\n')}`;
    },
  }),

  defineTool({
    name: 'search_tasks',
    description: 'Search tasks across a workspace',
    inputSchema: SearchTasksArgs,
    async handler(args, ctx) {
      const tasks = (await ctx.getClient().searchTasks(args.team_id, args.query)).slice(0, args.limit ?? 50);
      if (tasks.length === 0) return `🔍 No tasks found for query: ${args.query}`;
      const lines = tasks.map((t) => `• ${t.name} (ID: ${t.id}) - ${statusLabel(t)}`);
      return `🔍 Found ${tasks.length} tasks for '${args.query}':\n\n${lines.join('\n')}`;
    },
  }),

  defineTool({
    name: 'delete_task',
    description: 'Delete a task',
    inputSchema: TaskIdArgs,
    async handler(args, ctx) {
      await ctx.getClient().deleteTask(args.task_id);
      return `🗑️ Deleted task ${args.task_id}`;
    },
  }),

  defineTool({
    name: 'create_comment',
    description: 'Add a comment to a task',
    inputSchema: CreateCommentArgs,
    async handler(args, ctx) {
      await ctx.getClient().createComment(args.task_id, args.comment);
      return `💬 Added comment to task ${args.task_id}`;
    },
  }),
];

const TOOLS_BY_NAME = new Map(TOOLS.map((tool) => [tool.name, tool]));

export async function callTool(name: string, args: unknown, ctx: ToolContext): Promise<ToolOutcome> {
  const tool = TOOLS_BY_NAME.get(name);
  if (!tool) return { text: `❌ Unknown tool: ${name}`, isError: true };
  getLogger('mcp').debug({ tool: name }, 'Tool call');
  return tool.call(args, ctx);
}
