/**
 * Canned prompts. Each renders to a single user message that tells the
 * orchestrator which tools to call and how to shape the answer.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

export interface PromptArgumentDescriptor {
  name: string;
  description: string;
  required: boolean;
}

export interface PromptDescriptor {
  name: string;
  description: string;
  arguments: PromptArgumentDescriptor[];
}

export interface PromptMessage {
  role: 'user';
  content: { type: 'text'; text: string };
}

export type PromptResult = {
  description: string;
  messages: PromptMessage[];
};

interface PromptDefinition extends PromptDescriptor {
  render(args: Record<string, string>): string;
}

const SEVERITIES = ['critical', 'high', 'medium', 'low'];

const PROMPTS: readonly PromptDefinition[] = [
  {
    name: 'daily_standup',
    description: 'Draft a daily standup report from ClickUp tasks',
    arguments: [
      { name: 'team_id', description: 'Workspace (team) ID', required: true },
      { name: 'assignee', description: 'Username or user ID to focus on', required: false },
    ],
    render(args) {
      const lines = [
        `Prepare a daily standup report for ClickUp workspace ${args['team_id']}.`,
        '',
        'Use the search_tasks tool to find:',
        '1. Tasks finished since the last working day',
        '2. Tasks in progress today',
        '3. Tasks that are blocked or overdue',
        '',
      ];
      if (args['assignee']) lines.push(`Only include tasks assigned to ${args['assignee']}.`, '');
      lines.push(
        'Structure the report as:',
        '- ✅ **Done**: finished tasks',
        '- 🔄 **In progress**: current work',
        '- ⚠️ **Blocked**: problems and who can unblock them',
        '- 📋 **Next**: what is planned for today',
      );
      return lines.join('\n');
    },
  },
  {
    name: 'project_overview',
    description: 'Summarise the state of a ClickUp list',
    arguments: [{ name: 'list_id', description: 'List ID to analyse', required: true }],
    render(args) {
      return [
        `Write a project overview for ClickUp list ${args['list_id']}.`,
        '',
        'Use the list_tasks tool, then cover:',
        '',
        '1. **Status**: task count, share completed, counts per status, overdue work',
        '2. **Workload**: tasks per assignee and unassigned tasks',
        '3. **Priorities**: urgent and high priority items and the risks they carry',
        '4. **Next steps**: immediate actions and blockers to clear',
        '',
        'Keep it short enough for a status meeting.',
      ].join('\n');
    },
  },
  {
    name: 'bug_triage',
    description: 'Collect the details of a bug and file it as a task',
    arguments: [
      { name: 'list_id', description: 'List ID to file the bug in', required: true },
      { name: 'severity', description: `Bug severity: ${SEVERITIES.join(', ')} (default: medium)`, required: false },
    ],
    render(args) {
      const severity = args['severity'] || 'medium';
      return [
        `File a bug in ClickUp list ${args['list_id']} with severity ${severity}.`,
        '',
        'Ask me for the details first, then call the create_task tool with:',
        '',
        '**Name**: [Bug] short summary',
        '',
        '**Description**:',
        '## Summary',
        '## Steps to reproduce',
        '1. ...',
        '## Expected behaviour',
        '## Actual behaviour',
        '## Environment',
        '- OS / browser:',
        '- Version:',
        '## Logs or screenshots',
        '',
        `## Severity: ${severity.toUpperCase()}`,
        '',
        'Set the task priority to match the severity: critical 1, high 2, medium 3, low 4.',
      ].join('\n');
    },
  },
];

export function listPrompts(): PromptDescriptor[] {
  return PROMPTS.map(({ name, description, arguments: args }) => ({ name, description, arguments: args }));
}

/**
 * Render a prompt.
 *
 * @throws McpError (InvalidParams) for an unknown prompt or a missing required argument
 */
export function getPrompt(name: string, args: Record<string, string> = {}): PromptResult {
  const prompt = PROMPTS.find((p) => p.name === name);
  if (!prompt) {
    throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
  }
  for (const arg of prompt.arguments) {
    if (arg.required && !args[arg.name]) {
      throw new McpError(ErrorCode.InvalidParams, `Missing required argument '${arg.name}' for prompt ${name}`);
    }
  }
  return {
    description: prompt.description,
    messages: [{ role: 'user', content: { type: 'text', text: prompt.render(args) } }],
  };
}
