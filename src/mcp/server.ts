/**
 * Stdio protocol server wiring: tool, resource and prompt handlers over
 * the shared ClickUp client.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ClickUpClient } from '../core/client.js';
import type { Config } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { getPackageVersion } from '../core/version.js';
import { getPrompt, listPrompts } from './prompts.js';
import { RESOURCE_MIME_TYPE, RESOURCE_TEMPLATES, RESOURCES, readResource } from './resources.js';
import { callTool, TOOLS, type ToolContext } from './tools.js';

export const SERVER_NAME = 'clickup-toolkit';

export interface ServerOptions {
  config: Config;
  /** Builds the client on first use; tests pass one over a fake fetch. */
  createClient?: (config: Config) => ClickUpClient;
}

/**
 * Lazily built client. The settings file is re-read on each call so a token
 * saved after startup is picked up without a restart.
 */
export function createToolContext(options: ServerOptions): ToolContext {
  const build = options.createClient ?? ((config: Config) => new ClickUpClient(config));
  let client: ClickUpClient | null = null;
  return {
    getClient() {
      options.config.reload();
      if (!options.config.hasCredentials()) {
        throw new ConfigurationError('ClickUp API token not configured', { fix: 'clickup setup wizard' });
      }
      client ??= build(options.config);
      return client;
    },
  };
}

export function createServer(options: ServerOptions): Server {
  const ctx = createToolContext(options);
  const server = new Server(
    { name: SERVER_NAME, version: getPackageVersion() },
    { capabilities: { tools: {}, resources: {}, prompts: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const outcome = await callTool(request.params.name, request.params.arguments ?? {}, ctx);
    return {
      content: [{ type: 'text' as const, text: outcome.text }],
      ...(outcome.isError ? { isError: true } : {}),
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: [...RESOURCES] }));

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: [...RESOURCE_TEMPLATES],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    return { contents: [{ uri, mimeType: RESOURCE_MIME_TYPE, text: await readResource(uri, ctx) }] };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: listPrompts() }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) =>
    getPrompt(request.params.name, request.params.arguments),
  );

  return server;
}
