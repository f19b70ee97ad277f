#!/usr/bin/env node
/**
 * `clickup-mcp` entry point: the stdio protocol server.
 *
 * Stdout carries the protocol, so everything else goes to the log file or
 * stderr.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { Config } from '../core/config.js';
import { loadEnvironment } from '../core/env.js';
import { errorMessage } from '../core/errors.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { getConfigDir } from '../core/paths.js';
import { createServer } from './server.js';

let activeServer: Server | null = null;

async function shutdown(signal: string): Promise<void> {
  getLogger('mcp').info({ signal }, 'Shutting down');
  if (activeServer) {
    try {
      await activeServer.close();
    } catch (err) {
      process.stderr.write(`Error during shutdown: ${errorMessage(err)}\n`);
    }
  }
  closeLogger();
  process.exit(0);
}

export async function main(): Promise<void> {
  loadEnvironment();
  const config = new Config();
  try {
    initLogger(getConfigDir(), config.getLoggingConfig());
  } catch (err) {
    getLogger('mcp').warn({ err: errorMessage(err) }, 'File logging unavailable');
  }
  const log = getLogger('mcp');

  if (!config.hasCredentials()) {
    log.warn('No ClickUp credentials configured; tool calls will fail until a token is set');
  }

  const server = createServer({ config });
  activeServer = server;

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(new StdioServerTransport());
  log.info('Server started on stdio');
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch (err) {
    getLogger('mcp').debug({ entry, err: errorMessage(err) }, 'Entry point check failed');
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err: unknown) => {
    process.stderr.write(`Failed to start MCP server: ${errorMessage(err)}\n`);
    process.exit(1);
  });
}
