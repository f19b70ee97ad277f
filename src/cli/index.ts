#!/usr/bin/env node
/**
 * `clickup` CLI entry point.
 */

import { failCommand } from './context.js';
import { createProgram } from './program.js';

// `clickup --mcp-server` starts the stdio server in place of the CLI
if (process.argv.includes('--mcp-server')) {
  import('../mcp/index.js')
    .then((m) => m.main())
    .catch((err: unknown) => {
      process.stderr.write(`Failed to start MCP server: ${String(err)}\n`);
      process.exit(1);
    });
} else {
  createProgram().parseAsync().catch(failCommand);
}
