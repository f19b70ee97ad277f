/**
 * Tool-result error texts.
 *
 * The orchestrator on the other end of the stdio transport expects text,
 * so tool failures are never thrown through the protocol.
 */

import { ClickUpError, ConfigurationError, errorMessage } from '../core/errors.js';

/** Bad or empty tool input that the tool itself rejects. */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolInputError';
  }
}

export function errorToText(err: unknown): string {
  if (err instanceof ToolInputError) return `❌ ${err.message}`;
  if (err instanceof ConfigurationError) return `❌ Configuration Error: ${err.message}`;
  if (err instanceof ClickUpError) return `❌ ClickUp API Error: ${err.message}`;
  return `❌ Error: ${errorMessage(err)}`;
}
