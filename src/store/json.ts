/**
 * JSON file helpers shared by the config store, templates and bulk import.
 */

import { atomicWrite, atomicWriteSync, safeReadFile, safeReadFileSync } from './atomic.js';

export type JsonObject = Record<string, unknown>;

/** Narrow an unknown value to a plain (non-array) object. */
export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read and parse a JSON file. Returns null if the file does not exist;
 * throws a SyntaxError for malformed content.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return JSON.parse(content);
}

export function readJsonSync(filePath: string): unknown {
  const content = safeReadFileSync(filePath);
  if (content === null) return null;
  return JSON.parse(content);
}

function serialize(data: unknown, indent: number): string {
  return JSON.stringify(data, null, indent) + '\n';
}

export async function saveJson(filePath: string, data: unknown, options?: { indent?: number; mode?: number }): Promise<void> {
  await atomicWrite(filePath, serialize(data, options?.indent ?? 2), { mode: options?.mode });
}

export function saveJsonSync(filePath: string, data: unknown, options?: { indent?: number; mode?: number }): void {
  atomicWriteSync(filePath, serialize(data, options?.indent ?? 2), { mode: options?.mode });
}
