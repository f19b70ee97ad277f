/**
 * Atomic file writes using write-file-atomic (temp file, then rename).
 */

import writeFileAtomic from 'write-file-atomic';
import { mkdirSync, readFileSync } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface AtomicWriteOptions {
  mode?: number;
}

/**
 * Write data to a file atomically, creating parent directories first.
 */
export async function atomicWrite(filePath: string, data: string, options?: AtomicWriteOptions): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFileAtomic(filePath, data, { encoding: 'utf8', mode: options?.mode });
}

/** Synchronous variant for callers that persist from inside a setter. */
export function atomicWriteSync(filePath: string, data: string, options?: AtomicWriteOptions): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileAtomic.sync(filePath, data, { encoding: 'utf8', mode: options?.mode });
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a file as UTF-8. Returns null if it does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isMissing(err)) return null;
    throw err;
  }
}

export function safeReadFileSync(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (err: unknown) {
    if (isMissing(err)) return null;
    throw err;
  }
}
