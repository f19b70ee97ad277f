/**
 * Commander option parsers shared by the command modules.
 */

import { InvalidArgumentError } from 'commander';

export function parsePriority(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 4) {
    throw new InvalidArgumentError('Priority must be 1 (urgent) to 4 (low).');
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

/** Repeatable option: each occurrence appends. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** YYYY-MM-DD (UTC midnight) to epoch milliseconds. */
export function parseDueDate(value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new InvalidArgumentError('Use YYYY-MM-DD.');
  }
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  if (new Date(ms).toISOString().slice(0, 10) !== value) {
    throw new InvalidArgumentError(`Not a valid date: ${value}`);
  }
  return ms;
}

export function parseUserId(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('User ids are numeric.');
  }
  return Number(value);
}
