/**
 * Terminal color helpers for human-readable CLI output.
 *
 * chalk decides whether the terminal takes color; NO_COLOR and the
 * `colors: false` setting switch it off through applyColorSetting().
 */

import chalk from 'chalk';
import type { Priority, Status } from '../../core/models.js';

/** Called once from the preAction hook. */
export function applyColorSetting(enabled: boolean, env: NodeJS.ProcessEnv = process.env): void {
  if (!enabled || env['NO_COLOR'] !== undefined) {
    chalk.level = 0;
  }
}

const HEX_COLOR = /^#[0-9a-f]{6}$/i;

/** Status label in the status's own ClickUp color when it has one. */
export function statusText(status: Status | null): string {
  if (!status) return chalk.dim('none');
  if (status.color && HEX_COLOR.test(status.color)) return chalk.hex(status.color)(status.status);
  return status.status;
}

const PRIORITY_STYLES: Record<string, (s: string) => string> = {
  urgent: chalk.red.bold,
  high: chalk.yellow,
  normal: chalk.blue,
  low: chalk.gray,
};

export function priorityText(priority: Priority | null): string {
  const label = priority?.priority;
  if (!label) return chalk.dim('none');
  const style = PRIORITY_STYLES[label.toLowerCase()];
  return style ? style(label) : label;
}

export function success(message: string): string {
  return `${chalk.green('✓')} ${message}`;
}

export function warning(message: string): string {
  return chalk.yellow(message);
}

export function heading(text: string): string {
  return chalk.bold(text);
}

export function dim(text: string): string {
  return chalk.dim(text);
}

/** ClickUp dates are millisecond epoch strings. */
export function formatTimestamp(value: string | null): string {
  if (value === null || !/^\d+$/.test(value)) return '-';
  return new Date(Number(value)).toISOString().slice(0, 10);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}
