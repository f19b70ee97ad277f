/**
 * Interactive prompts. Questions go to stderr so stdout stays clean for
 * command output.
 */

import { createInterface } from 'node:readline/promises';
import { isCancel, password } from '@clack/prompts';
import { ClickUpError } from '../core/errors.js';

function requireTty(hint: string): void {
  if (!process.stdin.isTTY) {
    throw new ClickUpError(`Input required. ${hint}`);
  }
}

async function question(text: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(text);
  } finally {
    rl.close();
  }
}

export async function confirmAction(prompt: string, options?: { defaultValue?: boolean }): Promise<boolean> {
  requireTty('Re-run with --yes in non-interactive mode.');
  const defaultValue = options?.defaultValue ?? false;
  const suffix = defaultValue ? ' (Y/n) ' : ' (y/N) ';
  const normalized = (await question(`${prompt}${suffix}`)).trim().toLowerCase();
  if (!normalized) return defaultValue;
  return normalized === 'y' || normalized === 'yes';
}

/** Free-text answer; an empty answer gives the default. */
export async function ask(prompt: string, defaultValue = ''): Promise<string> {
  requireTty('Pass the value as an option in non-interactive mode.');
  const suffix = defaultValue ? ` [${defaultValue}] ` : ' ';
  const answer = (await question(`${prompt}${suffix}`)).trim();
  return answer === '' ? defaultValue : answer;
}

/** Masked answer for secrets such as API tokens. */
export async function askSecret(prompt: string): Promise<string> {
  requireTty('Pass the value as an argument in non-interactive mode.');
  const answer = await password({ message: prompt, mask: '*' });
  if (isCancel(answer)) throw new ClickUpError('Cancelled.');
  return answer.trim();
}

/**
 * Pick one of `choices` by 1-based number. Returns the chosen index.
 */
export async function choose(prompt: string, choices: readonly string[], defaultIndex = 0): Promise<number> {
  process.stderr.write(choices.map((c, i) => `  ${i + 1}. ${c}`).join('\n') + '\n');
  const answer = await ask(prompt, String(defaultIndex + 1));
  const picked = Number.parseInt(answer, 10);
  if (!Number.isInteger(picked) || picked < 1 || picked > choices.length) {
    throw new ClickUpError(`Invalid choice: ${answer}`);
  }
  return picked - 1;
}
