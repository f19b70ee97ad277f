/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and cliError().
 */

export type CliFormat = 'human' | 'json';

export interface FlagResolution {
  format: CliFormat;
  /** Where the format came from. */
  source: 'flag' | 'config' | 'default';
  quiet: boolean;
}

let currentResolution: FlagResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
};

export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FlagResolution {
  return currentResolution;
}

export function isJsonFormat(): boolean {
  return currentResolution.format === 'json';
}

export function isQuiet(): boolean {
  return currentResolution.quiet;
}
