/**
 * Process exit codes for the clickup CLI.
 *
 * Every handled failure exits with GENERAL_ERROR; the error kind travels in
 * the structured error body instead of the exit status.
 */

export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
