/**
 * Resolve the output format from --json / --human / --quiet and the
 * configured `output_format` setting.
 */

import type { OutputFormat } from '../../types/config.js';
import type { FlagResolution } from '../format-context.js';

export type { FlagResolution };

/**
 * Flags win over the setting; `--json` wins over `--human` when both are
 * given. `table` in the settings file means human output.
 */
export function resolveFormat(opts: Record<string, unknown>, configured?: OutputFormat): FlagResolution {
  const quiet = opts['quiet'] === true;
  if (opts['json'] === true) return { format: 'json', source: 'flag', quiet };
  if (opts['human'] === true) return { format: 'human', source: 'flag', quiet };
  if (configured !== undefined) {
    return { format: configured === 'json' ? 'json' : 'human', source: 'config', quiet };
  }
  return { format: 'human', source: 'default', quiet };
}
