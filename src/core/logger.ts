/**
 * Pino logger factory for the toolkit.
 *
 * One root logger per process, written to a rotating file by pino-roll.
 * Modules ask for a child with getLogger('subsystem'). Stdout belongs to
 * command output and the MCP protocol, so nothing here ever writes there.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: string;
  /** Log file, relative to the config directory unless absolute. */
  file: string;
  maxFileSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  file: join('logs', 'clickup.log'),
  maxFileSize: 10 * 1024 * 1024,
  maxFiles: 5,
};

/** pino-roll takes sizes as '10m', '512k' and so on. */
function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

const levelFormatter = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param configDir - Per-user config directory the log path is resolved against
 */
export function initLogger(configDir: string, config: LoggerConfig): pino.Logger {
  const dest = isAbsolute(config.file) ? config.file : join(configDir, config.file);
  mkdirSync(dirname(dest), { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: levelFormatter,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: ['headers.Authorization', 'token'],
    },
    transport,
  );

  return rootLogger;
}

/**
 * Child logger bound to a subsystem name.
 *
 * Before initLogger runs (early startup, tests) this returns a stderr
 * logger at warn level.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= pino({ level: 'warn', formatters: levelFormatter }, pino.destination(2));
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Flush and drop the root logger. */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
