/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the workspace.
 */

import { destination as fileDestination, pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';
// Path to append logs to; unset or '-' means stdout
const LOG_FILE = process.env['LOG_FILE'];

const isPretty = NODE_ENV === 'development';

const destination = !isPretty && LOG_FILE && LOG_FILE !== '-'
  ? fileDestination({ dest: LOG_FILE, mkdir: true, sync: true })
  : undefined;

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'vidshift',
    env: NODE_ENV,
  },
  transport: isPretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
}, destination);

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
