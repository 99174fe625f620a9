/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the workspace.
 */

import { pino, destination, stdTimeFunctions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: stdTimeFunctions.isoTime,
  base: {
    service: 'refmaster',
    env: NODE_ENV,
  },
  // Terminal output belongs to the CLI renderer; logs go to stderr
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      destination: 2,
    },
  } : undefined,
}, NODE_ENV === 'development' ? undefined : destination(2));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
