/**
 * @refmaster/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File and path helpers
 * - Keyed lock
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export { ensureDir, isDirectory, listFiles, isErrnoException } from './file.js';

// Path utilities
export { getExtension, getBasename, hasExtension } from './path.js';

// Locking
export { KeyedLock } from './lock.js';

// Type guards
export { isString, isNonEmptyString } from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
