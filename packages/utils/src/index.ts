/**
 * @vidshift/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Path utilities
 * - Type guards
 */

// Command execution
export {
  executeCommand,
  runTool,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  pathExists,
  removeFile,
  moveFile,
  canonicalPath,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  getExtension,
  getBasename,
  collapseWhitespace,
  maskUrl,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
