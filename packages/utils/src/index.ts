/**
 * @directplay/utils
 * 
 * Shared utilities package containing:
 * - Command execution (buffered and streaming, process-group aware)
 * - File operations
 * - Path utilities
 * - Time utilities
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  runStreamingCommand,
  killProcessGroup,
  type CommandResult,
  type CommandOptions,
  type StreamingCommandOptions,
  type StreamingCommandResult,
} from './command.js';

// File operations
export {
  ensureDir,
  fileExists,
  getFileSizeBytes,
  removeIfExists,
  moveFile,
  listMediaFiles,
} from './file.js';

// Path utilities
export {
  MEDIA_EXTENSIONS,
  getBasename,
  isMediaFile,
  deriveOutputPath,
  deriveTempPath,
} from './path.js';

// Type guards
export {
  isErrnoException,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  parseClockTime,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
