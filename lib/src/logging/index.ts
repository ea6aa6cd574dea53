/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogEntrySchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  type LoggerConfig,
  type LoggerConfigInput,
  createDefaultLoggerConfig,
  loadLoggerConfigFromEnv,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  getLogLevelName,
  shouldLog,
  formatError,
} from './types.js';

export {
  Logger,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
} from './logger.js';
