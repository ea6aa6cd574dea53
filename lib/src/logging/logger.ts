/**
 * Logger Implementation
 *
 * Structured logger used by every service in the chat pipeline and by the
 * HTTP handlers. Supports four output formats and a custom sink.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LoggerConfigInput,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  loadLoggerConfigFromEnv,
  shouldLog,
  formatError,
  LogLevel,
  LogFormat,
} from './types.js';

type LogContext = Record<string, unknown>;

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private level: LogLevel;

  constructor(config?: LoggerConfigInput) {
    this.config = createDefaultLoggerConfig(config);
    this.level = this.config.level;
  }

  /**
   * Create a child logger; its source is appended to this logger's source.
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: LogContext): void;
  error(message: string, error: Error, context?: LogContext): void;
  error(
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevel.ERROR, message, context, errorOrContext);
    } else {
      this.log(LogLevel.ERROR, message, errorOrContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config, level: this.level };
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): void {
    if (!shouldLog(level, this.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      source: this.config.source,
      error: error ? formatError(error) : undefined,
    };

    this.write(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.COMPACT:
        return this.formatCompact(entry);
      case LogFormat.PRETTY:
        return this.config.colors ? this.formatPretty(entry) : this.formatText(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(LogLevelName[entry.level].padEnd(5));
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      source: entry.source,
      message: entry.message,
      ...entry.context,
      error: entry.error,
    });
  }

  private formatCompact(entry: LogEntry): string {
    const initial = LogLevelName[entry.level].charAt(0);
    const time = entry.timestamp.toISOString().slice(11, 19);
    return `${time} ${initial} ${entry.message}`;
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(`${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`);
    }
    parts.push(`${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);
    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }
    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
    }

    return parts.join(' ');
  }

  private write(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }
    if (!this.config.console) {
      return;
    }

    if (level === LogLevel.ERROR) {
      console.error(formatted);
    } else if (level === LogLevel.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

/**
 * Get or create the process-wide logger, configured from LOG_LEVEL/LOG_FORMAT.
 */
export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(loadLoggerConfigFromEnv());
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

export function createLogger(source: string, config?: LoggerConfigInput): Logger {
  return new Logger({ ...config, source });
}
