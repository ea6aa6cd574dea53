/**
 * Logging Types and Schemas
 *
 * Level, format and configuration definitions shared by the Logger and the
 * environment loader.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

const LEVELS_BY_NAME: Readonly<Record<string, LogLevel>> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE,
};

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Structured fields attached by the caller */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Module path, e.g. `ChatOrchestrator` or `api:chat` */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line, for log drains */
  JSON: 'json',
  /** Time, level initial and message only */
  COMPACT: 'compact',
  /** Text with ANSI colours */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /** @default 'text' */
  format: LogFormatSchema.default('text'),

  timestamps: z.boolean().default(true),

  colors: z.boolean().default(true),

  source: z.string().optional(),

  /**
   * Whether to write to the console when no custom output is set
   * @default true
   */
  console: z.boolean().default(true),

  /**
   * Custom sink receiving each formatted line. Takes precedence over console.
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: LoggerConfigInput
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

/**
 * Reads LOG_LEVEL and LOG_FORMAT. Production defaults to JSON lines so the
 * platform's log drain can parse them.
 */
export function loadLoggerConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): LoggerConfig {
  const isProduction = env['NODE_ENV'] === 'production';
  const format = LogFormatSchema.safeParse(env['LOG_FORMAT']?.trim().toLowerCase());

  return createDefaultLoggerConfig({
    level: parseLogLevel(env['LOG_LEVEL'] ?? ''),
    format: format.success ? format.data : isProduction ? 'json' : 'pretty',
    colors: !isProduction,
  });
}

// =============================================================================
// Log Formatting
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Parse a log level name, case-insensitively. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  return LEVELS_BY_NAME[level.trim().toLowerCase()] ?? LogLevel.INFO;
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging. A string `code` property (set by every error
 * class in this library and by pg/axios errors) is carried over.
 */
export function formatError(
  error: unknown
): { name: string; message: string; code?: string; stack?: string } {
  if (error instanceof Error) {
    const code =
      'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined && { code }),
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
