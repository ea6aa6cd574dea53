/**
 * Interaction Store Types
 *
 * Zod schemas and row mappers for the chat_interactions table.
 */

import { z } from 'zod';

// =============================================================================
// Interaction
// =============================================================================

/**
 * One question/answer pair as stored. Immutable after insert.
 */
export const InteractionSchema = z.object({
  id: z.number().int().positive(),
  userId: z.string().min(1),
  question: z.string(),
  answer: z.string(),
  /** Source context shown with the answer; null when none was recorded */
  context: z.string().nullable(),
  /** Server-assigned UTC timestamp */
  createdAt: z.date(),
});

export type Interaction = z.infer<typeof InteractionSchema>;

export const CreateInteractionInputSchema = z.object({
  userId: z.string().trim().min(1, 'userId is required'),
  question: z.string(),
  answer: z.string(),
  context: z.string().nullable().default(null),
});

export type CreateInteractionInput = z.input<typeof CreateInteractionInputSchema>;

/**
 * Raw row from chat_interactions. BIGSERIAL ids arrive as strings from pg.
 */
export interface InteractionRow {
  id: string | number;
  user_id: string;
  question: string;
  answer: string;
  context: string | null;
  created_at: Date;
}

/**
 * Converts a database row to an Interaction (snake_case to camelCase)
 */
export function rowToInteraction(row: InteractionRow): Interaction {
  return {
    id: typeof row.id === 'string' ? parseInt(row.id, 10) : row.id,
    userId: row.user_id,
    question: row.question,
    answer: row.answer,
    context: row.context,
    createdAt: row.created_at,
  };
}

// =============================================================================
// Queries
// =============================================================================

export const HISTORY_DEFAULT_LIMIT = 50;
export const HISTORY_MAX_LIMIT = 100;

export const HistoryOptionsSchema = z.object({
  limit: z.number().int().min(1).max(HISTORY_MAX_LIMIT).default(HISTORY_DEFAULT_LIMIT),
  offset: z.number().int().nonnegative().default(0),
});

export type HistoryOptions = z.infer<typeof HistoryOptionsSchema>;
export type HistoryOptionsInput = z.input<typeof HistoryOptionsSchema>;

export interface AppendResult {
  /** False when the insert reported zero rows; logged, not raised */
  inserted: boolean;
  interaction: Interaction | null;
}

export interface InteractionStatistics {
  totalCount: number;
  distinctUserCount: number;
  /** Interactions since 00:00 UTC of the current date */
  countInCurrentDay: number;
  /** Mean answer length in characters; 0 when there are no interactions */
  meanAnswerLength: number;
}

export interface InteractionStatisticsRow {
  total_count: string;
  distinct_user_count: string;
  count_in_current_day: string;
  mean_answer_length: string | null;
}

export function getEmptyStatistics(): InteractionStatistics {
  return {
    totalCount: 0,
    distinctUserCount: 0,
    countInCurrentDay: 0,
    meanAnswerLength: 0,
  };
}

// =============================================================================
// Errors
// =============================================================================

export const PersistenceErrorCode = {
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  CONSTRAINT_VIOLATION: 'CONSTRAINT_VIOLATION',
  QUERY_FAILED: 'QUERY_FAILED',
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type PersistenceErrorCode = (typeof PersistenceErrorCode)[keyof typeof PersistenceErrorCode];

export class PersistenceError extends Error {
  readonly code: PersistenceErrorCode;
  /** SQLSTATE reported by PostgreSQL, when there was one */
  readonly sqlState: string | undefined;

  constructor(
    message: string,
    code: PersistenceErrorCode,
    options?: { cause?: unknown; sqlState?: string }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'PersistenceError';
    this.code = code;
    this.sqlState = options?.sqlState;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PersistenceError);
    }
  }

  static fromError(error: unknown, context: string): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const sqlState = getSqlState(error);
    return new PersistenceError(`${context}: ${message}`, classifyDatabaseError(error), {
      cause: error,
      ...(sqlState !== undefined && { sqlState }),
    });
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE']);

function getSqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Map a pg or socket error onto a persistence error code.
 * SQLSTATE class 23 is an integrity constraint violation, class 08 a
 * connection exception.
 */
export function classifyDatabaseError(error: unknown): PersistenceErrorCode {
  const code = getSqlState(error);
  if (code === undefined) {
    const message = error instanceof Error ? error.message.toLowerCase() : '';
    return message.includes('connect') || message.includes('timeout')
      ? PersistenceErrorCode.CONNECTION_ERROR
      : PersistenceErrorCode.QUERY_FAILED;
  }
  if (code.startsWith('23')) {
    return PersistenceErrorCode.CONSTRAINT_VIOLATION;
  }
  if (code.startsWith('08') || CONNECTION_ERROR_CODES.has(code) || code === '57P01') {
    return PersistenceErrorCode.CONNECTION_ERROR;
  }
  return PersistenceErrorCode.QUERY_FAILED;
}
