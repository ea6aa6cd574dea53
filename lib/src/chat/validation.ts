/**
 * Request Validation
 *
 * Zod schemas for the chat, history and statistics inputs plus the
 * conversion of zod issues into field-level validation errors.
 */

import { z } from 'zod';
import { HISTORY_DEFAULT_LIMIT, HISTORY_MAX_LIMIT } from '../db/types.js';

// =============================================================================
// Constants
// =============================================================================

/** Maximum question length in characters, after trimming */
export const MAX_QUESTION_LENGTH = 1000;

// =============================================================================
// Schemas
// =============================================================================

export const ChatRequestSchema = z
  .object({
    question: z
      .string({
        required_error: 'Question is required',
        invalid_type_error: 'Question must be a string',
      })
      .trim()
      .min(1, 'Question cannot be empty or only whitespace')
      .max(MAX_QUESTION_LENGTH, `Question cannot exceed ${MAX_QUESTION_LENGTH} characters`),
  })
  .strict();

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

/**
 * Query-string parameters arrive as strings; coerce before range checks.
 */
export const HistoryQuerySchema = z.object({
  limit: z.coerce
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .min(1, 'limit must be at least 1')
    .max(HISTORY_MAX_LIMIT, `limit cannot exceed ${HISTORY_MAX_LIMIT}`)
    .default(HISTORY_DEFAULT_LIMIT),
  offset: z.coerce
    .number({ invalid_type_error: 'offset must be a number' })
    .int('offset must be an integer')
    .min(0, 'offset cannot be negative')
    .default(0),
});

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;

// =============================================================================
// Validation Errors
// =============================================================================

export interface ValidationIssue {
  /** Path to the field that failed validation */
  field: string;
  message: string;
  /** Error code for programmatic handling */
  code: string;
}

/**
 * Map a zod issue to a specific error code
 */
function mapZodIssueToCode(issue: z.ZodIssue): string {
  const field = issue.path.join('.');

  if (field === 'question') {
    if (issue.code === 'invalid_type') {
      return issue.received === 'undefined' ? 'question_required' : 'question_invalid_type';
    }
    if (issue.code === 'too_small') return 'question_empty';
    if (issue.code === 'too_big') return 'question_too_long';
  }

  if (field === 'limit' || field === 'offset') {
    return `invalid_${field}`;
  }

  if (issue.code === 'unrecognized_keys') return 'unexpected_field';

  return 'invalid_value';
}

/**
 * Transform zod errors into structured validation issues
 */
export function transformZodErrors(zodError: z.ZodError): ValidationIssue[] {
  return zodError.issues.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
    code: mapZodIssueToCode(issue),
  }));
}

/**
 * Input rejected before it reaches the pipeline.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }

  static fromZodError(error: z.ZodError, message = 'Invalid request'): ValidationError {
    return new ValidationError(message, transformZodErrors(error));
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Parse a chat request body.
 *
 * @throws {ValidationError}
 */
export function parseChatRequest(body: unknown): ChatRequest {
  const result = ChatRequestSchema.safeParse(body);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Invalid chat request');
  }
  return result.data;
}

/**
 * Parse history pagination parameters.
 *
 * @throws {ValidationError}
 */
export function parseHistoryQuery(query: Record<string, unknown>): HistoryQuery {
  const result = HistoryQuerySchema.safeParse({
    limit: firstValue(query['limit']),
    offset: firstValue(query['offset']),
  });
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Invalid history query');
  }
  return result.data;
}

function firstValue(value: unknown): unknown {
  const single = Array.isArray(value) ? value[0] : value;
  return single === '' ? undefined : single;
}
