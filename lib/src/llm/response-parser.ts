/**
 * Response Parser
 *
 * Decodes the endpoint's JSON body into a tagged union. Shapes accepted:
 * a list of results (first item wins), an object signalling an error, and a
 * single object carrying `generated_text`. Anything else is malformed.
 */

import { z } from 'zod';

// =============================================================================
// Body Shapes
// =============================================================================

const ResultItemSchema = z.object({
  generated_text: z.string().optional(),
});

const ResultListSchema = z.array(z.unknown());

const ErrorBodySchema = z.object({
  error: z.unknown(),
  estimated_time: z.number().nonnegative().optional().catch(undefined),
});

const SingleResultSchema = z.object({
  generated_text: z.string(),
});

// =============================================================================
// Parsed Result
// =============================================================================

export const UpstreamErrorKind = {
  MODEL_LOADING: 'model_loading',
  RATE_LIMITED: 'rate_limited',
  OTHER: 'other',
} as const;

export type UpstreamErrorKind = (typeof UpstreamErrorKind)[keyof typeof UpstreamErrorKind];

export type ParsedGeneration =
  | { kind: 'text'; shape: 'list' | 'object'; text: string }
  | { kind: 'error'; errorKind: UpstreamErrorKind; message: string; estimatedTimeSeconds?: number }
  | { kind: 'malformed'; description: string };

function describe(body: unknown): string {
  if (body === null) return 'null';
  if (Array.isArray(body)) return 'array';
  return typeof body;
}

export function classifyUpstreamError(message: string): UpstreamErrorKind {
  const lower = message.toLowerCase();
  if (lower.includes('currently loading')) {
    return UpstreamErrorKind.MODEL_LOADING;
  }
  if (lower.includes('rate limited')) {
    return UpstreamErrorKind.RATE_LIMITED;
  }
  return UpstreamErrorKind.OTHER;
}

export function parseGenerationResponse(body: unknown): ParsedGeneration {
  const list = ResultListSchema.safeParse(body);
  if (list.success) {
    if (list.data.length === 0) {
      return { kind: 'text', shape: 'list', text: '' };
    }
    const first = ResultItemSchema.safeParse(list.data[0]);
    if (!first.success) {
      return { kind: 'malformed', description: 'list item without a text field' };
    }
    return { kind: 'text', shape: 'list', text: first.data.generated_text ?? '' };
  }

  const errorBody = ErrorBodySchema.safeParse(body);
  if (errorBody.success && errorBody.data.error !== undefined) {
    const { error, estimated_time } = errorBody.data;
    const message = typeof error === 'string' ? error : JSON.stringify(error);
    return {
      kind: 'error',
      errorKind: classifyUpstreamError(message),
      message,
      ...(estimated_time !== undefined && { estimatedTimeSeconds: estimated_time }),
    };
  }

  const single = SingleResultSchema.safeParse(body);
  if (single.success) {
    return { kind: 'text', shape: 'object', text: single.data.generated_text };
  }

  return { kind: 'malformed', description: `unexpected ${describe(body)} body` };
}
