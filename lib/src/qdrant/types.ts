/**
 * Vector Store Types
 *
 * Search options, results and errors for the VectorStoreService.
 */

import { z } from 'zod';

// =============================================================================
// Vector Store Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  /** Connection to Qdrant failed */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  /** Rejected API key */
  UNAUTHORIZED: 'UNAUTHORIZED',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  TIMEOUT: 'TIMEOUT',
  /** Any other failed search */
  SEARCH_FAILED: 'SEARCH_FAILED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode =
  (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  /** HTTP status reported by Qdrant, when there was a response */
  readonly status: number | undefined;

  constructor(
    message: string,
    code: VectorStoreErrorCode,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'VectorStoreError';
    this.code = code;
    this.status = options?.status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  static fromError(error: unknown, code?: VectorStoreErrorCode): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new VectorStoreError(message, code ?? VectorStoreErrorCode.UNKNOWN, {
      cause: error,
    });
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

// =============================================================================
// Search
// =============================================================================

export const SearchOptionsSchema = z.object({
  /**
   * Number of nearest neighbours to return
   * @default 8
   */
  limit: z.number().int().positive().max(100).default(8),

  /** Drop matches scoring below this value */
  scoreThreshold: z.number().min(0).max(1).optional(),

  /**
   * Include point payloads (passage text and source metadata)
   * @default true
   */
  withPayload: z.boolean().default(true),
});

export type SearchOptions = z.infer<typeof SearchOptionsSchema>;
export type SearchOptionsInput = z.input<typeof SearchOptionsSchema>;

/** Point payload as stored at indexing time; shape is owned by the indexer */
export type PointPayload = Record<string, unknown>;

export interface SearchResult {
  id: string | number;
  score: number;
  payload?: PointPayload;
}

export interface SearchResponse {
  /** Matches in the engine's relevance order */
  results: SearchResult[];
  total: number;
  durationMs: number;
}
