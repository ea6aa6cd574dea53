/**
 * Embedding Types and Schemas
 *
 * Configuration and error types for query embedding with Google's
 * text-embedding models.
 */

import { z } from 'zod';

// =============================================================================
// Model Configuration
// =============================================================================

export const EmbeddingModel = {
  /** 768-dimensional general-purpose text embedding */
  TEXT_EMBEDDING_004: 'text-embedding-004',
} as const;

export type EmbeddingModel = (typeof EmbeddingModel)[keyof typeof EmbeddingModel];

export const DEFAULT_EMBEDDING_MODEL = EmbeddingModel.TEXT_EMBEDDING_004;

export const DEFAULT_EMBEDDING_DIMENSIONS = 768;

export const QueryEmbedderConfigSchema = z.object({
  apiKey: z.string().min(1, 'GOOGLE_API_KEY is required'),

  /**
   * Model identifier. A leading `models/` is accepted and stripped.
   * @default 'text-embedding-004'
   */
  model: z
    .string()
    .min(1)
    .transform((value) => value.replace(/^models\//, ''))
    .default(DEFAULT_EMBEDDING_MODEL),

  /**
   * Expected vector length; must match the vector index.
   * @default 768
   */
  dimensions: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),

  /**
   * Queries longer than this are rejected before any network call.
   * @default 8000
   */
  maxInputChars: z.number().int().positive().default(8000),
});

export type QueryEmbedderConfig = z.infer<typeof QueryEmbedderConfigSchema>;
export type QueryEmbedderConfigInput = z.input<typeof QueryEmbedderConfigSchema>;

/**
 * Loads embedding configuration from GOOGLE_API_KEY, EMBEDDING_MODEL and
 * EMBEDDING_DIMENSIONS.
 */
export function loadEmbeddingConfig(
  env: Record<string, string | undefined> = process.env
): QueryEmbedderConfig {
  return QueryEmbedderConfigSchema.parse({
    apiKey: env['GOOGLE_API_KEY'] ?? '',
    model: env['EMBEDDING_MODEL'] || undefined,
    dimensions: env['EMBEDDING_DIMENSIONS']
      ? parseInt(env['EMBEDDING_DIMENSIONS'], 10)
      : undefined,
  });
}

/**
 * Validates the embedding environment without throwing.
 */
export function validateEmbeddingEnv(
  env: Record<string, string | undefined> = process.env
): {
  isValid: boolean;
  missingVars: string[];
  errors: string[];
} {
  const missingVars: string[] = [];
  const errors: string[] = [];

  if (!env['GOOGLE_API_KEY']) {
    missingVars.push('GOOGLE_API_KEY');
  }

  const dimensions = env['EMBEDDING_DIMENSIONS'];
  if (dimensions && !(parseInt(dimensions, 10) > 0)) {
    errors.push('EMBEDDING_DIMENSIONS must be a positive integer');
  }

  return {
    isValid: missingVars.length === 0 && errors.length === 0,
    missingVars,
    errors,
  };
}

// =============================================================================
// Results
// =============================================================================

export interface QueryEmbedding {
  embedding: number[];
  model: string;
  durationMs: number;
}

// =============================================================================
// Errors
// =============================================================================

export const EmbeddingErrorCode = {
  EMBEDDING_FAILED: 'EMBEDDING_FAILED',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type EmbeddingErrorCode = (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;

  constructor(
    message: string,
    code: EmbeddingErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'EmbeddingError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  static fromError(error: unknown, code?: EmbeddingErrorCode): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new EmbeddingError(message, code ?? EmbeddingErrorCode.EMBEDDING_FAILED, {
      cause: error,
    });
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}
