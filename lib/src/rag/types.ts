/**
 * Retrieval and Prompt Types
 *
 * Passages, prompt bundles, the prompt template and the retrieval error.
 */

import { z } from 'zod';

// =============================================================================
// Retrieval Error Types
// =============================================================================

export const RetrievalErrorCode = {
  /** The query could not be embedded */
  EMBEDDING_FAILED: 'EMBEDDING_FAILED',
  /** The vector index query failed (auth, network, missing collection, quota) */
  SEARCH_FAILED: 'SEARCH_FAILED',
  INVALID_QUERY: 'INVALID_QUERY',
} as const;

export type RetrievalErrorCode = (typeof RetrievalErrorCode)[keyof typeof RetrievalErrorCode];

export class RetrievalError extends Error {
  readonly code: RetrievalErrorCode;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: RetrievalErrorCode,
    options?: { cause?: unknown; metadata?: Record<string, unknown> }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RetrievalError';
    this.code = code;
    this.metadata = options?.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetrievalError);
    }
  }

  static fromError(
    error: unknown,
    code?: RetrievalErrorCode,
    metadata?: Record<string, unknown>
  ): RetrievalError {
    if (error instanceof RetrievalError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new RetrievalError(message, code ?? RetrievalErrorCode.SEARCH_FAILED, {
      cause: error,
      metadata,
    });
  }
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

// =============================================================================
// Passages
// =============================================================================

/**
 * One retrieved unit of indexed text. Lives for a single chat turn.
 */
export interface RetrievedPassage {
  id: string | number;
  text: string;
  score: number;
  /** Payload fields other than the text, as stored by the indexer */
  metadata: Record<string, unknown>;
}

export const RetrieverConfigSchema = z.object({
  /**
   * Nearest neighbours requested per query
   * @default 8
   */
  topK: z.number().int().positive().max(100).default(8),

  /**
   * Payload field holding the passage text
   * @default 'text'
   */
  textField: z.string().min(1).default('text'),

  /** Optional similarity floor passed to the index */
  scoreThreshold: z.number().min(0).max(1).optional(),
});

export type RetrieverConfig = z.infer<typeof RetrieverConfigSchema>;
export type RetrieverConfigInput = z.input<typeof RetrieverConfigSchema>;

export function loadRetrieverConfig(
  env: Record<string, string | undefined> = process.env
): RetrieverConfig {
  return RetrieverConfigSchema.parse({
    topK: env['RETRIEVAL_TOP_K'] ? parseInt(env['RETRIEVAL_TOP_K'], 10) : undefined,
    textField: env['RETRIEVAL_TEXT_FIELD'] || undefined,
  });
}

// =============================================================================
// Prompt Template
// =============================================================================

export const PromptTemplateSchema = z.object({
  /** Opening sentence naming the assistant and its domain */
  rolePreamble: z.string().min(1),
  /** Follows the preamble in the grounded prompt only */
  groundedRole: z.string().min(1),
  /** Numbered rules for the grounded prompt, in order */
  groundedInstructions: z.array(z.string().min(1)).min(1),
  /** Closing request of the fallback prompt */
  fallbackInstruction: z.string().min(1),
  /** Placed between passages inside the prompt's context block */
  contextSeparator: z.string(),
  /** Final line of every prompt; the model continues after it */
  answerCue: z.string().min(1),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;

export const DEFAULT_ROLE_PREAMBLE =
  "You are EPF Assist, an expert EPFO (Employees' Provident Fund Organisation) assistant.";

export const DEFAULT_GROUNDED_ROLE =
  'Your role is to provide accurate, helpful, and comprehensive answers about EPF-related matters based on the provided context.';

export const DEFAULT_GROUNDED_INSTRUCTIONS: readonly string[] = Object.freeze([
  'Answer ONLY based on the provided context',
  'Be precise, concise, and professional',
  "If the context doesn't contain enough information, clearly state what information is missing instead of guessing",
  'Always cite relevant sections or rules when the context provides them',
  'Provide step-by-step guidance for procedures',
  'Use simple language that is easy to understand',
]);

export const DEFAULT_FALLBACK_INSTRUCTION =
  'Please provide a helpful response about EPF-related matters. Do not invent specific figures, ' +
  'rules or deadlines; if you need more specific information to give a complete answer, ' +
  'tell the user which additional details would help.';

/** Joins passage texts in the caller-facing source context */
export const SOURCE_CONTEXT_SEPARATOR = '\n';

export type PromptTemplateDefaults = Readonly<Omit<PromptTemplate, 'groundedInstructions'>> & {
  readonly groundedInstructions: readonly string[];
};

export const DEFAULT_PROMPT_TEMPLATE: PromptTemplateDefaults = Object.freeze({
  rolePreamble: DEFAULT_ROLE_PREAMBLE,
  groundedRole: DEFAULT_GROUNDED_ROLE,
  groundedInstructions: DEFAULT_GROUNDED_INSTRUCTIONS,
  fallbackInstruction: DEFAULT_FALLBACK_INSTRUCTION,
  contextSeparator: '\n\n---\n\n',
  answerCue: 'Answer:',
});

/**
 * Output of the prompt builder for one turn.
 */
export interface PromptBundle {
  finalPrompt: string;
  /** Passage texts joined for display; empty when no passage had text */
  sourceContext: string;
  /** True when the prompt carries a context block */
  grounded: boolean;
  passageCount: number;
}
