/**
 * Chat Turn Types
 *
 * States, responses, traces and the fixed answer strings of one chat turn.
 */

import { z } from 'zod';

// =============================================================================
// States
// =============================================================================

/**
 * States a turn moves through, in order. A turn that fails outside the
 * guarded stages ends in FAILED instead of DONE.
 */
export const TurnState = {
  START: 'Start',
  RETRIEVING: 'Retrieving',
  PROMPT_READY: 'PromptReady',
  GENERATING: 'Generating',
  ANSWER_READY: 'AnswerReady',
  PERSISTING: 'Persisting',
  DONE: 'Done',
  FAILED: 'Failed',
} as const;

export type TurnState = (typeof TurnState)[keyof typeof TurnState];

export const TurnStage = {
  RETRIEVAL: 'retrieval',
  PROMPT_BUILDING: 'promptBuilding',
  GENERATION: 'generation',
  PERSISTENCE: 'persistence',
} as const;

export type TurnStage = (typeof TurnStage)[keyof typeof TurnStage];

// =============================================================================
// Fixed Answers
// =============================================================================

/** Answer substituted when generation fails */
export const GENERATION_FALLBACK_ANSWER =
  "I apologize, but I'm currently experiencing technical difficulties. Please try again later.";

/** Answer stored for a turn that failed outside the guarded stages */
export const SYSTEM_ERROR_ANSWER = 'System Error: Unable to process request';

/** Answer returned to the caller for such a turn */
export const TURN_FAILURE_ANSWER =
  'I apologize, but I encountered an error while processing your request. Please try again.';

// =============================================================================
// Configuration
// =============================================================================

export const EmptyRetrievalMode = {
  /** Send the bare question, as after a retrieval failure */
  RAW_QUESTION: 'raw_question',
  /** Send the prompt builder's fallback prompt */
  FALLBACK_PROMPT: 'fallback_prompt',
} as const;

export type EmptyRetrievalMode = (typeof EmptyRetrievalMode)[keyof typeof EmptyRetrievalMode];

export const OrchestratorConfigSchema = z.object({
  /**
   * Prompt used when retrieval succeeds with no usable passage
   * @default 'raw_question'
   */
  emptyRetrieval: z.enum(['raw_question', 'fallback_prompt']).default('raw_question'),

  /** Decoding overrides applied to every turn */
  decoding: z
    .object({
      maxNewTokens: z.number().int().positive().optional(),
      temperature: z.number().min(0).max(1).optional(),
      topP: z.number().gt(0).max(1).optional(),
    })
    .optional(),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;

// =============================================================================
// Turn Input and Output
// =============================================================================

export interface ChatTurnInput {
  /** Identity of the authenticated caller */
  userId: string;
  question: string;
  /** Correlation id; generated when absent */
  requestId?: string;
}

export interface ChatResponse {
  answer: string;
  sourceContext: string;
  success: boolean;
  errorMessage: string | null;
}

export interface StateEntry {
  state: TurnState;
  /** Milliseconds since the turn started */
  atMs: number;
}

export interface TurnTrace {
  requestId: string;
  states: StateEntry[];
  /** Stage durations in milliseconds */
  durations: Partial<Record<TurnStage, number>>;
  totalMs: number;
  /** Stages whose failure was absorbed, with the reason */
  degraded: Partial<Record<TurnStage, string>>;
  grounded: boolean;
  passageCount: number;
}

export interface ChatTurnOutcome {
  response: ChatResponse;
  trace: TurnTrace;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Failure outside the guarded stages of a turn.
 */
export class OrchestrationError extends Error {
  readonly requestId: string | undefined;

  constructor(message: string, options?: { cause?: unknown; requestId?: string }) {
    super(message, { cause: options?.cause });
    this.name = 'OrchestrationError';
    this.requestId = options?.requestId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OrchestrationError);
    }
  }

  static fromError(error: unknown, requestId?: string): OrchestrationError {
    if (error instanceof OrchestrationError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new OrchestrationError(message, {
      cause: error,
      ...(requestId !== undefined && { requestId }),
    });
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}

/**
 * Generate a unique request ID for tracking
 */
export function generateRequestId(prefix = 'chat'): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}
