/**
 * Generation Types
 *
 * Decoding parameters, client configuration, results and error information
 * for the hosted text-generation endpoint.
 */

import { z } from 'zod';

// =============================================================================
// Decoding Parameters
// =============================================================================

export const DecodingParamsSchema = z.object({
  /**
   * Upper bound on generated tokens
   * @default 512
   */
  maxNewTokens: z.number().int().positive().default(512),

  /**
   * Sampling randomness
   * @default 0.7
   */
  temperature: z.number().min(0).max(1).default(0.7),

  /**
   * Nucleus-sampling probability mass
   * @default 0.95
   */
  topP: z.number().gt(0).max(1).default(0.95),
});

export type DecodingParams = z.infer<typeof DecodingParamsSchema>;
export type DecodingParamsInput = z.input<typeof DecodingParamsSchema>;

/** Sequences that end generation early when the model supports them */
export const DEFAULT_STOP_SEQUENCES: readonly string[] = [
  '</s>',
  '[/INST]',
  'Human:',
  'Assistant:',
  '<|endoftext|>',
];

// =============================================================================
// Client Configuration
// =============================================================================

export const DEFAULT_GENERATION_BASE_URL = 'https://api-inference.huggingface.co/models';

export const GenerationConfigSchema = z.object({
  /** Normalised model repository id, e.g. "org/model-name" */
  modelId: z.string().min(1),

  /** Bearer token; requests go out unauthenticated when absent */
  apiToken: z.string().min(1).optional(),

  /**
   * Endpoint base; the model id is appended as a path
   * @default 'https://api-inference.huggingface.co/models'
   */
  baseUrl: z.string().url().default(DEFAULT_GENERATION_BASE_URL),

  /**
   * Hard request deadline
   * @default 30000
   */
  timeoutMs: z.number().int().positive().default(30000),

  decoding: DecodingParamsSchema.default({}),

  stopSequences: z.array(z.string()).default([...DEFAULT_STOP_SEQUENCES]),
});

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;

// =============================================================================
// Requests and Results
// =============================================================================

/**
 * Per-call overrides. A model or token override builds a one-shot request
 * and leaves the client's configuration untouched.
 */
export interface GenerateOptions {
  decoding?: Partial<DecodingParams>;
  /** Repository id or full model URL */
  model?: string;
  apiToken?: string;
}

/** Body posted to the text-generation endpoint */
export interface GenerationPayload {
  inputs: string;
  parameters: {
    max_new_tokens: number;
    temperature: number;
    top_p: number;
    return_full_text: false;
    stop: string[];
  };
}

export interface GenerationResult {
  rawText: string;
  /** What callers show and persist */
  cleanedText: string;
  model: string;
  durationMs: number;
  /** True when the endpoint produced no usable text and the placeholder was returned */
  placeholder: boolean;
}

export const EMPTY_GENERATION_PLACEHOLDER =
  "I apologize, but I couldn't generate a response at this time.";

export const CONNECTION_TEST_PROMPT = 'Hello, this is a test message.';

// =============================================================================
// Error Types
// =============================================================================

export const GenerationErrorCode = {
  /** Request exceeded the deadline */
  TIMEOUT: 'timeout',
  /** Bad or missing credential */
  UNAUTHORIZED: 'unauthorized',
  RATE_LIMITED: 'rate_limited',
  /** Cold start on the hosting side */
  MODEL_LOADING: 'model_loading',
  MODEL_NOT_FOUND: 'model_not_found',
  /** Transport failure without an HTTP response */
  NETWORK_ERROR: 'network_error',
  /** Any other non-2xx status or a malformed payload */
  UPSTREAM_ERROR: 'upstream_error',
} as const;

export type GenerationErrorCode = (typeof GenerationErrorCode)[keyof typeof GenerationErrorCode];

export interface GenerationErrorInfo {
  code: GenerationErrorCode;
  message: string;
  /** Model the failed request targeted */
  model: string;
  /** Whether a later attempt may succeed */
  retryable: boolean;
  /** Suggested delay before a later attempt */
  retryAfterMs?: number;
  /** HTTP status when the endpoint answered */
  status?: number;
  originalError?: unknown;
}
