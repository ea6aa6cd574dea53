/**
 * Generation Error Types
 *
 * One class per failure the generation endpoint can produce, all carrying
 * structured info with retry guidance. The client never retries itself.
 */

import { type GenerationErrorInfo, GenerationErrorCode } from './types.js';

// =============================================================================
// Base Error Class
// =============================================================================

export interface GenerationErrorOptions {
  status?: number | undefined;
  retryAfterMs?: number | undefined;
  originalError?: unknown;
}

export class GenerationError extends Error {
  readonly info: GenerationErrorInfo;

  constructor(info: GenerationErrorInfo) {
    super(info.message, { cause: info.originalError });
    this.name = 'GenerationError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  get code(): GenerationErrorCode {
    return this.info.code;
  }

  get model(): string {
    return this.info.model;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  /** Suggested retry delay in milliseconds */
  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  get status(): number | undefined {
    return this.info.status;
  }

  static fromError(error: unknown, model: string): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new UpstreamError(message, model, { originalError: error });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

export class GenerationTimeoutError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    super({
      code: GenerationErrorCode.TIMEOUT,
      message,
      model,
      retryable: true,
      retryAfterMs: options.retryAfterMs ?? 1000,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'GenerationTimeoutError';
  }
}

/**
 * The endpoint rejected the credential (401 or 403). Not retryable until the
 * token is fixed.
 */
export class UnauthorizedError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    super({
      code: GenerationErrorCode.UNAUTHORIZED,
      message,
      model,
      retryable: false,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'UnauthorizedError';
  }
}

/**
 * Honours the endpoint's Retry-After header when present.
 */
export class RateLimitedError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    super({
      code: GenerationErrorCode.RATE_LIMITED,
      message,
      model,
      retryable: true,
      retryAfterMs: options.retryAfterMs ?? 60000,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'RateLimitedError';
  }
}

/**
 * Cold start. `retryAfterMs` follows the endpoint's `estimated_time` when it
 * sends one.
 */
export class ModelLoadingError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    super({
      code: GenerationErrorCode.MODEL_LOADING,
      message,
      model,
      retryable: true,
      retryAfterMs: options.retryAfterMs ?? 20000,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'ModelLoadingError';
  }
}

export class ModelNotFoundError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    super({
      code: GenerationErrorCode.MODEL_NOT_FOUND,
      message,
      model,
      retryable: false,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'ModelNotFoundError';
  }
}

export class NetworkError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    super({
      code: GenerationErrorCode.NETWORK_ERROR,
      message,
      model,
      retryable: true,
      retryAfterMs: options.retryAfterMs ?? 2000,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Any other failure status or an unreadable body. Retryable only for 5xx.
 */
export class UpstreamError extends GenerationError {
  constructor(message: string, model: string, options: GenerationErrorOptions = {}) {
    const serverSide = options.status !== undefined && options.status >= 500;
    super({
      code: GenerationErrorCode.UPSTREAM_ERROR,
      message,
      model,
      retryable: serverSide,
      retryAfterMs: serverSide ? (options.retryAfterMs ?? 5000) : options.retryAfterMs,
      status: options.status,
      originalError: options.originalError,
    });
    this.name = 'UpstreamError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}
