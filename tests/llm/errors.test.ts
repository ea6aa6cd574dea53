/**
 * Tests for the generation error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  GenerationError,
  GenerationTimeoutError,
  ModelLoadingError,
  ModelNotFoundError,
  NetworkError,
  RateLimitedError,
  UnauthorizedError,
  UpstreamError,
  isGenerationError,
} from '../../lib/src/llm/errors.js';
import { GenerationErrorCode } from '../../lib/src/llm/types.js';

describe('generation errors', () => {
  it.each([
    [new GenerationTimeoutError('t', 'm'), GenerationErrorCode.TIMEOUT, true, 1000],
    [new UnauthorizedError('u', 'm'), GenerationErrorCode.UNAUTHORIZED, false, undefined],
    [new RateLimitedError('r', 'm'), GenerationErrorCode.RATE_LIMITED, true, 60000],
    [new ModelLoadingError('l', 'm'), GenerationErrorCode.MODEL_LOADING, true, 20000],
    [new ModelNotFoundError('n', 'm'), GenerationErrorCode.MODEL_NOT_FOUND, false, undefined],
    [new NetworkError('w', 'm'), GenerationErrorCode.NETWORK_ERROR, true, 2000],
    [new UpstreamError('x', 'm'), GenerationErrorCode.UPSTREAM_ERROR, false, undefined],
  ])('%s carries its retry guidance', (error, code, retryable, retryAfterMs) => {
    expect(error.code).toBe(code);
    expect(error.retryable).toBe(retryable);
    expect(error.retryAfterMs).toBe(retryAfterMs);
    expect(error.model).toBe('m');
    expect(isGenerationError(error)).toBe(true);
    expect(error).toBeInstanceOf(GenerationError);
  });

  it('lets an explicit delay win over the default', () => {
    expect(new RateLimitedError('r', 'm', { retryAfterMs: 5 }).retryAfterMs).toBe(5);
  });

  it('retries server-side upstream errors only', () => {
    expect(new UpstreamError('x', 'm', { status: 502 }).retryable).toBe(true);
    expect(new UpstreamError('x', 'm', { status: 400 }).retryable).toBe(false);
  });

  it('sets the subclass name', () => {
    expect(new ModelNotFoundError('n', 'm').name).toBe('ModelNotFoundError');
  });

  describe('fromError', () => {
    it('returns a generation error unchanged', () => {
      const original = new NetworkError('w', 'm');

      expect(GenerationError.fromError(original, 'other')).toBe(original);
    });

    it('wraps anything else as an upstream error', () => {
      const wrapped = GenerationError.fromError(new Error('odd'), 'm');

      expect(wrapped).toBeInstanceOf(UpstreamError);
      expect(wrapped.message).toBe('odd');
    });
  });
});
