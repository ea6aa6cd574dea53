/**
 * Tests for the generation response parser
 */

import { describe, it, expect } from 'vitest';
import {
  UpstreamErrorKind,
  classifyUpstreamError,
  parseGenerationResponse,
} from '../../lib/src/llm/response-parser.js';

describe('parseGenerationResponse', () => {
  it('takes the first item of a list', () => {
    expect(parseGenerationResponse([{ generated_text: 'first' }, { generated_text: 'second' }])).toEqual({
      kind: 'text',
      shape: 'list',
      text: 'first',
    });
  });

  it('treats an empty list as empty text', () => {
    expect(parseGenerationResponse([])).toEqual({ kind: 'text', shape: 'list', text: '' });
  });

  it('treats a list item without generated_text as empty text', () => {
    expect(parseGenerationResponse([{ score: 1 }])).toEqual({ kind: 'text', shape: 'list', text: '' });
  });

  it('rejects a list whose first item is not an object', () => {
    expect(parseGenerationResponse(['text'])).toEqual({
      kind: 'malformed',
      description: 'list item without a text field',
    });
  });

  it('reads a single object', () => {
    expect(parseGenerationResponse({ generated_text: 'hello' })).toEqual({
      kind: 'text',
      shape: 'object',
      text: 'hello',
    });
  });

  it('reads an error object with an estimated time', () => {
    expect(parseGenerationResponse({ error: 'Model x is currently loading', estimated_time: 8 })).toEqual({
      kind: 'error',
      errorKind: UpstreamErrorKind.MODEL_LOADING,
      message: 'Model x is currently loading',
      estimatedTimeSeconds: 8,
    });
  });

  it('prefers the error over generated_text', () => {
    expect(parseGenerationResponse({ error: 'bad input', generated_text: 'ignored' })).toEqual({
      kind: 'error',
      errorKind: UpstreamErrorKind.OTHER,
      message: 'bad input',
    });
  });

  it('serialises a structured error and ignores a bad estimated time', () => {
    expect(parseGenerationResponse({ error: { reason: 'quota' }, estimated_time: 'soon' })).toEqual({
      kind: 'error',
      errorKind: UpstreamErrorKind.OTHER,
      message: '{"reason":"quota"}',
    });
  });

  it.each(['EPF interest is credited annually.', '', '  padded  ', 'Answer: Fact one. Fact tw'])(
    'reads %j identically from a list or an object',
    (text) => {
      const fromList = parseGenerationResponse([{ generated_text: text }]);
      const fromObject = parseGenerationResponse({ generated_text: text });

      expect(fromList).toEqual({ kind: 'text', shape: 'list', text });
      expect(fromObject).toEqual({ kind: 'text', shape: 'object', text });
    }
  );

  it.each([
    [null, 'unexpected null body'],
    ['text', 'unexpected string body'],
    [42, 'unexpected number body'],
    [{ output: 'x' }, 'unexpected object body'],
    [{ generated_text: 5 }, 'unexpected object body'],
  ])('marks %j as malformed', (body, description) => {
    expect(parseGenerationResponse(body)).toEqual({ kind: 'malformed', description });
  });
});

describe('classifyUpstreamError', () => {
  it('recognises loading and rate limiting case-insensitively', () => {
    expect(classifyUpstreamError('Model is Currently Loading')).toBe(UpstreamErrorKind.MODEL_LOADING);
    expect(classifyUpstreamError('Rate limited. Please log in')).toBe(UpstreamErrorKind.RATE_LIMITED);
    expect(classifyUpstreamError('Internal error')).toBe(UpstreamErrorKind.OTHER);
  });
});
