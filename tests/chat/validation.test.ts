/**
 * Tests for request validation
 */

import { describe, it, expect } from 'vitest';
import {
  ValidationError,
  isValidationError,
  parseChatRequest,
  parseHistoryQuery,
} from '../../lib/src/chat/validation.js';

function issuesOf(run: () => unknown) {
  try {
    run();
  } catch (error) {
    if (isValidationError(error)) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseChatRequest', () => {
  it('returns the trimmed question', () => {
    expect(parseChatRequest({ question: '  What is UAN?  ' })).toEqual({ question: 'What is UAN?' });
  });

  it('accepts a question of exactly 1000 characters', () => {
    expect(parseChatRequest({ question: 'q'.repeat(1000) }).question).toHaveLength(1000);
  });

  it('reports a missing question', () => {
    expect(issuesOf(() => parseChatRequest({}))).toEqual([
      { field: 'question', message: 'Question is required', code: 'question_required' },
    ]);
  });

  it('reports a non-string question', () => {
    expect(issuesOf(() => parseChatRequest({ question: 42 }))).toEqual([
      { field: 'question', message: 'Question must be a string', code: 'question_invalid_type' },
    ]);
  });

  it('reports a whitespace-only question', () => {
    expect(issuesOf(() => parseChatRequest({ question: '   ' }))).toEqual([
      { field: 'question', message: 'Question cannot be empty or only whitespace', code: 'question_empty' },
    ]);
  });

  it('reports unexpected fields', () => {
    expect(issuesOf(() => parseChatRequest({ question: 'hi', userId: 'someone-else' }))).toEqual([
      { field: 'body', message: "Unrecognized key(s) in object: 'userId'", code: 'unexpected_field' },
    ]);
  });

  it('rejects a non-object body', () => {
    expect(() => parseChatRequest('question')).toThrow(ValidationError);
  });
});

describe('parseHistoryQuery', () => {
  it('applies defaults', () => {
    expect(parseHistoryQuery({})).toEqual({ limit: 50, offset: 0 });
  });

  it('coerces query-string values and takes the first of repeated keys', () => {
    expect(parseHistoryQuery({ limit: ['20', '90'], offset: '40' })).toEqual({ limit: 20, offset: 40 });
  });

  it('treats empty values as absent', () => {
    expect(parseHistoryQuery({ limit: '', offset: '' })).toEqual({ limit: 50, offset: 0 });
  });

  it('rejects out-of-range values', () => {
    expect(issuesOf(() => parseHistoryQuery({ limit: '101', offset: '-1' }))).toEqual([
      { field: 'limit', message: 'limit cannot exceed 100', code: 'invalid_limit' },
      { field: 'offset', message: 'offset cannot be negative', code: 'invalid_offset' },
    ]);
  });

  it('rejects non-integer values', () => {
    expect(issuesOf(() => parseHistoryQuery({ limit: '2.5' }))).toEqual([
      { field: 'limit', message: 'limit must be an integer', code: 'invalid_limit' },
    ]);
  });
});
