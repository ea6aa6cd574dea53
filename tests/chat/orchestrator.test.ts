/**
 * Tests for ChatOrchestrator
 *
 * Every collaborator is a fake, so each test pins down how one stage's
 * outcome flows into the response and the stored interaction.
 */

import { describe, it, expect, vi } from 'vitest';
import { ChatOrchestrator } from '../../lib/src/chat/orchestrator.js';
import {
  GENERATION_FALLBACK_ANSWER,
  SYSTEM_ERROR_ANSWER,
  TURN_FAILURE_ANSWER,
  TurnState,
} from '../../lib/src/chat/types.js';
import { ValidationError } from '../../lib/src/chat/validation.js';
import { PersistenceError, PersistenceErrorCode } from '../../lib/src/db/types.js';
import { GenerationTimeoutError } from '../../lib/src/llm/errors.js';
import type { GenerationResult } from '../../lib/src/llm/types.js';
import { Logger } from '../../lib/src/logging/index.js';
import { PromptBuilder } from '../../lib/src/rag/prompt-builder.js';
import { RetrievalError, RetrievalErrorCode, type RetrievedPassage } from '../../lib/src/rag/types.js';

const silentLogger = new Logger({ console: false });
const QUESTION = 'How do I transfer my EPF balance?';

const passages: RetrievedPassage[] = [
  { id: 1, text: 'Transfers are filed online through Form 13.', score: 0.91, metadata: {} },
  { id: 2, text: 'The new employer must approve the request.', score: 0.84, metadata: {} },
];

function generationResult(cleanedText: string): GenerationResult {
  return { rawText: cleanedText, cleanedText, model: 'test-model', durationMs: 5, placeholder: false };
}

function createFakes() {
  return {
    retriever: { search: vi.fn().mockResolvedValue(passages) },
    promptBuilder: new PromptBuilder(),
    generator: { generate: vi.fn().mockResolvedValue(generationResult('Submit Form 13 online.')) },
    store: { append: vi.fn().mockResolvedValue({ inserted: true, interaction: null }) },
  };
}

const fullStates = [
  TurnState.START,
  TurnState.RETRIEVING,
  TurnState.PROMPT_READY,
  TurnState.GENERATING,
  TurnState.ANSWER_READY,
  TurnState.PERSISTING,
  TurnState.DONE,
];

describe('ChatOrchestrator', () => {
  describe('successful turn', () => {
    it('grounds the prompt, answers and persists', async () => {
      const fakes = createFakes();
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({
        userId: 'user-1',
        question: QUESTION,
        requestId: 'chat-test-1',
      });

      const expectedPrompt = new PromptBuilder().build(QUESTION, passages).finalPrompt;
      const expectedContext =
        'Transfers are filed online through Form 13.\nThe new employer must approve the request.';

      expect(fakes.retriever.search).toHaveBeenCalledWith(QUESTION);
      expect(fakes.generator.generate).toHaveBeenCalledWith(expectedPrompt, {});
      expect(fakes.store.append).toHaveBeenCalledWith({
        userId: 'user-1',
        question: QUESTION,
        answer: 'Submit Form 13 online.',
        context: expectedContext,
      });
      expect(response).toEqual({
        answer: 'Submit Form 13 online.',
        sourceContext: expectedContext,
        success: true,
        errorMessage: null,
      });
      expect(trace.requestId).toBe('chat-test-1');
      expect(trace.states.map((entry) => entry.state)).toEqual(fullStates);
      expect(trace.grounded).toBe(true);
      expect(trace.passageCount).toBe(2);
      expect(trace.degraded).toEqual({});
    });

    it('trims the question before using it', async () => {
      const fakes = createFakes();
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      await orchestrator.handleTurn({ userId: 'user-1', question: `  ${QUESTION}\n` });

      expect(fakes.retriever.search).toHaveBeenCalledWith(QUESTION);
      expect(fakes.store.append.mock.calls[0]?.[0]).toMatchObject({ question: QUESTION });
    });

    it('generates a request id when none is given', async () => {
      const orchestrator = new ChatOrchestrator({ ...createFakes(), logger: silentLogger });

      const { trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(trace.requestId).toMatch(/^chat-\d+-[a-z0-9]+$/);
    });

    it('passes configured decoding overrides', async () => {
      const fakes = createFakes();
      const orchestrator = new ChatOrchestrator(
        { ...fakes, logger: silentLogger },
        { decoding: { temperature: 0.2, maxNewTokens: 256 } }
      );

      await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(fakes.generator.generate.mock.calls[0]?.[1]).toEqual({
        decoding: { maxNewTokens: 256, temperature: 0.2 },
      });
    });
  });

  describe('empty retrieval', () => {
    it('sends the raw question by default', async () => {
      const fakes = createFakes();
      fakes.retriever.search.mockResolvedValueOnce([]);
      const build = vi.spyOn(fakes.promptBuilder, 'build');
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(build).not.toHaveBeenCalled();
      expect(fakes.generator.generate).toHaveBeenCalledWith(QUESTION, {});
      expect(response.sourceContext).toBe('');
      expect(response.success).toBe(true);
      expect(trace.degraded).toEqual({ retrieval: 'NO_PASSAGES' });
    });

    it('sends the fallback prompt when configured', async () => {
      const fakes = createFakes();
      fakes.retriever.search.mockResolvedValueOnce([]);
      const orchestrator = new ChatOrchestrator(
        { ...fakes, logger: silentLogger },
        { emptyRetrieval: 'fallback_prompt' }
      );

      const { response, trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(fakes.generator.generate).toHaveBeenCalledWith(new PromptBuilder().buildFallbackPrompt(QUESTION), {});
      expect(response.sourceContext).toBe('');
      expect(trace.grounded).toBe(false);
      expect(trace.degraded).toEqual({ retrieval: 'NO_PASSAGES' });
    });
  });

  describe('partial failures', () => {
    it('continues with the raw question when retrieval fails', async () => {
      const fakes = createFakes();
      fakes.retriever.search.mockRejectedValueOnce(
        new RetrievalError('Vector search failed', RetrievalErrorCode.SEARCH_FAILED)
      );
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(fakes.generator.generate).toHaveBeenCalledWith(QUESTION, {});
      expect(response).toEqual({
        answer: 'Submit Form 13 online.',
        sourceContext: '',
        success: true,
        errorMessage: null,
      });
      expect(fakes.store.append).toHaveBeenCalledWith({
        userId: 'user-1',
        question: QUESTION,
        answer: 'Submit Form 13 online.',
        context: '',
      });
      expect(trace.degraded).toEqual({ retrieval: 'SEARCH_FAILED' });
      expect(trace.states.map((entry) => entry.state)).toEqual(fullStates);
    });

    it('substitutes the fallback answer when generation fails', async () => {
      const fakes = createFakes();
      fakes.generator.generate.mockRejectedValueOnce(new GenerationTimeoutError('Request timed out', 'test-model'));
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(response.answer).toBe(GENERATION_FALLBACK_ANSWER);
      expect(response.success).toBe(true);
      expect(response.sourceContext).toContain('Form 13');
      expect(fakes.store.append.mock.calls[0]?.[0]).toMatchObject({ answer: GENERATION_FALLBACK_ANSWER });
      expect(trace.degraded).toEqual({ generation: 'timeout' });
    });

    it('still succeeds when persistence fails', async () => {
      const fakes = createFakes();
      fakes.store.append.mockRejectedValueOnce(
        new PersistenceError('Failed to save interaction: down', PersistenceErrorCode.CONNECTION_ERROR)
      );
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(response.success).toBe(true);
      expect(response.answer).toBe('Submit Form 13 online.');
      expect(fakes.store.append).toHaveBeenCalledTimes(1);
      expect(trace.degraded).toEqual({ persistence: 'CONNECTION_ERROR' });
      expect(trace.states.at(-1)?.state).toBe(TurnState.DONE);
    });

    it('absorbs every stage failing at once', async () => {
      const fakes = createFakes();
      fakes.retriever.search.mockRejectedValueOnce(new Error('index offline'));
      fakes.generator.generate.mockRejectedValueOnce(new Error('endpoint offline'));
      fakes.store.append.mockRejectedValueOnce(new Error('database offline'));
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(response).toEqual({
        answer: GENERATION_FALLBACK_ANSWER,
        sourceContext: '',
        success: true,
        errorMessage: null,
      });
      expect(trace.degraded).toEqual({ retrieval: 'Error', generation: 'Error', persistence: 'Error' });
    });
  });

  describe('turn failure', () => {
    it('records a system error when prompt assembly throws', async () => {
      const fakes = {
        ...createFakes(),
        promptBuilder: {
          build: vi.fn(() => {
            throw new Error('template exploded');
          }),
        },
      };
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response, trace } = await orchestrator.handleTurn({
        userId: 'user-1',
        question: QUESTION,
        requestId: 'chat-test-2',
      });

      expect(response).toEqual({
        answer: TURN_FAILURE_ANSWER,
        sourceContext: '',
        success: false,
        errorMessage: 'template exploded',
      });
      expect(fakes.generator.generate).not.toHaveBeenCalled();
      expect(fakes.store.append).toHaveBeenCalledWith({
        userId: 'user-1',
        question: QUESTION,
        answer: SYSTEM_ERROR_ANSWER,
        context: '',
      });
      expect(trace.states.map((entry) => entry.state)).toEqual([
        TurnState.START,
        TurnState.RETRIEVING,
        TurnState.FAILED,
      ]);
    });

    it('returns the failure even when the system error cannot be stored', async () => {
      const fakes = {
        ...createFakes(),
        promptBuilder: {
          build: vi.fn(() => {
            throw new Error('template exploded');
          }),
        },
      };
      fakes.store.append.mockRejectedValueOnce(new Error('database offline'));
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      const { response } = await orchestrator.handleTurn({ userId: 'user-1', question: QUESTION });

      expect(response.success).toBe(false);
      expect(response.errorMessage).toBe('template exploded');
    });
  });

  describe('input validation', () => {
    it.each(['', '   ', '\n\t'])('rejects the blank question %j before any stage runs', async (question) => {
      const fakes = createFakes();
      const orchestrator = new ChatOrchestrator({ ...fakes, logger: silentLogger });

      await expect(orchestrator.handleTurn({ userId: 'user-1', question })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(fakes.retriever.search).not.toHaveBeenCalled();
      expect(fakes.store.append).not.toHaveBeenCalled();
    });

    it('rejects a question over the length limit', async () => {
      const orchestrator = new ChatOrchestrator({ ...createFakes(), logger: silentLogger });

      await expect(
        orchestrator.handleTurn({ userId: 'user-1', question: 'a'.repeat(1001) })
      ).rejects.toMatchObject({
        issues: [{ field: 'question', code: 'question_too_long', message: 'Question cannot exceed 1000 characters' }],
      });
    });

    it('rejects a blank user id', async () => {
      const orchestrator = new ChatOrchestrator({ ...createFakes(), logger: silentLogger });

      await expect(orchestrator.handleTurn({ userId: ' ', question: QUESTION })).rejects.toMatchObject({
        issues: [{ field: 'userId', message: 'User id is required', code: 'user_id_required' }],
      });
    });
  });
});
