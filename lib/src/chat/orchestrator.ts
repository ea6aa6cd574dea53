/**
 * Chat Orchestrator
 *
 * Runs one chat turn: retrieval, prompt assembly, generation, persistence.
 * Retrieval, generation and persistence failures are absorbed and replaced
 * with fallback values; only a failure outside those stages marks the turn
 * unsuccessful.
 */

import type { InteractionStore } from '../db/interaction-store.js';
import type { GenerateOptions } from '../llm/types.js';
import type { GenerationClient } from '../llm/generation-client.js';
import { isGenerationError } from '../llm/errors.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import type { PromptBuilder } from '../rag/prompt-builder.js';
import type { PassageRetriever } from '../rag/retriever.js';
import { isRetrievalError } from '../rag/types.js';
import { isPersistenceError } from '../db/types.js';
import { settle } from './result.js';
import { TurnTracker } from './turn-tracker.js';
import {
  EmptyRetrievalMode,
  GENERATION_FALLBACK_ANSWER,
  OrchestrationError,
  OrchestratorConfigSchema,
  SYSTEM_ERROR_ANSWER,
  TURN_FAILURE_ANSWER,
  TurnStage,
  TurnState,
  generateRequestId,
  type ChatTurnInput,
  type ChatTurnOutcome,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from './types.js';
import { ValidationError, ChatRequestSchema } from './validation.js';

export interface ChatOrchestratorDependencies {
  retriever: Pick<PassageRetriever, 'search'>;
  promptBuilder: Pick<PromptBuilder, 'build'>;
  generator: Pick<GenerationClient, 'generate'>;
  store: Pick<InteractionStore, 'append'>;
  logger?: Logger;
}

function errorCode(error: Error): string {
  if (isRetrievalError(error) || isGenerationError(error) || isPersistenceError(error)) {
    return error.code;
  }
  return error.name;
}

export class ChatOrchestrator {
  private readonly retriever: Pick<PassageRetriever, 'search'>;
  private readonly promptBuilder: Pick<PromptBuilder, 'build'>;
  private readonly generator: Pick<GenerationClient, 'generate'>;
  private readonly store: Pick<InteractionStore, 'append'>;
  private readonly logger: Logger;
  private readonly config: OrchestratorConfig;

  constructor(deps: ChatOrchestratorDependencies, config: OrchestratorConfigInput = {}) {
    this.retriever = deps.retriever;
    this.promptBuilder = deps.promptBuilder;
    this.generator = deps.generator;
    this.store = deps.store;
    this.logger = deps.logger ?? getGlobalLogger().child('ChatOrchestrator');
    this.config = OrchestratorConfigSchema.parse(config);
  }

  /**
   * Handle one chat turn.
   *
   * @throws {ValidationError} When the question or user id is rejected; nothing runs
   */
  async handleTurn(input: ChatTurnInput): Promise<ChatTurnOutcome> {
    const parsed = ChatRequestSchema.safeParse({ question: input.question });
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, 'Invalid chat request');
    }
    if (!input.userId.trim()) {
      throw new ValidationError('Invalid chat request', [
        { field: 'userId', message: 'User id is required', code: 'user_id_required' },
      ]);
    }

    const question = parsed.data.question;
    const userId = input.userId;
    const requestId = input.requestId ?? generateRequestId();
    const tracker = new TurnTracker(requestId, { logger: this.logger.child('TurnTracker') });
    let persistenceAttempted = false;

    this.logger.info('Chat turn started', {
      requestId,
      userId,
      question: question.slice(0, 50),
      questionLength: question.length,
    });
    tracker.enter(TurnState.START);

    try {
      // Retrieval and prompt assembly
      tracker.enter(TurnState.RETRIEVING);
      tracker.startStage(TurnStage.RETRIEVAL);
      const retrieval = await settle(() => this.retriever.search(question));
      tracker.endStage(TurnStage.RETRIEVAL);

      let finalPrompt = question;
      let sourceContext = '';

      if (!retrieval.ok) {
        tracker.markDegraded(TurnStage.RETRIEVAL, errorCode(retrieval.error));
        this.logger.error('Retrieval failed; continuing with the raw question', retrieval.error, {
          requestId,
          code: errorCode(retrieval.error),
        });
      } else if (
        retrieval.value.length === 0 &&
        this.config.emptyRetrieval === EmptyRetrievalMode.RAW_QUESTION
      ) {
        tracker.markDegraded(TurnStage.RETRIEVAL, 'NO_PASSAGES');
        this.logger.warn('No passages found; continuing with the raw question', { requestId });
      } else {
        tracker.startStage(TurnStage.PROMPT_BUILDING);
        const bundle = this.promptBuilder.build(question, retrieval.value);
        tracker.endStage(TurnStage.PROMPT_BUILDING);

        finalPrompt = bundle.finalPrompt;
        sourceContext = bundle.sourceContext;
        tracker.setRetrievalOutcome(bundle.grounded, bundle.passageCount);
        if (!bundle.grounded) {
          tracker.markDegraded(TurnStage.RETRIEVAL, 'NO_PASSAGES');
          this.logger.warn('No passages found; using the fallback prompt', { requestId });
        }
      }
      tracker.enter(TurnState.PROMPT_READY);

      // Generation
      tracker.enter(TurnState.GENERATING);
      tracker.startStage(TurnStage.GENERATION);
      const generation = await settle(() => this.generator.generate(finalPrompt, this.generateOptions()));
      tracker.endStage(TurnStage.GENERATION);

      let answer: string;
      if (generation.ok) {
        answer = generation.value.cleanedText;
      } else {
        answer = GENERATION_FALLBACK_ANSWER;
        tracker.markDegraded(TurnStage.GENERATION, errorCode(generation.error));
        this.logger.error('Generation failed; returning the fallback answer', generation.error, {
          requestId,
          code: errorCode(generation.error),
        });
      }
      tracker.enter(TurnState.ANSWER_READY);

      // Persistence
      tracker.enter(TurnState.PERSISTING);
      persistenceAttempted = true;
      tracker.startStage(TurnStage.PERSISTENCE);
      const persisted = await settle(() =>
        this.store.append({ userId, question, answer, context: sourceContext })
      );
      tracker.endStage(TurnStage.PERSISTENCE);

      if (!persisted.ok) {
        tracker.markDegraded(TurnStage.PERSISTENCE, errorCode(persisted.error));
        this.logger.error('Failed to persist interaction', persisted.error, {
          requestId,
          code: errorCode(persisted.error),
        });
      }
      tracker.enter(TurnState.DONE);

      const trace = tracker.getTrace();
      this.logger.info('Chat turn completed', {
        requestId,
        grounded: trace.grounded,
        passageCount: trace.passageCount,
        degraded: Object.keys(trace.degraded),
        totalMs: Math.round(trace.totalMs),
      });

      return {
        response: { answer, sourceContext, success: true, errorMessage: null },
        trace,
      };
    } catch (error) {
      const failure = OrchestrationError.fromError(error, requestId);
      this.logger.error('Chat turn failed', failure, { requestId });

      if (!persistenceAttempted) {
        const logged = await settle(() =>
          this.store.append({ userId, question, answer: SYSTEM_ERROR_ANSWER, context: '' })
        );
        if (!logged.ok) {
          this.logger.error('Failed to persist error interaction', logged.error, { requestId });
        }
      }
      tracker.enter(TurnState.FAILED);

      return {
        response: {
          answer: TURN_FAILURE_ANSWER,
          sourceContext: '',
          success: false,
          errorMessage: failure.message,
        },
        trace: tracker.getTrace(),
      };
    }
  }

  private generateOptions(): GenerateOptions {
    const decoding = this.config.decoding;
    if (!decoding) {
      return {};
    }
    return {
      decoding: {
        ...(decoding.maxNewTokens !== undefined && { maxNewTokens: decoding.maxNewTokens }),
        ...(decoding.temperature !== undefined && { temperature: decoding.temperature }),
        ...(decoding.topP !== undefined && { topP: decoding.topP }),
      },
    };
  }
}

export function createChatOrchestrator(
  deps: ChatOrchestratorDependencies,
  config?: OrchestratorConfigInput
): ChatOrchestrator {
  return new ChatOrchestrator(deps, config);
}
