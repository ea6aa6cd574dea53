/**
 * Chat API Endpoint
 *
 * POST /api/chat
 * Request: { question: string }
 * Response: { answer, source_context, success, error_message }
 *
 * Stage failures inside the pipeline still answer 200; `success` and
 * `error_message` report a turn that failed outright. Only auth, rate limit,
 * validation and service start-up failures produce HTTP errors.
 */

import type { ChatResponse } from '@epf-assist/lib';
import { parseChatRequest } from '@epf-assist/lib';
import { createRoute, type RouteDeps, type RouteHandler } from './_lib/http.js';

export interface ChatResponseBody {
  answer: string;
  source_context: string;
  success: boolean;
  error_message: string | null;
}

export function toChatResponseBody(response: ChatResponse): ChatResponseBody {
  return {
    answer: response.answer,
    source_context: response.sourceContext,
    success: response.success,
    error_message: response.errorMessage,
  };
}

export function createChatHandler(deps?: RouteDeps): RouteHandler {
  return createRoute(
    { name: 'chat', method: 'POST' },
    async (ctx) => {
      const user = ctx.authenticate();
      ctx.enforceRateLimit(ctx.config.rateLimitPerMinute);

      const { question } = parseChatRequest(ctx.req.body);
      ctx.logger.info('Chat request received', {
        requestId: ctx.requestId,
        userId: user.userId,
        questionLength: question.length,
      });

      const { orchestrator } = await ctx.services();
      const { response, trace } = await orchestrator.handleTurn({
        userId: user.userId,
        question,
        requestId: ctx.requestId,
      });

      ctx.logger.info('Chat turn finished', {
        requestId: trace.requestId,
        success: response.success,
        states: trace.states.map((entry) => entry.state).join(' > '),
        durations: trace.durations,
        degraded: trace.degraded,
        totalMs: Math.round(trace.totalMs),
      });

      ctx.res.status(200).json(toChatResponseBody(response));
    },
    deps
  );
}

export default createChatHandler();
