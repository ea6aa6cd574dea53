/**
 * Chat History Endpoint
 *
 * GET /api/chat-history?limit=50&offset=0
 * Response: { success: true, data: Interaction[], count }
 *
 * Returns the caller's own interactions, newest first.
 */

import { parseHistoryQuery, type Interaction } from '@epf-assist/lib';
import { createRoute, type RouteDeps, type RouteHandler } from './_lib/http.js';

export interface InteractionBody {
  id: number;
  user_id: string;
  question: string;
  answer: string;
  context: string | null;
  created_at: string;
}

export interface ChatHistoryResponseBody {
  success: true;
  data: InteractionBody[];
  count: number;
}

export function toInteractionBody(interaction: Interaction): InteractionBody {
  return {
    id: interaction.id,
    user_id: interaction.userId,
    question: interaction.question,
    answer: interaction.answer,
    context: interaction.context,
    created_at: interaction.createdAt.toISOString(),
  };
}

export function createChatHistoryHandler(deps?: RouteDeps): RouteHandler {
  return createRoute(
    { name: 'chat-history', method: 'GET', requestIdPrefix: 'history' },
    async (ctx) => {
      const user = ctx.authenticate();
      ctx.enforceRateLimit(ctx.config.rateLimitPerMinute);

      const { limit, offset } = parseHistoryQuery(ctx.req.query ?? {});
      const { store } = await ctx.services();
      const interactions = await store.history(user.userId, { limit, offset });

      const body: ChatHistoryResponseBody = {
        success: true,
        data: interactions.map(toInteractionBody),
        count: interactions.length,
      };
      ctx.res.status(200).json(body);
    },
    deps
  );
}

export default createChatHistoryHandler();
