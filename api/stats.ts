/**
 * Statistics Endpoint
 *
 * GET /api/stats
 * Response: { success: true, data: { total_count, distinct_user_count,
 *   count_in_current_day, mean_answer_length } }
 *
 * Scoped to the authenticated caller.
 */

import type { InteractionStatistics } from '@epf-assist/lib';
import { createRoute, type RouteDeps, type RouteHandler } from './_lib/http.js';

export interface StatisticsBody {
  total_count: number;
  distinct_user_count: number;
  count_in_current_day: number;
  mean_answer_length: number;
}

export function toStatisticsBody(stats: InteractionStatistics): StatisticsBody {
  return {
    total_count: stats.totalCount,
    distinct_user_count: stats.distinctUserCount,
    count_in_current_day: stats.countInCurrentDay,
    mean_answer_length: stats.meanAnswerLength,
  };
}

export function createStatsHandler(deps?: RouteDeps): RouteHandler {
  return createRoute(
    { name: 'stats', method: 'GET' },
    async (ctx) => {
      const user = ctx.authenticate();
      ctx.enforceRateLimit(ctx.config.statsRateLimitPerMinute);

      const { store } = await ctx.services();
      const stats = await store.statistics(user.userId);

      ctx.res.status(200).json({ success: true, data: toStatisticsBody(stats) });
    },
    deps
  );
}

export default createStatsHandler();
