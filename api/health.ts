/**
 * Health Check Endpoint
 *
 * GET /api/health
 * 200 while at least one dependency answers, 503 when none do.
 */

import { HealthStatus } from '@epf-assist/lib';
import { createRoute, type RouteDeps, type RouteHandler } from './_lib/http.js';

export function createHealthHandler(deps?: RouteDeps): RouteHandler {
  return createRoute(
    { name: 'health', method: 'GET' },
    async (ctx) => {
      const { health } = await ctx.services();
      const report = await health.check();
      const statusCode = report.status === HealthStatus.UNHEALTHY ? 503 : 200;
      ctx.res.status(statusCode).json(report);
    },
    deps
  );
}

export default createHealthHandler();
