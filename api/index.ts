/**
 * Service Info Endpoint
 *
 * GET /api
 */

import { createRoute, type RouteDeps, type RouteHandler } from './_lib/http.js';

export interface ServiceInfoBody {
  message: string;
  version: string;
  status: 'running';
}

export function createIndexHandler(deps?: RouteDeps): RouteHandler {
  return createRoute(
    { name: 'index', method: 'GET', requestIdPrefix: 'info' },
    async (ctx) => {
      const body: ServiceInfoBody = {
        message: `${ctx.config.appName} is running`,
        version: ctx.config.version,
        status: 'running',
      };
      ctx.res.status(200).json(body);
    },
    deps
  );
}

export default createIndexHandler();
