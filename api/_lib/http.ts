/**
 * Shared Request Plumbing
 *
 * Wraps each route with request ids, CORS, method checks and the mapping of
 * thrown errors onto HTTP responses. Error bodies never echo internals; the
 * underlying error is logged with the request id instead.
 */

import type { VercelRequest } from '@vercel/node';
import {
  generateRequestId,
  getGlobalLogger,
  getServiceContainer,
  isValidationError,
  loadAppConfig,
  type AppConfig,
  type Logger,
  type ServiceContainer,
  type ValidationIssue,
} from '@epf-assist/lib';
import { authenticateRequest, isAuthError, type AuthenticatedUser } from './auth.js';
import { FixedWindowRateLimiter } from './rate-limiter.js';

// =============================================================================
// Request / Response Shapes
// =============================================================================

/**
 * The parts of a Vercel request the routes read.
 */
export interface RouteRequest {
  method?: string | undefined;
  headers: VercelRequest['headers'];
  body?: unknown;
  query?: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string | undefined };
}

/**
 * The parts of a Vercel response the routes write.
 */
export interface RouteResponse {
  status(statusCode: number): RouteResponse;
  json(body: unknown): RouteResponse;
  setHeader(name: string, value: string | number): unknown;
  end(): unknown;
}

export interface ErrorResponse {
  success: false;
  error_message: string;
  error_code: string;
  request_id: string;
  details?: ValidationIssue[];
}

// =============================================================================
// Errors
// =============================================================================

export class RateLimitExceededError extends Error {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super('Rate limit exceeded. Please try again later.');
    this.name = 'RateLimitExceededError';
    this.retryAfterSeconds = retryAfterSeconds;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RateLimitExceededError);
    }
  }
}

export class ServiceUnavailableError extends Error {
  constructor(cause: unknown) {
    super('Service is currently unavailable', { cause });
    this.name = 'ServiceUnavailableError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ServiceUnavailableError);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Create error response with proper structure
 */
export function createErrorResponse(
  res: RouteResponse,
  statusCode: number,
  message: string,
  code: string,
  requestId: string,
  details?: ValidationIssue[]
): void {
  const body: ErrorResponse = {
    success: false,
    error_message: message,
    error_code: code,
    request_id: requestId,
    ...(details && { details }),
  };
  res.status(statusCode).json(body);
}

/**
 * Resolve the CORS origin to echo back, or null to send no CORS headers.
 * A wildcard is honoured only when configured explicitly.
 */
export function getAllowedOrigin(origin: string | undefined, allowedOrigins: readonly string[]): string | null {
  if (allowedOrigins.includes('*')) {
    return '*';
  }
  if (origin && allowedOrigins.includes(origin)) {
    return origin;
  }
  return null;
}

export function applyCors(
  req: RouteRequest,
  res: RouteResponse,
  allowedOrigins: readonly string[],
  method: string
): void {
  const allowedOrigin = getAllowedOrigin(req.headers.origin, allowedOrigins);
  if (!allowedOrigin) {
    return;
  }

  res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
  res.setHeader('Access-Control-Allow-Methods', `${method}, OPTIONS`);
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  if (allowedOrigin !== '*') {
    res.setHeader('Vary', 'Origin');
  }
}

/**
 * Rate-limit key for the caller: the first forwarded address, else the socket address.
 */
export function getClientKey(req: RouteRequest): string {
  const forwarded = req.headers['x-forwarded-for'];
  const raw = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const first = raw?.split(',')[0]?.trim();
  if (first) {
    return first;
  }
  return req.socket?.remoteAddress || 'unknown';
}

// =============================================================================
// Route Wrapper
// =============================================================================

/**
 * The shared services the routes use.
 */
export type RouteServices = Pick<ServiceContainer, 'orchestrator' | 'store' | 'health'>;

export interface RouteDeps {
  getConfig?: () => AppConfig;
  getServices?: () => Promise<RouteServices>;
  /** Replaces the per-route limiter built from configuration */
  limiter?: FixedWindowRateLimiter;
  now?: () => number;
  logger?: Logger;
}

export interface RouteContext {
  req: RouteRequest;
  res: RouteResponse;
  requestId: string;
  config: AppConfig;
  logger: Logger;
  /** Verify the bearer token; throws AuthError */
  authenticate(): AuthenticatedUser;
  /** Count this request against `limitPerMinute`; throws RateLimitExceededError */
  enforceRateLimit(limitPerMinute: number): void;
  /** Resolve shared services; throws ServiceUnavailableError */
  services(): Promise<RouteServices>;
}

export interface RouteDefinition {
  name: string;
  method: 'GET' | 'POST';
  requestIdPrefix?: string;
}

export type RouteHandler = (req: RouteRequest, res: RouteResponse) => Promise<void>;

let cachedConfig: AppConfig | null = null;

function getDefaultConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadAppConfig();
  }
  return cachedConfig;
}

/**
 * Build a route handler around `handle`.
 */
export function createRoute(
  definition: RouteDefinition,
  handle: (ctx: RouteContext) => Promise<void>,
  deps: RouteDeps = {}
): RouteHandler {
  const getConfig = deps.getConfig ?? getDefaultConfig;
  const getServices: () => Promise<RouteServices> = deps.getServices ?? getServiceContainer;
  const now = deps.now ?? Date.now;
  const logger = deps.logger ?? getGlobalLogger().child(`api:${definition.name}`);
  let limiter = deps.limiter ?? null;

  function getLimiter(limitPerMinute: number): FixedWindowRateLimiter {
    if (!limiter) {
      limiter = new FixedWindowRateLimiter({ limit: limitPerMinute, now });
    }
    return limiter;
  }

  return async (req, res) => {
    const requestId = generateRequestId(definition.requestIdPrefix ?? definition.name);
    let config: AppConfig;

    try {
      config = getConfig();
    } catch (error) {
      logger.error('Invalid application configuration', error instanceof Error ? error : new Error(String(error)), {
        requestId,
      });
      createErrorResponse(res, 503, 'Service is currently unavailable', 'SERVICE_UNAVAILABLE', requestId);
      return;
    }

    applyCors(req, res, config.corsOrigins, definition.method);

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    if (req.method !== definition.method) {
      res.setHeader('Allow', `${definition.method}, OPTIONS`);
      createErrorResponse(res, 405, 'Method not allowed', 'METHOD_NOT_ALLOWED', requestId);
      return;
    }

    const ctx: RouteContext = {
      req,
      res,
      requestId,
      config,
      logger,
      authenticate: () => authenticateRequest(req, config.auth, now),
      enforceRateLimit: (limitPerMinute) => {
        const decision = getLimiter(limitPerMinute).consume(getClientKey(req));
        res.setHeader('X-RateLimit-Limit', decision.limit);
        res.setHeader('X-RateLimit-Remaining', decision.remaining);
        if (!decision.allowed) {
          throw new RateLimitExceededError(decision.retryAfterSeconds);
        }
      },
      services: async () => {
        try {
          return await getServices();
        } catch (error) {
          throw new ServiceUnavailableError(error);
        }
      },
    };

    try {
      await handle(ctx);
    } catch (error) {
      sendRouteError(res, error, requestId, logger);
    }
  };
}

/**
 * Map a thrown error onto an HTTP response.
 */
export function sendRouteError(res: RouteResponse, error: unknown, requestId: string, logger: Logger): void {
  if (isAuthError(error)) {
    if (error.statusCode === 401) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      logger.warn('Authentication failed', { requestId, reason: error.message });
      createErrorResponse(res, 401, error.message, 'UNAUTHORIZED', requestId);
      return;
    }
    logger.error('Authentication unavailable', error, { requestId });
    createErrorResponse(res, error.statusCode, error.message, 'AUTH_NOT_CONFIGURED', requestId);
    return;
  }

  if (isValidationError(error)) {
    const message = error.issues[0]?.message ?? error.message;
    logger.warn('Validation failed', { requestId, issues: error.issues.length });
    createErrorResponse(res, 400, message, 'VALIDATION_ERROR', requestId, error.issues);
    return;
  }

  if (error instanceof RateLimitExceededError) {
    res.setHeader('Retry-After', error.retryAfterSeconds);
    logger.warn('Rate limit exceeded', { requestId });
    createErrorResponse(res, 429, error.message, 'RATE_LIMITED', requestId);
    return;
  }

  if (error instanceof ServiceUnavailableError) {
    const cause = error.cause instanceof Error ? error.cause : error;
    logger.error('Service initialization failed', cause, { requestId });
    createErrorResponse(res, 503, error.message, 'SERVICE_UNAVAILABLE', requestId);
    return;
  }

  logger.error('Request failed', error instanceof Error ? error : new Error(String(error)), { requestId });
  createErrorResponse(res, 500, 'An unexpected error occurred', 'INTERNAL_ERROR', requestId);
}
