/**
 * Shared fakes for the route handler tests
 */

import { vi } from 'vitest';
import {
  AppConfigSchema,
  ChatOrchestrator,
  HealthService,
  InteractionStore,
  Logger,
  PromptBuilder,
  type AppConfig,
  type AppConfigInput,
  type HealthChecks,
} from '@epf-assist/lib';
import { base64UrlEncode, signHs256 } from '../../api/_lib/auth.js';
import type { RouteRequest, RouteResponse, RouteServices } from '../../api/_lib/http.js';

export const TEST_SECRET = 'test-secret';
export const ALLOWED_ORIGIN = 'https://app.example';

export const silentLogger = new Logger({ console: false });

export function createToken(
  claims: Record<string, unknown>,
  secret: string = TEST_SECRET,
  header: Record<string, unknown> = { alg: 'HS256', typ: 'JWT' }
): string {
  const headerPart = base64UrlEncode(JSON.stringify(header));
  const payloadPart = base64UrlEncode(JSON.stringify(claims));
  return `${headerPart}.${payloadPart}.${signHs256(`${headerPart}.${payloadPart}`, secret)}`;
}

export function createConfig(overrides: AppConfigInput = {}): AppConfig {
  return AppConfigSchema.parse({
    corsOrigins: [ALLOWED_ORIGIN],
    auth: { jwtSecret: TEST_SECRET },
    ...overrides,
  });
}

export function createRequest(overrides: Partial<RouteRequest> = {}): RouteRequest {
  return {
    method: 'GET',
    headers: {
      authorization: `Bearer ${createToken({ sub: 'user-42' })}`,
      origin: ALLOWED_ORIGIN,
    },
    socket: { remoteAddress: '10.0.0.1' },
    ...overrides,
  };
}

export interface RecordedResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string | number>;
  ended: boolean;
}

export function createResponse(): { res: RouteResponse; recorded: RecordedResponse } {
  const recorded: RecordedResponse = { statusCode: 0, body: undefined, headers: {}, ended: false };
  const res: RouteResponse = {
    status(statusCode) {
      recorded.statusCode = statusCode;
      return res;
    },
    json(body) {
      recorded.body = body;
      return res;
    },
    setHeader(name, value) {
      recorded.headers[name] = value;
      return res;
    },
    end() {
      recorded.ended = true;
      return res;
    },
  };
  return { res, recorded };
}

/**
 * Real services wired to in-process fakes of the retriever, generator,
 * database and health checks.
 */
export function createServices(checks: Partial<HealthChecks> = {}) {
  const retriever = {
    search: vi.fn().mockResolvedValue([
      { id: 1, text: 'A UAN is a 12-digit number issued by EPFO.', score: 0.9, metadata: {} },
    ]),
  };
  const generator = {
    generate: vi.fn().mockResolvedValue({
      rawText: 'Your UAN is printed on your payslip.',
      cleanedText: 'Your UAN is printed on your payslip.',
      model: 'test-model',
      durationMs: 3,
      placeholder: false,
    }),
  };
  const query = vi.fn().mockResolvedValue({ rows: [] });
  const store = new InteractionStore({ db: { query }, logger: silentLogger });
  const promptBuilder = new PromptBuilder();
  const orchestrator = new ChatOrchestrator({ retriever, promptBuilder, generator, store, logger: silentLogger });
  const health = new HealthService(
    {
      database: async () => true,
      generation: async () => true,
      retrieval: async () => true,
      ...checks,
    },
    { version: '1.0.0', logger: silentLogger }
  );

  const services: RouteServices = { orchestrator, store, health };
  return { services, retriever, generator, query, promptBuilder };
}
