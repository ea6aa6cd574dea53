/**
 * Application Configuration
 *
 * Settings for the HTTP surface: identity, CORS, rate limits, token
 * verification and the orchestrator's empty-retrieval policy.
 */

import { z } from 'zod';

export const AppConfigSchema = z.object({
  appName: z.string().min(1).default('EPF Assist API'),
  version: z.string().min(1).default('1.0.0'),

  /** Allowed CORS origins; '*' only when listed explicitly */
  corsOrigins: z.array(z.string().min(1)).default(['http://localhost:3000']),

  /** Chat and history requests per client per minute */
  rateLimitPerMinute: z.number().int().positive().default(10),

  /** Statistics requests per client per minute */
  statsRateLimitPerMinute: z.number().int().positive().default(5),

  auth: z
    .object({
      /** HS256 signing secret; requests are refused when unset */
      jwtSecret: z.string().min(1).optional(),
      issuer: z.string().min(1).optional(),
      audience: z.string().min(1).optional(),
    })
    .default({}),

  emptyRetrieval: z.enum(['raw_question', 'fallback_prompt']).default('raw_question'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

function parseList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Loads application configuration from the environment.
 *
 * Environment variables:
 * - APP_NAME, APP_VERSION
 * - CORS_ORIGINS (comma-separated)
 * - RATE_LIMIT_PER_MINUTE (default: 10)
 * - STATS_RATE_LIMIT_PER_MINUTE (default: 5)
 * - AUTH_JWT_SECRET, AUTH_JWT_ISSUER, AUTH_JWT_AUDIENCE
 * - CHAT_EMPTY_RETRIEVAL (raw_question | fallback_prompt)
 */
export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  return AppConfigSchema.parse({
    appName: env['APP_NAME'] || undefined,
    version: env['APP_VERSION'] || undefined,
    corsOrigins: parseList(env['CORS_ORIGINS']),
    rateLimitPerMinute: parseInteger(env['RATE_LIMIT_PER_MINUTE']),
    statsRateLimitPerMinute: parseInteger(env['STATS_RATE_LIMIT_PER_MINUTE']),
    auth: {
      jwtSecret: env['AUTH_JWT_SECRET'] || undefined,
      issuer: env['AUTH_JWT_ISSUER'] || undefined,
      audience: env['AUTH_JWT_AUDIENCE'] || undefined,
    },
    emptyRetrieval: env['CHAT_EMPTY_RETRIEVAL'] || undefined,
  });
}
