/**
 * Qdrant Configuration
 *
 * Connection settings for the vector index holding the pre-built EPF
 * knowledge base. Values come from environment variables.
 */

import { z } from 'zod';

export const QdrantConfigSchema = z.object({
  /** Cluster URL, e.g. https://xyz.cloud.qdrant.io:6333 */
  url: z.string().url(),

  /** API key; optional for a local, unauthenticated instance */
  apiKey: z.string().min(1).optional(),

  /**
   * Collection holding the indexed passages
   * @default 'epf_knowledge'
   */
  collectionName: z.string().min(1).default('epf_knowledge'),

  /**
   * Vector length of the collection; must match the query embedder
   * @default 768
   */
  vectorSize: z.number().int().positive().default(768),

  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout: z.number().int().positive().default(30000),
});

export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;
export type QdrantConfigInput = z.input<typeof QdrantConfigSchema>;

/**
 * Loads Qdrant configuration from the environment.
 *
 * Environment variables:
 * - QDRANT_URL (required)
 * - QDRANT_API_KEY
 * - QDRANT_COLLECTION (default: epf_knowledge)
 * - QDRANT_TIMEOUT_MS (default: 30000)
 * - EMBEDDING_DIMENSIONS (default: 768)
 *
 * @throws {z.ZodError} If QDRANT_URL is missing or not a URL
 */
export function loadQdrantConfig(
  env: Record<string, string | undefined> = process.env
): QdrantConfig {
  return QdrantConfigSchema.parse({
    url: env['QDRANT_URL'],
    apiKey: env['QDRANT_API_KEY'] || undefined,
    collectionName: env['QDRANT_COLLECTION'] || undefined,
    vectorSize: env['EMBEDDING_DIMENSIONS']
      ? parseInt(env['EMBEDDING_DIMENSIONS'], 10)
      : undefined,
    timeout: env['QDRANT_TIMEOUT_MS'] ? parseInt(env['QDRANT_TIMEOUT_MS'], 10) : undefined,
  });
}

/**
 * Validates the Qdrant environment without throwing.
 */
export function validateQdrantEnv(
  env: Record<string, string | undefined> = process.env
): {
  isValid: boolean;
  missingVars: string[];
  errors: string[];
} {
  const missingVars: string[] = [];
  const errors: string[] = [];

  const url = env['QDRANT_URL'];
  if (!url) {
    missingVars.push('QDRANT_URL');
  } else if (!z.string().url().safeParse(url).success) {
    errors.push('QDRANT_URL must be a valid URL');
  }

  if (env['QDRANT_TIMEOUT_MS'] && !(parseInt(env['QDRANT_TIMEOUT_MS'], 10) > 0)) {
    errors.push('QDRANT_TIMEOUT_MS must be a positive integer');
  }

  return {
    isValid: missingVars.length === 0 && errors.length === 0,
    missingVars,
    errors,
  };
}
