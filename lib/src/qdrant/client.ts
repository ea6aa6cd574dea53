/**
 * Qdrant Client
 *
 * Configured @qdrant/js-client-rest instance shared by every chat turn.
 */

import { QdrantClient } from '@qdrant/js-client-rest';

import { loadQdrantConfig, validateQdrantEnv, type QdrantConfig } from './config.js';

/** Singleton client instance */
let clientInstance: QdrantClient | null = null;

export function createQdrantClient(config: QdrantConfig): QdrantClient {
  return new QdrantClient({
    url: config.url,
    apiKey: config.apiKey,
    timeout: config.timeout,
  });
}

/**
 * Gets or creates the process-wide Qdrant client from environment variables.
 *
 * @throws {Error} If the environment is not configured
 */
export function getQdrantClient(): QdrantClient {
  if (clientInstance) {
    return clientInstance;
  }

  const validation = validateQdrantEnv();
  if (!validation.isValid) {
    const errorMessages: string[] = [];
    if (validation.missingVars.length > 0) {
      errorMessages.push(`Missing environment variables: ${validation.missingVars.join(', ')}`);
    }
    if (validation.errors.length > 0) {
      errorMessages.push(validation.errors.join('; '));
    }
    throw new Error(`Qdrant configuration error: ${errorMessages.join('. ')}`);
  }

  clientInstance = createQdrantClient(loadQdrantConfig());
  return clientInstance;
}
