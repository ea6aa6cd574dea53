/**
 * Qdrant Module
 *
 * Vector index access for passage retrieval.
 */

export {
  QdrantConfigSchema,
  type QdrantConfig,
  type QdrantConfigInput,
  loadQdrantConfig,
  validateQdrantEnv,
} from './config.js';

export { createQdrantClient, getQdrantClient } from './client.js';

export {
  VectorStoreErrorCode,
  VectorStoreError,
  isVectorStoreError,
  SearchOptionsSchema,
  type SearchOptions,
  type SearchOptionsInput,
  type PointPayload,
  type SearchResult,
  type SearchResponse,
} from './types.js';

export {
  VectorStoreService,
  createVectorStoreService,
  type VectorSearchClient,
  type VectorStoreServiceDependencies,
} from './vector-store-service.js';
