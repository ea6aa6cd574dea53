/**
 * Embeddings Module
 */

export {
  EmbeddingModel,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_DIMENSIONS,
  QueryEmbedderConfigSchema,
  type QueryEmbedderConfig,
  type QueryEmbedderConfigInput,
  loadEmbeddingConfig,
  validateEmbeddingEnv,
  type QueryEmbedding,
  EmbeddingErrorCode,
  EmbeddingError,
  isEmbeddingError,
} from './types.js';

export {
  QueryEmbedder,
  createQueryEmbedder,
  type EmbeddingModelClient,
  type QueryEmbedderDependencies,
} from './query-embedder.js';
