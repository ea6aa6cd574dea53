/**
 * EPF Assist - Shared Library
 *
 * Chat pipeline, its collaborators and the composition root used by the
 * HTTP handlers and operator scripts.
 */

// Logging
export * from './logging/index.js';

// Configuration
export * from './config/index.js';

// Embeddings (query vectors)
export * from './embeddings/index.js';

// Qdrant (vector index)
export * from './qdrant/index.js';

// Retrieval and prompt assembly
export * from './rag/index.js';

// Text generation
export * from './llm/index.js';

// Interaction store (PostgreSQL)
export * from './db/index.js';

// Chat turn orchestration
export * from './chat/index.js';

// Health checks
export * from './health/index.js';

// Composition root
export * from './services/index.js';
