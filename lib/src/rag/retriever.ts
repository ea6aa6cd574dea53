/**
 * Passage Retriever
 *
 * Embeds a query with the retrieval-query intent, runs a top-K search against
 * the vector index and keeps the matches whose payload carries text, in the
 * order the index returned them.
 */

import type { QueryEmbedder } from '../embeddings/query-embedder.js';
import { isEmbeddingError } from '../embeddings/types.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import type { VectorStoreService } from '../qdrant/vector-store-service.js';
import type { SearchResult } from '../qdrant/types.js';
import {
  RetrievalError,
  RetrievalErrorCode,
  RetrieverConfigSchema,
  type RetrievedPassage,
  type RetrieverConfig,
  type RetrieverConfigInput,
} from './types.js';

export interface PassageRetrieverDependencies {
  embedder: Pick<QueryEmbedder, 'embedQuery'>;
  vectorStore: Pick<VectorStoreService, 'search'>;
  logger?: Logger;
}

export class PassageRetriever {
  private readonly config: RetrieverConfig;
  private readonly embedder: Pick<QueryEmbedder, 'embedQuery'>;
  private readonly vectorStore: Pick<VectorStoreService, 'search'>;
  private readonly logger: Logger;

  constructor(deps: PassageRetrieverDependencies, config: RetrieverConfigInput = {}) {
    this.config = RetrieverConfigSchema.parse(config);
    this.embedder = deps.embedder;
    this.vectorStore = deps.vectorStore;
    this.logger = deps.logger ?? getGlobalLogger().child('PassageRetriever');
  }

  /**
   * Return the passages for a query. An empty list is a normal outcome.
   *
   * @throws RetrievalError when embedding or the index query fails
   */
  async search(query: string): Promise<RetrievedPassage[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw new RetrievalError('Query cannot be empty', RetrievalErrorCode.INVALID_QUERY);
    }

    let vector: number[];
    try {
      const embedding = await this.embedder.embedQuery(trimmed);
      vector = embedding.embedding;
    } catch (error) {
      const code = isEmbeddingError(error) && error.code === 'INVALID_INPUT'
        ? RetrievalErrorCode.INVALID_QUERY
        : RetrievalErrorCode.EMBEDDING_FAILED;
      throw RetrievalError.fromError(error, code, { stage: 'embedding' });
    }

    let results: SearchResult[];
    try {
      const response = await this.vectorStore.search(vector, {
        limit: this.config.topK,
        withPayload: true,
        ...(this.config.scoreThreshold !== undefined && {
          scoreThreshold: this.config.scoreThreshold,
        }),
      });
      results = response.results;
    } catch (error) {
      throw RetrievalError.fromError(error, RetrievalErrorCode.SEARCH_FAILED, { stage: 'search' });
    }

    const passages = results
      .map((result) => this.toPassage(result))
      .filter((passage): passage is RetrievedPassage => passage !== null);

    if (passages.length === 0) {
      this.logger.warn('No passages with text found', {
        query: trimmed.slice(0, 50),
        matches: results.length,
      });
    } else {
      this.logger.debug('Passages retrieved', {
        matches: results.length,
        passages: passages.length,
      });
    }

    return passages;
  }

  getConfig(): RetrieverConfig {
    return { ...this.config };
  }

  private toPassage(result: SearchResult): RetrievedPassage | null {
    const payload = result.payload ?? {};
    const text = payload[this.config.textField];
    if (typeof text !== 'string' || text.length === 0) {
      return null;
    }

    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (key !== this.config.textField) {
        metadata[key] = value;
      }
    }

    return { id: result.id, text, score: result.score, metadata };
  }
}

export function createPassageRetriever(
  deps: PassageRetrieverDependencies,
  config?: RetrieverConfigInput
): PassageRetriever {
  return new PassageRetriever(deps, config);
}
