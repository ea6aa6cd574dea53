/**
 * Query Embedder
 *
 * Turns a user question into a dense vector with Google's embedding API,
 * tagged with the retrieval-query intent so it lines up with corpus vectors
 * that were indexed as documents.
 */

import {
  GoogleGenerativeAI,
  TaskType,
  type GenerativeModel,
} from '@google/generative-ai';

import { Logger, getGlobalLogger } from '../logging/index.js';
import {
  type QueryEmbedderConfig,
  type QueryEmbedderConfigInput,
  type QueryEmbedding,
  QueryEmbedderConfigSchema,
  EmbeddingError,
  EmbeddingErrorCode,
} from './types.js';

/** The slice of the SDK model this class calls */
export type EmbeddingModelClient = Pick<GenerativeModel, 'embedContent'>;

export interface QueryEmbedderDependencies {
  /** Pre-built model handle; created from the API key when omitted */
  model?: EmbeddingModelClient;
  logger?: Logger;
}

export class QueryEmbedder {
  private readonly config: QueryEmbedderConfig;
  private readonly model: EmbeddingModelClient;
  private readonly logger: Logger;

  constructor(config: QueryEmbedderConfigInput, deps: QueryEmbedderDependencies = {}) {
    const parsed = QueryEmbedderConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Invalid embedding configuration: ${parsed.error.errors.map((e) => e.message).join('; ')}`,
        EmbeddingErrorCode.INVALID_CONFIG
      );
    }

    this.config = parsed.data;
    this.logger = deps.logger ?? getGlobalLogger().child('QueryEmbedder');
    this.model =
      deps.model ??
      new GoogleGenerativeAI(this.config.apiKey).getGenerativeModel({
        model: this.config.model,
      });
  }

  /**
   * Embed a single query string.
   *
   * @throws {EmbeddingError} on empty or oversized input, API failure, or a
   *   vector whose length differs from the configured dimensions
   */
  async embedQuery(text: string): Promise<QueryEmbedding> {
    const input = text.trim();
    if (input.length === 0) {
      throw new EmbeddingError('Cannot embed an empty query', EmbeddingErrorCode.INVALID_INPUT);
    }
    if (input.length > this.config.maxInputChars) {
      throw new EmbeddingError(
        `Query exceeds ${this.config.maxInputChars} characters`,
        EmbeddingErrorCode.INVALID_INPUT
      );
    }

    const startTime = performance.now();
    let values: number[];

    try {
      const response = await this.model.embedContent({
        content: { role: 'user', parts: [{ text: input }] },
        taskType: TaskType.RETRIEVAL_QUERY,
      });
      values = response.embedding.values;
    } catch (error) {
      throw new EmbeddingError(
        `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.EMBEDDING_FAILED,
        { cause: error }
      );
    }

    if (values.length !== this.config.dimensions) {
      throw new EmbeddingError(
        `Expected ${this.config.dimensions} dimensions, got ${values.length}`,
        EmbeddingErrorCode.DIMENSION_MISMATCH
      );
    }

    const durationMs = performance.now() - startTime;
    this.logger.debug('Query embedded', {
      model: this.config.model,
      dimensions: values.length,
      durationMs: Math.round(durationMs),
    });

    return { embedding: values, model: this.config.model, durationMs };
  }

  getModel(): string {
    return this.config.model;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }
}

export function createQueryEmbedder(
  config: QueryEmbedderConfigInput,
  deps?: QueryEmbedderDependencies
): QueryEmbedder {
  return new QueryEmbedder(config, deps);
}
