/**
 * Vector Store Service
 *
 * Read-only access to the passage collection: nearest-neighbour search and
 * collection presence checks. Ingestion happens elsewhere.
 */

import type { QdrantClient } from '@qdrant/js-client-rest';

import { Logger, getGlobalLogger } from '../logging/index.js';
import { createQdrantClient } from './client.js';
import { type QdrantConfig, type QdrantConfigInput, QdrantConfigSchema } from './config.js';
import {
  type SearchOptionsInput,
  type SearchResponse,
  type SearchResult,
  type PointPayload,
  SearchOptionsSchema,
  VectorStoreError,
  VectorStoreErrorCode,
} from './types.js';

/** The slice of QdrantClient this service calls */
export type VectorSearchClient = Pick<QdrantClient, 'search' | 'collectionExists'>;

export interface VectorStoreServiceDependencies {
  client?: VectorSearchClient;
  logger?: Logger;
}

// =============================================================================
// VectorStoreService Class
// =============================================================================

export class VectorStoreService {
  private readonly config: QdrantConfig;
  private readonly client: VectorSearchClient;
  private readonly logger: Logger;

  constructor(config: QdrantConfigInput, deps: VectorStoreServiceDependencies = {}) {
    this.config = QdrantConfigSchema.parse(config);
    this.client = deps.client ?? createQdrantClient(this.config);
    this.logger = deps.logger ?? getGlobalLogger().child('VectorStoreService');
  }

  /**
   * Nearest-neighbour search. Results keep Qdrant's ordering.
   *
   * @throws {VectorStoreError}
   */
  async search(queryVector: number[], options?: SearchOptionsInput): Promise<SearchResponse> {
    const startTime = performance.now();
    const parsedOptions = SearchOptionsSchema.parse(options ?? {});

    if (queryVector.length !== this.config.vectorSize) {
      throw new VectorStoreError(
        `Vector dimension mismatch: expected ${this.config.vectorSize}, got ${queryVector.length}`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }

    try {
      const points = await this.client.search(this.config.collectionName, {
        vector: queryVector,
        limit: parsedOptions.limit,
        with_payload: parsedOptions.withPayload,
        with_vector: false,
        ...(parsedOptions.scoreThreshold !== undefined && {
          score_threshold: parsedOptions.scoreThreshold,
        }),
      });

      const results: SearchResult[] = points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: toPayload(point.payload),
      }));

      const durationMs = performance.now() - startTime;
      this.logger.debug('Vector search completed', {
        collection: this.config.collectionName,
        limit: parsedOptions.limit,
        matches: results.length,
        durationMs: Math.round(durationMs),
      });

      return { results, total: results.length, durationMs };
    } catch (error) {
      throw this.wrapError(error, 'Search failed');
    }
  }

  /**
   * Whether the configured collection exists. Connection failures propagate.
   */
  async collectionExists(): Promise<boolean> {
    try {
      const response = await this.client.collectionExists(this.config.collectionName);
      return response.exists;
    } catch (error) {
      throw this.wrapError(error, 'Collection check failed');
    }
  }

  getCollectionName(): string {
    return this.config.collectionName;
  }

  getVectorSize(): number {
    return this.config.vectorSize;
  }

  private wrapError(error: unknown, context: string): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const status = readStatus(error);
    const lowered = message.toLowerCase();

    let code: VectorStoreErrorCode = VectorStoreErrorCode.SEARCH_FAILED;
    if (status === 401 || status === 403) {
      code = VectorStoreErrorCode.UNAUTHORIZED;
    } else if (status === 404 || (lowered.includes('collection') && lowered.includes('not found'))) {
      code = VectorStoreErrorCode.COLLECTION_NOT_FOUND;
    } else if (lowered.includes('timeout') || lowered.includes('aborted')) {
      code = VectorStoreErrorCode.TIMEOUT;
    } else if (lowered.includes('econnrefused') || lowered.includes('fetch failed')) {
      code = VectorStoreErrorCode.CONNECTION_ERROR;
    }

    return new VectorStoreError(`${context}: ${message}`, code, { cause: error, status });
  }
}

function toPayload(payload: unknown): PointPayload | undefined {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(payload));
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createVectorStoreService(
  config: QdrantConfigInput,
  deps?: VectorStoreServiceDependencies
): VectorStoreService {
  return new VectorStoreService(config, deps);
}
