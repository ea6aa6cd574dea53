/**
 * Service Container
 *
 * Composition root. Builds every shared client once per process and wires
 * them into the orchestrator and the health service. Concurrent first callers
 * share one initialisation; a failed initialisation is forgotten so the next
 * call retries.
 */

import { loadAppConfig, type AppConfig } from '../config/app-config.js';
import { ChatOrchestrator } from '../chat/orchestrator.js';
import { getDatabasePool } from '../db/client.js';
import { InteractionStore } from '../db/interaction-store.js';
import { QueryEmbedder } from '../embeddings/query-embedder.js';
import { loadEmbeddingConfig } from '../embeddings/types.js';
import { HealthService } from '../health/health-service.js';
import { loadGenerationConfig } from '../llm/config.js';
import { GenerationClient } from '../llm/generation-client.js';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import { getQdrantClient } from '../qdrant/client.js';
import { loadQdrantConfig } from '../qdrant/config.js';
import { VectorStoreService } from '../qdrant/vector-store-service.js';
import { PromptBuilder } from '../rag/prompt-builder.js';
import { PassageRetriever } from '../rag/retriever.js';
import { loadRetrieverConfig } from '../rag/types.js';

export interface ServiceContainer {
  config: AppConfig;
  orchestrator: ChatOrchestrator;
  store: InteractionStore;
  generator: GenerationClient;
  vectorStore: VectorStoreService;
  health: HealthService;
  logger: Logger;
}

let containerPromise: Promise<ServiceContainer> | null = null;

/**
 * Build the container from the environment. Prefer getServiceContainer().
 */
export async function createServiceContainer(): Promise<ServiceContainer> {
  const logger = getGlobalLogger();
  const config = loadAppConfig();

  const embedder = new QueryEmbedder(loadEmbeddingConfig(), {
    logger: logger.child('QueryEmbedder'),
  });
  const vectorStore = new VectorStoreService(loadQdrantConfig(), {
    client: getQdrantClient(),
    logger: logger.child('VectorStoreService'),
  });
  const retriever = new PassageRetriever(
    { embedder, vectorStore, logger: logger.child('PassageRetriever') },
    loadRetrieverConfig()
  );
  const generator = new GenerationClient(loadGenerationConfig(), {
    logger: logger.child('GenerationClient'),
  });
  const store = new InteractionStore({
    db: getDatabasePool(),
    logger: logger.child('InteractionStore'),
  });

  const orchestrator = new ChatOrchestrator(
    {
      retriever,
      promptBuilder: new PromptBuilder(),
      generator,
      store,
      logger: logger.child('ChatOrchestrator'),
    },
    { emptyRetrieval: config.emptyRetrieval }
  );

  const health = new HealthService(
    {
      database: () => store.testConnection(),
      generation: () => generator.testConnection(),
      retrieval: () => vectorStore.collectionExists(),
    },
    { version: config.version, logger: logger.child('HealthService') }
  );

  logger.info('Services initialized', {
    app: config.appName,
    version: config.version,
    model: generator.getModelId(),
    collection: vectorStore.getCollectionName(),
  });

  return { config, orchestrator, store, generator, vectorStore, health, logger };
}

/**
 * Get or create the process-wide container.
 */
export function getServiceContainer(): Promise<ServiceContainer> {
  if (!containerPromise) {
    containerPromise = createServiceContainer().catch((error: unknown) => {
      containerPromise = null;
      throw error;
    });
  }
  return containerPromise;
}

export function resetServiceContainer(): void {
  containerPromise = null;
}
