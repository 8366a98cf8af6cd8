import type { AppConfig, EncoderConfig, IndexConfig } from '../types/config.types.js';
import type { Logger } from '../logging/logger.js';
import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import type { VectorStore } from './vectorStore.js';
import { OllamaEmbedder } from './embedders/ollamaEmbedder.js';
import { TransformersEmbedder, importPipelineFactory } from './embedders/transformersEmbedder.js';
import { MemoryVectorStore } from './memoryVectorStore.js';
import { SqliteVectorStore } from './sqliteVectorStore.js';
import { SearchService } from './searchService.js';
import { homedir } from 'node:os';
import { join } from 'node:path';

export { SearchService } from './searchService.js';
export type { VectorStore } from './vectorStore.js';
export type { EmbeddingProvider } from './embedders/embeddingProvider.js';

async function createEmbedder(config: EncoderConfig): Promise<EmbeddingProvider> {
  if (config.provider === 'ollama') {
    return new OllamaEmbedder(config.ollamaBaseUrl ?? 'http://localhost:11434', config.model);
  }
  return new TransformersEmbedder(config.model, await importPipelineFactory());
}

function createStore(config: IndexConfig): VectorStore {
  if (config.store === 'memory') return new MemoryVectorStore();
  return new SqliteVectorStore(
    config.persistPath ?? join(homedir(), '.listing-search', 'index.db'),
  );
}

/**
 * Builds the encoder and the store, loads the model and returns the service
 * that owns them. Model loading is the slow part of startup.
 */
export async function createSearchService(config: AppConfig, logger: Logger): Promise<SearchService> {
  const embedder = await createEmbedder(config.encoder);
  logger.info({ provider: config.encoder.provider, model: embedder.model }, 'loading embedding model');
  await embedder.load();
  logger.info('embedding model loaded');

  const store = createStore(config.index);
  logger.info({ store: config.index.store, path: config.index.persistPath }, 'vector index ready');

  return new SearchService({
    embedder,
    store,
    logger: logger.child({ component: 'search' }),
    batchSize: config.encoder.batchSize,
  });
}
