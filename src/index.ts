// Public API — explicit named exports only (no re-export *)

export type { AppConfig } from './types/config.types.js';
export type {
  ListingDocument,
  Metadata,
  MetadataValue,
  MetadataFilter,
  FilterPredicate,
  Neighbor,
  RankedResult,
  SearchOptions,
  SearchOutcome,
  RebuildResult,
  HealthStatus,
  WhereClause,
} from './types/search.types.js';
export type { EmbeddingProvider } from './search/embedders/embeddingProvider.js';
export type { VectorStore } from './search/vectorStore.js';
export type { Outcome } from './client/outcome.js';
export type { ListingSearchClientOptions, SearchParams } from './client/searchClient.js';
export type { Logger } from './logging/logger.js';

export { SearchService, createSearchService } from './search/index.js';
export { findAdaptiveCutoff, CUTOFF_POLICY } from './search/adaptiveCutoff.js';
export { parseFilter, matchesFilter } from './search/metadataFilter.js';
export { MemoryVectorStore } from './search/memoryVectorStore.js';
export { SqliteVectorStore } from './search/sqliteVectorStore.js';
export { OllamaEmbedder } from './search/embedders/ollamaEmbedder.js';
export { TransformersEmbedder, importPipelineFactory } from './search/embedders/transformersEmbedder.js';
export { createApiServer } from './api/server.js';
export { ListingSearchClient, ServiceRequestError } from './client/searchClient.js';
export { buildListingFilter } from './client/listingFilter.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { createLogger } from './logging/logger.js';
export {
  ListingSearchError,
  EncodingError,
  IndexStoreError,
  AuthenticationError,
  FilterError,
  RequestValidationError,
} from './errors/index.js';
