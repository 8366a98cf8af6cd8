import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import type { VectorStore } from './vectorStore.js';
import type { Logger } from '../logging/logger.js';
import type {
  HealthStatus,
  ListingDocument,
  Neighbor,
  RebuildResult,
  SearchOptions,
  SearchOutcome,
  StoredDocument,
} from '../types/search.types.js';
import { findAdaptiveCutoff } from './adaptiveCutoff.js';
import { IndexStoreError } from '../errors/indexStore.js';

export interface SearchServiceDeps {
  embedder: EmbeddingProvider;
  store: VectorStore;
  logger: Logger;
  /** Documents per encoder call during rebuild. */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 32;

/** The owning application keeps its primary key in metadata.pk. */
function resultPk(neighbor: Neighbor): string | number {
  const pk = neighbor.metadata['pk'];
  return typeof pk === 'string' || typeof pk === 'number' ? pk : neighbor.id;
}

/**
 * Ties the encoder, the vector store and the ranker together.
 *
 * Owns both collaborators: close() releases the store.
 */
export class SearchService {
  private readonly embedder: EmbeddingProvider;
  private readonly store: VectorStore;
  private readonly logger: Logger;
  private readonly batchSize: number;

  constructor(deps: SearchServiceDeps) {
    this.embedder = deps.embedder;
    this.store = deps.store;
    this.logger = deps.logger;
    this.batchSize = Math.max(1, deps.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  async index(doc: ListingDocument): Promise<void> {
    const vector = await this.embedder.embed(doc.text);
    await this.store.upsert({ ...doc, vector });
    this.logger.debug({ id: doc.id }, 'indexed document');
  }

  async remove(id: string): Promise<void> {
    await this.store.remove(id);
    this.logger.debug({ id }, 'removed document');
  }

  /**
   * Read-only. An unavailable store yields an empty result rather than an
   * error; encoder failures still propagate.
   */
  async search(query: string, options: SearchOptions): Promise<SearchOutcome> {
    const bypassCutoff = options.bypassCutoff ?? false;

    const neighbors = await this.nearest(query, options);
    const rawPks = neighbors.map(resultPk);
    const rawDistances = neighbors.map((n) => n.distance);
    const keepCount = bypassCutoff ? neighbors.length : findAdaptiveCutoff(rawDistances);

    return {
      results: neighbors
        .slice(0, keepCount)
        .map((n, i) => ({ pk: rawPks[i] ?? n.id, distance: n.distance })),
      debug: {
        bypassCutoff,
        rawCount: neighbors.length,
        rawPks,
        rawDistances,
        keepCount,
      },
    };
  }

  /**
   * Re-embeds every document and replaces the collection. Documents the
   * encoder rejects are skipped and reported in `failedIds`.
   */
  async rebuild(docs: ListingDocument[]): Promise<RebuildResult> {
    const encoded: StoredDocument[] = [];
    const failedIds: string[] = [];

    for (let start = 0; start < docs.length; start += this.batchSize) {
      const batch = docs.slice(start, start + this.batchSize);
      const { stored, failed } = await this.encodeBatch(batch);
      encoded.push(...stored);
      failedIds.push(...failed);
    }

    await this.store.replaceAll(encoded);
    this.logger.info(
      { count: encoded.length, failed: failedIds.length },
      'rebuilt vector index',
    );
    return { count: encoded.length, failedIds };
  }

  async health(): Promise<HealthStatus> {
    return {
      status: 'ok',
      modelLoaded: this.embedder.loaded,
      collectionCount: await this.store.size,
    };
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async nearest(query: string, options: SearchOptions): Promise<Neighbor[]> {
    let count: number;
    try {
      count = await this.store.size;
    } catch (err) {
      if (!(err instanceof IndexStoreError)) throw err;
      this.logger.error({ err }, 'vector index unavailable, returning no results');
      return [];
    }
    if (count === 0) return [];

    const vector = await this.embedder.embed(query);
    const k = Math.min(options.limit, count);
    try {
      return await this.store.query(vector, options.filter ?? [], k);
    } catch (err) {
      if (!(err instanceof IndexStoreError)) throw err;
      this.logger.error({ err }, 'vector query failed, returning no results');
      return [];
    }
  }

  /** One encoder call per batch; a failing batch is retried item by item. */
  private async encodeBatch(
    batch: ListingDocument[],
  ): Promise<{ stored: StoredDocument[]; failed: string[] }> {
    try {
      const vectors = await this.embedder.embedBatch(batch.map((d) => d.text));
      const stored: StoredDocument[] = [];
      batch.forEach((doc, i) => {
        const vector = vectors[i];
        if (vector) stored.push({ ...doc, vector });
      });
      if (stored.length === batch.length) return { stored, failed: [] };
    } catch (err) {
      this.logger.warn({ err, size: batch.length }, 'batch encoding failed, retrying one by one');
    }

    const stored: StoredDocument[] = [];
    const failed: string[] = [];
    for (const doc of batch) {
      try {
        stored.push({ ...doc, vector: await this.embedder.embed(doc.text) });
      } catch (err) {
        this.logger.error({ err, id: doc.id }, 'failed to index document');
        failed.push(doc.id);
      }
    }
    return { stored, failed };
  }
}
