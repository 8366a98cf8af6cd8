import type { MetadataFilter, Neighbor, StoredDocument } from '../types/search.types.js';

/**
 * Nearest-neighbour index keyed by document id, under cosine distance.
 *
 * Results are ordered by ascending distance; equal distances are ordered by id.
 */
export interface VectorStore {
  /** Inserts or fully replaces the document with the same id. */
  upsert(doc: StoredDocument): Promise<void>;
  /** Deletes the document if present. Missing ids are not an error. */
  remove(id: string): Promise<void>;
  /** Up to `k` neighbours among documents matching `filter`; `k` is clamped to the collection size. */
  query(vector: Float32Array, filter: MetadataFilter, k: number): Promise<Neighbor[]>;
  /** Replaces the whole collection with `docs`. */
  replaceAll(docs: StoredDocument[]): Promise<void>;
  readonly size: Promise<number>;
  close(): Promise<void>;
}

export function compareNeighbors(a: Neighbor, b: Neighbor): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}
