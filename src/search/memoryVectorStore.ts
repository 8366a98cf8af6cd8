import type { VectorStore } from './vectorStore.js';
import { compareNeighbors } from './vectorStore.js';
import type { MetadataFilter, Neighbor, StoredDocument } from '../types/search.types.js';
import { matchesFilter } from './metadataFilter.js';

function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/** Non-persistent store. Queries are a linear scan. */
export class MemoryVectorStore implements VectorStore {
  private entries = new Map<string, StoredDocument>();

  async upsert(doc: StoredDocument): Promise<void> {
    this.entries.set(doc.id, { ...doc, metadata: { ...doc.metadata } });
  }

  async remove(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async query(vector: Float32Array, filter: MetadataFilter, k: number): Promise<Neighbor[]> {
    const limit = Math.min(k, this.entries.size);
    if (limit <= 0) return [];

    const results: Neighbor[] = [];
    for (const entry of this.entries.values()) {
      if (!matchesFilter(entry.metadata, filter)) continue;
      results.push({
        id: entry.id,
        distance: 1 - cosineSimilarity(vector, entry.vector),
        metadata: { ...entry.metadata },
      });
    }

    results.sort(compareNeighbors);
    return results.slice(0, limit);
  }

  async replaceAll(docs: StoredDocument[]): Promise<void> {
    const next = new Map<string, StoredDocument>();
    for (const doc of docs) next.set(doc.id, { ...doc, metadata: { ...doc.metadata } });
    this.entries = next;
  }

  get size(): Promise<number> {
    return Promise.resolve(this.entries.size);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
