import type { EmbeddingProvider } from '../../src/search/embedders/embeddingProvider.js';
import { EncodingError } from '../../src/errors/encoding.js';

/**
 * Deterministic embedder for tests: every text maps to a fixed vector.
 * Texts without a vector, or listed in `failOn`, raise EncodingError.
 */
export class StubEmbedder implements EmbeddingProvider {
  readonly model = 'stub';
  loaded = false;
  readonly failOn = new Set<string>();
  embedCalls: string[] = [];
  batchCalls: string[][] = [];

  constructor(private readonly vectors: Record<string, number[]> = {}) {}

  set(text: string, vector: number[]): void {
    this.vectors[text] = vector;
  }

  async load(): Promise<void> {
    this.loaded = true;
  }

  async embed(text: string): Promise<Float32Array> {
    this.embedCalls.push(text);
    return this.lookup(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    this.batchCalls.push([...texts]);
    return texts.map((text) => this.lookup(text));
  }

  private lookup(text: string): Float32Array {
    const vector = this.vectors[text];
    if (this.failOn.has(text) || !vector) {
      throw new EncodingError(`stub cannot encode "${text}"`);
    }
    return new Float32Array(vector);
  }
}
