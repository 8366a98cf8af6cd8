/**
 * Maps free text to a fixed-length dense vector.
 *
 * Implementations are deterministic for a given model and input, and return
 * the same dimensionality for every call within a process. An empty string
 * still yields a vector.
 */
export interface EmbeddingProvider {
  readonly model: string;
  /** True once the model is ready to serve requests. */
  readonly loaded: boolean;
  /** One-time startup cost. Safe to call more than once. */
  load(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  /** Encodes several texts in one pass; output order matches input order. */
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}
