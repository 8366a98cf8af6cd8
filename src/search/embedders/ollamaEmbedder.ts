import type { EmbeddingProvider } from './embeddingProvider.js';
import { EncodingError } from '../../errors/encoding.js';

interface OllamaEmbedResponse {
  embeddings: number[][];
}

function isEmbedResponse(value: unknown): value is OllamaEmbedResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'embeddings' in value &&
    Array.isArray(value.embeddings)
  );
}

export class OllamaEmbedder implements EmbeddingProvider {
  private _loaded = false;

  constructor(
    private readonly baseUrl: string,
    readonly model: string,
  ) {}

  get loaded(): boolean {
    return this._loaded;
  }

  /** Checks the server is reachable; Ollama loads the model itself on first use. */
  async load(): Promise<void> {
    if (this._loaded) return;
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/tags`);
    } catch (err) {
      throw new EncodingError('Failed to connect to Ollama', undefined, err);
    }
    if (!response.ok) {
      throw new EncodingError(
        `Ollama health check failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
    this._loaded = true;
  }

  async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.request([text]);
    if (!vector) {
      throw new EncodingError('Ollama returned empty embeddings array');
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const vectors = await this.request(texts);
    if (vectors.length !== texts.length) {
      throw new EncodingError(
        `Ollama returned ${vectors.length} embeddings for ${texts.length} inputs`,
      );
    }
    return vectors;
  }

  private async request(input: string[]): Promise<Float32Array[]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input }),
      });
    } catch (err) {
      throw new EncodingError('Failed to connect to Ollama for embeddings', undefined, err);
    }

    if (!response.ok) {
      throw new EncodingError(
        `Ollama embed request failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const data: unknown = await response.json();
    if (!isEmbedResponse(data)) {
      throw new EncodingError('Ollama returned a malformed embed response');
    }
    return data.embeddings.map((embedding) => new Float32Array(embedding));
  }
}
