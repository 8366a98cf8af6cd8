import type { EmbeddingProvider } from './embeddingProvider.js';
import { EncodingError } from '../../errors/encoding.js';

export interface Tensor {
  data: Float32Array;
  dims: number[];
}

export type FeatureExtractor = (
  texts: string | string[],
  options: { pooling: 'mean'; normalize: boolean },
) => Promise<Tensor>;

export type PipelineFactory = (task: 'feature-extraction', model: string) => Promise<FeatureExtractor>;

export const TRANSFORMERS_PACKAGE = '@xenova/transformers';

function isPipelineModule(value: unknown): value is { pipeline: PipelineFactory } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pipeline' in value &&
    typeof value.pipeline === 'function'
  );
}

/**
 * Resolves `pipeline()` from the optional @xenova/transformers peer dependency.
 * The specifier is a variable so the package is only needed when this encoder is chosen.
 */
export async function importPipelineFactory(
  importer: (specifier: string) => Promise<unknown> = (specifier) => import(specifier),
): Promise<PipelineFactory> {
  let mod: unknown;
  try {
    mod = await importer(TRANSFORMERS_PACKAGE);
  } catch (err) {
    throw new EncodingError(
      `${TRANSFORMERS_PACKAGE} is not installed. Install it, or set encoder.provider to "ollama".`,
      undefined,
      err,
    );
  }
  if (!isPipelineModule(mod)) {
    throw new EncodingError(`${TRANSFORMERS_PACKAGE} does not export pipeline()`);
  }
  return mod.pipeline;
}

/**
 * Sentence embeddings computed in-process with @xenova/transformers.
 * Mean-pooled and L2-normalised, so cosine distance is 1 - dot product.
 */
export class TransformersEmbedder implements EmbeddingProvider {
  private extractor: FeatureExtractor | null = null;
  private loading: Promise<FeatureExtractor> | null = null;

  constructor(
    readonly model: string,
    private readonly createPipeline: PipelineFactory,
  ) {}

  get loaded(): boolean {
    return this.extractor !== null;
  }

  async load(): Promise<void> {
    await this.getExtractor();
  }

  async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new EncodingError(`Model ${this.model} returned no embedding`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const extractor = await this.getExtractor();
    let output: Tensor;
    try {
      output = await extractor(texts, { pooling: 'mean', normalize: true });
    } catch (err) {
      throw new EncodingError(`Model ${this.model} failed to encode input`, undefined, err);
    }

    const dimensions = output.dims[output.dims.length - 1] ?? 0;
    if (dimensions === 0 || output.data.length !== dimensions * texts.length) {
      throw new EncodingError(
        `Unexpected embedding shape [${output.dims.join(', ')}] for ${texts.length} inputs`,
      );
    }
    return texts.map((_, i) => output.data.slice(i * dimensions, (i + 1) * dimensions));
  }

  private getExtractor(): Promise<FeatureExtractor> {
    if (this.extractor) return Promise.resolve(this.extractor);
    this.loading ??= this.createPipeline('feature-extraction', this.model).then(
      (extractor) => {
        this.extractor = extractor;
        return extractor;
      },
      (err: unknown) => {
        this.loading = null;
        throw new EncodingError(`Failed to load embedding model ${this.model}`, undefined, err);
      },
    );
    return this.loading;
  }
}
