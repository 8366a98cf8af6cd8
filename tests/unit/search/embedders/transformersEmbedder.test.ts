import { describe, it, expect, vi } from 'vitest';
import {
  TransformersEmbedder,
  importPipelineFactory,
} from '../../../../src/search/embedders/transformersEmbedder.js';
import type { FeatureExtractor, PipelineFactory } from '../../../../src/search/embedders/transformersEmbedder.js';
import { EncodingError } from '../../../../src/errors/encoding.js';

// Each text becomes [length, 1], one row per input in a single [n, 2] tensor.
const lengthExtractor: FeatureExtractor = async (texts) => {
  const list = Array.isArray(texts) ? texts : [texts];
  return {
    data: new Float32Array(list.flatMap((text) => [text.length, 1])),
    dims: [list.length, 2],
  };
};

function factoryFor(extractor: FeatureExtractor) {
  return vi.fn<PipelineFactory>().mockResolvedValue(extractor);
}

describe('TransformersEmbedder', () => {
  it('loads a mean-pooled, normalised feature-extraction pipeline', async () => {
    const extractor = vi.fn(lengthExtractor);
    const factory = factoryFor(extractor);
    const embedder = new TransformersEmbedder('test-model', factory);

    expect(embedder.loaded).toBe(false);
    await embedder.embed('sofa');

    expect(embedder.loaded).toBe(true);
    expect(factory).toHaveBeenCalledWith('feature-extraction', 'test-model');
    expect(extractor).toHaveBeenCalledWith(['sofa'], { pooling: 'mean', normalize: true });
  });

  it('splits the batch tensor into one row per input, in order', async () => {
    const embedder = new TransformersEmbedder('test-model', factoryFor(lengthExtractor));
    const vectors = await embedder.embedBatch(['ab', 'c', 'wxyz']);
    expect(vectors.map((v) => Array.from(v))).toEqual([
      [2, 1],
      [1, 1],
      [4, 1],
    ]);
  });

  it('encodes the empty string', async () => {
    const embedder = new TransformersEmbedder('test-model', factoryFor(lengthExtractor));
    expect(Array.from(await embedder.embed(''))).toEqual([0, 1]);
  });

  it('embedBatch of nothing does not load the model', async () => {
    const factory = factoryFor(lengthExtractor);
    const embedder = new TransformersEmbedder('test-model', factory);
    expect(await embedder.embedBatch([])).toEqual([]);
    expect(factory).not.toHaveBeenCalled();
  });

  it('rejects a tensor whose shape does not match the inputs', async () => {
    const malformed: FeatureExtractor = async () => ({ data: new Float32Array(3), dims: [2, 3] });
    const embedder = new TransformersEmbedder('test-model', factoryFor(malformed));
    await expect(embedder.embedBatch(['a', 'b'])).rejects.toThrow(
      'Unexpected embedding shape [2, 3] for 2 inputs',
    );
  });

  it('wraps inference failures in EncodingError', async () => {
    const failing: FeatureExtractor = async () => {
      throw new Error('onnx runtime error');
    };
    const embedder = new TransformersEmbedder('test-model', factoryFor(failing));
    await expect(embedder.embed('sofa')).rejects.toThrow('Model test-model failed to encode input');
  });

  it('retries a model load that failed', async () => {
    const factory = vi
      .fn<PipelineFactory>()
      .mockRejectedValueOnce(new Error('download interrupted'))
      .mockResolvedValue(lengthExtractor);
    const embedder = new TransformersEmbedder('test-model', factory);

    await expect(embedder.load()).rejects.toThrow('Failed to load embedding model test-model');
    expect(embedder.loaded).toBe(false);

    await embedder.load();
    expect(embedder.loaded).toBe(true);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('loads the model once for concurrent callers', async () => {
    const factory = factoryFor(lengthExtractor);
    const embedder = new TransformersEmbedder('test-model', factory);
    await Promise.all([embedder.embed('a'), embedder.embed('b'), embedder.load()]);
    expect(factory).toHaveBeenCalledTimes(1);
  });
});

describe('importPipelineFactory', () => {
  it('returns the package pipeline()', async () => {
    const pipeline = factoryFor(lengthExtractor);
    const importer = vi.fn().mockResolvedValue({ pipeline });

    expect(await importPipelineFactory(importer)).toBe(pipeline);
    expect(importer).toHaveBeenCalledWith('@xenova/transformers');
  });

  it('explains how to proceed when the package is missing', async () => {
    const missing = Object.assign(new Error("Cannot find package '@xenova/transformers'"), {
      code: 'ERR_MODULE_NOT_FOUND',
    });
    const error = await importPipelineFactory(vi.fn().mockRejectedValue(missing)).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({
      message: '@xenova/transformers is not installed. Install it, or set encoder.provider to "ollama".',
      cause: missing,
    });
  });

  it('rejects a module without pipeline()', async () => {
    await expect(importPipelineFactory(vi.fn().mockResolvedValue({}))).rejects.toThrow(
      '@xenova/transformers does not export pipeline()',
    );
  });
});
