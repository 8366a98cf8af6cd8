import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryVectorStore } from '../../../src/search/memoryVectorStore.js';
import type { Metadata } from '../../../src/types/search.types.js';

function makeDoc(id: string, vector: number[], metadata: Metadata = {}) {
  return { id, text: `text of ${id}`, vector: new Float32Array(vector), metadata };
}

describe('MemoryVectorStore', () => {
  let store: MemoryVectorStore;

  beforeEach(() => {
    store = new MemoryVectorStore();
  });

  it('upsert and query returns the matching id with zero distance', async () => {
    await store.upsert(makeDoc('a', [1, 0, 0], { pk: 1 }));
    const results = await store.query(new Float32Array([1, 0, 0]), [], 1);
    expect(results).toHaveLength(1);
    expect(results[0].id).toBe('a');
    expect(results[0].distance).toBeCloseTo(0, 6);
    expect(results[0].metadata).toEqual({ pk: 1 });
  });

  it('orders results by ascending cosine distance', async () => {
    await store.upsert(makeDoc('a', [1, 0, 0]));
    await store.upsert(makeDoc('b', [0, 1, 0]));
    await store.upsert(makeDoc('c', [0.6, 0.8, 0]));

    const results = await store.query(new Float32Array([1, 0, 0]), [], 3);
    expect(results.map((r) => r.id)).toEqual(['a', 'c', 'b']);
    expect(results[1].distance).toBeCloseTo(0.4, 5);
    expect(results[2].distance).toBeCloseTo(1, 5);
  });

  it('breaks distance ties by id', async () => {
    await store.upsert(makeDoc('m', [0, 1]));
    await store.upsert(makeDoc('b', [0, 2]));
    await store.upsert(makeDoc('k', [0, 3]));

    const results = await store.query(new Float32Array([0, 1]), [], 3);
    expect(results.map((r) => r.id)).toEqual(['b', 'k', 'm']);
  });

  it('respects k', async () => {
    await store.upsert(makeDoc('a', [1, 0, 0]));
    await store.upsert(makeDoc('b', [0, 1, 0]));
    await store.upsert(makeDoc('c', [0, 0, 1]));

    expect(await store.query(new Float32Array([1, 0, 0]), [], 2)).toHaveLength(2);
  });

  it('clamps k to the collection size', async () => {
    await store.upsert(makeDoc('a', [1, 0]));
    await store.upsert(makeDoc('b', [0, 1]));
    await store.upsert(makeDoc('c', [1, 1]));

    expect(await store.query(new Float32Array([1, 0]), [], 1000)).toHaveLength(3);
  });

  it('returns an empty list for an empty collection', async () => {
    expect(await store.query(new Float32Array([1, 0]), [], 5)).toEqual([]);
  });

  it('applies the metadata filter before ranking', async () => {
    await store.upsert(makeDoc('a', [1, 0], { status: 'active' }));
    await store.upsert(makeDoc('b', [0.9, 0.1], { status: 'closed' }));
    await store.upsert(makeDoc('c', [0, 1], { status: 'active' }));
    await store.upsert(makeDoc('d', [1, 0]));

    const results = await store.query(
      new Float32Array([1, 0]),
      [{ key: 'status', op: 'eq', value: 'active' }],
      10,
    );
    expect(results.map((r) => r.id)).toEqual(['a', 'c']);
  });

  it('excludes documents lacking the key from $ne predicates', async () => {
    await store.upsert(makeDoc('a', [1, 0], { owner: 1 }));
    await store.upsert(makeDoc('b', [1, 0], { owner: 2 }));
    await store.upsert(makeDoc('c', [1, 0]));

    const results = await store.query(
      new Float32Array([1, 0]),
      [{ key: 'owner', op: 'ne', value: 1 }],
      10,
    );
    expect(results.map((r) => r.id)).toEqual(['b']);
  });

  it('remove deletes the entry and ignores missing ids', async () => {
    await store.upsert(makeDoc('x', [1, 0]));
    await store.remove('x');
    await expect(store.remove('missing')).resolves.toBeUndefined();
    expect(await store.size).toBe(0);
  });

  it('upsert replaces every field of an existing id', async () => {
    await store.upsert(makeDoc('dup', [1, 0], { v: '1' }));
    await store.upsert(makeDoc('dup', [0, 1], { v: '2' }));
    expect(await store.size).toBe(1);
    const results = await store.query(new Float32Array([0, 1]), [], 1);
    expect(results[0].id).toBe('dup');
    expect(results[0].distance).toBeCloseTo(0, 6);
    expect(results[0].metadata).toEqual({ v: '2' });
  });

  it('replaceAll swaps the whole collection', async () => {
    await store.upsert(makeDoc('old', [1, 0]));
    await store.replaceAll([makeDoc('n1', [1, 0]), makeDoc('n2', [0, 1])]);
    expect(await store.size).toBe(2);
    const ids = (await store.query(new Float32Array([1, 0]), [], 10)).map((r) => r.id);
    expect(ids).toEqual(['n1', 'n2']);
  });

  it('handles close gracefully', async () => {
    await expect(store.close()).resolves.toBeUndefined();
  });

  it('hands out copies of the stored metadata', async () => {
    await store.upsert(makeDoc('a', [1, 0], { status: 'active' }));
    const [first] = await store.query(new Float32Array([1, 0]), [], 1);
    first.metadata['status'] = 'closed';

    const again = await store.query(
      new Float32Array([1, 0]),
      [{ key: 'status', op: 'eq', value: 'active' }],
      1,
    );
    expect(again.map((r) => r.id)).toEqual(['a']);
    expect(again[0].metadata).toEqual({ status: 'active' });
  });
});
