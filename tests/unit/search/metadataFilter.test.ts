import { describe, it, expect } from 'vitest';
import { parseFilter, matchesFilter, isWhereClause } from '../../../src/search/metadataFilter.js';
import { FilterError } from '../../../src/errors/request.js';

describe('parseFilter', () => {
  it('treats null and undefined as no filter', () => {
    expect(parseFilter(null)).toEqual([]);
    expect(parseFilter(undefined)).toEqual([]);
    expect(parseFilter({})).toEqual([]);
  });

  it('reads bare values as equality', () => {
    expect(parseFilter({ status: 'active' })).toEqual([{ key: 'status', op: 'eq', value: 'active' }]);
  });

  it('reads $eq and $ne operators', () => {
    expect(parseFilter({ status: { $eq: 'active' } })).toEqual([
      { key: 'status', op: 'eq', value: 'active' },
    ]);
    expect(parseFilter({ created_by_id: { $ne: 7 } })).toEqual([
      { key: 'created_by_id', op: 'ne', value: 7 },
    ]);
  });

  it('flattens nested $and clauses in order', () => {
    const filter = parseFilter({
      $and: [
        { listing_type: { $eq: 'supply_lot' } },
        { $and: [{ featured: true }, { created_by_id: { $ne: 3 } }] },
      ],
    });
    expect(filter).toEqual([
      { key: 'listing_type', op: 'eq', value: 'supply_lot' },
      { key: 'featured', op: 'eq', value: true },
      { key: 'created_by_id', op: 'ne', value: 3 },
    ]);
  });

  it('ANDs several keys in one object', () => {
    expect(parseFilter({ a: 1, b: 'x' })).toEqual([
      { key: 'a', op: 'eq', value: 1 },
      { key: 'b', op: 'eq', value: 'x' },
    ]);
  });

  it.each([
    [{ $or: [{ a: 1 }] }, 'Unsupported logical operator "$or"'],
    [{ price: { $gt: 5 } }, 'Unsupported operator "$gt" for key "price"'],
    [{ tags: ['a', 'b'] }, 'Invalid filter value for key "tags"'],
    [{ a: null }, 'Invalid filter value for key "a"'],
    [{ a: { $eq: 1, $ne: 2 } }, 'Invalid filter value for key "a"'],
    [{ $and: { a: 1 } }, '$and expects an array of clauses'],
    [{ $and: ['a'] }, 'Filter clause must be an object'],
    [{ 'say"hi': 1 }, 'Invalid metadata key "say"hi"'],
  ])('rejects %j', (where, message) => {
    expect(() => parseFilter(where)).toThrow(FilterError);
    expect(() => parseFilter(where)).toThrow(message);
  });
});

describe('isWhereClause', () => {
  it('accepts supported clauses and rejects the rest', () => {
    expect(isWhereClause({ $and: [{ status: 'active' }] })).toBe(true);
    expect(isWhereClause({ $or: [] })).toBe(false);
    expect(isWhereClause([])).toBe(false);
    expect(isWhereClause('status')).toBe(false);
  });
});

describe('matchesFilter', () => {
  const metadata = { status: 'active', created_by_id: 4, featured: false };

  it('matches everything with an empty filter', () => {
    expect(matchesFilter(metadata, [])).toBe(true);
  });

  it('requires every predicate to hold', () => {
    expect(
      matchesFilter(metadata, [
        { key: 'status', op: 'eq', value: 'active' },
        { key: 'created_by_id', op: 'ne', value: 9 },
      ]),
    ).toBe(true);
    expect(
      matchesFilter(metadata, [
        { key: 'status', op: 'eq', value: 'active' },
        { key: 'created_by_id', op: 'ne', value: 4 },
      ]),
    ).toBe(false);
  });

  it('compares type as well as value', () => {
    expect(matchesFilter(metadata, [{ key: 'created_by_id', op: 'eq', value: '4' }])).toBe(false);
    expect(matchesFilter(metadata, [{ key: 'featured', op: 'eq', value: 0 }])).toBe(false);
    expect(matchesFilter(metadata, [{ key: 'featured', op: 'eq', value: false }])).toBe(true);
  });

  it('never matches a missing key, even for $ne', () => {
    expect(matchesFilter(metadata, [{ key: 'category', op: 'eq', value: 'steel' }])).toBe(false);
    expect(matchesFilter(metadata, [{ key: 'category', op: 'ne', value: 'steel' }])).toBe(false);
  });
});
