import type {
  FilterPredicate,
  Metadata,
  MetadataFilter,
  MetadataValue,
  WhereClause,
} from '../types/search.types.js';
import { FilterError } from '../errors/request.js';

function isScalar(value: unknown): value is MetadataValue {
  return typeof value === 'string' || typeof value === 'boolean' || Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseOperand(key: string, operand: unknown): FilterPredicate {
  if (isScalar(operand)) return { key, op: 'eq', value: operand };

  if (isRecord(operand)) {
    const entries = Object.entries(operand);
    const [entry] = entries;
    if (entries.length === 1 && entry) {
      const [operator, value] = entry;
      if ((operator === '$eq' || operator === '$ne') && isScalar(value)) {
        return { key, op: operator === '$eq' ? 'eq' : 'ne', value };
      }
      throw new FilterError(`Unsupported operator "${operator}" for key "${key}"`);
    }
  }
  throw new FilterError(`Invalid filter value for key "${key}"`);
}

function collect(clause: unknown, into: FilterPredicate[]): void {
  if (!isRecord(clause)) {
    throw new FilterError('Filter clause must be an object');
  }
  for (const [key, operand] of Object.entries(clause)) {
    if (key === '$and') {
      if (!Array.isArray(operand)) {
        throw new FilterError('$and expects an array of clauses');
      }
      for (const nested of operand) collect(nested, into);
    } else if (key.startsWith('$')) {
      throw new FilterError(`Unsupported logical operator "${key}"`);
    } else if (key === '' || key.includes('"')) {
      throw new FilterError(`Invalid metadata key "${key}"`);
    } else {
      into.push(parseOperand(key, operand));
    }
  }
}

/**
 * Flattens a where-clause into a conjunction of predicates.
 *
 * Accepts `{key: value}`, `{key: {$eq: value}}`, `{key: {$ne: value}}` and
 * `{$and: [...]}` (nestable). Several keys in one object are ANDed together.
 * `null` and `undefined` mean "no filter".
 */
export function parseFilter(where: unknown): MetadataFilter {
  if (where === null || where === undefined) return [];
  const predicates: FilterPredicate[] = [];
  collect(where, predicates);
  return predicates;
}

export function isWhereClause(value: unknown): value is WhereClause {
  if (!isRecord(value)) return false;
  try {
    parseFilter(value);
    return true;
  } catch (err) {
    if (err instanceof FilterError) return false;
    throw err;
  }
}

/** Absent keys never match, whichever the operator. */
export function matchesFilter(metadata: Metadata, filter: MetadataFilter): boolean {
  return filter.every(({ key, op, value }) => {
    if (!Object.prototype.hasOwnProperty.call(metadata, key)) return false;
    const equal = metadata[key] === value;
    return op === 'eq' ? equal : !equal;
  });
}
