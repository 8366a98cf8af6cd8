export type MetadataValue = string | number | boolean;

/** Flat key/value bag supplied by the caller; only ever used for filtering. */
export type Metadata = Record<string, MetadataValue>;

export interface ListingDocument {
  id: string;
  text: string;
  metadata: Metadata;
}

export interface StoredDocument extends ListingDocument {
  vector: Float32Array;
}

export interface Neighbor {
  id: string;
  /** Cosine distance, 0 = identical direction. */
  distance: number;
  metadata: Metadata;
}

export type FilterOperator = 'eq' | 'ne';

export interface FilterPredicate {
  key: string;
  op: FilterOperator;
  value: MetadataValue;
}

/** Conjunction of predicates. An empty filter matches every document. */
export type MetadataFilter = readonly FilterPredicate[];

// ── Wire filter language ─────────────────────────────────────────────────────

export type WhereOperand = MetadataValue | { $eq: MetadataValue } | { $ne: MetadataValue };

export type WhereClause = { $and: WhereClause[] } | { [key: string]: WhereOperand };

// ── Search results ───────────────────────────────────────────────────────────

export interface RankedResult {
  pk: string | number;
  distance: number;
}

export interface SearchOptions {
  filter?: MetadataFilter;
  limit: number;
  bypassCutoff?: boolean;
}

export interface SearchDebugInfo {
  bypassCutoff: boolean;
  rawCount: number;
  rawPks: Array<string | number>;
  rawDistances: number[];
  keepCount: number;
}

export interface SearchOutcome {
  results: RankedResult[];
  debug: SearchDebugInfo;
}

export interface RebuildResult {
  count: number;
  failedIds: string[];
}

export interface HealthStatus {
  status: 'ok';
  modelLoaded: boolean;
  collectionCount: number;
}
