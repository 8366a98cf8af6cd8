import Database from 'better-sqlite3';
import { load as loadSqliteVec } from 'sqlite-vec';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { VectorStore } from './vectorStore.js';
import type {
  FilterPredicate,
  Metadata,
  MetadataFilter,
  MetadataValue,
  Neighbor,
  StoredDocument,
} from '../types/search.types.js';
import { IndexStoreError } from '../errors/indexStore.js';

interface DocumentRow {
  id: string;
  metadata: string;
  distance: number;
}

type SqlParam = string | number | Buffer;

const MAX_CACHED_QUERIES = 64;

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

function jsonPath(key: string): string {
  return `$."${key}"`;
}

interface SqlFragment {
  sql: string;
  params: SqlParam[];
}

/**
 * json_extract() turns JSON booleans into 0/1, so the JSON type is compared as
 * well to keep `true` and `1` distinct.
 */
function equalityClause(path: string, value: MetadataValue): SqlFragment {
  if (typeof value === 'boolean') {
    return { sql: 'json_type(metadata, ?) = ?', params: [path, value ? 'true' : 'false'] };
  }
  if (typeof value === 'number') {
    return {
      sql: "json_type(metadata, ?) IN ('integer', 'real') AND json_extract(metadata, ?) = ?",
      params: [path, path, value],
    };
  }
  return {
    sql: "json_type(metadata, ?) = 'text' AND json_extract(metadata, ?) = ?",
    params: [path, path, value],
  };
}

// A missing key has no JSON type, so it fails both forms.
function predicateToSql({ key, op, value }: FilterPredicate): SqlFragment {
  const path = jsonPath(key);
  const eq = equalityClause(path, value);
  if (op === 'eq') {
    return { sql: `(${eq.sql})`, params: eq.params };
  }
  return {
    sql: `(json_type(metadata, ?) IS NOT NULL AND NOT (${eq.sql}))`,
    params: [path, ...eq.params],
  };
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    loadSqliteVec(db);
    if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id        TEXT PRIMARY KEY,
        text      TEXT NOT NULL DEFAULT '',
        metadata  TEXT NOT NULL DEFAULT '{}',
        embedding BLOB NOT NULL
      )
    `);
    return db;
  } catch (err) {
    throw new IndexStoreError(`Failed to open index at ${dbPath}`, err);
  }
}

function parseMetadata(raw: string): Metadata {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Persistent store on SQLite with the sqlite-vec extension.
 *
 * Vectors live as float32 blobs next to the document text and a JSON metadata
 * column. Queries scan the filtered rows and rank them with
 * vec_distance_cosine(). better-sqlite3 runs every statement synchronously, so
 * mutations never interleave, and replaceAll() is one transaction.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly upsertStmt: Database.Statement<[string, string, string, Buffer]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly clearStmt: Database.Statement<[]>;
  private readonly countStmt: Database.Statement<[], { n: number }>;
  private readonly replaceTx: (docs: StoredDocument[]) => void;
  /** Keyed by WHERE clause, which only varies with the filter's keys, operators and value types. */
  private readonly queryStmts = new Map<string, Database.Statement<SqlParam[], DocumentRow>>();

  constructor(dbPath = ':memory:') {
    this.db = openDatabase(dbPath);
    this.upsertStmt = this.db.prepare<[string, string, string, Buffer]>(`
      INSERT INTO documents(id, text, metadata, embedding) VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        text = excluded.text,
        metadata = excluded.metadata,
        embedding = excluded.embedding
    `);
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM documents WHERE id = ?');
    this.clearStmt = this.db.prepare<[]>('DELETE FROM documents');
    this.countStmt = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM documents');
    this.replaceTx = this.db.transaction((docs: StoredDocument[]) => {
      this.clearStmt.run();
      for (const doc of docs) this.write(doc);
    });
  }

  async upsert(doc: StoredDocument): Promise<void> {
    this.guard(`upsert ${doc.id}`, () => this.write(doc));
  }

  async remove(id: string): Promise<void> {
    this.guard(`remove ${id}`, () => this.deleteStmt.run(id));
  }

  async query(vector: Float32Array, filter: MetadataFilter, k: number): Promise<Neighbor[]> {
    return this.guard('query', () => {
      const count = this.count();
      const limit = Math.min(k, count);
      if (limit <= 0) return [];

      const clauses = filter.map(predicateToSql);
      const where = clauses.length > 0 ? `WHERE ${clauses.map((c) => c.sql).join(' AND ')}` : '';
      const params: SqlParam[] = [toBlob(vector), ...clauses.flatMap((c) => c.params), limit];

      const rows = this.queryStatement(where).all(...params);

      return rows.map((row) => ({
        id: row.id,
        distance: row.distance,
        metadata: parseMetadata(row.metadata),
      }));
    });
  }

  async replaceAll(docs: StoredDocument[]): Promise<void> {
    this.guard('rebuild', () => this.replaceTx(docs));
  }

  get size(): Promise<number> {
    try {
      return Promise.resolve(this.count());
    } catch (err) {
      return Promise.reject(new IndexStoreError('Failed to count documents', err));
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private write(doc: StoredDocument): void {
    this.upsertStmt.run(doc.id, doc.text, JSON.stringify(doc.metadata), toBlob(doc.vector));
  }

  private queryStatement(where: string): Database.Statement<SqlParam[], DocumentRow> {
    let stmt = this.queryStmts.get(where);
    if (!stmt) {
      if (this.queryStmts.size >= MAX_CACHED_QUERIES) this.queryStmts.clear();
      stmt = this.db.prepare<SqlParam[], DocumentRow>(
        `SELECT id, metadata, vec_distance_cosine(embedding, ?) AS distance
         FROM documents
         ${where}
         ORDER BY distance ASC, id ASC
         LIMIT ?`,
      );
      this.queryStmts.set(where, stmt);
    }
    return stmt;
  }

  private count(): number {
    return this.countStmt.get()?.n ?? 0;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new IndexStoreError(`Index store ${operation} failed: ${reason}`, err);
    }
  }
}
