/**
 * Vector store on SQLite, accelerated by sqlite-vss when the extension loads
 */

import type Database from 'better-sqlite3';
import { load as loadSqliteVss } from 'sqlite-vss';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { VectorAttributes, VectorMatch, VectorStore } from './types.js';

interface VectorRow {
  id: number;
  item_id: string;
  embedding: Buffer;
}

export interface SqliteVectorStoreOptions {
  /** Try to load sqlite-vss; falls back to an in-process cosine scan. */
  useVss?: boolean;
  logger?: Logger;
}

export class SqliteVectorStore implements VectorStore {
  private readonly logger: Logger;
  private vssAvailable = false;
  private readonly vssTables = new Set<number>();

  constructor(
    private readonly db: Database.Database,
    options: SqliteVectorStoreOptions = {},
  ) {
    this.logger = (options.logger ?? rootLogger).child('vectors');
    this.initTables();

    if (options.useVss ?? true) {
      try {
        // Use the sqlite-vss helper which handles platform-specific paths
        loadSqliteVss(db);
        this.vssAvailable = true;
        this.logger.debug('sqlite-vss extension loaded');
      } catch (err) {
        this.logger.warn('sqlite-vss extension not loaded, using fallback search', err);
      }
    }

    if (this.vssAvailable) {
      this.syncVssIndexes();
    }
  }

  isVssAvailable(): boolean {
    return this.vssAvailable;
  }

  async add(collection: string, id: string, vector: number[], attributes: VectorAttributes = {}): Promise<void> {
    const embedding = normalize(Float32Array.from(vector));
    const blob = serializeFloat32(embedding);

    const write = this.db.transaction(() => {
      const existing = this.db
        .prepare<[string, string], { id: number; dim: number }>(
          'SELECT id, dim FROM vectors WHERE collection = ? AND item_id = ?',
        )
        .get(collection, id);
      if (existing) {
        this.deleteVssRow(existing.id, existing.dim);
        this.db.prepare('DELETE FROM vectors WHERE id = ?').run(existing.id);
      }

      const result = this.db
        .prepare(
          `
          INSERT INTO vectors (collection, item_id, dim, embedding, attributes, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `,
        )
        .run(collection, id, embedding.length, blob, JSON.stringify(attributes), new Date().toISOString());

      if (this.vssAvailable) {
        this.ensureVssTable(embedding.length);
        this.db
          .prepare(`INSERT INTO ${vssTable(embedding.length)}(rowid, embedding) VALUES (?, ?)`)
          .run(result.lastInsertRowid, blob);
      }
    });

    write();
  }

  async query(collection: string, vector: number[], k: number): Promise<VectorMatch[]> {
    const queryVec = normalize(Float32Array.from(vector));
    const dim = queryVec.length;

    const countRow = this.db
      .prepare<[string, number], { count: number }>(
        'SELECT COUNT(*) as count FROM vectors WHERE collection = ? AND dim = ?',
      )
      .get(collection, dim);
    if (!countRow || countRow.count === 0 || k <= 0) return [];

    if (this.vssAvailable && this.vssTables.has(dim)) {
      try {
        return this.queryVss(collection, queryVec, k);
      } catch (err) {
        this.logger.debug(`VSS search failed: ${err}, falling back to manual similarity`);
      }
    }
    return this.queryScan(collection, queryVec, k);
  }

  async has(collection: string, id: string): Promise<boolean> {
    const row = this.db
      .prepare<[string, string], { id: number }>('SELECT id FROM vectors WHERE collection = ? AND item_id = ?')
      .get(collection, id);
    return row !== undefined;
  }

  async remove(collection: string, id: string): Promise<boolean> {
    const existing = this.db
      .prepare<[string, string], { id: number; dim: number }>(
        'SELECT id, dim FROM vectors WHERE collection = ? AND item_id = ?',
      )
      .get(collection, id);
    if (!existing) return false;

    this.db.transaction(() => {
      this.deleteVssRow(existing.id, existing.dim);
      this.db.prepare('DELETE FROM vectors WHERE id = ?').run(existing.id);
    })();
    return true;
  }

  async count(collection: string): Promise<number> {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM vectors WHERE collection = ?')
      .get(collection);
    return row?.count ?? 0;
  }

  private initTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vectors (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        collection TEXT NOT NULL,
        item_id TEXT NOT NULL,
        dim INTEGER NOT NULL,
        embedding BLOB NOT NULL,
        attributes TEXT,
        created_at TEXT NOT NULL,
        UNIQUE (collection, item_id)
      );
    `);
  }

  /**
   * Rebuild any vss index that drifted from the vectors table, e.g. rows
   * written while the extension was unavailable.
   */
  private syncVssIndexes(): void {
    const dims = this.db.prepare<[], { dim: number }>('SELECT DISTINCT dim FROM vectors').all();

    try {
      for (const { dim } of dims) {
        this.ensureVssTable(dim);
        const indexed = this.db
          .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${vssTable(dim)}`)
          .get();
        const stored = this.db
          .prepare<[number], { count: number }>('SELECT COUNT(*) as count FROM vectors WHERE dim = ?')
          .get(dim);
        if ((indexed?.count ?? 0) === (stored?.count ?? 0)) continue;

        this.logger.info(`Rebuilding vector index for dimension ${dim}`);
        this.db.transaction(() => {
          this.db.exec(`DELETE FROM ${vssTable(dim)}`);
          this.db
            .prepare(`INSERT INTO ${vssTable(dim)}(rowid, embedding) SELECT id, embedding FROM vectors WHERE dim = ?`)
            .run(dim);
        })();
      }
    } catch (err) {
      this.vssAvailable = false;
      this.logger.warn('Vector index sync failed, using fallback search', err);
    }
  }

  private ensureVssTable(dim: number): void {
    if (this.vssTables.has(dim)) return;
    this.db.exec(`CREATE VIRTUAL TABLE IF NOT EXISTS ${vssTable(dim)} USING vss0(embedding(${dim}));`);
    this.vssTables.add(dim);
  }

  private deleteVssRow(rowid: number, dim: number): void {
    if (!this.vssAvailable) return;
    this.ensureVssTable(dim);
    this.db.prepare(`DELETE FROM ${vssTable(dim)} WHERE rowid = ?`).run(rowid);
  }

  private queryVss(collection: string, queryVec: Float32Array, k: number): VectorMatch[] {
    const dim = queryVec.length;
    const total = this.db
      .prepare<[number], { count: number }>('SELECT COUNT(*) as count FROM vectors WHERE dim = ?')
      .get(dim);
    // Fetch more neighbours than asked: other collections share the index
    const fetchLimit = Math.min(k * 3, total?.count ?? k);

    const rows = this.db
      .prepare<[Buffer, number, string], { item_id: string; distance: number }>(
        `
        SELECT v.item_id, s.distance
        FROM ${vssTable(dim)} s
        JOIN vectors v ON v.id = s.rowid
        WHERE vss_search(s.embedding, vss_search_params(?, ?))
          AND v.collection = ?
      `,
      )
      .all(serializeFloat32(queryVec), fetchLimit, collection);

    // For unit vectors: L2² = 2 - 2·cos, so cosine distance = L2² / 2
    return rows
      .map((row) => ({ id: row.item_id, distance: (row.distance * row.distance) / 2 }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  private queryScan(collection: string, queryVec: Float32Array, k: number): VectorMatch[] {
    const rows = this.db
      .prepare<[string, number], VectorRow>('SELECT id, item_id, embedding FROM vectors WHERE collection = ? AND dim = ?')
      .all(collection, queryVec.length);

    return rows
      .map((row) => ({
        id: row.item_id,
        distance: Math.max(0, 1 - dot(queryVec, deserializeFloat32(row.embedding))),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }
}

function vssTable(dim: number): string {
  return `vectors_vss_${dim}`;
}

/**
 * Serialize Float32Array to Buffer for database storage
 */
export function serializeFloat32(arr: Float32Array): Buffer {
  return Buffer.from(arr.buffer, arr.byteOffset, arr.byteLength);
}

/**
 * Deserialize Buffer to Float32Array (copies: SQLite buffers are not always 4-byte aligned)
 */
export function deserializeFloat32(buffer: Buffer): Float32Array {
  return new Float32Array(buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength));
}

/**
 * Normalize a vector to unit length (L2 norm = 1) so cosine similarity is a dot product
 */
export function normalize(vec: Float32Array): Float32Array {
  let norm = 0;
  for (let i = 0; i < vec.length; i++) {
    norm += vec[i] * vec[i];
  }
  norm = Math.sqrt(norm);
  if (norm > 0) {
    for (let i = 0; i < vec.length; i++) {
      vec[i] /= norm;
    }
  }
  return vec;
}

function dot(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}
