/**
 * SQLite item store
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  CATEGORIES,
  DEFAULT_CATEGORY,
  isContentType,
  type Category,
  type Item,
  type ItemStore,
  type QueryFilters,
} from './types.js';

interface ItemRow {
  id: string;
  title: string;
  content: string;
  summary: string;
  category: string;
  tags: string;
  source_url: string | null;
  type: string;
  embedding_id: string | null;
  image_url: string | null;
  embed_html: string | null;
  created_at: string;
}

const tagList = z.array(z.string());

export function initItemTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS items (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      content TEXT NOT NULL,
      summary TEXT NOT NULL,
      category TEXT NOT NULL,
      tags TEXT NOT NULL DEFAULT '[]',
      source_url TEXT,
      type TEXT NOT NULL,
      embedding_id TEXT,
      image_url TEXT,
      embed_html TEXT,
      created_at TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_items_created ON items(created_at);
    CREATE INDEX IF NOT EXISTS idx_items_type ON items(type);
  `);
}

export class SqliteItemStore implements ItemStore {
  constructor(private readonly db: Database.Database) {
    initItemTables(db);
    // SQLite's LIKE folds ASCII only
    db.function('fold', { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? value.toLowerCase() : null,
    );
  }

  async create(item: Item): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO items (id, title, content, summary, category, tags, source_url, type, embedding_id, image_url, embed_html, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      )
      .run(
        item.id,
        item.title,
        item.content,
        item.summary,
        item.category,
        JSON.stringify(item.tags),
        item.sourceUrl ?? null,
        item.type,
        item.embeddingId ?? null,
        item.imageUrl ?? null,
        item.embedHtml ?? null,
        item.createdAt.toISOString(),
      );
  }

  async getById(id: string): Promise<Item | undefined> {
    const row = this.db.prepare<[string], ItemRow>('SELECT * FROM items WHERE id = ?').get(id);
    return row ? rowToItem(row) : undefined;
  }

  async getByIds(ids: string[]): Promise<Item[]> {
    if (ids.length === 0) return [];

    const placeholders = ids.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], ItemRow>(`SELECT * FROM items WHERE id IN (${placeholders})`)
      .all(...ids);
    return rows.map(rowToItem);
  }

  async list(limit: number, offset = 0): Promise<Item[]> {
    const rows = this.db
      .prepare<[number, number], ItemRow>(
        `
        SELECT * FROM items
        ORDER BY created_at DESC
        LIMIT ? OFFSET ?
      `,
      )
      .all(limit, offset);
    return rows.map(rowToItem);
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM items WHERE id = ?').run(id);
    return result.changes > 0;
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM items').get();
    return row?.count ?? 0;
  }

  /**
   * Filtered text search. The type filter only applies when there are no
   * residual terms: free text turns a type-scoped query into a type-agnostic one.
   */
  async searchItems(filters: QueryFilters, limit: number): Promise<Item[]> {
    const { sql, params } = buildSearchQuery(filters, limit);
    const rows = this.db.prepare<unknown[], ItemRow>(sql).all(...params);
    return rows.map(rowToItem);
  }
}

export function buildSearchQuery(filters: QueryFilters, limit: number): { sql: string; params: unknown[] } {
  let sql = 'SELECT * FROM items WHERE 1=1';
  const params: unknown[] = [];

  if (filters.searchTerms) {
    const pattern = `%${escapeLike(filters.searchTerms.toLowerCase())}%`;
    sql += ` AND (fold(title) LIKE ? ESCAPE '\\' OR fold(content) LIKE ? ESCAPE '\\' OR fold(summary) LIKE ? ESCAPE '\\')`;
    params.push(pattern, pattern, pattern);
  } else if (filters.type) {
    sql += ' AND type = ?';
    params.push(filters.type);
  }

  if (filters.dateFrom) {
    sql += ' AND created_at >= ?';
    params.push(filters.dateFrom.toISOString());
  }
  if (filters.dateTo) {
    sql += ' AND created_at <= ?';
    params.push(filters.dateTo.toISOString());
  }

  if (filters.tags.length > 0) {
    const placeholders = filters.tags.map(() => '?').join(', ');
    sql += ` AND EXISTS (SELECT 1 FROM json_each(items.tags) WHERE fold(json_each.value) IN (${placeholders}))`;
    params.push(...filters.tags.map((t) => t.toLowerCase()));
  }

  if (filters.author) {
    const pattern = `%${escapeLike(filters.author.toLowerCase())}%`;
    sql += ` AND (fold(content) LIKE ? ESCAPE '\\' OR fold(title) LIKE ? ESCAPE '\\')`;
    params.push(pattern, pattern);
  }

  sql += ' ORDER BY created_at DESC LIMIT ?';
  params.push(limit);

  return { sql, params };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function rowToItem(row: ItemRow): Item {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    summary: row.summary,
    category: toCategory(row.category),
    tags: parseTagColumn(row.tags),
    sourceUrl: row.source_url ?? undefined,
    type: isContentType(row.type) ? row.type : 'note',
    embeddingId: row.embedding_id ?? undefined,
    imageUrl: row.image_url ?? undefined,
    embedHtml: row.embed_html ?? undefined,
    createdAt: new Date(row.created_at),
  };
}

function toCategory(value: string): Category {
  return CATEGORIES.find((c) => c === value) ?? DEFAULT_CATEGORY;
}

function parseTagColumn(raw: string): string[] {
  try {
    const parsed = tagList.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}
