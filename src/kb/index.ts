/**
 * Knowledge Base Module - Main Entry Point
 */

import type { AppConfig } from '../config.js';
import { closeDatabase, openDatabase } from '../db.js';
import { logger as rootLogger, setLogLevel, type Logger } from '../logger.js';
import { requestSignal } from './async.js';
import { ItemNotFoundError, PartialSubsystemFailure, describeError } from './errors.js';
import { IngestionPipeline, type MetadataSource } from './ingest.js';
import { MetadataResolver } from './metadata.js';
import { ProviderAdapter, type LanguageModelProvider } from './providers/index.js';
import { HybridSearch } from './search.js';
import { SqliteItemStore } from './storage.js';
import type { CapturedInput, Item, RequestOptions, SearchResult } from './types.js';
import { SqliteVectorStore } from './vectors.js';

// Re-export types
export * from './types.js';
export * from './errors.js';

export { loadConfig, type AppConfig } from '../config.js';
export { parseQuery } from './query.js';
export { HybridSearch, fuseResults, extractPrice, applyPriceFilter, formatSearchResults } from './search.js';
export { IngestionPipeline, summaryFallback, type MetadataSource } from './ingest.js';
export { MetadataResolver, extractIsbn, extractVideo } from './metadata.js';
export {
  ProviderAdapter,
  parseTags,
  normalizeCategory,
  type LanguageModelProvider,
  type VideoHint,
} from './providers/index.js';
export { SqliteItemStore } from './storage.js';
export { SqliteVectorStore } from './vectors.js';

export const MAX_SEARCH_LIMIT = 50;
const REINDEX_PAGE_SIZE = 100;

export interface SearchOptions extends RequestOptions {
  limit?: number;
}

export interface ReindexResult {
  reindexed: number;
  failed: number;
}

export interface KnowledgeBaseStats {
  items: number;
  vectors: number;
}

export interface KnowledgeBase {
  capture(input: CapturedInput, options?: RequestOptions): Promise<Item>;
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
  getItem(id: string): Promise<Item>;
  listItems(limit?: number, offset?: number): Promise<Item[]>;
  deleteItem(id: string): Promise<void>;
  /** Re-embed one item, or every item whose vector is missing. */
  reindex(id?: string, options?: RequestOptions): Promise<ReindexResult>;
  stats(): Promise<KnowledgeBaseStats>;
  close(): void;
}

/** Collaborators that replace the configured ones, e.g. in tests. */
export interface KnowledgeBaseOverrides {
  provider?: LanguageModelProvider;
  resolver?: MetadataSource;
  logger?: Logger;
}

/**
 * Open the knowledge base described by `config`
 */
export function createKnowledgeBase(
  config: Readonly<AppConfig>,
  overrides: KnowledgeBaseOverrides = {},
): KnowledgeBase {
  setLogLevel(config.logLevel);
  const logger = overrides.logger ?? rootLogger;
  const log = logger.child('kb');

  const db = openDatabase(config);
  const items = new SqliteItemStore(db);
  const vectors = new SqliteVectorStore(db, { useVss: config.vectors.useVss, logger });
  const collection = config.vectors.collection;

  const provider = overrides.provider ?? ProviderAdapter.fromSettings(config.providers, logger);
  const resolver = overrides.resolver ?? new MetadataResolver({ ...config.metadata, logger });

  const pipeline = new IngestionPipeline({ provider, resolver, items, vectors, collection, logger });
  const engine = new HybridSearch({ provider, items, vectors, collection, logger });

  const getItem = async (id: string): Promise<Item> => {
    const item = await items.getById(id);
    if (!item) throw new ItemNotFoundError(id);
    return item;
  };

  log.debug('Knowledge base opened', config.dataDir);

  return {
    capture(input, options = {}) {
      return pipeline.createItem(input, { signal: requestSignal(config.requestTimeoutMs, options.signal) });
    },

    search(query, options = {}) {
      const limit = clampLimit(options.limit ?? config.searchLimit, config.searchLimit);
      return engine.search(query, limit, { signal: requestSignal(config.requestTimeoutMs, options.signal) });
    },

    getItem,

    listItems(limit = 20, offset = 0) {
      return items.list(limit, offset);
    },

    async deleteItem(id) {
      if (!(await items.delete(id))) {
        throw new ItemNotFoundError(id);
      }

      try {
        await vectors.remove(collection, id);
      } catch (err) {
        const failure = new PartialSubsystemFailure('vector_store', 'vector not removed', err);
        log.warn(failure.message, id, describeError(err));
      }
      log.info('Item deleted', id);
    },

    async reindex(id, options = {}) {
      if (id) {
        const item = await getItem(id);
        await pipeline.reindexItem(item, { signal: requestSignal(config.requestTimeoutMs, options.signal) });
        return { reindexed: 1, failed: 0 };
      }

      const result: ReindexResult = { reindexed: 0, failed: 0 };
      for (let offset = 0; ; offset += REINDEX_PAGE_SIZE) {
        const page = await items.list(REINDEX_PAGE_SIZE, offset);
        for (const item of page) {
          if (await vectors.has(collection, item.id)) continue;
          try {
            await pipeline.reindexItem(item, { signal: requestSignal(config.requestTimeoutMs, options.signal) });
            result.reindexed++;
          } catch (err) {
            if (options.signal?.aborted) throw err;
            result.failed++;
            log.warn('Re-index failed', item.id, describeError(err));
          }
        }
        if (page.length < REINDEX_PAGE_SIZE) break;
      }

      log.info('Re-index finished', result.reindexed, 'indexed,', result.failed, 'failed');
      return result;
    },

    async stats() {
      return { items: await items.count(), vectors: await vectors.count(collection) };
    },

    close() {
      closeDatabase(db);
    },
  };
}

/**
 * Clamp a requested result count to 1..MAX_SEARCH_LIMIT
 */
export function clampLimit(limit: number, fallback: number): number {
  const value = Number.isFinite(limit) ? Math.floor(limit) : fallback;
  return Math.min(MAX_SEARCH_LIMIT, Math.max(1, value));
}
