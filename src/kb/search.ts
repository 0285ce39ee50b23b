/**
 * Hybrid search: vector similarity fused with filtered text matches
 */

import { logger as rootLogger, type Logger } from '../logger.js';
import { abortable, settle } from './async.js';
import { DualSubsystemFailure, PartialSubsystemFailure, describeError } from './errors.js';
import type { LanguageModelProvider } from './providers/index.js';
import { parseQuery } from './query.js';
import type { Item, ItemStore, QueryFilters, RequestOptions, SearchResult, VectorStore } from './types.js';

/** Fused score for a text hit that the vector path also found: `similarity * weight + boost` */
export const FUSION_VECTOR_WEIGHT = 0.7;
export const FUSION_TEXT_BOOST = 0.3;
/** Score for a text-only hit */
export const TEXT_ONLY_SCORE = 0.5;

const PRICE_PATTERN = /price[:\s]+\$?(\d[\d,]*(?:\.\d+)?)/i;

export interface HybridSearchDeps {
  provider: Pick<LanguageModelProvider, 'embed'>;
  items: ItemStore;
  vectors: VectorStore;
  collection: string;
  logger?: Logger;
  /** Reference time for relative dates in queries */
  now?: () => Date;
}

export class HybridSearch {
  private readonly logger: Logger;

  constructor(private readonly deps: HybridSearchDeps) {
    this.logger = (deps.logger ?? rootLogger).child('search');
  }

  /**
   * Search by meaning and by text at once. Either path may fail on its own;
   * only both failing is an error.
   */
  async search(query: string, limit: number, options: RequestOptions = {}): Promise<SearchResult[]> {
    const { signal } = options;
    const filters = parseQuery(query, this.deps.now?.() ?? new Date());
    const fetchLimit = limit * 2;

    this.logger.debug('Parsed query', JSON.stringify(filters));

    const [semantic, text] = await abortable(
      Promise.all([
        settle(this.vectorSearch(filters.searchTerms, fetchLimit, signal)),
        settle(this.deps.items.searchItems(filters, fetchLimit)),
      ]),
      signal,
      'search',
    );

    if (!semantic.ok && !text.ok) {
      throw new DualSubsystemFailure(semantic.error, text.error);
    }
    if (!semantic.ok) {
      this.logPartialFailure(new PartialSubsystemFailure('vector_store', 'semantic search failed', semantic.error));
    }
    if (!text.ok) {
      this.logPartialFailure(new PartialSubsystemFailure('item_store', 'text search failed', text.error));
    }

    const fused = fuseResults(semantic.ok ? semantic.value : [], text.ok ? text.value : []);
    return applyPriceFilter(fused.slice(0, limit), filters);
  }

  private async vectorSearch(terms: string, k: number, signal?: AbortSignal): Promise<SearchResult[]> {
    if (!terms) return [];

    const queryVector = await this.deps.provider.embed(terms, signal);
    const matches = await this.deps.vectors.query(this.deps.collection, queryVector, k);
    if (matches.length === 0) return [];

    const items = new Map((await this.deps.items.getByIds(matches.map((m) => m.id))).map((item) => [item.id, item]));

    const results: SearchResult[] = [];
    for (const match of matches) {
      const item = items.get(match.id);
      if (!item) {
        // Vector outlived its item
        this.logger.debug('Skipping vector without item', match.id);
        continue;
      }
      results.push({ item, score: Math.max(0, 1 - match.distance) });
    }
    return results;
  }

  private logPartialFailure(failure: PartialSubsystemFailure): void {
    this.logger.warn(failure.message, describeError(failure.cause));
  }
}

/**
 * Merge both result sets by item id and rank by score. Vector hits keep their
 * similarity; a text hit on top of a vector hit is boosted.
 */
export function fuseResults(vectorHits: SearchResult[], textHits: Item[]): SearchResult[] {
  const byId = new Map<string, SearchResult>();
  for (const hit of vectorHits) {
    if (!byId.has(hit.item.id)) byId.set(hit.item.id, hit);
  }

  const seen = new Set<string>();
  for (const item of textHits) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);

    const existing = byId.get(item.id);
    byId.set(
      item.id,
      existing
        ? { item: existing.item, score: existing.score * FUSION_VECTOR_WEIGHT + FUSION_TEXT_BOOST }
        : { item, score: TEXT_ONLY_SCORE },
    );
  }

  return [...byId.values()].sort((a, b) => b.score - a.score);
}

/**
 * Read a `price: $N` mention from free text
 */
export function extractPrice(content: string): number | undefined {
  const match = content.match(PRICE_PATTERN);
  if (!match) return undefined;

  const price = Number(match[1].replace(/,/g, ''));
  return Number.isFinite(price) ? price : undefined;
}

/**
 * Drop results whose stated price is outside the range. Items without a
 * stated price always pass.
 */
export function applyPriceFilter(results: SearchResult[], filters: Pick<QueryFilters, 'priceMin' | 'priceMax'>): SearchResult[] {
  const { priceMin, priceMax } = filters;
  if (priceMin === undefined && priceMax === undefined) return results;

  return results.filter(({ item }) => {
    const price = extractPrice(item.content);
    if (price === undefined) return true;
    if (priceMin !== undefined && price < priceMin) return false;
    if (priceMax !== undefined && price > priceMax) return false;
    return true;
  });
}

/**
 * Format search results for terminal output
 */
export function formatSearchResults(results: SearchResult[], maxChars = 4000): string {
  if (results.length === 0) {
    return 'No matching items.';
  }

  let output = `Found ${results.length} item${results.length > 1 ? 's' : ''}:\n\n`;

  for (const { item, score } of results) {
    const heading = item.title || item.sourceUrl || item.id;
    const snippet = item.summary.length > 200 ? `${item.summary.slice(0, 200)}...` : item.summary;
    const tags = item.tags.length ? `  #${item.tags.join(' #')}\n` : '';

    const entry = `[${item.type}] ${heading} (${score.toFixed(2)})\n  ${snippet}\n${tags}  id: ${item.id}\n\n`;

    if (output.length + entry.length > maxChars) {
      output += '...(truncated)';
      break;
    }

    output += entry;
  }

  return output.trimEnd();
}
