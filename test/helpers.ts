import { vi } from 'vitest';
import type { MetadataSource } from '../src/kb/ingest.js';
import type { LanguageModelProvider } from '../src/kb/providers/index.js';
import type { Item, ItemStore, VectorStore } from '../src/kb/types.js';

let seq = 0;

export function makeItem(overrides: Partial<Item> = {}): Item {
  seq++;
  return {
    id: `item-${seq}`,
    title: `Item ${seq}`,
    content: `Content ${seq}`,
    summary: `Summary ${seq}`,
    category: 'Other',
    tags: [],
    type: 'note',
    createdAt: new Date('2026-03-01T12:00:00.000Z'),
    ...overrides,
  };
}

export function makeProvider() {
  return {
    embed: vi.fn<LanguageModelProvider['embed']>(async () => [1, 0, 0]),
    summarize: vi.fn<LanguageModelProvider['summarize']>(async () => 'A short summary.'),
    generateTags: vi.fn<LanguageModelProvider['generateTags']>(async () => ['reading']),
    categorize: vi.fn<LanguageModelProvider['categorize']>(async () => 'Books & Reading'),
  };
}

export function makeResolver() {
  return {
    resolve: vi.fn<MetadataSource['resolve']>(async () => ({})),
  };
}

/** Item store stand-in: lookups read from `stored`, text search returns `textHits`. */
export function makeItemStore(stored: Item[], textHits: Item[] = []) {
  return {
    create: vi.fn<ItemStore['create']>(async () => undefined),
    getById: vi.fn<ItemStore['getById']>(async (id) => stored.find((i) => i.id === id)),
    getByIds: vi.fn<ItemStore['getByIds']>(async (ids) => stored.filter((i) => ids.includes(i.id))),
    list: vi.fn<ItemStore['list']>(async () => stored),
    delete: vi.fn<ItemStore['delete']>(async () => true),
    count: vi.fn<ItemStore['count']>(async () => stored.length),
    searchItems: vi.fn<ItemStore['searchItems']>(async () => textHits),
  };
}

export function makeVectorStore(matches: Array<{ id: string; distance: number }> = []) {
  return {
    add: vi.fn<VectorStore['add']>(async () => undefined),
    query: vi.fn<VectorStore['query']>(async () => matches),
    has: vi.fn<VectorStore['has']>(async () => true),
    remove: vi.fn<VectorStore['remove']>(async () => true),
    count: vi.fn<VectorStore['count']>(async () => matches.length),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}
