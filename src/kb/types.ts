/**
 * Knowledge Base Types
 */

export const CONTENT_TYPES = [
  'url',
  'video',
  'amazon',
  'blog',
  'book',
  'recipe',
  'image',
  'note',
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export function isContentType(value: string): value is ContentType {
  return CONTENT_TYPES.some((type) => type === value);
}

export const CATEGORIES = [
  'Technology',
  'Food & Recipes',
  'Books & Reading',
  'Videos & Entertainment',
  'Shopping & Products',
  'Articles & News',
  'Notes & Ideas',
  'Design & Inspiration',
  'Travel',
  'Health & Fitness',
  'Education & Learning',
  'Other',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = 'Other';

/**
 * Raw content handed to the ingestion pipeline by a capture client.
 */
export interface CapturedInput {
  title: string;
  content: string;
  sourceUrl?: string;
  type?: ContentType;
  /** Hints from the capture client, e.g. `image`, `thumbnail`, `price`. */
  metadata?: Record<string, string>;
}

export interface Item {
  id: string;
  title: string;
  /** Never empty: falls back to the title. */
  content: string;
  summary: string;
  category: Category;
  tags: string[];
  sourceUrl?: string;
  type: ContentType;
  /** Vector-store key; equal to `id` once an embedding was generated. */
  embeddingId?: string;
  imageUrl?: string;
  embedHtml?: string;
  createdAt: Date;
}

export interface SearchResult {
  item: Item;
  /** 0 = no match, 1 = identical */
  score: number;
}

export interface QueryFilters {
  /** Residual free text after structured hints were extracted. */
  searchTerms: string;
  type?: ContentType;
  dateFrom?: Date;
  dateTo?: Date;
  /** OR-matched */
  tags: string[];
  author?: string;
  priceMin?: number;
  priceMax?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Relational item store. Owns items; the vector store only references them.
 */
export interface ItemStore {
  create(item: Item): Promise<void>;
  getById(id: string): Promise<Item | undefined>;
  getByIds(ids: string[]): Promise<Item[]>;
  list(limit: number, offset?: number): Promise<Item[]>;
  delete(id: string): Promise<boolean>;
  count(): Promise<number>;
  searchItems(filters: QueryFilters, limit: number): Promise<Item[]>;
}

export type VectorAttributes = Record<string, string | number | boolean>;

export interface VectorMatch {
  id: string;
  /** Non-negative; smaller is more similar. */
  distance: number;
}

export interface VectorStore {
  add(collection: string, id: string, vector: number[], attributes?: VectorAttributes): Promise<void>;
  query(collection: string, vector: number[], k: number): Promise<VectorMatch[]>;
  has(collection: string, id: string): Promise<boolean>;
  remove(collection: string, id: string): Promise<boolean>;
  count(collection: string): Promise<number>;
}
