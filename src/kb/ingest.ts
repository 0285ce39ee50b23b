/**
 * Content ingestion pipeline
 */

import crypto from 'crypto';
import { z } from 'zod';
import { logger as rootLogger, type Logger } from '../logger.js';
import { abortable, settle, throwIfAborted } from './async.js';
import {
  EmbeddingUnavailableError,
  InvalidInputError,
  PartialSubsystemFailure,
  RequestTimeoutError,
  describeError,
} from './errors.js';
import { extractVideo, type MetadataRequest, type ResolvedMetadata } from './metadata.js';
import type { LanguageModelProvider } from './providers/index.js';
import {
  CONTENT_TYPES,
  DEFAULT_CATEGORY,
  type CapturedInput,
  type ContentType,
  type Item,
  type ItemStore,
  type RequestOptions,
  type VectorStore,
} from './types.js';

export const SUMMARY_FALLBACK_LENGTH = 200;

const capturedInputSchema = z
  .object({
    title: z.string(),
    content: z.string(),
    sourceUrl: z.string().trim().url().optional(),
    type: z.enum(CONTENT_TYPES).optional(),
    metadata: z.record(z.string()).optional(),
  })
  .refine((input) => Boolean(input.title.trim() || input.content.trim()), {
    message: 'title or content is required',
  });

export interface MetadataSource {
  resolve(req: MetadataRequest, signal?: AbortSignal): Promise<ResolvedMetadata>;
}

export interface IngestionDeps {
  provider: LanguageModelProvider;
  resolver: MetadataSource;
  items: ItemStore;
  vectors: VectorStore;
  collection: string;
  logger?: Logger;
}

/**
 * Turns captured input into a stored, enriched item. Enrichment tasks run
 * concurrently and each settles on its own; only a missing embedding stops
 * the item from being stored.
 */
export class IngestionPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: IngestionDeps) {
    this.logger = (deps.logger ?? rootLogger).child('ingest');
  }

  async createItem(input: CapturedInput, options: RequestOptions = {}): Promise<Item> {
    const parsed = capturedInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInputError(parsed.error.issues.map((i) => i.message).join('; '));
    }

    const { title, sourceUrl, type, metadata } = parsed.data;
    const content = parsed.data.content.trim() ? parsed.data.content : title;
    const { signal } = options;
    const { provider, resolver } = this.deps;

    throwIfAborted(signal, 'capture');

    // The id doubles as the vector key, so it exists before any write
    const id = crypto.randomUUID();
    const provisionalType: ContentType = type ?? (sourceUrl ? 'url' : 'note');

    const categorized = settle(provider.categorize(title, content, provisionalType, signal));
    const pendingCategory = categorized.then((outcome) => (outcome.ok ? outcome.value : undefined));
    const videoHint = sourceUrl && extractVideo(sourceUrl) ? { videoUrl: sourceUrl, title } : undefined;

    const [summary, tags, embedding, category, resolved] = await abortable(
      Promise.all([
        settle(provider.summarize(content, signal, videoHint)),
        settle(provider.generateTags(content, signal)),
        settle(provider.embed(content, signal)),
        categorized,
        settle(resolver.resolve({ title, content, type, sourceUrl, metadata, category: pendingCategory }, signal)),
      ]),
      signal,
      'capture',
    );

    if (!embedding.ok) {
      if (embedding.error instanceof RequestTimeoutError) throw embedding.error;
      this.logger.error('Embedding failed, item not stored', describeError(embedding.error));
      throw new EmbeddingUnavailableError(embedding.error);
    }

    if (!summary.ok) {
      this.logger.warn('Summary failed, using content excerpt', describeError(summary.error));
    }
    if (!tags.ok) {
      this.logger.warn('Tag generation failed', describeError(tags.error));
    }
    if (!category.ok) {
      this.logger.warn('Categorization failed', describeError(category.error));
    }
    if (!resolved.ok) {
      this.logger.warn('Metadata resolution failed', describeError(resolved.error));
    }

    const meta: ResolvedMetadata = resolved.ok ? resolved.value : {};
    const item: Item = {
      id,
      title,
      content,
      summary: summary.ok && summary.value.trim() ? summary.value.trim() : summaryFallback(content),
      category: category.ok ? category.value : DEFAULT_CATEGORY,
      tags: tags.ok ? tags.value : [],
      sourceUrl,
      type: type ?? meta.inferredType ?? provisionalType,
      embeddingId: id,
      imageUrl: meta.imageUrl,
      embedHtml: meta.embedHtml,
      createdAt: new Date(),
    };

    throwIfAborted(signal, 'capture');

    await this.writeVector(item, embedding.value);
    await this.deps.items.create(item);

    this.logger.info('Item captured', item.id, item.type, item.title);
    return item;
  }

  /**
   * Re-embed a stored item and overwrite its vector. Failures propagate.
   */
  async reindexItem(item: Item, options: RequestOptions = {}): Promise<void> {
    const { signal } = options;
    let vector: number[];
    try {
      vector = await abortable(this.deps.provider.embed(item.content, signal), signal, 'reindex');
    } catch (err) {
      if (err instanceof RequestTimeoutError) throw err;
      throw new EmbeddingUnavailableError(err);
    }

    await this.deps.vectors.add(this.deps.collection, item.id, vector, vectorAttributes(item));
    this.logger.info('Item re-indexed', item.id);
  }

  private async writeVector(item: Item, vector: number[]): Promise<void> {
    try {
      await this.deps.vectors.add(this.deps.collection, item.id, vector, vectorAttributes(item));
    } catch (err) {
      const failure = new PartialSubsystemFailure(
        'vector_store',
        'embedding not stored; item stays text-searchable until re-indexed',
        err,
      );
      this.logger.warn(failure.message, item.id, describeError(err));
    }
  }
}

/**
 * Excerpt used when the summary could not be generated
 */
export function summaryFallback(content: string): string {
  return content.length > SUMMARY_FALLBACK_LENGTH ? `${content.slice(0, SUMMARY_FALLBACK_LENGTH)}...` : content;
}

function vectorAttributes(item: Item): { title: string; type: ContentType; category: string } {
  return { title: item.title, type: item.type, category: item.category };
}
