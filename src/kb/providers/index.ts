/**
 * Provider adapter: one interface over interchangeable model backends
 */

import { LRUCache } from 'lru-cache';
import type { ProviderName, ProviderSettings } from '../../config.js';
import { logger as rootLogger, type Logger } from '../../logger.js';
import { ProviderError, isTransientProviderError } from '../errors.js';
import { CATEGORIES, DEFAULT_CATEGORY, type Category, type ContentType } from '../types.js';
import { createGeminiBackend } from './gemini.js';
import { createOllamaBackend } from './ollama.js';
import { createOpenAIBackend } from './openai.js';
import type { BackendFactory, ModelBackend } from './types.js';

export type { ModelBackend } from './types.js';
export { postJson, kindForStatus } from './http.js';

const BACKENDS: Record<ProviderName, BackendFactory> = {
  gemini: createGeminiBackend,
  openai: createOpenAIBackend,
  ollama: createOllamaBackend,
};

/** Input characters kept before each call, to stay inside backend token limits. */
export const INPUT_BUDGETS = {
  embedding: 8000,
  summary: 4000,
  tags: 2000,
  category: 1500,
} as const;

/** Max output tokens per generation call. */
export const OUTPUT_TOKENS = {
  summary: 150,
  videoSummary: 300,
  tags: 50,
  category: 20,
} as const;

const MAX_TAGS = 5;

/** Marks content captured from a video page, which gets its own summary prompt. */
export interface VideoHint {
  videoUrl: string;
  title: string;
}

export interface LanguageModelProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  summarize(text: string, signal?: AbortSignal, video?: VideoHint): Promise<string>;
  generateTags(text: string, signal?: AbortSignal): Promise<string[]>;
  categorize(title: string, content: string, type: ContentType, signal?: AbortSignal): Promise<Category>;
}

export function createBackend(name: ProviderName, settings: ProviderSettings, logger: Logger): ModelBackend {
  return BACKENDS[name](settings, logger);
}

/**
 * Dispatches every call to the primary backend. The fallback backend is tried
 * per call, only for embeddings and summaries, and only when the primary
 * reports a quota or availability failure.
 */
export class ProviderAdapter implements LanguageModelProvider {
  private readonly cache = new LRUCache<string, number[]>({ max: 1000 });
  private readonly logger: Logger;

  constructor(
    private readonly primary: ModelBackend,
    private readonly fallback?: ModelBackend,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child('providers');
  }

  static fromSettings(settings: ProviderSettings, logger: Logger = rootLogger): ProviderAdapter {
    const primary = createBackend(settings.primary, settings, logger);
    const fallback = settings.fallback ? createBackend(settings.fallback, settings, logger) : undefined;
    return new ProviderAdapter(primary, fallback, logger);
  }

  get backends(): { primary: ProviderName; fallback?: ProviderName } {
    return { primary: this.primary.name, fallback: this.fallback?.name };
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const input = text.slice(0, INPUT_BUDGETS.embedding);
    if (!input.trim()) {
      throw new ProviderError(this.primary.name, 'malformed', 'cannot embed empty text');
    }

    return this.withFallback('embed', async (backend) => {
      const key = `${backend.name}:${input}`;
      const cached = this.cache.get(key);
      if (cached) return cached;

      const vector = await backend.embed(input, signal);
      this.cache.set(key, vector);
      return vector;
    });
  }

  async summarize(text: string, signal?: AbortSignal, video?: VideoHint): Promise<string> {
    const input = text.slice(0, INPUT_BUDGETS.summary);
    if (video) {
      const prompt = videoSummaryPrompt(video, input);
      return this.withFallback('summarize', (backend) => backend.generate(prompt, OUTPUT_TOKENS.videoSummary, signal));
    }

    const prompt = 'Summarize the content below in two or three concise sentences that capture its key points.\n\n' + input;
    return this.withFallback('summarize', (backend) => backend.generate(prompt, OUTPUT_TOKENS.summary, signal));
  }

  async generateTags(text: string, signal?: AbortSignal): Promise<string[]> {
    const prompt =
      'List 3 to 5 short topical tags for the content below. Reply with the tags only, ' +
      'separated by commas, with no numbering or explanation.\n\n' +
      text.slice(0, INPUT_BUDGETS.tags);

    const response = await this.primary.generate(prompt, OUTPUT_TOKENS.tags, signal);
    return parseTags(response);
  }

  async categorize(title: string, content: string, type: ContentType, signal?: AbortSignal): Promise<Category> {
    const prompt = [
      'Assign this content to exactly one of these sections:',
      ...CATEGORIES.map((c) => `- ${c}`),
      '',
      `Title: ${title}`,
      `Type: ${type}`,
      `Content: ${content.slice(0, INPUT_BUDGETS.category)}`,
      '',
      'Reply with the section name only.',
    ].join('\n');

    const response = await this.primary.generate(prompt, OUTPUT_TOKENS.category, signal);
    return normalizeCategory(response);
  }

  private async withFallback<T>(operation: string, call: (backend: ModelBackend) => Promise<T>): Promise<T> {
    try {
      return await call(this.primary);
    } catch (err) {
      if (!this.fallback || !isTransientProviderError(err)) throw err;

      this.logger.warn(`${operation} failed on ${this.primary.name} (${err.kind}), retrying on ${this.fallback.name}`);
      return call(this.fallback);
    }
  }
}

function videoSummaryPrompt(video: VideoHint, description: string): string {
  return [
    'You are summarizing a video. In three or four sentences, describe the main topics and key points it covers,',
    'ignoring promotional text and links.',
    '',
    `Video title: ${video.title}`,
    `Video URL: ${video.videoUrl}`,
    `Description: ${description}`,
  ].join('\n');
}

/**
 * Parse a comma-separated tag reply: lower-cased, de-duplicated, capped.
 */
export function parseTags(response: string, max = MAX_TAGS): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];

  for (const raw of response.split(/[,\n]/)) {
    const tag = raw
      .trim()
      .replace(/^(?:\d+[.)]|[-*•])\s*/, '')
      .replace(/^#/, '')
      .replace(/^["']+|["'.]+$/g, '')
      .trim()
      .toLowerCase();

    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    tags.push(tag);
    if (tags.length >= max) break;
  }

  return tags;
}

/**
 * Snap a free-text reply onto the fixed category set.
 */
export function normalizeCategory(response: string): Category {
  const firstLine = response.trim().split('\n')[0];
  const label = firstLine
    .replace(/^["'*\s]+|["'.*\s]+$/g, '')
    .toLowerCase();

  return CATEGORIES.find((c) => c.toLowerCase() === label) ?? DEFAULT_CATEGORY;
}
