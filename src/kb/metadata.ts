/**
 * Preview metadata resolution: images, embeddable players and type hints
 */

import { escapeAttribute } from 'entities';
import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { logger as rootLogger, type Logger } from '../logger.js';
import { describeError } from './errors.js';
import type { Category, ContentType } from './types.js';

export interface MetadataRequest {
  title: string;
  content: string;
  type?: ContentType;
  sourceUrl?: string;
  metadata?: Record<string, string>;
  /** May still be pending; only the last step waits for it */
  category?: Category | Promise<Category | undefined>;
}

export interface ResolvedMetadata {
  embedHtml?: string;
  imageUrl?: string;
  inferredType?: ContentType;
}

export interface MetadataResolverOptions {
  /** Per-lookup timeout */
  timeoutMs: number;
  userAgent: string;
  logger?: Logger;
}

export const BOOK_KEYWORDS = ['book', 'author', 'published', 'isbn', 'chapter', 'novel', 'read'];

export const RECIPE_KEYWORDS = [
  'recipe',
  'ingredients',
  'cook',
  'bake',
  'prep time',
  'servings',
  'cups',
  'tablespoons',
  'tsp',
  'tbsp',
];

const CALLER_IMAGE_KEYS = ['image_url', 'image', 'thumbnail'];

const PREVIEW_IMAGE_SELECTORS = ['meta[property="og:image"]', 'meta[name="twitter:image"]'];

const CATEGORY_SEARCH_TERMS: Partial<Record<Category, string>> = {
  Technology: 'technology',
  'Food & Recipes': 'food',
  'Books & Reading': 'books',
  'Videos & Entertainment': 'entertainment',
  'Shopping & Products': 'product',
  'Articles & News': 'news',
  'Notes & Ideas': 'notebook',
  'Design & Inspiration': 'design',
  Travel: 'travel',
  'Health & Fitness': 'fitness',
  'Education & Learning': 'education',
};

const DEFAULT_SEARCH_TERM = 'abstract';

const ISBN_PATTERNS = [
  /ISBN(?:-?13)?[:\s]*((?:\d[-\s]?){12}\d)/i,
  /ISBN(?:-?10)?[:\s]*((?:\d[-\s]?){9}[\dX])/i,
  /\b(\d{3}[-\s]?\d{10})\b/,
];

const openLibrarySearch = z.object({
  docs: z.array(z.object({ cover_i: z.number().optional() })),
});

export interface VideoRef {
  platform: 'youtube' | 'vimeo';
  id: string;
}

/**
 * Resolves preview metadata for a captured item. Steps run in a fixed order
 * and the first that yields an image wins; the book heuristic is checked
 * before the recipe heuristic. Lookup failures are logged and skipped.
 */
export class MetadataResolver {
  private readonly logger: Logger;

  constructor(private readonly options: MetadataResolverOptions) {
    this.logger = (options.logger ?? rootLogger).child('metadata');
  }

  async resolve(req: MetadataRequest, signal?: AbortSignal): Promise<ResolvedMetadata> {
    const infer = (type: ContentType): ContentType | undefined => (req.type ? undefined : type);

    // 1. Caller-supplied image
    const callerImage = CALLER_IMAGE_KEYS.map((key) => req.metadata?.[key]?.trim()).find(Boolean);
    if (callerImage) {
      return { imageUrl: callerImage };
    }

    if (req.sourceUrl) {
      // 2. Known video platform: deterministic, no network
      const video = extractVideo(req.sourceUrl);
      if (video) {
        return { ...videoEmbed(video), inferredType: infer('video') };
      }

      // 3. Social preview image from the page
      const preview = await this.fetchPreviewImage(req.sourceUrl, signal);
      if (preview) {
        return { imageUrl: preview, embedHtml: previewHtml(preview) };
      }
    }

    // 4. Book cover
    if (matchesKeywords(req.title, req.content, BOOK_KEYWORDS)) {
      const cover = await this.findBookCover(req.title, req.content, signal);
      if (cover) {
        return { imageUrl: cover, inferredType: infer('book') };
      }
    }

    // 5. Recipe image
    if (matchesKeywords(req.title, req.content, RECIPE_KEYWORDS)) {
      return { imageUrl: imageSearchUrl('recipe', req.title), inferredType: infer('recipe') };
    }

    // 6. Generic image for the category
    const category = await req.category;
    const term = (category && CATEGORY_SEARCH_TERMS[category]) || DEFAULT_SEARCH_TERM;
    return { imageUrl: imageSearchUrl(term, req.title) };
  }

  /**
   * Fetch page markup and read og:image, then twitter:image.
   */
  async fetchPreviewImage(pageUrl: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const res = await fetch(pageUrl, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'text/html,application/xhtml+xml' },
        signal: this.lookupSignal(signal),
      });
      if (!res.ok) {
        this.logger.debug('Preview fetch returned', res.status, pageUrl);
        return undefined;
      }

      const dom = new JSDOM(await res.text());
      try {
        const doc = dom.window.document;
        for (const selector of PREVIEW_IMAGE_SELECTORS) {
          const content = doc.querySelector(selector)?.getAttribute('content')?.trim();
          if (content) {
            return new URL(content, pageUrl).href;
          }
        }
        return undefined;
      } finally {
        dom.window.close();
      }
    } catch (err) {
      this.logger.debug('Preview image lookup failed', pageUrl, describeError(err));
      return undefined;
    }
  }

  /**
   * Cover by ISBN when the text carries one, otherwise by title search.
   */
  async findBookCover(title: string, content: string, signal?: AbortSignal): Promise<string | undefined> {
    const isbn = extractIsbn(`${title}\n${content}`);
    if (isbn) {
      return this.coverByIsbn(isbn, signal);
    }
    if (title.trim()) {
      return this.coverByTitle(title.trim(), signal);
    }
    return undefined;
  }

  private async coverByIsbn(isbn: string, signal?: AbortSignal): Promise<string | undefined> {
    const coverUrl = `https://covers.openlibrary.org/b/isbn/${isbn}-L.jpg`;
    try {
      // default=false makes a missing cover a 404 instead of a blank image
      const res = await fetch(`${coverUrl}?default=false`, {
        method: 'HEAD',
        headers: { 'User-Agent': this.options.userAgent },
        signal: this.lookupSignal(signal),
      });
      return res.ok ? coverUrl : undefined;
    } catch (err) {
      this.logger.debug('Cover lookup by ISBN failed', isbn, describeError(err));
      return undefined;
    }
  }

  private async coverByTitle(title: string, signal?: AbortSignal): Promise<string | undefined> {
    const searchUrl = `https://openlibrary.org/search.json?title=${encodeURIComponent(title)}&limit=1`;
    try {
      const res = await fetch(searchUrl, {
        headers: { 'User-Agent': this.options.userAgent },
        signal: this.lookupSignal(signal),
      });
      if (!res.ok) return undefined;

      const parsed = openLibrarySearch.safeParse(await res.json());
      const coverId = parsed.success ? parsed.data.docs[0]?.cover_i : undefined;
      return coverId && coverId > 0 ? `https://covers.openlibrary.org/b/id/${coverId}-L.jpg` : undefined;
    } catch (err) {
      this.logger.debug('Cover lookup by title failed', title, describeError(err));
      return undefined;
    }
  }

  private lookupSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

export function matchesKeywords(title: string, content: string, keywords: readonly string[]): boolean {
  const lowerTitle = title.toLowerCase();
  const lowerContent = content.toLowerCase();
  return keywords.some((k) => lowerTitle.includes(k) || lowerContent.includes(k));
}

/**
 * Extract an ISBN-13, ISBN-10 or bare 13-digit number, separators removed
 */
export function extractIsbn(text: string): string | undefined {
  for (const pattern of ISBN_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[1].replace(/[-\s]/g, '');
    }
  }
  return undefined;
}

/**
 * Extract a YouTube or Vimeo video id from a URL
 */
export function extractVideo(url: string): VideoRef | null {
  const youtube = url.match(
    /(?:youtube\.com\/(?:watch\?(?:[^#]*&)?v=|embed\/|shorts\/|v\/)|youtu\.be\/)([a-zA-Z0-9_-]{11})/,
  );
  if (youtube) {
    return { platform: 'youtube', id: youtube[1] };
  }

  const vimeo = url.match(/vimeo\.com\/(?:video\/)?(\d+)/);
  if (vimeo) {
    return { platform: 'vimeo', id: vimeo[1] };
  }

  return null;
}

export function videoEmbed(video: VideoRef): { embedHtml: string; imageUrl: string } {
  if (video.platform === 'youtube') {
    return {
      embedHtml: `<iframe width="560" height="315" src="https://www.youtube.com/embed/${video.id}" frameborder="0" allow="accelerometer; autoplay; clipboard-write; encrypted-media; gyroscope; picture-in-picture" allowfullscreen></iframe>`,
      imageUrl: `https://img.youtube.com/vi/${video.id}/maxresdefault.jpg`,
    };
  }
  return {
    embedHtml: `<iframe src="https://player.vimeo.com/video/${video.id}" width="640" height="360" frameborder="0" allow="autoplay; fullscreen; picture-in-picture" allowfullscreen></iframe>`,
    imageUrl: `https://vumbnail.com/${video.id}.jpg`,
  };
}

export function previewHtml(imageUrl: string): string {
  return `<div class="url-preview"><img src="${escapeAttribute(imageUrl)}" alt="Preview" style="max-width: 100%; border-radius: 8px;" /></div>`;
}

export function imageSearchUrl(term: string, title: string): string {
  const words = title.trim().split(/\s+/).filter(Boolean).map(encodeURIComponent);
  const query = [encodeURIComponent(term), ...(words.length ? [words.join('+')] : [])].join(',');
  return `https://source.unsplash.com/400x300/?${query}`;
}
