import { describe, expect, it, vi } from 'vitest';
import {
  MetadataResolver,
  extractIsbn,
  extractVideo,
  imageSearchUrl,
  matchesKeywords,
  previewHtml,
} from '../../src/kb/metadata.js';
import { jsonResponse } from '../helpers.js';

function makeResolver() {
  return new MetadataResolver({ timeoutMs: 1000, userAgent: 'TestAgent/1.0' });
}

function htmlResponse(html: string): Response {
  return new Response(html, { status: 200, headers: { 'Content-Type': 'text/html' } });
}

// ──────────────────────────────────────────────────────────────────────────────
// resolve
// ──────────────────────────────────────────────────────────────────────────────
describe('MetadataResolver.resolve', () => {
  it('prefers a caller-supplied image over everything else', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({
      title: 'A book about recipes',
      content: 'ingredients',
      sourceUrl: 'https://youtu.be/dQw4w9WgXcQ',
      metadata: { thumbnail: 'https://img.example/t.jpg' },
    });

    expect(result).toEqual({ imageUrl: 'https://img.example/t.jpg' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('embeds YouTube videos without a network call', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({
      title: 'Talk',
      content: 'A talk',
      sourceUrl: 'https://www.youtube.com/watch?v=dQw4w9WgXcQ',
    });

    expect(result.imageUrl).toBe('https://img.youtube.com/vi/dQw4w9WgXcQ/maxresdefault.jpg');
    expect(result.embedHtml).toContain('src="https://www.youtube.com/embed/dQw4w9WgXcQ"');
    expect(result.inferredType).toBe('video');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('does not infer a type when the caller set one', async () => {
    const result = await makeResolver().resolve({
      title: 'Talk',
      content: 'A talk',
      type: 'note',
      sourceUrl: 'https://vimeo.com/76979871',
    });

    expect(result.imageUrl).toBe('https://vumbnail.com/76979871.jpg');
    expect(result.inferredType).toBeUndefined();
  });

  it('reads og:image from the page and resolves it against the page URL', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      htmlResponse('<html><head><meta property="og:image" content="/img/cover.png"></head></html>'),
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({
      title: 'Post',
      content: 'Hello',
      sourceUrl: 'https://blog.example/post',
    });

    expect(result).toEqual({
      imageUrl: 'https://blog.example/img/cover.png',
      embedHtml:
        '<div class="url-preview"><img src="https://blog.example/img/cover.png" alt="Preview" style="max-width: 100%; border-radius: 8px;" /></div>',
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://blog.example/post');
    expect(init?.headers).toMatchObject({ 'User-Agent': 'TestAgent/1.0' });
  });

  it('falls back to twitter:image', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () =>
        htmlResponse('<meta name="twitter:image" content="https://cdn.example/card.jpg">'),
      ),
    );

    const result = await makeResolver().resolve({ title: 'Post', content: 'Hello', sourceUrl: 'https://x.example/p' });
    expect(result.imageUrl).toBe('https://cdn.example/card.jpg');
  });

  it('moves on when the page cannot be fetched', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => Promise.reject(new TypeError('fetch failed'))));

    const result = await makeResolver().resolve({
      title: 'Trip notes',
      content: 'Packing list',
      sourceUrl: 'https://travel.example/trip',
      category: 'Travel',
    });

    expect(result).toEqual({ imageUrl: 'https://source.unsplash.com/400x300/?travel,Trip+notes' });
  });

  it('finds a book cover by ISBN', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({
      title: '',
      content: 'Great book by Jane Austen, ISBN 9780141439518',
    });

    expect(result).toEqual({
      imageUrl: 'https://covers.openlibrary.org/b/isbn/9780141439518-L.jpg',
      inferredType: 'book',
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://covers.openlibrary.org/b/isbn/9780141439518-L.jpg?default=false');
    expect(init?.method).toBe('HEAD');
  });

  it('skips the title search when the ISBN has no cover', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({
      title: 'Pride and Prejudice',
      content: 'A novel. ISBN 9780141439518',
      category: 'Books & Reading',
    });

    expect(result).toEqual({ imageUrl: 'https://source.unsplash.com/400x300/?books,Pride+and+Prejudice' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('searches Open Library by title when there is no ISBN', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ docs: [{ cover_i: 12345 }] }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({ title: 'Dune', content: 'Reading list' });

    expect(result).toEqual({ imageUrl: 'https://covers.openlibrary.org/b/id/12345-L.jpg', inferredType: 'book' });
    expect(fetchMock.mock.calls[0][0]).toBe('https://openlibrary.org/search.json?title=Dune&limit=1');
  });

  it('checks the book heuristic before the recipe heuristic', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => jsonResponse({ docs: [{ cover_i: 7 }] })));

    const result = await makeResolver().resolve({ title: 'Cookbook', content: 'A book of recipes' });

    expect(result.inferredType).toBe('book');
    expect(result.imageUrl).toBe('https://covers.openlibrary.org/b/id/7-L.jpg');
  });

  it('synthesises a recipe image', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeResolver().resolve({ title: 'Pasta Carbonara', content: '2 cups flour' });

    expect(result).toEqual({
      imageUrl: 'https://source.unsplash.com/400x300/?recipe,Pasta+Carbonara',
      inferredType: 'recipe',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('uses an abstract image for unknown categories', async () => {
    const result = await makeResolver().resolve({ title: '', content: 'hello world' });
    expect(result).toEqual({ imageUrl: 'https://source.unsplash.com/400x300/?abstract' });
  });
});

// ──────────────────────────────────────────────────────────────────────────────
// helpers
// ──────────────────────────────────────────────────────────────────────────────
describe('extractVideo', () => {
  it.each([
    ['https://www.youtube.com/watch?v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/watch?feature=share&v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://youtu.be/dQw4w9WgXcQ?t=42', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/embed/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://youtube.com/shorts/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
  ])('reads the YouTube id from %s', (url, id) => {
    expect(extractVideo(url)).toEqual({ platform: 'youtube', id });
  });

  it('reads Vimeo ids', () => {
    expect(extractVideo('https://vimeo.com/76979871')).toEqual({ platform: 'vimeo', id: '76979871' });
  });

  it('returns null for other URLs', () => {
    expect(extractVideo('https://example.com/watch?v=1')).toBeNull();
  });
});

describe('extractIsbn', () => {
  it('reads ISBN-13 with separators', () => {
    expect(extractIsbn('ISBN 978-0-14-143951-8')).toBe('9780141439518');
  });

  it('reads ISBN-10', () => {
    expect(extractIsbn('ISBN-10: 0-14-143951-3')).toBe('0141439513');
  });

  it('reads a bare 13-digit number', () => {
    expect(extractIsbn('code 9780141439518 here')).toBe('9780141439518');
  });

  it('returns undefined without an ISBN', () => {
    expect(extractIsbn('no numbers here')).toBeUndefined();
  });
});

describe('matchesKeywords', () => {
  it('matches substrings of title or content case-insensitively', () => {
    expect(matchesKeywords('NOVEL ideas', '', ['novel'])).toBe(true);
    expect(matchesKeywords('', 'Prep Time: 5 min', ['prep time'])).toBe(true);
    expect(matchesKeywords('Trip', 'Packing', ['book'])).toBe(false);
  });
});

describe('previewHtml', () => {
  it('escapes the image URL for the attribute', () => {
    expect(previewHtml('https://x.example/a.jpg?w=1&h="2"')).toBe(
      '<div class="url-preview"><img src="https://x.example/a.jpg?w=1&amp;h=&quot;2&quot;" alt="Preview" style="max-width: 100%; border-radius: 8px;" /></div>',
    );
  });
});

describe('imageSearchUrl', () => {
  it('joins title words with plus signs', () => {
    expect(imageSearchUrl('food', '  Green   curry ')).toBe('https://source.unsplash.com/400x300/?food,Green+curry');
  });
});
