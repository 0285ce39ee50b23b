import { describe, expect, it } from 'vitest';
import { parseQuery } from '../../src/kb/query.js';

// Monday
const NOW = new Date('2026-10-19T15:30:00.000Z');

// ──────────────────────────────────────────────────────────────────────────────
// tags, type, author
// ──────────────────────────────────────────────────────────────────────────────
describe('parseQuery: tags, type and author', () => {
  it('extracts a tag and keeps the residual terms', () => {
    const filters = parseQuery('pasta recipe tag:dinner', NOW);

    expect(filters.searchTerms).toBe('pasta recipe');
    expect(filters.tags).toEqual(['dinner']);
    expect(filters.type).toBe('recipe');
  });

  it('unions every tag syntax, lower-cased', () => {
    const filters = parseQuery('notes tags:ai,ML #Research tag:"deep learning"', NOW);

    expect(filters.tags).toEqual(['ai', 'ml', 'deep learning', 'research']);
    expect(filters.searchTerms).toBe('notes');
  });

  it('reads an explicit type and drops unknown ones', () => {
    expect(parseQuery('type:video cats', NOW)).toMatchObject({ type: 'video', searchTerms: 'cats' });

    const unknown = parseQuery('type:podcast cats', NOW);
    expect(unknown.type).toBeUndefined();
    expect(unknown.searchTerms).toBe('cats');
  });

  it('infers the type from a bare type word without removing it', () => {
    const filters = parseQuery('funny videos', NOW);

    expect(filters.type).toBe('video');
    expect(filters.searchTerms).toBe('funny videos');
  });

  it('prefers an explicit type over a type word', () => {
    expect(parseQuery('book reviews type:blog', NOW).type).toBe('blog');
  });

  it('extracts "by" followed by capitalised words', () => {
    const filters = parseQuery('novels by Jane Austen', NOW);

    expect(filters.author).toBe('Jane Austen');
    expect(filters.searchTerms).toBe('novels');
    expect(filters.type).toBeUndefined();
  });

  it('extracts a quoted author', () => {
    const filters = parseQuery('author:"Ursula K. Le Guin" essays', NOW);

    expect(filters.author).toBe('Ursula K. Le Guin');
    expect(filters.searchTerms).toBe('essays');
  });

  it('leaves a lower-case "by" phrase alone', () => {
    const filters = parseQuery('sorted by date', NOW);

    expect(filters.author).toBeUndefined();
    expect(filters.searchTerms).toBe('sorted by date');
  });
});

// ──────────────────────────────────────────────────────────────────────────────
// price
// ──────────────────────────────────────────────────────────────────────────────
describe('parseQuery: price', () => {
  it('reads an upper bound', () => {
    expect(parseQuery('headphones under $100', NOW)).toMatchObject({
      searchTerms: 'headphones',
      priceMax: 100,
      priceMin: undefined,
    });
  });

  it('reads a lower bound', () => {
    expect(parseQuery('at least $30 boots', NOW)).toMatchObject({ searchTerms: 'boots', priceMin: 30 });
  });

  it('reads a between range', () => {
    expect(parseQuery('lamp between $20 and $45.50', NOW)).toMatchObject({
      searchTerms: 'lamp',
      priceMin: 20,
      priceMax: 45.5,
    });
  });

  it('orders a dollar range', () => {
    expect(parseQuery('$50-$10 chairs', NOW)).toMatchObject({ searchTerms: 'chairs', priceMin: 10, priceMax: 50 });
  });

  it('accepts thousands separators', () => {
    expect(parseQuery('laptop under $1,000', NOW)).toMatchObject({ searchTerms: 'laptop', priceMax: 1000 });
    expect(parseQuery('between $1,200 and $2,500.50 bikes', NOW)).toMatchObject({
      searchTerms: 'bikes',
      priceMin: 1200,
      priceMax: 2500.5,
    });
  });
});

// ──────────────────────────────────────────────────────────────────────────────
// dates
// ──────────────────────────────────────────────────────────────────────────────
describe('parseQuery: dates', () => {
  it('handles a relative window', () => {
    const filters = parseQuery('ideas from the last 30 days', NOW);

    expect(filters.searchTerms).toBe('ideas');
    expect(filters.dateFrom?.toISOString()).toBe('2026-09-19T00:00:00.000Z');
    expect(filters.dateTo).toBeUndefined();
  });

  it('leaves a window too long to represent in the text', () => {
    const filters = parseQuery('geology from the last 300000 years', NOW);

    expect(filters.searchTerms).toBe('geology from the last 300000 years');
    expect(filters.dateFrom).toBeUndefined();
    expect(filters.dateTo).toBeUndefined();
  });

  it('handles today and yesterday', () => {
    const today = parseQuery('today', NOW);
    expect(today.dateFrom?.toISOString()).toBe('2026-10-19T00:00:00.000Z');
    expect(today.dateTo?.toISOString()).toBe('2026-10-19T23:59:59.999Z');
    expect(today.searchTerms).toBe('');

    const yesterday = parseQuery('yesterday', NOW);
    expect(yesterday.dateFrom?.toISOString()).toBe('2026-10-18T00:00:00.000Z');
    expect(yesterday.dateTo?.toISOString()).toBe('2026-10-18T23:59:59.999Z');
  });

  it('handles calendar periods', () => {
    const thisWeek = parseQuery('this week', NOW);
    expect(thisWeek.dateFrom?.toISOString()).toBe('2026-10-19T00:00:00.000Z');
    expect(thisWeek.dateTo).toBeUndefined();

    const lastWeek = parseQuery('last week', NOW);
    expect(lastWeek.dateFrom?.toISOString()).toBe('2026-10-12T00:00:00.000Z');
    expect(lastWeek.dateTo?.toISOString()).toBe('2026-10-18T23:59:59.999Z');

    const lastMonth = parseQuery('last month', NOW);
    expect(lastMonth.dateFrom?.toISOString()).toBe('2026-09-01T00:00:00.000Z');
    expect(lastMonth.dateTo?.toISOString()).toBe('2026-09-30T23:59:59.999Z');

    const pastMonth = parseQuery('past month', NOW);
    expect(pastMonth.dateFrom?.toISOString()).toBe('2026-09-19T00:00:00.000Z');
    expect(pastMonth.dateTo).toBeUndefined();
  });

  it('handles absolute dates', () => {
    expect(parseQuery('before 2026-03-01', NOW).dateTo?.toISOString()).toBe('2026-02-28T23:59:59.999Z');
    expect(parseQuery('after 2026-03-01', NOW).dateFrom?.toISOString()).toBe('2026-03-02T00:00:00.000Z');

    const on = parseQuery('on 2026-03-01', NOW);
    expect(on.dateFrom?.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(on.dateTo?.toISOString()).toBe('2026-03-01T23:59:59.999Z');
  });

  it('leaves an impossible date in the terms', () => {
    const filters = parseQuery('since 2026-02-30', NOW);

    expect(filters.dateFrom).toBeUndefined();
    expect(filters.searchTerms).toBe('since 2026-02-30');
  });

  it('handles a year', () => {
    const filters = parseQuery('trips in 2024', NOW);

    expect(filters.searchTerms).toBe('trips');
    expect(filters.dateFrom?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(filters.dateTo?.toISOString()).toBe('2024-12-31T23:59:59.999Z');
  });
});

// ──────────────────────────────────────────────────────────────────────────────
// residual
// ──────────────────────────────────────────────────────────────────────────────
describe('parseQuery: residual', () => {
  it('collapses whitespace', () => {
    expect(parseQuery('  cheap   flights  ', NOW).searchTerms).toBe('cheap flights');
  });

  it('returns empty terms for an empty query', () => {
    expect(parseQuery('', NOW)).toMatchObject({ searchTerms: '', tags: [] });
  });

  it('extracts hints uncovered by an earlier extraction', () => {
    const filters = parseQuery('in in 2024 2023', NOW);

    expect(filters.searchTerms).toBe('');
    expect(filters.dateFrom?.toISOString()).toBe('2023-01-01T00:00:00.000Z');
  });

  it.each([
    'pasta recipe tag:dinner',
    'in in 2024 2023',
    'tag:tag:nested things',
    'novels by Jane Austen under $20 last week',
    '#a#b ## plain words',
    'from from the last 3 days',
    'since 2026-02-30 notes',
    'geology from the last 300000 years',
  ])('is idempotent for %j', (query) => {
    const once = parseQuery(query, NOW).searchTerms;
    expect(parseQuery(once, NOW).searchTerms).toBe(once);
  });
});
