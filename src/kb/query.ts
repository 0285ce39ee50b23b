/**
 * Natural-language query parsing into structured search filters
 *
 * Pattern rules only. Every rule removes what it recognises from the text,
 * and parsing repeats until the residual stops changing, so the residual of a
 * parse never contains anything a further parse would extract.
 */

import { isContentType, type ContentType, type QueryFilters } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface DateRange {
  dateFrom?: Date;
  dateTo?: Date;
}

interface Accumulator extends DateRange {
  tags: Set<string>;
  type?: ContentType;
  author?: string;
  priceMin?: number;
  priceMax?: number;
}

type Rule = (text: string, acc: Accumulator, now: Date) => string;

// Every pattern starts with (^|\s) and ends at whitespace or end of text;
// the leading whitespace is put back so neighbouring tokens stay apart.

const TAG = /(^|\s)tags?:(?:"([^"]*)"|(\S+))/gi;
const HASHTAG = /(^|\s)#([\p{L}\p{N}][\p{L}\p{N}_-]*)(?=\s|$)/gu;
const TYPE = /(^|\s)type:(\S+)/gi;
const AUTHOR = /(^|\s)author:(?:"([^"]*)"|(\S+))/gi;
const BY_AUTHOR = /(^|\s)[Bb]y\s+(\p{Lu}[\p{L}'.-]*(?:\s+\p{Lu}[\p{L}'.-]*)*)(?=\s|$)/gu;

const AMOUNT = String.raw`(\d[\d,]*(?:\.\d+)?)`;
const PRICE_BETWEEN = new RegExp(
  String.raw`(^|\s)(?:between|from)\s+\$${AMOUNT}\s+(?:and|to|-)\s+\$?${AMOUNT}(?=\s|$)`,
  'gi',
);
const PRICE_RANGE = new RegExp(String.raw`(^|\s)\$${AMOUNT}\s*-\s*\$?${AMOUNT}(?=\s|$)`, 'g');
const PRICE_MAX = new RegExp(
  String.raw`(^|\s)(?:under|below|less\s+than|cheaper\s+than|up\s+to)\s+\$${AMOUNT}(?=\s|$)`,
  'gi',
);
const PRICE_MIN = new RegExp(String.raw`(^|\s)(?:over|above|more\s+than|at\s+least)\s+\$${AMOUNT}(?=\s|$)`, 'gi');

const LEAD_IN = String.raw`(?:(?:from|in|during|within|since)\s+)?(?:the\s+)?`;
const DATE_RELATIVE = new RegExp(
  String.raw`(^|\s)${LEAD_IN}(?:last|past)\s+(\d+)\s+(day|week|month|year)s?(?=\s|$)`,
  'gi',
);
const DATE_NAMED = new RegExp(String.raw`(^|\s)${LEAD_IN}(today|yesterday)(?=\s|$)`, 'gi');
const DATE_PERIOD = new RegExp(String.raw`(^|\s)${LEAD_IN}(this|last|past)\s+(week|month|year)(?=\s|$)`, 'gi');
const DATE_ABSOLUTE = /(^|\s)(since|after|before|until|on)\s+(\d{4}-\d{2}-\d{2})(?=\s|$)/gi;
const DATE_YEAR = /(^|\s)(?:in|during|from)\s+((?:19|20)\d{2})(?=\s|$)/gi;

const TYPE_WORDS: Array<[RegExp, ContentType]> = [
  [/\bvideos?\b/i, 'video'],
  [/\bbooks?\b/i, 'book'],
  [/\brecipes?\b/i, 'recipe'],
  [/\b(?:images?|photos?|pictures?)\b/i, 'image'],
  [/\bnotes?\b/i, 'note'],
  [/\b(?:blogs?|articles?)\b/i, 'blog'],
  [/\bproducts?\b/i, 'amazon'],
  [/\b(?:links?|urls?)\b/i, 'url'],
];

const RULES: Rule[] = [
  (text, acc) =>
    text.replace(TAG, (_m, lead: string, quoted?: string, bare?: string) => {
      for (const tag of (quoted ?? bare ?? '').split(',')) {
        const clean = tag.trim().toLowerCase();
        if (clean) acc.tags.add(clean);
      }
      return lead;
    }),

  (text, acc) =>
    text.replace(HASHTAG, (_m, lead: string, tag: string) => {
      acc.tags.add(tag.toLowerCase());
      return lead;
    }),

  (text, acc) =>
    text.replace(TYPE, (_m, lead: string, value: string) => {
      const type = value.toLowerCase();
      if (isContentType(type)) acc.type = type;
      return lead;
    }),

  (text, acc) =>
    text.replace(AUTHOR, (_m, lead: string, quoted?: string, bare?: string) => {
      const author = (quoted ?? bare ?? '').trim();
      if (author) acc.author = author;
      return lead;
    }),

  (text, acc) =>
    text.replace(BY_AUTHOR, (_m, lead: string, author: string) => {
      acc.author = author;
      return lead;
    }),

  (text, acc) =>
    text.replace(PRICE_BETWEEN, (_m, lead: string, a: string, b: string) => {
      setPriceRange(acc, parseAmount(a), parseAmount(b));
      return lead;
    }),

  (text, acc) =>
    text.replace(PRICE_RANGE, (_m, lead: string, a: string, b: string) => {
      setPriceRange(acc, parseAmount(a), parseAmount(b));
      return lead;
    }),

  (text, acc) =>
    text.replace(PRICE_MAX, (_m, lead: string, amount: string) => {
      acc.priceMax = parseAmount(amount);
      return lead;
    }),

  (text, acc) =>
    text.replace(PRICE_MIN, (_m, lead: string, amount: string) => {
      acc.priceMin = parseAmount(amount);
      return lead;
    }),

  (text, acc, now) =>
    text.replace(DATE_RELATIVE, (match, lead: string, count: string, unit: string) => {
      const n = Number(count);
      const today = startOfDay(now);
      const unitLower = unit.toLowerCase();
      const from =
        unitLower === 'day'
          ? addDays(today, -n)
          : unitLower === 'week'
            ? addDays(today, -7 * n)
            : unitLower === 'month'
              ? addMonths(today, -n)
              : addMonths(today, -12 * n);
      // Spans past the representable date range stay in the text
      if (Number.isNaN(from.getTime())) return match;
      Object.assign(acc, { dateFrom: from, dateTo: undefined });
      return lead;
    }),

  (text, acc, now) =>
    text.replace(DATE_NAMED, (_m, lead: string, day: string) => {
      const start = day.toLowerCase() === 'today' ? startOfDay(now) : addDays(startOfDay(now), -1);
      Object.assign(acc, { dateFrom: start, dateTo: endOfDay(start) });
      return lead;
    }),

  (text, acc, now) =>
    text.replace(DATE_PERIOD, (_m, lead: string, which: string, unit: string) => {
      Object.assign(acc, periodRange(which.toLowerCase(), unit.toLowerCase(), now));
      return lead;
    }),

  (text, acc) =>
    text.replace(DATE_ABSOLUTE, (match, lead: string, op: string, iso: string) => {
      const day = parseIsoDay(iso);
      if (!day) return match;

      switch (op.toLowerCase()) {
        case 'since':
          acc.dateFrom = day;
          break;
        case 'after':
          acc.dateFrom = addDays(day, 1);
          break;
        case 'before':
          acc.dateTo = new Date(day.getTime() - 1);
          break;
        case 'until':
          acc.dateTo = endOfDay(day);
          break;
        default:
          acc.dateFrom = day;
          acc.dateTo = endOfDay(day);
      }
      return lead;
    }),

  (text, acc) =>
    text.replace(DATE_YEAR, (_m, lead: string, year: string) => {
      const y = Number(year);
      Object.assign(acc, {
        dateFrom: new Date(Date.UTC(y, 0, 1)),
        dateTo: new Date(Date.UTC(y + 1, 0, 1) - 1),
      });
      return lead;
    }),
];

/**
 * Parse a free-text query into filters plus the residual search terms.
 * Dates are computed in UTC relative to `now`.
 */
export function parseQuery(raw: string, now: Date = new Date()): QueryFilters {
  const acc: Accumulator = { tags: new Set() };

  let text = collapse(raw);
  // Each pass either removes text or leaves it untouched, so this terminates
  for (;;) {
    const next = collapse(RULES.reduce((current, rule) => rule(current, acc, now), text));
    if (next === text) break;
    text = next;
  }

  if (!acc.type) {
    acc.type = TYPE_WORDS.find(([pattern]) => pattern.test(text))?.[1];
  }

  return {
    searchTerms: text,
    type: acc.type,
    dateFrom: acc.dateFrom,
    dateTo: acc.dateTo,
    tags: [...acc.tags],
    author: acc.author,
    priceMin: acc.priceMin,
    priceMax: acc.priceMax,
  };
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function parseAmount(amount: string): number {
  return Number(amount.replace(/,/g, ''));
}

function setPriceRange(acc: Accumulator, a: number, b: number): void {
  acc.priceMin = Math.min(a, b);
  acc.priceMax = Math.max(a, b);
}

function periodRange(which: string, unit: string, now: Date): DateRange {
  const today = startOfDay(now);

  if (which === 'past') {
    const from = unit === 'week' ? addDays(today, -7) : addMonths(today, unit === 'month' ? -1 : -12);
    return { dateFrom: from, dateTo: undefined };
  }

  const start =
    unit === 'week'
      ? startOfWeek(now)
      : unit === 'month'
        ? new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1))
        : new Date(Date.UTC(now.getUTCFullYear(), 0, 1));

  if (which === 'this') {
    return { dateFrom: start, dateTo: undefined };
  }

  const previous = unit === 'week' ? addDays(start, -7) : addMonths(start, unit === 'month' ? -1 : -12);
  return { dateFrom: previous, dateTo: new Date(start.getTime() - 1) };
}

function parseIsoDay(iso: string): Date | undefined {
  const day = new Date(`${iso}T00:00:00.000Z`);
  if (Number.isNaN(day.getTime()) || !day.toISOString().startsWith(iso)) return undefined;
  return day;
}

function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function endOfDay(date: Date): Date {
  return new Date(startOfDay(date).getTime() + DAY_MS - 1);
}

/** Monday 00:00 UTC of the week containing `date` */
function startOfWeek(date: Date): Date {
  const daysSinceMonday = (date.getUTCDay() + 6) % 7;
  return addDays(startOfDay(date), -daysSinceMonday);
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function addMonths(date: Date, months: number): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, date.getUTCDate()));
}
