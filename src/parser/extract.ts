/**
 * Parameter extractors. Each takes the normalized (lower-cased, single-spaced)
 * query text and returns only the parameters it actually found.
 */
import { parseAmount, parseCount } from './amount';
import { FilterParams, SortField, StatsParams } from '../types';

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'all', 'any', 'some', 'my', 'these', 'those', 'other', 'which', 'what',
  'me', 'show', 'list', 'find', 'get', 'search', 'give', 'top', 'first',
  'active', 'inactive', 'closed', 'resolved', 'open', 'live',
  'related', 'similar', 'more', 'most', 'best', 'biggest', 'largest', 'new', 'hot', 'trending',
  'liquid', 'many', 'few', 'prediction', 'and', 'or', 'of', 'in', 'for', 'on', 'by',
  'category', 'categories', 'market', 'markets', 'each', 'every', 'per',
  'volume', 'volumes', 'liquidity', 'highest', 'lowest', 'least', 'smallest',
]);

type ThresholdKey = 'min_volume' | 'max_volume' | 'min_liquidity' | 'max_liquidity';

const THRESHOLDS: Array<[ThresholdKey, SortField, 'min' | 'max']> = [
  ['min_volume',    'volume',    'min'],
  ['max_volume',    'volume',    'max'],
  ['min_liquidity', 'liquidity', 'min'],
  ['max_liquidity', 'liquidity', 'max'],
];

const OVER  = '(?:over|above|greater than|more than|>=?|at least)';
const UNDER = '(?:under|below|less than|<=?|at most)';

// ── Category ─────────────────────────────────────────────────
const CATEGORY_PATTERNS: RegExp[] = [
  /\bcategory[:\s]+([a-z][\w-]*)/g,
  /\b(?:in|for|about|on) (?:the )?([a-z][\w-]*) (?:category|markets?)\b/g,
  /\b([a-z][\w-]*) markets?\b/g,
];

export function extractCategory(text: string): string | undefined {
  for (const pattern of CATEGORY_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const word = match[1]?.replace(/-(?:related|themed)$/, '');
      if (word && !STOP_WORDS.has(word)) return word;
    }
  }
  return undefined;
}

// ── Volume / liquidity thresholds ────────────────────────────
function threshold(text: string, metric: SortField, direction: 'min' | 'max'): number | undefined {
  const op = direction === 'min' ? OVER : UNDER;
  const word = direction === 'min' ? 'min(?:imum)?' : 'max(?:imum)?';
  const patterns = [
    new RegExp(`\\b${metric}\\s+(?:of\\s+|is\\s+)?${op}\\s*(\\S+)`),
    new RegExp(`\\b${word}\\s+${metric}\\s+(?:of\\s+)?(\\S+)`),
    new RegExp(`\\b${op}\\s+(\\S+)\\s+(?:in\\s+|of\\s+)?${metric}\\b`),
  ];
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (!match) continue;
    const amount = parseAmount(match[1]);
    if (amount !== undefined) return amount;
  }
  return undefined;
}

// ── Sorting ──────────────────────────────────────────────────
function extractSort(text: string): Pick<FilterParams, 'sort_by' | 'sort_order'> {
  const out: Pick<FilterParams, 'sort_by' | 'sort_order'> = {};

  const match =
    /\b(?:sorted |ordered |sort |order )?by (volume|liquidity)\b/.exec(text) ??
    /\b(?:highest|most|biggest|largest|top|lowest|least|smallest) (volume|liquidity)\b/.exec(text) ??
    /\b(volume|liquidity) markets?\b/.exec(text);
  const field = match?.[1];
  if (field === 'volume' || field === 'liquidity') {
    out.sort_by = field;
  } else if (/\bmost liquid\b/.test(text)) {
    out.sort_by = 'liquidity';
  }

  // "at least" is a threshold, not a sort direction
  if (/\b(?:lowest|smallest|ascending)\b|(?<!\bat )\bleast\b/.test(text)) out.sort_order = 'asc';
  else if (/\bdescending\b/.test(text)) out.sort_order = 'desc';

  return out;
}

// ── Limit ────────────────────────────────────────────────────
export function extractLimit(text: string): number | undefined {
  const match =
    /\b(?:top|first|show me|get|find|list)\s+(\d+)\b/.exec(text) ??
    /\b(\d{1,3})\s+(?:[a-z][\w-]*\s+)?markets?\b/.exec(text);
  return match ? parseCount(match[1]) : undefined;
}

export function extractFilter(text: string): FilterParams {
  const params: FilterParams = {};

  const category = extractCategory(text);
  if (category) params.category = category;

  if (/\b(?:inactive|closed|resolved)\b/.test(text)) params.active = false;
  else if (/\b(?:active|live)\b/.test(text))         params.active = true;

  for (const [key, metric, direction] of THRESHOLDS) {
    const amount = threshold(text, metric, direction);
    if (amount !== undefined) params[key] = amount;
  }

  Object.assign(params, extractSort(text));

  const limit = extractLimit(text);
  if (limit !== undefined) params.limit = limit;

  return params;
}

// ── Stats scope ──────────────────────────────────────────────
export function extractStats(text: string): StatsParams {
  const match = /\bstat(?:s|istics)\s+(?:for|on|in|of|by|per)\s+(.+)$/.exec(text);
  const names: string[] = [];

  if (match) {
    for (const part of match[1].split(/,|&|\band\b/)) {
      const name = part
        .replace(/[?.!]/g, ' ')
        .split(' ')
        .filter(w => w && !STOP_WORDS.has(w))
        .join(' ');
      if (name && !names.includes(name)) names.push(name);
    }
  }

  if (names.length > 0) return { scope: 'category', categories: names };
  if (/\bcategor(?:y|ies)\b/.test(text)) return { scope: 'category' };
  return { scope: 'market' };
}

// ── Market slug ──────────────────────────────────────────────
const SLUG_FILLER = new Set([
  ...STOP_WORDS,
  'recommend', 'recommends', 'recommendation', 'recommendations', 'to', 'like', 'with',
  'analyze', 'analyse', 'analysis', 'tell', 'about', 'details', 'detail', 'deep', 'dive',
  'deep-dive', 'please', 'is', 'are', 'i', 'you', 'can', 'could', 'would', 'should', 'this',
  'that', 'slug', 'question',
]);

/**
 * The longest hyphenated token left after intent words are removed;
 * failing that, the remaining words joined with hyphens.
 */
export function extractSlug(text: string): string | undefined {
  const tokens = text
    .split(' ')
    .map(t => t.replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, ''))
    .filter(t => t && !SLUG_FILLER.has(t));

  let best = '';
  for (const token of tokens) {
    if (/^[a-z0-9]+(?:-[a-z0-9]+)+$/.test(token) && token.length > best.length) best = token;
  }
  if (best) return best;

  const words = tokens.filter(t => !/^\d+$/.test(t));
  return words.length > 0 ? words.join('-') : undefined;
}
