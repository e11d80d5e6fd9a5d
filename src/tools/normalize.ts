/**
 * Normalizes raw retrieval-API payloads into Market / stats records.
 *
 * Market field reference (retrieval API /markets/):
 *   slug, question, category, active, closed, endDate,
 *   tags ([{ name }] or [string]),
 *   pricing { volume, liquidity, outcomeYesPrice, outcomeNoPrice, spread }
 * Flat volumeNum / liquidityNum are accepted as fallbacks.
 */
import { CategoryStats, Market, MarketStats } from '../types';

type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(...values: unknown[]): number {
  for (const v of values) {
    const n = typeof v === 'string' ? Number(v) : v;
    if (typeof n === 'number' && Number.isFinite(n)) return n;
  }
  return 0;
}

function str(...values: unknown[]): string {
  for (const v of values) {
    if (typeof v === 'string' && v.trim()) return v.trim();
  }
  return '';
}

function parseTags(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const tags: string[] = [];
  for (const t of raw) {
    const name = isRecord(t) ? str(t.name, t.label, t.slug) : str(t);
    if (name && !tags.includes(name)) tags.push(name);
  }
  return tags;
}

// ── Parse a raw market object ────────────────────────────────
export function parseMarket(raw: unknown): Market | null {
  if (!isRecord(raw)) return null;
  const slug = str(raw.slug);
  if (!slug) return null;

  const pricing: RawRecord = isRecord(raw.pricing) ? raw.pricing : {};
  const endDate = str(raw.endDate, raw.endDateIso, raw.end_date);

  return {
    slug,
    question:  str(raw.question, raw.title) || slug,
    category:  str(raw.category),
    tags:      parseTags(raw.tags),
    volume:    Math.max(0, num(pricing.volume,    raw.volumeNum,    raw.volume)),
    liquidity: Math.max(0, num(pricing.liquidity, raw.liquidityNum, raw.liquidity)),
    active:    raw.active === true || raw.active === 'true',
    closed:    raw.closed === true || raw.closed === 'true',
    ...(endDate ? { end_date: endDate } : {}),
    pricing: {
      yes_price: num(pricing.outcomeYesPrice, raw.outcomeYesPrice),
      no_price:  num(pricing.outcomeNoPrice,  raw.outcomeNoPrice),
      spread:    num(pricing.spread,          raw.spread),
    },
  };
}

// Drops records without a slug; a repeated slug keeps its first record
export function parseMarkets(raw: unknown[]): Market[] {
  const seen    = new Set<string>();
  const markets: Market[] = [];
  for (const item of raw) {
    const market = parseMarket(item);
    if (!market || seen.has(market.slug)) continue;
    seen.add(market.slug);
    markets.push(market);
  }
  return markets;
}

// ── Stats ────────────────────────────────────────────────────
export function parseMarketStats(raw: RawRecord): MarketStats {
  const lastUpdated = str(raw.lastUpdated, raw.last_updated);
  return {
    total_markets:   num(raw.totalMarkets,   raw.total_markets),
    active_markets:  num(raw.activeMarkets,  raw.active_markets),
    total_volume:    num(raw.totalVolume,    raw.total_volume),
    total_liquidity: num(raw.totalLiquidity, raw.total_liquidity),
    ...(lastUpdated ? { last_updated: lastUpdated } : {}),
  };
}

export function parseCategoryStats(raw: unknown): CategoryStats | null {
  if (!isRecord(raw)) return null;
  const category = str(raw.category, raw.name, raw._id);
  if (!category) return null;
  return {
    category,
    market_count:    num(raw.marketCount, raw.totalMarkets, raw.count),
    total_volume:    num(raw.totalVolume,    raw.volume),
    total_liquidity: num(raw.totalLiquidity, raw.liquidity),
  };
}
