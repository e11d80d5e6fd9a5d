/**
 * One method per retrieval action against the market data API.
 *
 * Endpoints:
 *   GET /markets/         filtered list (category, active, volume_gt/lt,
 *                         liquidity_gt/lt, sortBy, sortOrder, limit; any other
 *                         key is an equality filter, which is how slug lookup works)
 *   GET /stats/market     aggregate stats document
 *   GET /stats/category   per-category stats list (optional ?category=)
 *
 * Every failure (timeout, non-2xx, network, unexpected payload) surfaces as a
 * RetrievalFailure. One request per call: no caching, no retries.
 */
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { ApiConfig } from '../config';
import { RetrievalFailure, errorMessage } from '../errors';
import { CategoryStats, FilterParams, Market, MarketStats } from '../types';
import { isRecord, parseCategoryStats, parseMarketStats, parseMarkets } from './normalize';

export type MarketFilter = Omit<FilterParams, 'limit'> & { limit: number };

export interface MarketDataSource {
  fetchMarkets(filter: MarketFilter): Promise<Market[]>;
  fetchMarketStats(): Promise<MarketStats>;
  fetchCategoryStats(category?: string): Promise<CategoryStats[]>;
  fetchMarket(slug: string): Promise<Market | null>;
}

type QueryParams = Record<string, string | number>;

export const ENDPOINTS = {
  markets:       '/markets/',
  marketStats:   '/stats/market',
  categoryStats: '/stats/category',
} as const;

// ── Internal filter names → API query contract ───────────────
export function toQueryParams(filter: MarketFilter): QueryParams {
  const params: QueryParams = { limit: filter.limit };
  if (filter.category)                     params.category     = filter.category;
  if (filter.active !== undefined)         params.active       = String(filter.active);
  if (filter.min_volume !== undefined)     params.volume_gt    = filter.min_volume;
  if (filter.max_volume !== undefined)     params.volume_lt    = filter.max_volume;
  if (filter.min_liquidity !== undefined)  params.liquidity_gt = filter.min_liquidity;
  if (filter.max_liquidity !== undefined)  params.liquidity_lt = filter.max_liquidity;
  if (filter.sort_by)                      params.sortBy       = `pricing.${filter.sort_by}`;
  if (filter.sort_order)                   params.sortOrder    = filter.sort_order;
  return params;
}

// ── Transport errors → RetrievalFailure ──────────────────────
export function toRetrievalFailure(endpoint: string, err: unknown, timeoutMs: number): RetrievalFailure {
  if (err instanceof RetrievalFailure) return err;
  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new RetrievalFailure(endpoint, `timed out after ${timeoutMs}ms`);
    }
    if (err.response) {
      return new RetrievalFailure(endpoint, `HTTP ${err.response.status}`);
    }
    return new RetrievalFailure(endpoint, err.code ? `${err.code} ${err.message}` : err.message);
  }
  return new RetrievalFailure(endpoint, errorMessage(err));
}

function listPayload(endpoint: string, data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (isRecord(data)) {
    const inner = data.data ?? data.markets;
    if (Array.isArray(inner)) return inner;
  }
  throw new RetrievalFailure(endpoint, 'malformed payload (expected a list)');
}

export class MarketApiClient implements MarketDataSource {
  private readonly http: AxiosInstance;

  constructor(private readonly config: ApiConfig, adapter?: AxiosAdapter) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: config.apiKey ? { 'X-API-KEY': config.apiKey } : {},
      ...(adapter ? { adapter } : {}),
    });
  }

  private async get(endpoint: string, params?: QueryParams): Promise<unknown> {
    try {
      const res = await this.http.get<unknown>(endpoint, { params });
      return res.data;
    } catch (err: unknown) {
      throw toRetrievalFailure(endpoint, err, this.config.timeoutMs);
    }
  }

  // ── Filtered market list ─────────────────────────────────────
  async fetchMarkets(filter: MarketFilter): Promise<Market[]> {
    const data    = await this.get(ENDPOINTS.markets, toQueryParams(filter));
    const markets = parseMarkets(listPayload(ENDPOINTS.markets, data));
    console.log(`📡 Fetched ${markets.length} market(s)${filter.category ? ` in "${filter.category}"` : ''}`);
    return markets;
  }

  // ── Aggregate stats ──────────────────────────────────────────
  async fetchMarketStats(): Promise<MarketStats> {
    const data = await this.get(ENDPOINTS.marketStats);
    if (!isRecord(data)) {
      throw new RetrievalFailure(ENDPOINTS.marketStats, 'malformed payload (expected an object)');
    }
    if (Object.keys(data).length === 0) {
      throw new RetrievalFailure(ENDPOINTS.marketStats, 'no stats available yet');
    }
    return parseMarketStats(data);
  }

  async fetchCategoryStats(category?: string): Promise<CategoryStats[]> {
    const data = await this.get(ENDPOINTS.categoryStats, category ? { category } : undefined);
    const rows: CategoryStats[] = [];
    for (const item of listPayload(ENDPOINTS.categoryStats, data)) {
      const row = parseCategoryStats(item);
      if (row) rows.push(row);
    }
    return rows;
  }

  // ── One market by slug (zero or one) ─────────────────────────
  async fetchMarket(slug: string): Promise<Market | null> {
    const data    = await this.get(ENDPOINTS.markets, { slug, limit: 1 });
    const markets = parseMarkets(listPayload(ENDPOINTS.markets, data));
    return markets.find(m => m.slug === slug) ?? null;
  }
}
