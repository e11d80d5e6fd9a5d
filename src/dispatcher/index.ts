/**
 * Routes a StructuredCommand to its tool or reasoning path and
 * returns reply text.
 *
 *   stats           → market stats / category stats (named categories fetched concurrently)
 *   filter_markets  → filtered market list
 *   analyze_market  → one market + category peers → analysis read-out
 *   recommend       → source market + scoped fetches → graph → one-hop reasoning
 *   unknown         → help text
 *
 * dispatch() never rejects: RetrievalFailure and NotFoundError each get their
 * own reply, anything else is logged and answered with a generic apology.
 */
import { AppConfig } from '../config';
import { NotFoundError, RetrievalFailure, errorMessage } from '../errors';
import { buildGraph, normalizeKey } from '../graph';
import { recommend } from '../reasoning';
import { analyzeMarket, formatAnalysis } from '../analysis';
import { MarketDataSource, MarketFilter } from '../tools';
import {
  AnalyzeParams, CategoryStats, FilterParams, Market, RecommendParams,
  StatsParams, StructuredCommand,
} from '../types';
import {
  UNEXPECTED_ERROR_REPLY, formatCategoryStats, formatMarketList, formatMarketStats,
  formatRecommendations, missingSlugReply, notFoundReply, retrievalFailureReply, unknownReply,
} from '../format';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class Dispatcher {
  constructor(
    private readonly source: MarketDataSource,
    private readonly config: AppConfig,
  ) {}

  async dispatch(command: StructuredCommand): Promise<string> {
    try {
      return await this.route(command);
    } catch (err: unknown) {
      return this.failureReply(command, err);
    }
  }

  private async route(command: StructuredCommand): Promise<string> {
    switch (command.intent) {
      case 'stats':          return this.stats(command.params);
      case 'filter_markets': return this.filterMarkets(command.params);
      case 'analyze_market': return this.analyze(command.params);
      case 'recommend':      return this.recommend(command.params);
      case 'unknown':        return unknownReply(command.params.text);
    }
  }

  private failureReply(command: StructuredCommand, err: unknown): string {
    if (err instanceof RetrievalFailure) {
      console.warn(`⚠️  ${command.intent}: ${err.message}`);
      return retrievalFailureReply(err.endpoint, err.reason);
    }
    if (err instanceof NotFoundError) {
      console.log(`🔎 ${command.intent}: no market "${err.slug}"`);
      return notFoundReply(err.slug);
    }
    console.error(`❌ ${command.intent} failed: ${errorMessage(err)}`);
    return UNEXPECTED_ERROR_REPLY;
  }

  // ── Defaults for absent filter params ────────────────────────
  resolveFilter(params: FilterParams): MarketFilter {
    const { defaultLimit, maxLimit, defaultSortBy } = this.config.query;
    return {
      ...params,
      limit:      clamp(params.limit ?? defaultLimit, 1, maxLimit),
      sort_by:    params.sort_by ?? defaultSortBy,
      sort_order: params.sort_order ?? 'desc',
    };
  }

  // ── stats ────────────────────────────────────────────────────
  private async stats(params: StatsParams): Promise<string> {
    if (params.scope === 'market') {
      return formatMarketStats(await this.source.fetchMarketStats());
    }

    const requested = params.categories ?? [];
    if (requested.length === 0) {
      return formatCategoryStats(await this.source.fetchCategoryStats());
    }

    const batches = await Promise.all(requested.map(c => this.source.fetchCategoryStats(c)));
    const wanted  = new Set(requested.map(normalizeKey));
    const rows    = new Map<string, CategoryStats>();
    for (const row of batches.flat()) {
      const key = normalizeKey(row.category);
      if (wanted.has(key) && !rows.has(key)) rows.set(key, row);
    }
    const missing = requested.filter(c => !rows.has(normalizeKey(c)));
    return formatCategoryStats([...rows.values()], missing);
  }

  // ── filter_markets ───────────────────────────────────────────
  private async filterMarkets(params: FilterParams): Promise<string> {
    const filter  = this.resolveFilter(params);
    const markets = await this.source.fetchMarkets(filter);
    return formatMarketList(markets.slice(0, filter.limit), filter);
  }

  private async requireMarket(slug: string): Promise<Market> {
    const market = await this.source.fetchMarket(slug);
    if (!market) throw new NotFoundError(slug);
    return market;
  }

  // ── analyze_market ───────────────────────────────────────────
  private async analyze(params: AnalyzeParams): Promise<string> {
    if (!params.market_slug) return missingSlugReply('analyze');

    const market = await this.requireMarket(params.market_slug);
    const peers  = market.category
      ? await this.source.fetchMarkets({ category: market.category, limit: this.config.recommend.scopeLimit })
      : [];

    const graph   = buildGraph([market, ...peers]);
    const similar = recommend(graph, market.slug, 3, this.config.recommend.weights).items;
    return formatAnalysis(analyzeMarket(market, [...graph.nodes.values()], similar));
  }

  // ── recommend ────────────────────────────────────────────────
  scopesFor(market: Market): string[] {
    const scopes: string[] = [];
    const add = (value: string) => {
      const key = normalizeKey(value);
      if (key && !scopes.some(s => normalizeKey(s) === key)) scopes.push(value.trim());
    };
    add(market.category);
    market.tags.slice(0, this.config.recommend.tagScopes).forEach(add);
    return scopes;
  }

  private async recommend(params: RecommendParams): Promise<string> {
    if (!params.market_slug) return missingSlugReply('recommendations for');

    const { scopeLimit, defaultLimit, weights } = this.config.recommend;
    const source  = await this.requireMarket(params.market_slug);
    const batches = await Promise.all(
      this.scopesFor(source).map(scope => this.source.fetchMarkets({ category: scope, limit: scopeLimit })),
    );

    const graph = buildGraph([source, ...batches.flat()]);
    console.log(`🕸️  Graph for ${source.slug}: ${graph.nodes.size} node(s), ${graph.edges.length} edge(s)`);

    const limit  = clamp(params.limit ?? defaultLimit, 1, this.config.query.maxLimit);
    const result = recommend(graph, source.slug, limit, weights);
    return formatRecommendations(result);
  }
}
