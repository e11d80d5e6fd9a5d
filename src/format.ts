/**
 * Reply text builders. Plain text (no HTML) so any transport can carry it.
 */
import { CategoryStats, Market, MarketStats, RecommendationResult, GraphEdge } from './types';
import { MarketFilter } from './tools';

export function formatUsd(value: number): string {
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

export function formatCount(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function formatScore(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(2).replace(/0$/, '');
}

// ── Market list ──────────────────────────────────────────────
export function describeFilter(filter: MarketFilter): string {
  const parts: string[] = [];
  if (filter.category)                     parts.push(`category: ${filter.category}`);
  if (filter.active === true)              parts.push('active only');
  if (filter.active === false)             parts.push('closed only');
  if (filter.min_volume !== undefined)     parts.push(`volume > ${formatUsd(filter.min_volume)}`);
  if (filter.max_volume !== undefined)     parts.push(`volume < ${formatUsd(filter.max_volume)}`);
  if (filter.min_liquidity !== undefined)  parts.push(`liquidity > ${formatUsd(filter.min_liquidity)}`);
  if (filter.max_liquidity !== undefined)  parts.push(`liquidity < ${formatUsd(filter.max_liquidity)}`);
  if (filter.sort_by) parts.push(`by ${filter.sort_by} ${filter.sort_order === 'asc' ? '↑' : '↓'}`);
  return parts.join(', ');
}

export function formatMarketLine(market: Market, index: number): string {
  return [
    `${index + 1}. ${truncate(market.question, 100)} (Volume: ${formatUsd(market.volume)}, Liq: ${formatUsd(market.liquidity)})`,
    `   slug: ${market.slug}`,
  ].join('\n');
}

export function formatMarketList(markets: Market[], filter: MarketFilter): string {
  if (markets.length === 0) return "I couldn't find any markets matching your query.";
  const desc = describeFilter(filter);
  return [
    `📋 Here are the markets I found${desc ? ` (${desc})` : ''}:`,
    ...markets.map(formatMarketLine),
  ].join('\n');
}

// ── Stats ────────────────────────────────────────────────────
export function formatMarketStats(stats: MarketStats): string {
  return [
    '📊 Market stats',
    `• Markets: ${formatCount(stats.total_markets)} (${formatCount(stats.active_markets)} active)`,
    `• Total volume: ${formatUsd(stats.total_volume)}`,
    `• Total liquidity: ${formatUsd(stats.total_liquidity)}`,
    stats.last_updated ? `• Updated: ${stats.last_updated}` : '',
  ].filter(Boolean).join('\n');
}

export function formatCategoryStats(rows: CategoryStats[], missing: string[] = []): string {
  const lines = ['📊 Category stats'];
  if (rows.length === 0) lines.push('No category stats available.');

  const sorted = [...rows].sort((a, b) => b.total_volume - a.total_volume);
  sorted.forEach((r, i) => {
    lines.push(`${i + 1}. ${r.category}: ${formatCount(r.market_count)} markets | Vol ${formatUsd(r.total_volume)} | Liq ${formatUsd(r.total_liquidity)}`);
  });
  if (missing.length > 0) lines.push(`No stats found for: ${missing.join(', ')}`);
  return lines.join('\n');
}

// ── Recommendations ──────────────────────────────────────────
function describeRelation(edge: GraphEdge): string {
  return edge.type === 'same_category' ? `same category "${edge.value}"` : `tag "${edge.value}"`;
}

export function formatRecommendations(result: RecommendationResult): string {
  const { source, items } = result;
  if (items.length === 0) {
    return `I couldn't find any markets related to '${source.slug}'.`;
  }
  return [
    `🔗 Based on category and shared tags, markets related to "${truncate(source.question, 80)}":`,
    ...items.map((r, i) => [
      `${i + 1}. ${truncate(r.market.question, 100)} (score ${formatScore(r.score)}: ${r.relations.map(describeRelation).join(', ')})`,
      `   slug: ${r.market.slug} | Vol: ${formatUsd(r.market.volume)}`,
    ].join('\n')),
  ].join('\n');
}

// ── Fallbacks ────────────────────────────────────────────────
export const HELP_TEXT = [
  "🤖 I answer questions about prediction markets. Try:",
  '• "market stats" or "category stats for crypto and politics"',
  '• "show me the top 5 crypto markets by volume"',
  '• "active politics markets with liquidity over 50k"',
  '• "analyze <market-slug>"',
  '• "recommendations for <market-slug>"',
].join('\n');

export const GREETING = `👋 Hello! I'm the market query agent.\n\n${HELP_TEXT}`;

export function unknownReply(text: string): string {
  const shown = truncate(text.trim(), 80);
  return shown ? `🤔 I didn't understand "${shown}".\n\n${HELP_TEXT}` : HELP_TEXT;
}

export function missingSlugReply(action: 'analyze' | 'recommendations for'): string {
  return `Which market? Send its slug, e.g. "${action} will-bitcoin-reach-100k-in-2025".`;
}

export function retrievalFailureReply(endpoint: string, reason: string): string {
  return `⚠️ Market data unavailable (${endpoint}: ${reason}). Please try again shortly.`;
}

export function notFoundReply(slug: string): string {
  return `🔎 Market not found: "${slug}". Check the slug and try again.`;
}

export const UNEXPECTED_ERROR_REPLY = 'Sorry, I hit an unexpected error handling that request.';
