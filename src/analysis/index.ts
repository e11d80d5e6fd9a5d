/**
 * Deterministic health / pricing read-out for one market,
 * put in context against its category peers. Describes what the market
 * itself implies; it does not forecast outcomes.
 */
import { Market, Recommendation } from '../types';
import { formatPercent, formatUsd, truncate } from '../format';

// ── Risk bands ───────────────────────────────────────────────
interface RiskBand { volume: number; liquidity: number; spread: number }

const RISK_BANDS: Record<'low' | 'medium', RiskBand> = {
  low:    { volume: 100_000, liquidity: 50_000, spread: 0.05 },
  medium: { volume: 50_000,  liquidity: 25_000, spread: 0.10 },
};

export type RiskLevel      = 'low' | 'medium' | 'high';
export type HealthLabel    = 'healthy' | 'low' | 'very_low';
export type SpreadLabel    = 'tight' | 'moderate' | 'wide';
export type StabilityLabel = 'stable' | 'volatile' | 'highly_volatile';

export interface HealthAnalysis {
  risk_level:       RiskLevel;
  confidence_score: number;   // 0–100
  activity_score:   number;   // 30 | 50 | 70 | 90
  volume_health:    HealthLabel;
  liquidity_health: HealthLabel;
  spread_health:    SpreadLabel;
}

export interface PriceAnalysis {
  yes_price:            number;
  no_price:             number;
  spread:               number;
  implied_probability:  number;
  price_stability:      StabilityLabel;
  mispriced:            boolean;   // yes + no strays > 5pp from 1.0
}

export interface CategoryContext {
  total_markets: number;
  avg_volume:    number;
  trend:         'hot' | 'stable' | 'unknown';
}

export interface MarketInsights {
  market:   Market;
  health:   HealthAnalysis;
  price:    PriceAnalysis;
  context:  CategoryContext;
  similar:  Recommendation[];
  notes:    string[];
}

// ── Health ───────────────────────────────────────────────────
function within(band: RiskBand, volume: number, liquidity: number, spread: number): boolean {
  return volume >= band.volume && liquidity >= band.liquidity && spread <= band.spread;
}

export function riskLevel(volume: number, liquidity: number, spread: number): RiskLevel {
  if (within(RISK_BANDS.low,    volume, liquidity, spread)) return 'low';
  if (within(RISK_BANDS.medium, volume, liquidity, spread)) return 'medium';
  return 'high';
}

export function confidenceScore(volume: number, liquidity: number, spread: number): number {
  const volumeScore    = Math.min(volume / 100_000 * 30, 30);
  const liquidityScore = Math.min(liquidity / 50_000 * 30, 30);
  const spreadScore    = Math.max(0, 40 - spread * 200);
  return Math.floor(volumeScore + liquidityScore + spreadScore);
}

export function activityScore(volume: number, liquidity: number): number {
  if (volume > 100_000 && liquidity > 50_000) return 90;
  if (volume > 50_000  && liquidity > 25_000) return 70;
  if (volume > 10_000  && liquidity > 5_000)  return 50;
  return 30;
}

function health(value: number, healthy: number, low: number): HealthLabel {
  return value > healthy ? 'healthy' : value > low ? 'low' : 'very_low';
}

export function analyzeHealth(market: Market): HealthAnalysis {
  const { volume, liquidity } = market;
  const spread = market.pricing.spread;
  return {
    risk_level:       riskLevel(volume, liquidity, spread),
    confidence_score: confidenceScore(volume, liquidity, spread),
    activity_score:   activityScore(volume, liquidity),
    volume_health:    health(volume,    50_000, 10_000),
    liquidity_health: health(liquidity, 25_000, 5_000),
    spread_health:    spread < 0.05 ? 'tight' : spread < 0.15 ? 'moderate' : 'wide',
  };
}

// ── Pricing ──────────────────────────────────────────────────
export function analyzePricing(market: Market): PriceAnalysis {
  const { yes_price, no_price, spread } = market.pricing;
  return {
    yes_price,
    no_price,
    spread,
    implied_probability: yes_price > 0 ? yes_price : 0.5,
    price_stability:     spread < 0.05 ? 'stable' : spread < 0.15 ? 'volatile' : 'highly_volatile',
    mispriced:           Math.abs(yes_price + no_price - 1) > 0.05,
  };
}

// ── Category context ─────────────────────────────────────────
export function analyzeCategory(category: string, peers: Market[]): CategoryContext {
  const key   = category.trim().toLowerCase();
  const inCat = peers.filter(m => key && m.category.trim().toLowerCase() === key);
  if (inCat.length === 0) return { total_markets: 0, avg_volume: 0, trend: 'unknown' };

  const avg   = inCat.reduce((s, m) => s + m.volume, 0) / inCat.length;
  const heavy = inCat.filter(m => m.volume > avg * 1.5).length;
  return {
    total_markets: inCat.length,
    avg_volume:    avg,
    trend:         heavy > inCat.length * 0.3 ? 'hot' : 'stable',
  };
}

export function probabilityDescription(probability: number, confidence: number): string {
  const desc =
    probability < 0.3 ? 'Very unlikely' :
    probability < 0.4 ? 'Unlikely' :
    probability < 0.6 ? 'Toss-up' :
    probability < 0.7 ? 'Likely' :
                        'Very likely';
  const conf = confidence > 70 ? 'high confidence' : confidence > 40 ? 'medium confidence' : 'low confidence';
  return `${desc} (${conf})`;
}

function buildNotes(market: Market, h: HealthAnalysis, p: PriceAnalysis): string[] {
  const notes: string[] = [];
  if (h.risk_level === 'high')            notes.push('⚠️ Thin or wide market: prices can move on small orders');
  else if (h.risk_level === 'low')        notes.push('✅ Deep, tight market');
  if (h.volume_health === 'very_low')     notes.push('📉 Very low volume');
  else if (h.volume_health === 'healthy') notes.push('📈 Healthy volume');
  if (p.mispriced)                        notes.push("💰 Yes + No prices don't sum to 1.0");
  if (p.price_stability === 'highly_volatile') notes.push('⚡ Wide spread: expect large price swings');
  if (h.confidence_score < 40)            notes.push('❓ Weak market signals');
  else if (h.confidence_score > 80)       notes.push('🎯 Strong market signals');
  if (market.closed)                      notes.push('🔒 Market is closed');
  return notes;
}

export function analyzeMarket(market: Market, peers: Market[], similar: Recommendation[]): MarketInsights {
  const h = analyzeHealth(market);
  const p = analyzePricing(market);
  return {
    market,
    health:  h,
    price:   p,
    context: analyzeCategory(market.category, peers),
    similar: similar.slice(0, 3),
    notes:   buildNotes(market, h, p),
  };
}

// ── Render ───────────────────────────────────────────────────
function title(label: string): string {
  return label.split('_').map(w => w.charAt(0).toUpperCase() + w.slice(1)).join(' ');
}

export function formatAnalysis(insights: MarketInsights): string {
  const { market, health: h, price: p, context: c } = insights;
  const lines = [
    `🔍 MARKET ANALYSIS: ${market.question}`,
    `Slug: ${market.slug}`,
    ``,
    `📊 Market Health`,
    `• Risk level: ${h.risk_level.toUpperCase()}`,
    `• Confidence score: ${h.confidence_score}/100`,
    `• Activity level: ${h.activity_score}/100`,
    `• Volume: ${formatUsd(market.volume)} (${title(h.volume_health)}) | Liquidity: ${formatUsd(market.liquidity)} (${title(h.liquidity_health)})`,
    ``,
    `💰 Pricing`,
    `• Yes: $${p.yes_price.toFixed(3)} | No: $${p.no_price.toFixed(3)} | Spread: ${p.spread.toFixed(3)}`,
    `• Implied probability: ${formatPercent(p.implied_probability)}`,
    `• Price stability: ${title(p.price_stability)}`,
    `• Assessment: ${probabilityDescription(p.implied_probability, h.confidence_score)}`,
    ``,
    `📈 Category Context (${market.category || 'uncategorized'})`,
    `• Markets in sample: ${c.total_markets}`,
    `• Average volume: ${formatUsd(c.avg_volume)}`,
    `• Trend: ${title(c.trend)}`,
  ];

  if (insights.notes.length > 0) {
    lines.push('', '💡 Notes', ...insights.notes.map(n => `• ${n}`));
  }
  if (insights.similar.length > 0) {
    lines.push('', '🔗 Similar Markets', ...insights.similar.map(r =>
      `• ${truncate(r.market.question, 60)} (Vol: ${formatUsd(r.market.volume)})`,
    ));
  }
  return lines.join('\n');
}
