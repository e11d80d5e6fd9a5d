/**
 * Deduces related markets from the knowledge graph.
 *
 * One-hop only: a candidate must share at least one edge with the source.
 * Chains like "related to something related to X" are not followed.
 *
 * score = Σ weight(edge.type) over the edges joining candidate and source
 * order = score desc → volume desc → slug asc
 */
import { NotFoundError } from '../errors';
import { neighbours } from '../graph';
import { MarketGraph, Recommendation, RecommendationResult, RelationWeights } from '../types';

export const DEFAULT_WEIGHTS: RelationWeights = {
  same_category: 1,
  shared_tag:    0.5,
};

export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (b.score !== a.score)                   return b.score - a.score;
  if (b.market.volume !== a.market.volume)   return b.market.volume - a.market.volume;
  return a.market.slug < b.market.slug ? -1 : a.market.slug > b.market.slug ? 1 : 0;
}

export function recommend(
  graph:      MarketGraph,
  sourceSlug: string,
  limit:      number,
  weights:    RelationWeights = DEFAULT_WEIGHTS,
): RecommendationResult {
  const source = graph.nodes.get(sourceSlug);
  if (!source) throw new NotFoundError(sourceSlug);

  const candidates: Recommendation[] = [];
  for (const [slug, relations] of neighbours(graph, sourceSlug)) {
    const market = graph.nodes.get(slug);
    if (!market || slug === sourceSlug) continue;
    const score = relations.reduce((sum, edge) => sum + weights[edge.type], 0);
    candidates.push({ market, score, relations });
  }

  candidates.sort(compareRecommendations);
  return { source, items: candidates.slice(0, Math.max(0, Math.floor(limit))) };
}
