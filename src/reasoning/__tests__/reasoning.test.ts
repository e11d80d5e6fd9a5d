import { describe, it, expect } from 'vitest';
import { recommend, DEFAULT_WEIGHTS } from '../index';
import { buildGraph } from '../../graph';
import { NotFoundError } from '../../errors';
import { makeMarket } from '../../__tests__/fixtures';

const graph = buildGraph([
  makeMarket({ slug: 'src',     category: 'x', tags: ['t'], volume: 1_000 }),
  makeMarket({ slug: 'alpha',   category: 'x', volume: 100 }),
  makeMarket({ slug: 'bravo',   category: 'x', volume: 500 }),
  makeMarket({ slug: 'charlie', category: 'x', volume: 500 }),
  makeMarket({ slug: 'delta',   category: 'y', tags: ['T'], volume: 9_000 }),
  makeMarket({ slug: 'echo',    category: 'z', volume: 50_000 }),
]);

describe('recommend', () => {
  it('should rank by score, then volume, then slug', () => {
    const result = recommend(graph, 'src', 10);
    expect(result.source.slug).toBe('src');
    expect(result.items.map(r => [r.market.slug, r.score])).toEqual([
      ['bravo',   1],
      ['charlie', 1],
      ['alpha',   1],
      ['delta',   0.5],
    ]);
  });

  it('should exclude the source and unrelated markets', () => {
    const slugs = recommend(graph, 'src', 10).items.map(r => r.market.slug);
    expect(slugs).not.toContain('src');
    expect(slugs).not.toContain('echo');
  });

  it('should return at most limit items', () => {
    expect(recommend(graph, 'src', 2).items.map(r => r.market.slug)).toEqual(['bravo', 'charlie']);
    expect(recommend(graph, 'src', 0).items).toEqual([]);
  });

  it('should apply custom weights', () => {
    const items = recommend(graph, 'src', 1, { same_category: 0.2, shared_tag: 2 }).items;
    expect(items.map(r => [r.market.slug, r.score])).toEqual([['delta', 2]]);
  });

  it('should carry the matched relations', () => {
    const [top] = recommend(graph, 'src', 1, DEFAULT_WEIGHTS).items;
    expect(top.relations).toEqual([{ from: 'bravo', to: 'src', type: 'same_category', value: 'x' }]);
  });

  it('should throw NotFoundError for a source outside the graph', () => {
    expect(() => recommend(graph, 'missing', 5)).toThrow(NotFoundError);
  });
});
