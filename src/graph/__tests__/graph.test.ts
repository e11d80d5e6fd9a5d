import { describe, it, expect } from 'vitest';
import { buildGraph, edgesBetween, neighbours } from '../index';
import { makeMarket } from '../../__tests__/fixtures';

const A = makeMarket({ slug: 'a-market', category: 'Crypto',  tags: ['Bitcoin', 'ETF', 'Halving'] });
const B = makeMarket({ slug: 'b-market', category: 'crypto ', tags: ['etf', 'bitcoin', 'mining'] });
const C = makeMarket({ slug: 'c-market', category: 'sports',  tags: ['mining'] });

describe('buildGraph', () => {
  it('should add one category edge and one edge per shared tag', () => {
    expect(buildGraph([A, B]).edges).toEqual([
      { from: 'a-market', to: 'b-market', type: 'same_category', value: 'crypto' },
      { from: 'a-market', to: 'b-market', type: 'shared_tag',    value: 'bitcoin' },
      { from: 'a-market', to: 'b-market', type: 'shared_tag',    value: 'etf' },
    ]);
  });

  it('should not depend on input order', () => {
    const forward  = buildGraph([A, B, C]);
    const backward = buildGraph([C, B, A]);
    expect(backward.edges).toEqual(forward.edges);
    expect(backward.adjacency).toEqual(forward.adjacency);
  });

  it('should not link markets without a category', () => {
    const graph = buildGraph([makeMarket({ slug: 'x' }), makeMarket({ slug: 'y' })]);
    expect(graph.edges).toEqual([]);
    expect(graph.adjacency.get('x')).toEqual([]);
  });

  it('should keep the first record of a repeated slug', () => {
    const graph = buildGraph([A, { ...A, question: 'second copy' }]);
    expect(graph.nodes.size).toBe(1);
    expect(graph.nodes.get('a-market')).toBe(A);
  });
});

describe('graph queries', () => {
  const graph = buildGraph([A, B, C]);

  it('should list the edges between two markets in either direction', () => {
    expect(edgesBetween(graph, 'b-market', 'c-market')).toEqual([
      { from: 'b-market', to: 'c-market', type: 'shared_tag', value: 'mining' },
    ]);
    expect(edgesBetween(graph, 'c-market', 'b-market')).toHaveLength(1);
    expect(edgesBetween(graph, 'a-market', 'c-market')).toEqual([]);
  });

  it('should group neighbour edges by market', () => {
    const around = neighbours(graph, 'b-market');
    expect([...around.keys()]).toEqual(['a-market', 'c-market']);
    expect(around.get('a-market')).toHaveLength(3);
  });
});
