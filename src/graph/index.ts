/**
 * Knowledge graph: one node per market, undirected edges for
 * shared attributes:
 *   same_category  both markets carry the same non-empty category
 *   shared_tag     one edge per tag present on both markets
 *
 * Pairwise, so O(n²) in the working set. Callers must hand it a bounded
 * fetch (the dispatcher always passes a limit), never the whole catalogue.
 */
import { GraphEdge, Market, MarketGraph, RelationType } from '../types';

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

function tagKeys(market: Market): Set<string> {
  const keys = new Set<string>();
  for (const tag of market.tags) {
    const key = normalizeKey(tag);
    if (key) keys.add(key);
  }
  return keys;
}

function makeEdge(a: string, b: string, type: RelationType, value: string): GraphEdge {
  return a < b ? { from: a, to: b, type, value } : { from: b, to: a, type, value };
}

function compareEdges(x: GraphEdge, y: GraphEdge): number {
  if (x.from  !== y.from)  return x.from  < y.from  ? -1 : 1;
  if (x.to    !== y.to)    return x.to    < y.to    ? -1 : 1;
  if (x.type  !== y.type)  return x.type  < y.type  ? -1 : 1;
  if (x.value !== y.value) return x.value < y.value ? -1 : 1;
  return 0;
}

// ── Build ────────────────────────────────────────────────────
export function buildGraph(markets: Market[]): MarketGraph {
  const nodes = new Map<string, Market>();
  for (const m of markets) {
    if (!nodes.has(m.slug)) nodes.set(m.slug, m);
  }

  // Sorted node order makes the pair walk independent of input order
  const slugs      = [...nodes.keys()].sort();
  const categories = new Map(slugs.map((s): [string, string] => [s, normalizeKey(nodes.get(s)?.category ?? '')]));
  const tags       = new Map(slugs.map((s): [string, Set<string>] => {
    const market = nodes.get(s);
    return [s, market ? tagKeys(market) : new Set<string>()];
  }));

  const edges: GraphEdge[] = [];
  for (let i = 0; i < slugs.length; i++) {
    for (let j = i + 1; j < slugs.length; j++) {
      const a = slugs[i];
      const b = slugs[j];

      const category = categories.get(a) ?? '';
      if (category && category === categories.get(b)) {
        edges.push(makeEdge(a, b, 'same_category', category));
      }

      const tagsB = tags.get(b) ?? new Set<string>();
      for (const tag of tags.get(a) ?? []) {
        if (tagsB.has(tag)) edges.push(makeEdge(a, b, 'shared_tag', tag));
      }
    }
  }
  edges.sort(compareEdges);

  const adjacency = new Map(slugs.map((s): [string, GraphEdge[]] => [s, []]));
  for (const edge of edges) {
    adjacency.get(edge.from)?.push(edge);
    adjacency.get(edge.to)?.push(edge);
  }

  return { nodes, edges, adjacency };
}

// ── Queries ──────────────────────────────────────────────────
export function otherEnd(edge: GraphEdge, slug: string): string {
  return edge.from === slug ? edge.to : edge.from;
}

export function edgesBetween(graph: MarketGraph, a: string, b: string): GraphEdge[] {
  return (graph.adjacency.get(a) ?? []).filter(e => otherEnd(e, a) === b);
}

// Direct neighbours, each with the edges that connect it to `slug`
export function neighbours(graph: MarketGraph, slug: string): Map<string, GraphEdge[]> {
  const out = new Map<string, GraphEdge[]>();
  for (const edge of graph.adjacency.get(slug) ?? []) {
    const other = otherEnd(edge, slug);
    if (other === slug) continue;
    const list = out.get(other);
    if (list) list.push(edge);
    else out.set(other, [edge]);
  }
  return out;
}
