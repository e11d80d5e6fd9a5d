// ── Market types ─────────────────────────────────────────────
export interface MarketPricing {
  yes_price: number;   // 0–1, 0 when the API omits it
  no_price:  number;
  spread:    number;
}

export interface Market {
  slug:      string;
  question:  string;
  category:  string;     // may be '' when the API has none
  tags:      string[];   // de-duplicated, order irrelevant
  volume:    number;     // USD lifetime
  liquidity: number;     // USD
  active:    boolean;
  closed:    boolean;
  end_date?: string;
  pricing:   MarketPricing;
}

export interface MarketStats {
  total_markets:   number;
  active_markets:  number;
  total_volume:    number;
  total_liquidity: number;
  last_updated?:   string;
}

export interface CategoryStats {
  category:        string;
  market_count:    number;
  total_volume:    number;
  total_liquidity: number;
}

// ── Structured commands ──────────────────────────────────────
export const INTENTS = ['stats', 'filter_markets', 'analyze_market', 'recommend', 'unknown'] as const;
export type Intent = typeof INTENTS[number];

export type SortField = 'volume' | 'liquidity';
export type SortOrder = 'asc' | 'desc';

export interface StatsParams {
  scope:       'market' | 'category';
  categories?: string[];
}

export interface FilterParams {
  category?:      string;
  active?:        boolean;
  min_volume?:    number;
  max_volume?:    number;
  min_liquidity?: number;
  max_liquidity?: number;
  sort_by?:       SortField;
  sort_order?:    SortOrder;
  limit?:         number;
}

export interface AnalyzeParams {
  market_slug?: string;
}

export interface RecommendParams {
  market_slug?: string;
  limit?:       number;
}

export type StructuredCommand =
  | { intent: 'stats';          text: string; params: StatsParams }
  | { intent: 'filter_markets'; text: string; params: FilterParams }
  | { intent: 'analyze_market'; text: string; params: AnalyzeParams }
  | { intent: 'recommend';      text: string; params: RecommendParams }
  | { intent: 'unknown';        text: string; params: { text: string } };

// ── Knowledge graph ──────────────────────────────────────────
export type RelationType = 'same_category' | 'shared_tag';

export interface GraphEdge {
  from:  string;         // slug, always < to
  to:    string;
  type:  RelationType;
  value: string;         // matched category or tag (normalized)
}

export interface MarketGraph {
  nodes:     Map<string, Market>;
  edges:     GraphEdge[];
  adjacency: Map<string, GraphEdge[]>;
}

export type RelationWeights = Record<RelationType, number>;

// ── Reasoning output ─────────────────────────────────────────
export interface Recommendation {
  market:    Market;
  score:     number;
  relations: GraphEdge[];
}

export interface RecommendationResult {
  source: Market;
  items:  Recommendation[];
}
