import 'dotenv/config';
import { ConfigurationError } from './errors';
import { RelationWeights, SortField } from './types';

type Env = Record<string, string | undefined>;

export interface ApiConfig {
  baseUrl:   string;
  apiKey:    string;
  timeoutMs: number;
}

export interface TelegramConfig {
  botToken:       string;
  chatId:         string;   // '' = answer every chat
  pollIntervalMs: number;
}

export interface QueryConfig {
  defaultLimit:  number;
  maxLimit:      number;
  defaultSortBy: SortField;
}

export interface RecommendConfig {
  defaultLimit: number;
  scopeLimit:   number;   // per scoped fetch; bounds the graph
  tagScopes:    number;   // extra fetches by the source's tags
  weights:      RelationWeights;
}

export interface AppConfig {
  api:       ApiConfig;
  telegram:  TelegramConfig;
  query:     QueryConfig;
  recommend: RecommendConfig;
}

function required(env: Env, key: string): string {
  const val = env[key]?.trim();
  if (!val) throw new ConfigurationError(key, 'Missing required env var');
  return val;
}

function optional(env: Env, key: string, fallback: string): string {
  const val = env[key]?.trim();
  return val ? val : fallback;
}

function number(env: Env, key: string, fallback: string): number {
  const val = Number(optional(env, key, fallback));
  if (!Number.isFinite(val) || val < 0) {
    throw new ConfigurationError(key, 'Expected a non-negative number');
  }
  return val;
}

function integer(env: Env, key: string, fallback: string): number {
  const val = number(env, key, fallback);
  if (!Number.isInteger(val)) throw new ConfigurationError(key, 'Expected an integer');
  return val;
}

function positiveInteger(env: Env, key: string, fallback: string): number {
  const val = integer(env, key, fallback);
  if (val < 1) throw new ConfigurationError(key, 'Expected a positive integer');
  return val;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const sortBy = optional(env, 'QUERY_DEFAULT_SORT', 'volume');
  if (sortBy !== 'volume' && sortBy !== 'liquidity') {
    throw new ConfigurationError('QUERY_DEFAULT_SORT', 'Expected "volume" or "liquidity"');
  }

  return {
    // ── Retrieval API ────────────────────────────────────────
    api: {
      baseUrl:   required(env, 'MARKET_API_URL').replace(/\/+$/, ''),
      apiKey:    optional(env, 'MARKET_API_KEY', ''),
      timeoutMs: integer(env, 'MARKET_API_TIMEOUT_MS', '10000'),
    },

    // ── Telegram ─────────────────────────────────────────────
    telegram: {
      botToken:       optional(env, 'TELEGRAM_BOT_TOKEN', ''),
      chatId:         optional(env, 'TELEGRAM_CHAT_ID', ''),
      pollIntervalMs: integer(env, 'TELEGRAM_POLL_INTERVAL_MS', '1000'),
    },

    // ── Query defaults ───────────────────────────────────────
    query: {
      defaultLimit:  positiveInteger(env, 'QUERY_DEFAULT_LIMIT', '10'),
      maxLimit:      positiveInteger(env, 'QUERY_MAX_LIMIT',     '50'),
      defaultSortBy: sortBy,
    },

    // ── Recommendations ──────────────────────────────────────
    recommend: {
      defaultLimit: positiveInteger(env, 'RECOMMEND_DEFAULT_LIMIT', '5'),
      scopeLimit:   positiveInteger(env, 'RECOMMEND_SCOPE_LIMIT',   '100'),
      tagScopes:    integer(env, 'RECOMMEND_TAG_SCOPES',    '2'),
      weights: {
        same_category: number(env, 'WEIGHT_SAME_CATEGORY', '1'),
        shared_tag:    number(env, 'WEIGHT_SHARED_TAG',    '0.5'),
      },
    },
  };
}

export function printConfig(config: AppConfig): void {
  const { api, telegram, query, recommend } = config;
  console.log('⚙️  Market Query Agent Config');
  console.log(`   Market API:     ${api.baseUrl} (timeout ${api.timeoutMs}ms)`);
  console.log(`   API key:        ${api.apiKey ? '✅' : '⚠️  none'}`);
  console.log(`   Query limit:    ${query.defaultLimit} default / ${query.maxLimit} max, sort by ${query.defaultSortBy}`);
  console.log(`   Recommend:      top ${recommend.defaultLimit} from ≤${recommend.scopeLimit} per scope, ${recommend.tagScopes} tag scope(s)`);
  console.log(`   Weights:        same_category=${recommend.weights.same_category} shared_tag=${recommend.weights.shared_tag}`);
  console.log(`   Telegram:       ${telegram.botToken ? '✅' : '⚠️  no bot token'}${telegram.chatId ? ` (chat ${telegram.chatId} only)` : ''}`);
}
