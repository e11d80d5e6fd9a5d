import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { ConfigurationError } from '../errors';

const BASE = { MARKET_API_URL: 'http://market-api.test///' };

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(BASE);
    expect(config.api).toEqual({ baseUrl: 'http://market-api.test', apiKey: '', timeoutMs: 10_000 });
    expect(config.query).toEqual({ defaultLimit: 10, maxLimit: 50, defaultSortBy: 'volume' });
    expect(config.recommend).toEqual({
      defaultLimit: 5, scopeLimit: 100, tagScopes: 2,
      weights: { same_category: 1, shared_tag: 0.5 },
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({ ...BASE, WEIGHT_SHARED_TAG: '0.25', QUERY_DEFAULT_SORT: 'liquidity', TELEGRAM_CHAT_ID: ' 42 ' });
    expect(config.recommend.weights.shared_tag).toBe(0.25);
    expect(config.query.defaultSortBy).toBe('liquidity');
    expect(config.telegram.chatId).toBe('42');
  });

  it('should require the market API url', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow('Missing required env var: MARKET_API_URL');
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ ...BASE, QUERY_MAX_LIMIT: 'lots' })).toThrow('Expected a non-negative number: QUERY_MAX_LIMIT');
    expect(() => loadConfig({ ...BASE, QUERY_DEFAULT_LIMIT: '2.5' })).toThrow('Expected an integer: QUERY_DEFAULT_LIMIT');
    expect(() => loadConfig({ ...BASE, QUERY_DEFAULT_SORT: 'price' })).toThrow('Expected "volume" or "liquidity": QUERY_DEFAULT_SORT');
  });

  it('should reject limits below one', () => {
    expect(() => loadConfig({ ...BASE, QUERY_MAX_LIMIT: '0' })).toThrow('Expected a positive integer: QUERY_MAX_LIMIT');
    expect(() => loadConfig({ ...BASE, QUERY_DEFAULT_LIMIT: '0' })).toThrow('Expected a positive integer: QUERY_DEFAULT_LIMIT');
    expect(() => loadConfig({ ...BASE, RECOMMEND_SCOPE_LIMIT: '0' })).toThrow('Expected a positive integer: RECOMMEND_SCOPE_LIMIT');
    expect(loadConfig({ ...BASE, RECOMMEND_TAG_SCOPES: '0' }).recommend.tagScopes).toBe(0);
  });
});
