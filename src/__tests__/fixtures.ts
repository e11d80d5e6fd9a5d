/**
 * Shared test helpers: market records and an in-process axios adapter.
 */
import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { AppConfig, loadConfig } from '../config';
import { Market } from '../types';

export function makeMarket(fields: Partial<Market> & { slug: string }): Market {
  return {
    question:  fields.slug,
    category:  '',
    tags:      [],
    volume:    0,
    liquidity: 0,
    active:    true,
    closed:    false,
    pricing:   { yes_price: 0.5, no_price: 0.5, spread: 0.02 },
    ...fields,
  };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ MARKET_API_URL: 'http://market-api.test', ...env });
}

// Answers every request with handler(config); a thrown error becomes the rejection
export function stubAdapter(handler: (config: InternalAxiosRequestConfig) => unknown): {
  adapter: AxiosAdapter;
  calls:   InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    calls.push(config);
    return { data: handler(config), status: 200, statusText: 'OK', headers: {}, config };
  };
  return { adapter, calls };
}
