import { describe, it, expect } from 'vitest';
import { parse, parseAmount, parseCount, extractSlug, extractStats } from '../index';
import { INTENTS } from '../../types';

describe('parse', () => {
  describe('filter_markets', () => {
    it('should extract category, sort and limit from a top-N query', () => {
      expect(parse('show me the top 5 crypto markets by volume')).toEqual({
        intent: 'filter_markets',
        text:   'show me the top 5 crypto markets by volume',
        params: { category: 'crypto', sort_by: 'volume', limit: 5 },
      });
    });

    it('should extract activity and a liquidity floor', () => {
      const command = parse('Active politics markets with liquidity over 50k');
      expect(command.intent).toBe('filter_markets');
      expect(command.params).toEqual({ category: 'politics', active: true, min_liquidity: 50_000 });
    });

    it('should extract a volume ceiling and ascending sort', () => {
      const command = parse('markets with volume under $2.5m sorted by liquidity ascending');
      expect(command.params).toEqual({ max_volume: 2_500_000, sort_by: 'liquidity', sort_order: 'asc' });
    });

    it('should leave a constraint unset when its amount is not a number', () => {
      const command = parse('show markets with volume over abc');
      expect(command).toEqual({ intent: 'filter_markets', text: 'show markets with volume over abc', params: {} });
    });
  });

  describe('thresholds', () => {
    it.each([
      ['over', 'min_volume'], ['above', 'min_volume'], ['greater than', 'min_volume'],
      ['more than', 'min_volume'], ['>', 'min_volume'], ['>=', 'min_volume'], ['at least', 'min_volume'],
      ['under', 'max_volume'], ['below', 'max_volume'], ['less than', 'max_volume'],
      ['<', 'max_volume'], ['<=', 'max_volume'], ['at most', 'max_volume'],
    ])('should read "volume %s 10k" as %s', (op, key) => {
      expect(parse(`markets with volume ${op} 10k`).params).toEqual({ [key]: 10_000 });
    });

    it('should not treat "at least" as an ascending sort', () => {
      expect(parse('crypto markets with volume at least 50k').params).toEqual({ category: 'crypto', min_volume: 50_000 });
      expect(parse('markets with at least 5k in volume').params).toEqual({ min_volume: 5_000 });
    });

    it('should read minimum and maximum phrasing', () => {
      expect(parse('markets with minimum volume of 15k').params).toEqual({ min_volume: 15_000 });
      expect(parse('markets with maximum liquidity 2m').params).toEqual({ max_liquidity: 2_000_000 });
    });

    it('should still sort ascending on "least"', () => {
      expect(parse('show me the least liquidity markets').params).toEqual({ sort_by: 'liquidity', sort_order: 'asc' });
    });
  });

  describe('sort words', () => {
    it('should not take the sort field as a category', () => {
      expect(parse('show me the highest volume markets').params).toEqual({ sort_by: 'volume' });
      expect(parse('top 10 liquidity markets').params).toEqual({ sort_by: 'liquidity', limit: 10 });
      expect(parse('show me the lowest liquidity markets').params).toEqual({ sort_by: 'liquidity', sort_order: 'asc' });
    });
  });

  describe('hyphenated words', () => {
    it('should filter "<category>-related markets" instead of recommending', () => {
      expect(parse('show me politics-related markets')).toEqual({
        intent: 'filter_markets',
        text:   'show me politics-related markets',
        params: { category: 'politics' },
      });
    });
  });

  describe('intent order', () => {
    it('should prefer stats over filter words', () => {
      expect(parse('stats for crypto markets').intent).toBe('stats');
    });

    it('should prefer recommend over analyze', () => {
      expect(parse('analysis of markets related to fed-rate-cut')).toEqual({
        intent: 'recommend',
        text:   'analysis of markets related to fed-rate-cut',
        params: { market_slug: 'fed-rate-cut' },
      });
    });
  });

  describe('analyze_market', () => {
    it('should pick the hyphenated slug', () => {
      expect(parse('tell me about will-bitcoin-reach-100k-in-2025').params)
        .toEqual({ market_slug: 'will-bitcoin-reach-100k-in-2025' });
    });

    it('should join plain words into a slug', () => {
      expect(parse('analyze bitcoin etf approval').params).toEqual({ market_slug: 'bitcoin-etf-approval' });
    });

    it('should leave the slug unset when none is given', () => {
      expect(parse('analyze')).toEqual({ intent: 'analyze_market', text: 'analyze', params: {} });
    });
  });

  describe('recommend', () => {
    it('should extract the source slug', () => {
      expect(parse('recommendations for will-donald-trump-win-the-2024-election')).toEqual({
        intent: 'recommend',
        text:   'recommendations for will-donald-trump-win-the-2024-election',
        params: { market_slug: 'will-donald-trump-win-the-2024-election' },
      });
    });

    it('should take a limit from "top N"', () => {
      expect(parse('top 3 recommendations for btc-100k').params).toEqual({ market_slug: 'btc-100k', limit: 3 });
    });
  });

  describe('unknown', () => {
    it('should keep the original text', () => {
      expect(parse('Hello  There')).toEqual({ intent: 'unknown', text: 'Hello  There', params: { text: 'Hello  There' } });
    });

    it('should treat blank input as unknown', () => {
      expect(parse('   ')).toEqual({ intent: 'unknown', text: '   ', params: { text: '   ' } });
    });

    it('should never throw', () => {
      const inputs = ['', '!!!', '🤖🤖', 'a'.repeat(10_000), 'stats for', 'top 99999999999999999999 markets', '$$$ over under by'];
      for (const input of inputs) {
        expect(INTENTS).toContain(parse(input).intent);
      }
    });
  });
});

describe('extractStats', () => {
  it('should default to market scope', () => {
    expect(extractStats('market stats')).toEqual({ scope: 'market' });
  });

  it('should use category scope without names', () => {
    expect(extractStats('category stats')).toEqual({ scope: 'category' });
  });

  it('should split named categories', () => {
    expect(extractStats('stats for crypto and politics')).toEqual({ scope: 'category', categories: ['crypto', 'politics'] });
    expect(extractStats('statistics for sports, crypto & the economy?'))
      .toEqual({ scope: 'category', categories: ['sports', 'crypto', 'economy'] });
  });
});

describe('extractSlug', () => {
  it('should prefer the longest hyphenated token', () => {
    expect(extractSlug('similar to btc-100k or will-btc-hit-100k')).toBe('will-btc-hit-100k');
  });

  it('should return undefined when only filler remains', () => {
    expect(extractSlug('recommendations for the')).toBeUndefined();
  });
});

describe('parseAmount', () => {
  it('should apply k and m suffixes', () => {
    expect(parseAmount('50k')).toBe(50_000);
    expect(parseAmount('$2.5m')).toBe(2_500_000);
    expect(parseAmount('1,200')).toBe(1_200);
    expect(parseAmount('10k.')).toBe(10_000);
  });

  it('should reject non-numbers', () => {
    expect(parseAmount('abc')).toBeUndefined();
    expect(parseAmount('12x')).toBeUndefined();
    expect(parseAmount('')).toBeUndefined();
  });
});

describe('parseCount', () => {
  it('should accept positive integers only', () => {
    expect(parseCount('7')).toBe(7);
    expect(parseCount('0')).toBeUndefined();
    expect(parseCount('2.5')).toBeUndefined();
  });
});
