/**
 * Turns a chat message into a StructuredCommand.
 *
 * Intent signatures are tried top to bottom and the first match wins,
 * so narrower phrases sit above broader ones:
 *   stats           "market stats", "category stats", "stats for crypto and politics"
 *   recommend       "recommendations for <slug>", "markets similar to <slug>"
 *   analyze_market  "analyze <slug>", "tell me about <slug>"
 *   filter_markets  "top 5 crypto markets by volume", "liquidity over 50k"
 * Anything else is `unknown`, carrying the original text.
 */
import { StructuredCommand, Intent } from '../types';
import { extractFilter, extractLimit, extractSlug, extractStats } from './extract';

export { parseAmount, parseCount } from './amount';
export { extractCategory, extractFilter, extractLimit, extractSlug, extractStats } from './extract';

interface IntentSignature {
  intent:  Exclude<Intent, 'unknown'>;
  matches: (text: string) => boolean;
  extract: (text: string, original: string) => StructuredCommand;
}

function hasConstraint(text: string): boolean {
  return Object.keys(extractFilter(text)).length > 0;
}

export const SIGNATURES: IntentSignature[] = [
  {
    intent:  'stats',
    matches: text => /\bstat(?:s|istics)\b/.test(text),
    extract: (text, original) => ({ intent: 'stats', text: original, params: extractStats(text) }),
  },
  {
    intent:  'recommend',
    // whole words only: "politics-related markets" is a filter
    matches: text => /(?<![\w-])(?:recommend\w*|related|similar)(?![\w-])/.test(text),
    extract: (text, original) => {
      const market_slug = extractSlug(text);
      const limit       = /\btop\s+(\d+)\b/.test(text) ? extractLimit(text) : undefined;
      return {
        intent: 'recommend',
        text:   original,
        params: {
          ...(market_slug ? { market_slug } : {}),
          ...(limit !== undefined ? { limit } : {}),
        },
      };
    },
  },
  {
    intent:  'analyze_market',
    matches: text => /\b(?:analy[sz]e|analysis|tell me about|details? (?:for|on|of)|deep[- ]dive)\b/.test(text),
    extract: (text, original) => {
      const market_slug = extractSlug(text);
      return { intent: 'analyze_market', text: original, params: market_slug ? { market_slug } : {} };
    },
  },
  {
    intent:  'filter_markets',
    matches: text => /\bmarkets?\b/.test(text) || /\b(?:top|show|list|find|get|search)\b/.test(text) || hasConstraint(text),
    extract: (text, original) => ({ intent: 'filter_markets', text: original, params: extractFilter(text) }),
  },
];

function unknown(original: string): StructuredCommand {
  return { intent: 'unknown', text: original, params: { text: original } };
}

export function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

// ── Parse ────────────────────────────────────────────────────
export function parse(input: string): StructuredCommand {
  const original = typeof input === 'string' ? input : '';
  try {
    const text = normalize(original);
    if (!text) return unknown(original);

    const signature = SIGNATURES.find(s => s.matches(text));
    return signature ? signature.extract(text, original) : unknown(original);
  } catch (err: unknown) {
    console.warn(`⚠️  Parser fell back to unknown: ${err instanceof Error ? err.message : String(err)}`);
    return unknown(original);
  }
}
