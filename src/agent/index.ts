/**
 * One inbound text in, one reply out. Transport-agnostic: Telegram
 * and the CLI both call handle().
 */
import { AppConfig } from '../config';
import { Dispatcher } from '../dispatcher';
import { errorMessage } from '../errors';
import { GREETING, HELP_TEXT, truncate } from '../format';
import { buildGraph } from '../graph';
import { parse } from '../parser';
import { recommend } from '../reasoning';
import { MarketApiClient, MarketDataSource } from '../tools';

export interface Agent {
  handle(text: string, sessionId: string): Promise<string>;
}

export function createAgent(config: AppConfig, source: MarketDataSource = new MarketApiClient(config.api)): Agent {
  const dispatcher = new Dispatcher(source, config);

  return {
    async handle(text: string, sessionId: string): Promise<string> {
      const trimmed = text.trim();
      if (trimmed === '' || trimmed === '/start') return GREETING;
      if (trimmed === '/help' || trimmed.toLowerCase() === 'help') return HELP_TEXT;

      const command = parse(trimmed);
      console.log(`💬 [${sessionId}] ${command.intent} ← "${truncate(trimmed, 60)}"`);
      return dispatcher.dispatch(command);
    },
  };
}

// ── Startup self-check ───────────────────────────────────────
export interface SelfCheckResult {
  stats:     boolean;
  markets:   boolean;
  reasoning: boolean;
}

export async function runSelfCheck(source: MarketDataSource, config: AppConfig): Promise<SelfCheckResult> {
  const result: SelfCheckResult = { stats: false, markets: false, reasoning: false };
  console.log('🧪 Running startup self-check...');

  try {
    const stats = await source.fetchMarketStats();
    result.stats = true;
    console.log(`   ✅ Market stats tool (${stats.total_markets} markets)`);
  } catch (err: unknown) {
    console.error(`   ❌ Market stats tool: ${errorMessage(err)}`);
  }

  try {
    const markets = await source.fetchMarkets({ limit: config.recommend.scopeLimit });
    result.markets = markets.length > 0;
    console.log(`   ${result.markets ? '✅' : '❌'} Market query tool (${markets.length} markets)`);

    if (result.markets) {
      const graph = buildGraph(markets);
      const recs  = recommend(graph, markets[0].slug, config.recommend.defaultLimit, config.recommend.weights);
      result.reasoning = true;
      console.log(`   ✅ Reasoning engine (${graph.edges.length} edges, ${recs.items.length} recommendation(s) for ${markets[0].slug})`);
    } else {
      console.warn('   ⚠️  Skipping reasoning check: no markets returned');
    }
  } catch (err: unknown) {
    console.error(`   ❌ Market query tool: ${errorMessage(err)}`);
  }

  return result;
}
