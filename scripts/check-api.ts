/**
 * Check the market API: stats, a market listing, and one reasoning pass.
 * Exits non-zero if any probe fails.
 */
import 'dotenv/config';
import { loadConfig, printConfig } from '../src/config';
import { MarketApiClient } from '../src/tools';
import { runSelfCheck } from '../src/agent';
import { errorMessage } from '../src/errors';

async function main() {
  const config = loadConfig();
  printConfig(config);
  console.log('');

  const result = await runSelfCheck(new MarketApiClient(config.api), config);
  const ok     = result.stats && result.markets && result.reasoning;
  console.log(ok ? '\n✅ Market API looks good' : '\n❌ Market API check failed');
  process.exit(ok ? 0 : 1);
}

main().catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
