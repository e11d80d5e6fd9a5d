/**
 * Market query agent, main process.
 * Loads config, self-checks the market API, then answers Telegram messages
 * until SIGINT / SIGTERM.
 */
import 'dotenv/config';
import { loadConfig, printConfig } from '../config';
import { ConfigurationError, errorMessage, isAgentError } from '../errors';
import { MarketApiClient } from '../tools';
import { createAgent, runSelfCheck } from '../agent';
import { TelegramPoller, describeChat } from '../chat/telegram';

async function main(): Promise<void> {
  console.log('🎯 Market Query Agent — Starting');
  console.log('='.repeat(60));

  const config = loadConfig();
  printConfig(config);
  console.log('');

  const source = new MarketApiClient(config.api);
  await runSelfCheck(source, config);

  if (!config.telegram.botToken) {
    console.warn('⚠️  TELEGRAM_BOT_TOKEN not set. Use `npm run ask -- "<question>"` for one-off questions.');
    return;
  }

  const agent  = createAgent(config, source);
  const poller = new TelegramPoller(config.telegram, agent);

  process.on('SIGINT',  () => { poller.stop(); console.log('\n👋 Shutting down...'); });
  process.on('SIGTERM', () => { poller.stop(); });

  poller.start();
  console.log(`✅ Listening on Telegram (${describeChat(config.telegram)})`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`❌ Configuration error: ${err.message}`);
  } else if (isAgentError(err)) {
    console.error(`❌ ${err.kind}: ${err.message}`);
  } else {
    console.error(`❌ Fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
