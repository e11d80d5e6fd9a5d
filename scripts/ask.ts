/**
 * Ask the agent one question from the command line.
 *   npm run ask -- "top 5 crypto markets by volume"
 */
import 'dotenv/config';
import { loadConfig } from '../src/config';
import { createAgent } from '../src/agent';
import { errorMessage } from '../src/errors';

async function main() {
  const question = process.argv.slice(2).join(' ').trim();
  if (!question) {
    console.log('Usage: npm run ask -- "<question>"');
    process.exit(1);
  }

  const agent = createAgent(loadConfig());
  const reply = await agent.handle(question, 'cli');
  console.log('');
  console.log(reply);
}

main().catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
