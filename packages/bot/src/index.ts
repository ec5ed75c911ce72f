import { logger } from '@broadside/server/logger';
import { BotClient, parseActionDelay } from './BotClient.js';
import { isStrategyName } from './strategies.js';

// Parse command line arguments
const args = process.argv.slice(2);
// biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
const serverUrl = args[0] ?? process.env['BOT_SERVER_URL'] ?? 'ws://localhost:4001';

// biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
const strategyName = process.env['BOT_STRATEGY'] ?? 'hunt';
if (!isStrategyName(strategyName)) {
  logger.error('Unknown bot strategy', { strategy: strategyName, expected: ['random', 'hunt'] });
  process.exit(1);
}

const config = {
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  name: process.env['BOT_NAME'] ?? `bot-${process.pid}`,
  strategy: strategyName,
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  actionDelayMs: parseActionDelay(process.env['BOT_ACTION_DELAY_MS']),
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  requeue: process.env['BOT_REQUEUE'] === 'true',
};

logger.info('Starting bot player', { serverUrl, ...config });

const bot = new BotClient(config);
bot.connect(serverUrl);

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, disconnecting bot...');
  bot.disconnect();
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, disconnecting bot...');
  bot.disconnect();
  process.exit(0);
});
