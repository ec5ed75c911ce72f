import { loadServerConfig } from './config/serverConfig.js';
import { BroadsideServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';

const config = loadServerConfig();
// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
if (!process.env['LOG_LEVEL']) {
  setLogLevel(config.logging.level);
}

logger.info('Starting Broadside server...');

const server = new BroadsideServer(config);

server.start().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});

// Graceful shutdown
const handleSignal = (signal: string) => {
  logger.info(`${signal} received, shutting down...`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    });
};

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));
