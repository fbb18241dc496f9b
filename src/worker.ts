/**
 * Reconciler worker entry point.
 * Runs reconciliation passes on a fixed interval until signalled to stop.
 */

import { buildCore } from './app/build-core.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'shortlink-reconciler',
    pretty: config.logger.pretty,
  });

  logger.info({ reconciler: config.reconciler }, 'Starting reconciler worker');

  const core = await buildCore({ config, logger });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await core.close();
      logger.info('Reconciler worker stopped gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  core.scheduler.start();
};

// Start the worker (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
