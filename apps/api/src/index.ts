/**
 * API Server Entry Point
 *
 * Serves both protocol surfaces:
 * - Newznab search on /api
 * - SABnzbd queue on /sabnzbd/api (and /api?mode=)
 *
 * Jobs persisted by an earlier run are loaded before the poller starts
 * reconciling them.
 */

import { createServer } from './server.js';
import { config } from './config/index.js';
import { buildContainer } from './lib/container.js';
import { logger } from './lib/logger.js';

async function main(): Promise<void> {
  try {
    const container = buildContainer(config);
    const restored = await container.registry.load();
    const server = await createServer({ config, ...container });

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    const shutdown = async (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Received shutdown signal');

      try {
        await container.poller.stop();
        await server.close();
        logger.info('Server closed gracefully');
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    };

    for (const signal of signals) {
      process.once(signal, () => {
        void shutdown(signal);
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });
    container.poller.start();

    logger.info({
      port: config.port,
      env: config.nodeEnv,
      restored,
    }, 'API server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
