/**
 * Leadflow API Server
 *
 * Serves the operator API. The scheduler only runs when adapters for the
 * external ports are wired in through createServer.
 */

import { createLogger } from '@leadflow/core';

import { loadConfig } from './config.js';
import { createServer } from './server.js';

const logger = createLogger({ name: 'main' });

async function main(): Promise<void> {
  const config = loadConfig();

  const server = await createServer({
    config: config.workflow,
    database: config.database.url
      ? { url: config.database.url, maxConnections: config.database.maxConnections }
      : undefined,
    httpLogger: { level: config.logger.level },
  });

  if (server.schedulerEnabled) {
    server.scheduler.start();
  } else {
    logger.warn('No port adapters configured; leads will not advance until a scheduler is wired in');
  }

  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      server
        .close()
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  const address = await server.app.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info({ address, env: config.env }, 'Leadflow API server started');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
