/**
 * Gateway entry point
 */

// Load environment variables first
import './env-loader.js';

import { logger } from '@tenantune/logger';
import { GatewayApplication } from './main.js';

async function start(): Promise<void> {
  const app = new GatewayApplication();

  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received signal, shutting down');
    app.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Rejection');
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught Exception');
    process.exit(1);
  });

  await app.initialize();
}

start().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start gateway');
  process.exit(1);
});
