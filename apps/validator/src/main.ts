import 'dotenv/config';
import type { Pool } from 'pg';
import { TokenCache } from './auth/token-cache.js';
import { getConfig } from './config.js';
import { closeDatabase, initDatabase } from './data/database.js';
import { PgValidationStore } from './data/pg-store.js';
import { HealthServer } from './health.js';
import { createLogger } from './logger.js';
import { createValidationPoller } from './poller.js';
import { ValidationClient } from './validation/client.js';

/**
 * Validator Service Entry Point
 *
 * Drains sunat_queue against the SUNAT validarcomprobante API and keeps the
 * history, snapshot and purchase_invoice_header columns up to date.
 */
async function main(): Promise<void> {
  const config = getConfig();
  const logger = createLogger(config);

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      workerBatch: config.workerBatch,
      workerThreads: config.workerThreads,
      clientId: config.sunatClientId,
    },
    'Starting SUNAT validator service',
  );

  let pool: Pool;
  try {
    pool = await initDatabase(config, logger);
  } catch (error) {
    logger.fatal({ error }, 'Database connection failed');
    process.exit(1);
  }

  const store = new PgValidationStore(pool, logger);
  const tokenCache = new TokenCache({
    config: {
      clientId: config.sunatClientId,
      clientSecret: config.sunatClientSecret,
      authBaseUrl: config.authBaseUrl,
      timeoutMs: config.httpTimeoutMs,
    },
    logger,
  });
  const client = new ValidationClient({
    config: {
      apiBaseUrl: config.apiBaseUrl,
      ruc: config.sunatRuc,
      timeoutMs: config.httpTimeoutMs,
      retryMax: config.retryMax,
    },
    logger,
  });
  const poller = createValidationPoller(
    { store, tokenCache, client, logger },
    {
      batchSize: config.workerBatch,
      concurrency: config.workerThreads,
      idlePollIntervalMs: config.idlePollIntervalMs,
    },
  );
  const healthServer = new HealthServer(config, { store, poller, tokenCache }, logger);

  // Graceful shutdown handler
  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, finishing current cycle...');

    try {
      await healthServer.stop();
      await poller.stop();
      await closeDatabase(logger);

      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason: reason instanceof Error ? reason.message : String(reason) }, 'Unhandled rejection');
    process.exit(1);
  });

  await healthServer.start();
  poller.start();

  logger.info('SUNAT validator service started');
}

main().catch((error: unknown) => {
  console.error('Failed to start SUNAT validator service:', error);
  process.exit(1);
});
