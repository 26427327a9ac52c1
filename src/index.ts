/**
 * Fuel Ledger Entry Point
 *
 * IMPORTANT: dotenv must be loaded BEFORE any other imports
 * so LOG_LEVEL and NODE_ENV are set when the logger is created
 */

// Load environment variables FIRST (before any other imports)
import dotenv from 'dotenv';
dotenv.config();

// Now import everything else AFTER dotenv is configured
import http from 'http';
import packageJson from '../package.json';
import { createApp } from './app';
import { AppConfig, loadConfig, validateConfig } from './config';
import { systemClock } from './lib/date';
import { LedgerEngine } from './lib/ledger';
import { parseAmount } from './lib/money';
import type { LedgerStore } from './db/store';
import { MemoryLedgerStore } from './db/memory';
import { PostgresLedgerStore } from './db/postgres';
import { createPool } from './db/pool';
import { logger } from './middleware/logging';

async function createStore(config: AppConfig): Promise<LedgerStore> {
  if (!config.database.url) {
    logger.warn({ event: 'store_selected', store: 'memory' }, 'DATABASE_URL not set, expenses will not survive a restart');
    return new MemoryLedgerStore();
  }

  const store = new PostgresLedgerStore({ pool: createPool(config.database) });
  await store.migrate();
  logger.info({ event: 'store_selected', store: 'postgres', poolMax: config.database.poolMax });
  return store;
}

async function startServer(): Promise<void> {
  const config = loadConfig();

  // Validate configuration before starting
  validateConfig(config);

  const store = await createStore(config);
  const defaultLimit = parseAmount(config.ledger.defaultLimit, 'DEFAULT_LIMIT');

  const ledger = new LedgerEngine({
    store,
    clock: systemClock(config.ledger.timeZone),
    defaultLimit,
  });

  const app = createApp({ ledger, defaultLimit, timeZone: config.ledger.timeZone });
  const server = http.createServer(app);

  server.listen(config.port, () => {
    logger.info({
      event: 'server_started',
      port: config.port,
      env: config.nodeEnv,
      version: packageJson.version,
      releaseNotes: packageJson.changelog.description,
      timezone: config.ledger.timeZone,
      defaultLimit: defaultLimit.toFixed(2),
    }, `Fuel ledger running on http://localhost:${config.port}`);
  });

  // Handle shutdown signals
  const shutdown = (signal: string) => {
    logger.info({ event: 'shutdown', signal });
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ event: 'shutdown_failed', err: error });
          process.exit(1);
        },
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  logger.fatal({ event: 'startup_failed', err: error }, 'Failed to start server');
  process.exit(1);
});
