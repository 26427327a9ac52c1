/**
 * PostgreSQL Connection Pool
 *
 * One pool per process, built from configuration. Every connection acquire,
 * statement and query is bounded by the configured timeout.
 */

import { Pool } from 'pg';
import type { AppConfig } from '../config';
import { logger } from '../middleware/logging';

const IDLE_TIMEOUT_MS = 30_000;

export function createPool(database: AppConfig['database']): Pool {
  const pool = new Pool({
    connectionString: database.url,
    max: database.poolMax,
    connectionTimeoutMillis: database.timeoutMs,
    statement_timeout: database.timeoutMs,
    query_timeout: database.timeoutMs,
    idleTimeoutMillis: IDLE_TIMEOUT_MS,
  });

  // Idle clients can fail (server restart); without a listener the process would crash
  pool.on('error', (err) => {
    logger.error({ event: 'pool_error', err }, 'Idle database client failed');
  });

  return pool;
}
