import dotenv from 'dotenv';
import { hostTimeZone, isValidTimeZone } from './lib/date';
import { parseAmount } from './lib/money';

// Load environment variables
dotenv.config();

/**
 * Centralized application configuration
 *
 * Read once at startup and handed to the store and engine constructors.
 */
export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;

  database: {
    url: string;
    poolMax: number;
    timeoutMs: number;
  };

  ledger: {
    defaultLimit: string;
    timeZone: string;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',

    database: {
      url: env.DATABASE_URL || '',
      poolMax: parseInt(env.DB_POOL_MAX || '5', 10),
      timeoutMs: parseInt(env.DB_TIMEOUT_MS || '5000', 10),
    },

    ledger: {
      defaultLimit: (env.DEFAULT_LIMIT || '210.00').trim(),
      timeZone: env.LEDGER_TIMEZONE || hostTimeZone(),
    },
  };
}

/**
 * Validate configuration on startup
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('PORT must be an integer between 0 and 65535');
  }

  if (!config.database.url && config.nodeEnv === 'production') {
    errors.push('DATABASE_URL is required in production');
  }

  if (!Number.isInteger(config.database.poolMax) || config.database.poolMax < 1) {
    errors.push('DB_POOL_MAX must be at least 1');
  }

  if (!Number.isInteger(config.database.timeoutMs) || config.database.timeoutMs < 1) {
    errors.push('DB_TIMEOUT_MS must be at least 1');
  }

  try {
    parseAmount(config.ledger.defaultLimit, 'DEFAULT_LIMIT');
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  if (!isValidTimeZone(config.ledger.timeZone)) {
    errors.push(`LEDGER_TIMEZONE is not a known timezone: ${config.ledger.timeZone}`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }
}
