/**
 * PostgreSQL pool lifecycle for the validator.
 *
 * - DATE columns are returned as their YYYY-MM-DD text so issue dates never
 *   go through a local-time Date conversion
 * - BIGINT and NUMERIC keep pg's default string representation
 */

import pg from 'pg';
import type { Pool, PoolConfig } from 'pg';
import type { Logger } from 'pino';
import type { Config } from '../config.js';

const PG_DATE_OID = 1082;

let poolInstance: Pool | null = null;

export function createPool(
  config: Pick<Config, 'databaseUrl' | 'dbPoolSize' | 'httpTimeoutMs'>,
): Pool {
  pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

  const poolConfig: PoolConfig = {
    connectionString: config.databaseUrl,
    max: config.dbPoolSize,
    idleTimeoutMillis: 60_000,
    connectionTimeoutMillis: 15_000,
    statement_timeout: Math.max(60_000, config.httpTimeoutMs),
    application_name: 'sunat-validator',
  };

  return new pg.Pool(poolConfig);
}

/**
 * Initialize the shared pool and verify connectivity. Connection failures
 * here are fatal to the process.
 */
export async function initDatabase(
  config: Pick<Config, 'databaseUrl' | 'dbPoolSize' | 'httpTimeoutMs'>,
  logger: Logger,
): Promise<Pool> {
  if (poolInstance) {
    return poolInstance;
  }

  logger.info({ poolSize: config.dbPoolSize }, 'Initializing database connection...');
  const pool = createPool(config);

  pool.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  try {
    await checkConnection(pool);
  } catch (error) {
    await pool.end();
    throw error;
  }

  poolInstance = pool;
  logger.info('Database connection initialized');
  return pool;
}

export async function checkConnection(pool: Pick<Pool, 'query'>): Promise<void> {
  const result = await pool.query<{ ok: number }>('SELECT 1 AS ok');
  if (result.rows[0]?.ok !== 1) {
    throw new Error('Database connection test failed - unexpected result');
  }
}

export async function closeDatabase(logger: Logger): Promise<void> {
  if (poolInstance) {
    logger.info('Closing database connection...');
    await poolInstance.end();
    poolInstance = null;
    logger.info('Database connection closed');
  }
}
