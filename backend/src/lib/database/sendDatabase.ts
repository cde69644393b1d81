/**
 * SEND Data Store Client
 * PostgreSQL pool and query helpers for the pooled SEND database
 */

import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { getConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

// Singleton pool instance
let pool: Pool | null = null;

const dbLogger = logger.child({ service: 'SendDatabase' });

/**
 * Get SEND database pool instance
 */
export function getSendPool(): Pool {
  if (!pool) {
    const config = getConfig();

    if (!config.DATABASE_URL) {
      throw new ConfigurationError('DATABASE_URL environment variable is required');
    }

    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DB_POOL_MAX,
      idleTimeoutMillis: config.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: config.DB_CONNECTION_TIMEOUT_MS,
    });

    pool.on('error', (err) => {
      dbLogger.error({ error: err }, 'SEND database pool error');
    });

    dbLogger.info({ max: config.DB_POOL_MAX }, 'SEND database pool initialized');
  }

  return pool;
}

/**
 * Execute a read query
 */
export const query: QueryFn = async <T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[]
): Promise<QueryResult<T>> => {
  const start = Date.now();

  try {
    const result = await getSendPool().query<T>(sql, params);
    const duration = Date.now() - start;

    dbLogger.debug({ sql: sql.slice(0, 100), duration, rowCount: result.rowCount }, 'SEND query executed');

    return result;
  } catch (error) {
    dbLogger.error({ error, sql: sql.slice(0, 200) }, 'SEND query failed');
    throw error;
  }
};

/**
 * Close the pool (graceful shutdown)
 */
export async function closeSendPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    dbLogger.info('SEND database pool closed');
  }
}
