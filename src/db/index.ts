import { Pool } from 'pg';
import config from '@config';
import { logger } from '@telemetry/index';

export type PoolOptions = {
  /** Server-side `statement_timeout` for every session of the pool. */
  statementTimeoutMs: number;
  max?: number;
  name?: string;
};

export const createPool = (options: PoolOptions) => {
  logger.info({ pool: options.name ?? 'default' }, 'Connecting to PostgreSQL...');
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: options.max ?? config.database.maxConnections,
    idleTimeoutMillis: config.database.idleTimeoutMs,
    statement_timeout: options.statementTimeoutMs,
  });
  // Idle clients can error when the server restarts; without a listener the process would crash.
  pool.on('error', (err) => logger.error({ err }, 'PostgreSQL pool error'));
  return pool;
};
