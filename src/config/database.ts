import { Pool } from 'pg';
import type { DatabaseConfig } from './index';
import { logger } from '../utils/logger';

/**
 * Create the connection pool shared by every request.
 */
export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.max,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });

  // pg emits 'error' for idle clients the server drops
  pool.on('error', (err) => {
    logger.error('Idle database client error', { error: err.message });
  });

  return pool;
}
