import pg from 'pg';
import type { DatabaseConfig } from '../../config.js';

const { Pool } = pg;

/**
 * Create the process-wide connection pool.
 * Does not connect eagerly: a missing connection string only fails on first use.
 */
export function createPool(config: DatabaseConfig): pg.Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    console.log('Database connection established');
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
