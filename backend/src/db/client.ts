import pg from 'pg';
import { getAppConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';

const { Pool } = pg;

const log = createLogger('Database');

// TLS is configured through the connection string, e.g. `?sslmode=require`.
const pool = new Pool({
  connectionString: process.env.DATABASE_URL
});

const debugSql = getAppConfig().debugSql;

pool.on('connect', () => {
  if (debugSql) {
    log.info('Connected to PostgreSQL database');
  }
});

pool.on('error', (err: Error) => {
  log.error('Unexpected error on idle client', err);
  process.exit(-1);
});

/**
 * Execute a SQL query
 * @param text - SQL query
 * @param params - Query parameters
 */
export async function query<R extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<R>> {
  const start = Date.now();
  const res = await pool.query<R>(text, params);
  if (debugSql) {
    log.info('Executed query', {
      statement: text.replace(/\s+/g, ' ').trim().slice(0, 200),
      duration: Date.now() - start,
      rows: res.rowCount
    });
  }
  return res;
}

/**
 * Check out a client for a transaction; the caller must release it.
 */
export async function getClient(): Promise<pg.PoolClient> {
  return pool.connect();
}

export async function end(): Promise<void> {
  return pool.end();
}

export default { query, getClient, pool, end };
