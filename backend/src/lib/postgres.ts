/**
 * PostgreSQL Client
 * Pool singleton plus query/transaction helpers used by the repository adapters
 */

import pg from 'pg';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { getConfig } from './config.js';
import { logger } from './logger.js';

const dbLogger = logger.child({ service: 'Postgres' });

/**
 * Minimal query surface shared by the pool and by transaction clients.
 * Rows come back untyped; repositories decode them with zod.
 */
export interface SqlClient {
  query(sql: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

/**
 * A SqlClient that can also run a callback inside BEGIN/COMMIT.
 */
export interface SqlExecutor extends SqlClient {
  transaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T>;
}

// Singleton pool instance
let pool: pg.Pool | null = null;

/**
 * Get PostgreSQL pool instance
 */
export function getPool(): pg.Pool {
  if (!pool) {
    const connectionString = getConfig().databaseUrl;

    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }

    pool = new pg.Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    pool.on('error', (err) => {
      dbLogger.error({ error: err }, 'PostgreSQL pool error');
    });

    dbLogger.info('PostgreSQL pool initialized');
  }

  return pool;
}

/**
 * Execute a query
 */
export async function query(sql: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
  const start = Date.now();

  try {
    const result = await getPool().query<QueryResultRow>(sql, params);
    const duration = Date.now() - start;

    dbLogger.debug({ sql: sql.slice(0, 100), duration, rowCount: result.rowCount }, 'PostgreSQL query executed');

    return result;
  } catch (error) {
    dbLogger.error({ error, sql: sql.slice(0, 200) }, 'PostgreSQL query failed');
    throw error;
  }
}

/**
 * Execute a query with a dedicated client (for transactions)
 */
export async function withClient<T>(
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();

  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

/**
 * Execute a transaction
 */
export async function transaction<T>(
  fn: (client: SqlClient) => Promise<T>
): Promise<T> {
  return withClient(async (client) => {
    const scoped: SqlClient = {
      query: (sql: string, params?: unknown[]) => client.query<QueryResultRow>(sql, params),
    };

    await client.query('BEGIN');
    try {
      const result = await fn(scoped);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  });
}

/**
 * Pool-backed executor handed to the repository adapters
 */
export const postgres: SqlExecutor = {
  query,
  transaction,
};

/**
 * Close the pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    dbLogger.info('PostgreSQL pool closed');
  }
}
