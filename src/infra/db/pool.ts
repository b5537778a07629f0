import pg from 'pg';
import type { Pool as PgPool, QueryResult, QueryResultRow } from 'pg';
import { createLogger } from '../logger.js';

const { Pool } = pg;

const log = createLogger('db');

/**
 * The slice of a pg Pool or Client that repositories need.
 * Injected so tests can substitute a stand-in.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface PoolOptions {
  connectionString: string;
  max: number;
  connectionTimeoutMillis: number;
}

export function createPool(options: PoolOptions): PgPool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis,
  });

  pool.on('connect', () => {
    log.debug('Database connection established');
  });

  pool.on('error', (err) => {
    log.error('Unexpected database error', { error: err });
  });

  return pool;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

/**
 * Run a trivial query to confirm the database is reachable.
 */
export async function checkConnection(db: Queryable, timeoutMs: number): Promise<boolean> {
  try {
    await withTimeout(db.query('SELECT 1'), timeoutMs);
    return true;
  } catch (error) {
    log.error('Database health check failed', { error });
    return false;
  }
}
