import pg from 'pg';
import type { QueryResultRow } from 'pg';

const { Pool } = pg;

/**
 * The slice of pg used by the repositories. pg.Pool and pg.PoolClient
 * both satisfy it, which lets tests substitute an in-process fake.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<TransactionClient>;
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    console.log('Database connection established');
  });

  // Idle client errors (e.g. the server restarting) must not crash the process
  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
