import type { ConnectionPool, TransactionClient } from './pool.js';

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client.
 * Any error rolls the transaction back and is rethrown; the client is
 * released either way.
 */
export async function withTransaction<T>(
  pool: ConnectionPool,
  work: (client: TransactionClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let releaseError: Error | undefined;

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      // Connection is unusable; have the pool discard it
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    client.release(releaseError);
  }
}
