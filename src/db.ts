import { Pool, PoolClient } from 'pg';

/**
 * Opens the pool the material store runs on. The caller owns it and must
 * `end()` it on shutdown.
 */
export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    console.error('Unexpected DB pool error', err);
  });
  return pool;
}

export async function withTransaction<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
