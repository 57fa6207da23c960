import { Pool, PoolClient, QueryConfig, QueryResult, QueryResultRow, types } from 'pg';

// Sale and forecast dates are DATE columns; keep them as "YYYY-MM-DD" strings so they
// line up with the ISO date keys used throughout the forecasting code.
types.setTypeParser(1082, (value) => value);
// NUMERIC comes back as text by default.
types.setTypeParser(1700, (value) => parseFloat(value));

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) return pool;
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL must be set before using the forecasting store');
  }
  pool = new Pool({
    connectionString: process.env.DATABASE_URL
  });
  pool.on('error', (err) => {
    console.error('Unexpected DB pool error', err);
  });
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  config: string | QueryConfig<unknown[]>,
  params?: unknown[]
): Promise<QueryResult<T>> {
  if (typeof config === 'string') {
    return getPool().query<T>(config, params);
  }
  return getPool().query<T>(config);
}

export async function withTransaction<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
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

export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
}
