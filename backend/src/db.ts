import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { DbConfig } from './config.js';

let pool: Pool | null = null;

export function connect(config: DbConfig): Pool {
  if (!pool) {
    pool = new Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
    });
  }
  return pool;
}

function getPool(): Pool {
  if (!pool) {
    throw new Error('database pool not connected');
  }
  return pool;
}

export async function disconnect(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResult<T>> {
  if (client) {
    return client.query<T>(text, params);
  }
  return getPool().query<T>(text, params);
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}
