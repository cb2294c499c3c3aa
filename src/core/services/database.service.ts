import pg from 'pg';

import { env } from '../config.js';
import { logger } from '../logger.js';

const pool = new pg.Pool({
  host: env.PGHOST,
  port: env.PGPORT,
  database: env.PGDATABASE,
  user: env.PGUSER,
  password: env.PGPASSWORD,
  ssl: env.PGSSL ? { rejectUnauthorized: false } : undefined,
});

pool.on('error', (error) => {
  logger.error({ err: error }, 'Unexpected database error');
});

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return pool.query<T>(text, params);
}

export async function getClient(): Promise<pg.PoolClient> {
  return pool.connect();
}

export async function end(): Promise<void> {
  await pool.end();
}
