import pg from 'pg';
import { readFile } from 'fs/promises';
import { resolve } from 'path';

const { Pool } = pg;

export interface DbQueryResult {
  rows: Record<string, unknown>[];
  rowCount?: number | null;
}

/** The slice of `pg.Pool` the repositories need; tests hand in a fake. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<DbQueryResult>;
}

let _pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: process.env['DATABASE_URL'],
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'taxi-analytics',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

const SCHEMA_PATH = resolve(__dirname, '../../sql/schema.sql');

/** Create the analytics schema and tables if missing (idempotent). */
export async function applySchema(db: Queryable = getPool()): Promise<void> {
  const ddl = await readFile(SCHEMA_PATH, 'utf8');
  await db.query(ddl);
  console.log('[pg-pool] schema applied');
}
