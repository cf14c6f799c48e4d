import { Pool, type PoolClient } from 'pg';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { SQL } from './sql.js';

export const pool = new Pool({ connectionString: config.databaseUrl, max: config.collection.globalConcurrency + 2 });

pool.on('error', (err) => logger.error({ err }, 'pg idle client error'));

export async function dbHealth(db: Pool = pool): Promise<boolean> {
  const c = await db.connect();
  try { await c.query(SQL.ping); return true; }
  finally { c.release(); }
}

export async function withTransaction<T>(db: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const c = await db.connect();
  try {
    await c.query('BEGIN');
    const out = await fn(c);
    await c.query('COMMIT');
    return out;
  } catch (err) {
    await c.query('ROLLBACK').catch((rbErr: unknown) => logger.error({ err: rbErr }, 'pg rollback failed'));
    throw err;
  } finally {
    c.release();
  }
}

export async function ensureSchema(db: Pool = pool): Promise<void> {
  await db.query(SQL.schema);
  logger.info('db schema ensured');
}
