import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type Queryable = Pick<pg.Pool, 'query'>;

export interface PoolSettings {
  connectionString?: string;
  max?: number;
  /** Server-side cap on a single statement; 0 leaves it to the server default. */
  statementTimeoutMs?: number;
  applicationName?: string;
}

let _pool: pg.Pool | null = null;

/**
 * Process-wide pool. Settings only apply on the first call; later calls
 * return the pool that already exists.
 */
export function getPool(settings: PoolSettings = {}): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: settings.connectionString ?? process.env['DATABASE_URL'],
      max: settings.max ?? 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      statement_timeout: settings.statementTimeoutMs || undefined,
      application_name: settings.applicationName ?? 'sensorgrid',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] idle client error:', err.message);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = null;
  await pool.end();
  console.log('[pg-pool] closed');
}
