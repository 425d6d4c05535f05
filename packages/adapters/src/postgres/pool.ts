import pg from 'pg';
import { ConcurrencyConflict, DuplicateRecord, StorageError, ValidationError } from '@rentdesk/domain';
import type { Row } from './row.js';

const { Pool, types } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

/** Anything that can run a parameterized statement: the pool or a checked-out client. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
}

export interface PoolOptions {
  connectionString?: string;
  max?: number;
}

// DATE stays a calendar-date string; NUMERIC already arrives as a string.
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

let _pool: pg.Pool | null = null;
let _options: PoolOptions = {};

/** Must run before the first getPool() call to take effect. */
export function configurePool(options: PoolOptions): void {
  _options = options;
}

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: _options.connectionString ?? process.env['DATABASE_URL'],
      max: _options.max ?? 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'rentdesk-api',
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

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', '57P01', '57P03']);

/** Maps driver errors onto the domain taxonomy; anything else passes through. */
export function translatePgError(err: unknown): unknown {
  if (err instanceof pg.DatabaseError) {
    switch (err.code) {
      case '23505':
        return new DuplicateRecord(err.table ?? 'record', err.constraint ?? 'key', err.detail ?? '');
      case '23502':
      case '23503':
      case '23514':
      case '22P02':
      case '22003':
      case '22007':
      case '22008':
        return new ValidationError(err.message, { constraint: err.constraint ?? null });
      case '40001':
      case '40P01':
      case '55P03':
        return new ConcurrencyConflict(err.message, { pgCode: err.code });
      default:
        break;
    }
  }
  const code = errorCode(err);
  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'))) {
    return new StorageError(`database unavailable (${code})`);
  }
  if (err instanceof Error && err.message.includes('timeout exceeded when trying to connect')) {
    return new StorageError('database unavailable (connect timeout)');
  }
  return err;
}

/** Parameterized query with driver errors translated. */
export async function exec(db: Queryable, text: string, values: unknown[] = []): Promise<Row[]> {
  try {
    const { rows } = await db.query(text, values);
    return rows;
  } catch (err) {
    throw translatePgError(err);
  }
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  fn: (client: DbClient) => Promise<T>,
  pool: DbPool = getPool(),
): Promise<T> {
  let client: DbClient;
  try {
    client = await pool.connect();
  } catch (err) {
    throw translatePgError(err);
  }
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      console.error('[pg-pool] rollback failed', rollbackErr);
    }
    throw translatePgError(err);
  } finally {
    client.release();
  }
}
