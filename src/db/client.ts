import { Pool } from 'pg';
import { logger } from '../utils/logger';

export interface QueryOutcome {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * Anything that runs a parameterized statement: the pool or a checked-out client
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<TransactionClient>;
}

let pool: Pool | null = null;

function isServerless(env: NodeJS.ProcessEnv): boolean {
  return (
    env.NODE_ENV === 'production' ||
    env.VERCEL === '1' ||
    env.VERCEL_ENV === 'production' ||
    !!env.VERCEL_URL ||
    !!env.AWS_LAMBDA_FUNCTION_NAME
  );
}

/**
 * Managed databases need SSL with self-signed certificates accepted
 * Locally DATABASE_SSL=false turns it off
 */
export function resolveSsl(env: NodeJS.ProcessEnv): false | { rejectUnauthorized: boolean } {
  if (!isServerless(env) && env.DATABASE_SSL === 'false') {
    return false;
  }
  return { rejectUnauthorized: false };
}

/**
 * Drops SSL query parameters so the explicit `ssl` option is the only one applied
 */
export function stripSslParams(connectionString: string): string {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    return connectionString;
  }
  for (const param of ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl']) {
    url.searchParams.delete(param);
  }
  return url.toString();
}

export function getPool(env: NodeJS.ProcessEnv = process.env): Pool {
  if (!pool) {
    const databaseUrl = env.DATABASE_URL;
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    pool = new Pool({
      connectionString: stripSslParams(databaseUrl),
      ssl: resolveSsl(env),
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

/**
 * Runs the callback between BEGIN and COMMIT on one client
 * Any error rolls the transaction back and is rethrown
 */
export async function withTransaction<T>(
  callback: (client: Queryable) => Promise<T>,
  connectionPool: ConnectionPool = getPool()
): Promise<T> {
  const client = await connectionPool.connect();
  let broken = false;
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = true;
      logger.error('Rollback failed', rollbackError);
    }
    throw error;
  } finally {
    // A client whose rollback failed is not returned to the pool
    client.release(broken);
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
