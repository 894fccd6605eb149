import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { schema } from './schema.js';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseOptions {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export interface DatabaseHandle {
  db: Database;
  pool: PgPool;
  close(): Promise<void>;
}

/**
 * Creates the pg connection pool and the drizzle handle over it.
 */
export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? 20,
    idleTimeoutMillis: options.idleTimeoutMs ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMs ?? 30000,
  });

  pool.on('error', (err: Error) => {
    console.error('[database] Unexpected error on idle client:', err.message);
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    pool,
    async close(): Promise<void> {
      await pool.end();
      console.log('[database] Connection pool closed');
    },
  };
}
