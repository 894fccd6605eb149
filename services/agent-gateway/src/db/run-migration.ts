import { promises as fsp } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Pool as PgPool } from 'pg';

export const DEFAULT_MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../migrations');

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    name VARCHAR(255) PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

/**
 * Applies every `*.sql` file in `migrationsDir` that has not been applied yet,
 * in lexical order, each in its own transaction.
 *
 * @returns names of the files applied by this run
 *
 * @example
 * ```typescript
 * const applied = await runMigrations(pool);
 * console.log(`Applied ${applied.length} migration(s)`);
 * ```
 */
export async function runMigrations(pool: PgPool, migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
  const files = (await fsp.readdir(migrationsDir)).filter(file => file.endsWith('.sql')).sort();
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await client.query(MIGRATIONS_TABLE);
    const result = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(result.rows.map(row => row.name));

    for (const file of files) {
      if (done.has(file)) continue;

      const sqlText = await fsp.readFile(path.join(migrationsDir, file), 'utf-8');
      console.log(`[migrations] Applying ${file}...`);
      try {
        await client.query('BEGIN');
        await client.query(sqlText);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        applied.push(file);
      } catch (error) {
        await client.query('ROLLBACK');
        console.error(`[migrations] ${file} failed:`, error);
        throw error;
      }
    }
  } finally {
    client.release();
  }

  if (applied.length === 0) {
    console.log('[migrations] Schema is up to date');
  }
  return applied;
}
