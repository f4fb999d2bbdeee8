import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type pg from 'pg';
import { get_pool, close_pool } from './index.js';
import { logger } from '../lib/logger.js';
import { to_storage_error } from '../lib/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const MIGRATIONS_DIR = join(__dirname, 'migrations');

// Arbitrary key shared by every instance running migrations
const MIGRATION_LOCK_KEY = 7_310_224;

export function select_pending(files: string[], applied: Set<string>): string[] {
  return files
    .filter((f) => f.endsWith('.sql') && !applied.has(f))
    .sort();
}

async function ensure_migrations_table(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
}

async function get_applied_migrations(client: pg.PoolClient): Promise<Set<string>> {
  const result = await client.query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY id'
  );
  return new Set(result.rows.map((row) => row.filename));
}

async function apply_migration(client: pg.PoolClient, dir: string, filename: string): Promise<void> {
  const sql = await readFile(join(dir, filename), 'utf-8');

  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [filename]);
    await client.query('COMMIT');
    logger.info('migration applied', { filename });
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
}

export async function run_migrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  logger.info('starting migrations', { dir });

  let client: pg.PoolClient;
  try {
    client = await get_pool().connect();
  } catch (err) {
    throw to_storage_error(err);
  }

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensure_migrations_table(client);
      const applied = await get_applied_migrations(client);
      const pending = select_pending(await readdir(dir), applied);

      if (pending.length === 0) {
        logger.info('no pending migrations');
        return [];
      }

      logger.info('pending migrations', { count: pending.length, files: pending });

      for (const filename of pending) {
        await apply_migration(client, dir, filename);
      }

      logger.info('migrations complete', { applied: pending.length });
      return pending;
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }
}

// Run directly if this is the main module
const is_main = process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js');
if (is_main) {
  run_migrations()
    .then(() => close_pool())
    .catch((err: unknown) => {
      logger.error('migration failed', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      process.exit(1);
    });
}
