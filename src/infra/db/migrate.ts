import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Queryable } from './pool.js';
import { createLogger } from '../logger.js';

export const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

export interface MigrationClient extends Queryable {
  release(): void;
}

/**
 * What the runner needs from a pg Pool: plain queries plus a dedicated
 * client for each migration's transaction.
 */
export interface MigrationPool extends Queryable {
  connect(): Promise<MigrationClient>;
}

export interface Migration {
  filename: string;
  version: number;
}

const log = createLogger('migrate');

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedVersions(db: Queryable): Promise<number[]> {
  const result = await db.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: MigrationPool, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
    log.info('Applied migration', { version: migration.version, file: migration.filename });
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every migration not yet recorded in schema_migrations, in version
 * order, each in its own transaction. Returns the versions applied.
 */
export async function runMigrations(
  pool: MigrationPool,
  dir: string = MIGRATIONS_DIR
): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await listMigrations(dir);
  const applied = new Set(await getAppliedVersions(pool));

  const pending = migrations.filter((m) => !applied.has(m.version));
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
  }

  return pending.map((m) => m.version);
}
