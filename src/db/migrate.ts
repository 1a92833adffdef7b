import 'dotenv/config';

import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Pool, type PoolClient } from 'pg';

import { getEnv } from '../config/env.js';

/** Advisory lock held for the whole run; concurrent runners wait on it. */
const MIGRATION_LOCK_KEY = 724_201;

interface MigrationFile {
  filename: string;
  sql: string;
  checksum: string;
}

interface AppliedMigrationRow {
  filename: string;
  checksum: string;
}

function hashMigration(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

function defaultMigrationsDirectory(): string {
  return fileURLToPath(new URL('../../migrations', import.meta.url));
}

async function readMigrationFiles(migrationsDirectory: string): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDirectory);
  const sqlFiles = files
    .filter((file) => /^\d{3}_[a-z0-9_]+\.sql$/.test(file))
    .sort((left, right) => left.localeCompare(right));

  return Promise.all(sqlFiles.map(async (filename) => {
    const sql = await readFile(path.join(migrationsDirectory, filename), 'utf8');
    return { filename, sql, checksum: hashMigration(sql) };
  }));
}

async function ensureMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function loadAppliedMigrations(client: PoolClient): Promise<Map<string, string>> {
  const result = await client.query<AppliedMigrationRow>('SELECT filename, checksum FROM schema_migrations');
  return new Map(result.rows.map((row) => [row.filename, row.checksum]));
}

async function applyMigration(client: PoolClient, migration: MigrationFile): Promise<void> {
  try {
    await client.query('BEGIN');
    await client.query(migration.sql);
    await client.query('INSERT INTO schema_migrations (filename, checksum) VALUES ($1, $2)', [migration.filename, migration.checksum]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  }
}

async function runMigrations(pool: Pool, migrationsDirectory = defaultMigrationsDirectory()): Promise<string[]> {
  const migrations = await readMigrationFiles(migrationsDirectory);
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    await ensureMigrationsTable(client);
    const existing = await loadAppliedMigrations(client);

    for (const migration of migrations) {
      const appliedChecksum = existing.get(migration.filename);

      if (appliedChecksum === undefined) {
        const startedAt = Date.now();
        await applyMigration(client, migration);
        applied.push(migration.filename);
        console.log('migration_applied', { filename: migration.filename, durationMs: Date.now() - startedAt });
        continue;
      }

      if (appliedChecksum !== migration.checksum) {
        throw new Error(`Checksum mismatch for migration ${migration.filename}; applied migrations are immutable.`);
      }
    }

    console.log('migrations_complete', { applied: applied.length, total: migrations.length });
    return applied;
  } finally {
    await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    client.release();
  }
}

async function run(): Promise<void> {
  const env = getEnv();
  if (typeof env.DATABASE_URL !== 'string' || env.DATABASE_URL.length === 0) {
    throw new Error('DATABASE_URL must be configured to run migrations.');
  }

  const pool = new Pool({ connectionString: env.DATABASE_URL });
  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
}

void run().catch((error: unknown) => {
  console.error('migrations_failed', { error: error instanceof Error ? error.message : 'unknown' });
  process.exit(1);
});
