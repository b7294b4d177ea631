import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { loadDatabaseConfig } from '../config.js';
import { createPool } from './pool.js';
import { withTransaction } from './transaction.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

const pool = createPool(loadDatabaseConfig().databaseUrl);

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
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

async function ensureMigrationsTable(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  await withTransaction(pool, async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
  });
  console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
}

async function migrate(): Promise<void> {
  try {
    console.log('Starting migrations...');

    await ensureMigrationsTable();
    const migrations = await getMigrations();
    const applied = await getAppliedMigrations();

    const pending = migrations.filter((m) => !applied.includes(m.version));

    if (pending.length === 0) {
      console.log('No pending migrations.');
      return;
    }

    console.log(`Found ${pending.length} pending migration(s)`);

    for (const migration of pending) {
      await applyMigration(migration);
    }

    console.log('All migrations applied successfully.');
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
