/**
 * Applies the SQL files of the migrations directory in file-name order.
 * Applied versions are recorded in schema_migrations, so reruns are no-ops.
 */
import fs from 'fs/promises';
import path from 'path';
import { sql } from 'drizzle-orm';
import type { AppLogger } from '@/services/logger';
import type { DatabaseConnector } from './connection';
import { schemaMigrations } from './schema';
import { withTransaction } from './transaction';

const CREATE_MIGRATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS schema_migrations (
    version TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`;

// Serializes migrations across processes sharing the database.
const MIGRATION_LOCK = sql.raw('SELECT pg_advisory_xact_lock(72419001)');

/** @returns the versions applied by this run */
export async function runMigrations(
  connector: DatabaseConnector,
  dir: string,
  logger: AppLogger,
): Promise<string[]> {
  const migrationsDir = path.resolve(process.cwd(), dir);
  const files = (await fs.readdir(migrationsDir)).filter((f) => f.endsWith('.sql')).sort();

  const applied = await withTransaction(connector, 'migrate', async ({ db, runScript }) => {
    await db.execute(MIGRATION_LOCK);
    await runScript(CREATE_MIGRATIONS_TABLE);

    const done = new Set((await db.select({ version: schemaMigrations.version }).from(schemaMigrations)).map((r) => r.version));
    const versions: string[] = [];

    for (const file of files) {
      const version = path.basename(file, '.sql');
      if (done.has(version)) continue;

      await runScript(await fs.readFile(path.join(migrationsDir, file), 'utf8'));
      await db.insert(schemaMigrations).values({ version });
      versions.push(version);
    }
    return versions;
  });

  logger.info('db:migrated', { dir: migrationsDir, applied, total: files.length });
  return applied;
}
