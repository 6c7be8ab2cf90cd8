/**
 * In-process Postgres for tests. PGlite is a single session, so connections
 * are handed out one at a time, like a pool of size one.
 */
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import type { DatabaseConnection, DatabaseConnector, ForecastDatabase } from '@/db/connection';
import { runMigrations } from '@/db/migrate';
import * as schema from '@/db/schema';
import { silentLogger } from '@/services/logger';

export class PgliteConnector implements DatabaseConnector {
  readonly client: PGlite;
  private readonly db: ForecastDatabase;
  private busy = false;
  private readonly waiters: Array<() => void> = [];

  constructor(client: PGlite = new PGlite()) {
    this.client = client;
    this.db = drizzle(client, { schema });
  }

  async connect(): Promise<DatabaseConnection> {
    if (this.busy) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    this.busy = true;

    let released = false;
    return {
      db: this.db,
      runScript: async (script: string) => {
        await this.client.exec(script);
      },
      release: () => {
        if (released) return;
        released = true;
        const next = this.waiters.shift();
        if (next) {
          next();
        } else {
          this.busy = false;
        }
      },
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/** Fresh in-memory database with the project migrations applied. */
export async function createTestDatabase(): Promise<PgliteConnector> {
  const connector = new PgliteConnector();
  await runMigrations(connector, 'migrations', silentLogger());
  return connector;
}
