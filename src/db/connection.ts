/**
 * Database connector.
 *
 * Every transaction checks out its own connection, so concurrent callers
 * never share a session or a cursor.
 */
import { Pool, type PoolClient } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { AppLogger } from '@/services/logger';
import { ConfigError } from '@/utils/errors';
import * as schema from './schema';

export type ForecastDatabase = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseConnection {
  readonly db: ForecastDatabase;
  /** Runs a multi-statement SQL script (migrations). */
  runScript(script: string): Promise<void>;
  /** @param broken drop the connection instead of returning it to the pool */
  release(broken?: boolean): void;
}

export interface DatabaseConnector {
  connect(): Promise<DatabaseConnection>;
  close(): Promise<void>;
}

export interface PgConnectorOptions {
  dsn: string;
  maxConns: number;
  connectTimeoutMs: number;
  logger: AppLogger;
}

export class PgConnector implements DatabaseConnector {
  private readonly pool: Pool;
  private readonly logger: AppLogger;
  private readonly maxConns: number;

  constructor(options: PgConnectorOptions) {
    if (!options.dsn) {
      throw new ConfigError([{ path: 'dsn', message: 'DSN is empty' }]);
    }
    this.logger = options.logger;
    this.maxConns = options.maxConns;
    this.pool = new Pool({
      connectionString: options.dsn,
      max: options.maxConns,
      connectionTimeoutMillis: options.connectTimeoutMs,
    });
    this.pool.on('error', (err) => {
      this.logger.warn('db:idle_client_error', { error: err.message });
    });
  }

  async connect(): Promise<DatabaseConnection> {
    const client = await this.pool.connect();
    return wrapClient(client);
  }

  /** Checks that the database answers. */
  async ping(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    this.logger.info('db:connected', { maxConns: this.maxConns });
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('db:closed');
  }
}

function wrapClient(client: PoolClient): DatabaseConnection {
  const db: ForecastDatabase = drizzle(client, { schema });
  let released = false;

  return {
    db,
    async runScript(script: string): Promise<void> {
      await client.query(script);
    },
    release(broken = false): void {
      if (released) return;
      released = true;
      client.release(broken);
    },
  };
}
