/**
 * Forecast store: append-only forecast records plus aggregate statistics.
 *
 * Both operations run in their own read-committed transaction on a dedicated
 * pooled connection (see withTransaction).
 */
import { sql } from 'drizzle-orm';
import { z } from 'zod';
import type { DatabaseConnector } from '@/db/connection';
import { forecasts } from '@/db/schema';
import { withTransaction } from '@/db/transaction';
import type { AppLogger } from '@/services/logger';
import { NoDataError, QueryError, ValidationError } from '@/utils/errors';
import { toIssues } from '@/utils/validation';

/** One forecast delivered to a chat, as persisted. */
export interface ForecastRecord {
  messageId: number;
  city: string;
  description: string;
  temperature: number;
  humidity: number;
  windSpeed: number;
  madeAt: Date;
}

export type StatMetric = 'temperature' | 'humidity' | 'wind';

export interface RecordHolder {
  city: string;
  value: number;
}

export interface ForecastStatistics {
  totalRecords: number;
  firstRecordAt: Date;
  recordHolders: Record<StatMetric, RecordHolder>;
}

export interface ForecastRepository {
  insert(record: ForecastRecord): Promise<void>;
  stat(): Promise<ForecastStatistics>;
}

const forecastRecordSchema = z.object({
  messageId: z.number().int(),
  city: z.string().trim().min(1, 'city must not be empty'),
  description: z.string(),
  temperature: z.number().finite(),
  humidity: z.number().int().positive('humidity must be positive'),
  windSpeed: z.number().finite().positive('wind must be positive'),
  madeAt: z.date(),
});

// node-postgres hands timestamptz back as text ("2024-03-01 10:00:00+00").
const timestamptz = z.preprocess(
  (v) => (typeof v === 'string' ? v.replace(' ', 'T').replace(/([+-]\d{2})$/, '$1:00') : v),
  z.coerce.date(),
);

const statRowSchema = z.object({
  total: z.coerce.number().int(),
  first_record_at: timestamptz.nullable(),
  temperature_city: z.string().nullable(),
  temperature_value: z.coerce.number().nullable(),
  humidity_city: z.string().nullable(),
  humidity_value: z.coerce.number().nullable(),
  wind_city: z.string().nullable(),
  wind_value: z.coerce.number().nullable(),
});

const statResultSchema = z.object({
  rows: z.array(statRowSchema).min(1),
});

export type StatRow = z.infer<typeof statRowSchema>;

// Ties on a maximum go to the smallest city name in byte order.
const f = forecasts;
const statQuery = sql`
SELECT
  count(*)::int AS total,
  min(${f.madeAt}) AS first_record_at,
  (SELECT ${f.city} FROM ${f} ORDER BY ${f.temperature} DESC, ${f.city} COLLATE "C" ASC LIMIT 1) AS temperature_city,
  max(${f.temperature}) AS temperature_value,
  (SELECT ${f.city} FROM ${f} ORDER BY ${f.humidity} DESC, ${f.city} COLLATE "C" ASC LIMIT 1) AS humidity_city,
  max(${f.humidity}) AS humidity_value,
  (SELECT ${f.city} FROM ${f} ORDER BY ${f.windSpeed} DESC, ${f.city} COLLATE "C" ASC LIMIT 1) AS wind_city,
  max(${f.windSpeed}) AS wind_value
FROM ${f}`;

// Postgres SQLSTATEs for rows rejected by table constraints.
const CONSTRAINT_VIOLATIONS = new Set(['23502', '23514']);

export class ForecastStore implements ForecastRepository {
  constructor(
    private readonly connector: DatabaseConnector,
    private readonly logger: AppLogger,
  ) {}

  /**
   * Appends one forecast record. Duplicate message ids are stored as
   * separate rows.
   * @throws ValidationError when the record breaks a table invariant
   */
  async insert(record: ForecastRecord): Promise<void> {
    const parsed = forecastRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ValidationError(toIssues(parsed.error));
    }
    const row = parsed.data;

    await withTransaction(this.connector, 'insert forecast', async ({ db }) => {
      try {
        await db.insert(forecasts).values(row);
      } catch (err) {
        throw toStoreError('insert forecast', err);
      }
    });

    this.logger.debug('store:inserted', { messageId: row.messageId, city: row.city });
  }

  /**
   * Computes statistics over every stored record in one statement.
   * @throws NoDataError when nothing has been stored yet
   */
  async stat(): Promise<ForecastStatistics> {
    const row = await withTransaction(this.connector, 'stat forecasts', async ({ db }) => {
      let result: unknown;
      try {
        result = await db.execute(statQuery);
      } catch (err) {
        throw toStoreError('stat forecasts', err);
      }
      return readStatRow(result);
    });

    const stat = toStatistics(row);
    this.logger.debug('store:stat', { total: stat.totalRecords });
    return stat;
  }
}

/**
 * Reads the single stat row from a driver result (`{ rows: [...] }`).
 * @throws QueryError when the row does not have the expected shape
 */
export function readStatRow(result: unknown): StatRow {
  const parsed = statResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new QueryError('stat forecasts', new Error(`unexpected row shape: ${parsed.error.message}`));
  }
  return parsed.data.rows[0];
}

function toStatistics(row: StatRow): ForecastStatistics {
  const temperature = holder(row.temperature_city, row.temperature_value);
  const humidity = holder(row.humidity_city, row.humidity_value);
  const wind = holder(row.wind_city, row.wind_value);

  if (row.total === 0 || !row.first_record_at || !temperature || !humidity || !wind) {
    throw new NoDataError();
  }

  return {
    totalRecords: row.total,
    firstRecordAt: row.first_record_at,
    recordHolders: { temperature, humidity, wind },
  };
}

function holder(city: string | null, value: number | null): RecordHolder | null {
  return city === null || value === null ? null : { city, value };
}

function toStoreError(operation: string, err: unknown): Error {
  const code = sqlState(err);
  if (code !== undefined && CONSTRAINT_VIOLATIONS.has(code)) {
    const message = err instanceof Error ? err.message : 'constraint violated';
    return new ValidationError([{ path: 'row', message }], { cause: err });
  }
  return new QueryError(operation, err);
}

function sqlState(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return sqlState(err.cause);
  return undefined;
}
