/**
 * Drizzle schema
 * Postgres table definitions; the DDL itself lives in /migrations.
 */

import { sql } from 'drizzle-orm';
import { bigserial, check, doublePrecision, index, integer, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const forecasts = pgTable(
  'forecasts',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    messageId: integer('message_id').notNull(),
    city: text('city').notNull(),
    description: text('description').notNull(),
    temperature: doublePrecision('temp').notNull(),
    humidity: integer('humidity').notNull(),
    windSpeed: doublePrecision('wind').notNull(),
    madeAt: timestamp('made_at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => [
    check('forecasts_city_check', sql`length(${table.city}) > 0`),
    check('forecasts_humidity_check', sql`${table.humidity} > 0`),
    check('forecasts_wind_check', sql`${table.windSpeed} > 0`),
    index('idx_forecasts_made_at').on(table.madeAt),
  ],
);

export type ForecastRow = typeof forecasts.$inferSelect;
export type NewForecastRow = typeof forecasts.$inferInsert;

export const schemaMigrations = pgTable('schema_migrations', {
  version: text('version').primaryKey(),
  appliedAt: timestamp('applied_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
});
