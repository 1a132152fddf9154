/**
 * @module Schema
 * @description Database schema definitions for Drizzle ORM.
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core'

/**
 * Drizzle ORM schema for the `current_weather` table.
 *
 * Append-only time series: one row per loaded snapshot. Epoch-second fields
 * from the provider (`sys.sunrise`, `sys.sunset`, `dt`) are stored as
 * `timestamp` integers and read back as `Date`.
 *
 * @example
 * ```ts
 * import { drizzle } from 'drizzle-orm/better-sqlite3'
 * import { current_weather } from './schema.js'
 *
 * const db = drizzle(sqlite)
 * const rows = db.select().from(current_weather).where(eq(current_weather.location_id, 123456)).all()
 * ```
 */
export const current_weather = sqliteTable('current_weather', {
  location_id: integer('location_id').notNull(),
  location_name: text('location_name').notNull(),
  location_country: text('location_country').notNull(),
  sunrise: integer('sunrise', { mode: 'timestamp' }).notNull(),
  sunset: integer('sunset', { mode: 'timestamp' }).notNull(),
  location_lon: real('location_lon').notNull(),
  location_lat: real('location_lat').notNull(),
  weather_main: text('weather_main').notNull(),
  weather_description: text('weather_description').notNull(),
  timestamp_local: integer('timestamp_local', { mode: 'timestamp' }).notNull(),
  temperature: real('temperature').notNull(),
  temperature_feels_like: real('temperature_feels_like').notNull(),
  temperature_min: real('temperature_min').notNull(),
  temperature_max: real('temperature_max').notNull(),
  pressure: integer('pressure').notNull(),
  humidity: integer('humidity').notNull(),
  wind_speed: real('wind_speed').notNull(),
  wind_degrees: integer('wind_degrees').notNull(),
  clouds: integer('clouds').notNull(),
}, (table) => ({
  location_idx: index('idx_current_weather_location').on(table.location_id),
}))

/**
 * Drizzle ORM schema for the `location` table.
 *
 * Derived from `current_weather`; a row is inserted once per `id` and never
 * updated or deleted.
 */
export const location = sqliteTable('location', {
  id: integer('id').primaryKey(),
  name: text('name').notNull(),
  country: text('country').notNull(),
  lon: real('lon').notNull(),
  lat: real('lat').notNull(),
})

export type CurrentWeatherRow = typeof current_weather.$inferSelect
export type CurrentWeatherInsert = typeof current_weather.$inferInsert
export type LocationRow = typeof location.$inferSelect

/**
 * SQL to create the tables above.
 *
 * Safe to run multiple times (uses IF NOT EXISTS).
 */
export const WEATHER_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS current_weather (
  location_id INTEGER NOT NULL,
  location_name TEXT NOT NULL,
  location_country TEXT NOT NULL,
  sunrise INTEGER NOT NULL,
  sunset INTEGER NOT NULL,
  location_lon REAL NOT NULL,
  location_lat REAL NOT NULL,
  weather_main TEXT NOT NULL,
  weather_description TEXT NOT NULL,
  timestamp_local INTEGER NOT NULL,
  temperature REAL NOT NULL,
  temperature_feels_like REAL NOT NULL,
  temperature_min REAL NOT NULL,
  temperature_max REAL NOT NULL,
  pressure INTEGER NOT NULL,
  humidity INTEGER NOT NULL,
  wind_speed REAL NOT NULL,
  wind_degrees INTEGER NOT NULL,
  clouds INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_current_weather_location ON current_weather(location_id);

CREATE TABLE IF NOT EXISTS location (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  country TEXT NOT NULL,
  lon REAL NOT NULL,
  lat REAL NOT NULL
);
`
