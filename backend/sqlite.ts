/**
 * @module Backends
 * @description Embedded SQLite storage for observations and derived locations.
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { sql } from "drizzle-orm";
import { mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { EventHandler, LocationReader, RelationalLoader, Result, SavedLocation, WeatherError } from "../types.js";
import { ok, err } from "../types.js";
import { try_catch, try_catch_async, to_error } from "../result.js";
import { observation_codec } from "../codec.js";
import { create_emitter, epoch_to_date } from "../utils.js";
import { current_weather, location, WEATHER_MIGRATION_SQL, type CurrentWeatherInsert } from "../schema.js";
import type { Observation } from "../openweather/schema.js";

/**
 * An open database: the raw connection, its drizzle handle and the file it was opened from.
 */
export type WeatherDatabase = {
	path: string;
	sqlite: Database.Database;
	db: BetterSQLite3Database;
};

const IN_MEMORY = ":memory:";

/**
 * Opens (creating if needed) the database file at `path`.
 * The parent directory is created first. `":memory:"` opens a private in-memory database.
 */
export async function open_database(path: string): Promise<Result<WeatherDatabase, WeatherError>> {
	return try_catch_async(
		async () => {
			if (path !== IN_MEMORY) await mkdir(dirname(path), { recursive: true });
			const sqlite = new Database(path);
			return { path, sqlite, db: drizzle(sqlite) };
		},
		(cause): WeatherError => ({ kind: "storage_unavailable", path, cause: to_error(cause) })
	);
}

/**
 * Runs {@link WEATHER_MIGRATION_SQL}. Safe to run on every start.
 */
export function ensure_tables(database: WeatherDatabase): Result<void, WeatherError> {
	return try_catch(
		() => {
			database.sqlite.exec(WEATHER_MIGRATION_SQL);
		},
		(cause): WeatherError => ({ kind: "storage_unavailable", path: database.path, cause: to_error(cause) })
	);
}

/**
 * Scoped acquisition: opens the database, ensures the tables exist, runs `fn`
 * and closes the connection whether `fn` succeeds, fails or throws.
 *
 * @example
 * ```ts
 * const saved = await with_database(config.db_path, database =>
 *   create_location_reader({ database }).list_saved()
 * )
 * ```
 */
export async function with_database<T>(path: string, fn: (database: WeatherDatabase) => Result<T, WeatherError> | Promise<Result<T, WeatherError>>): Promise<Result<T, WeatherError>> {
	const opened = await open_database(path);
	if (!opened.ok) return opened;

	const database = opened.value;
	try {
		const tables = ensure_tables(database);
		if (!tables.ok) return tables;
		return await fn(database);
	} finally {
		database.sqlite.close();
	}
}

/**
 * Projects a provider observation into a `current_weather` row.
 *
 * `sunset` is taken from `sys.sunset`.
 */
export function observation_to_row(observation: Observation): CurrentWeatherInsert {
	const [condition] = observation.weather;
	return {
		location_id: observation.id,
		location_name: observation.name,
		location_country: observation.sys.country,
		sunrise: epoch_to_date(observation.sys.sunrise),
		sunset: epoch_to_date(observation.sys.sunset),
		location_lon: observation.coord.lon,
		location_lat: observation.coord.lat,
		weather_main: condition.main,
		weather_description: condition.description,
		timestamp_local: epoch_to_date(observation.dt),
		temperature: observation.main.temp,
		temperature_feels_like: observation.main.feels_like,
		temperature_min: observation.main.temp_min,
		temperature_max: observation.main.temp_max,
		pressure: observation.main.pressure,
		humidity: observation.main.humidity,
		wind_speed: observation.wind.speed,
		wind_degrees: observation.wind.deg,
		clouds: observation.clouds.all,
	};
}

export type SqliteLoaderOptions = {
	database: WeatherDatabase;
	on_event?: EventHandler;
};

/**
 * Creates a {@link RelationalLoader} over an open database.
 *
 * Statements run synchronously on the single connection, so concurrent
 * callers never interleave partial inserts.
 */
export function create_sqlite_loader(options: SqliteLoaderOptions): RelationalLoader {
	const { database, on_event } = options;
	const { db } = database;
	const emit = create_emitter(on_event);

	function fail(error: WeatherError): Result<never, WeatherError> {
		emit({ type: "error", error });
		return err(error);
	}

	function insert_observation(observation: Observation): Result<void, WeatherError> {
		const inserted = try_catch(
			() => {
				db.insert(current_weather).values(observation_to_row(observation)).run();
			},
			(cause): WeatherError => ({ kind: "load_failed", operation: "current_weather.insert", cause: to_error(cause) })
		);
		if (!inserted.ok) return fail(inserted.error);

		emit({ type: "observation_load", location_id: observation.id, location_name: observation.name });
		return ok(undefined);
	}

	return {
		async load_observation(path): Promise<Result<void, WeatherError>> {
			const bytes = await try_catch_async(
				() => readFile(path),
				(cause): WeatherError => ({ kind: "load_failed", operation: "snapshot.read", cause: to_error(cause), path })
			);
			if (!bytes.ok) return fail(bytes.error);

			const observation = try_catch(
				() => observation_codec.decode(bytes.value),
				(cause): WeatherError => ({ kind: "load_failed", operation: "snapshot.decode", cause: to_error(cause), path })
			);
			if (!observation.ok) return fail(observation.error);

			return insert_observation(observation.value);
		},

		insert_observation,

		derive_locations(): Result<number, WeatherError> {
			// One row per id: OR IGNORE drops later tuples that share an id within the same batch.
			const derived = try_catch(
				() =>
					db.run(sql`
						INSERT OR IGNORE INTO location (id, name, country, lon, lat)
						SELECT DISTINCT cw.location_id, cw.location_name, cw.location_country, cw.location_lon, cw.location_lat
						FROM current_weather AS cw
						WHERE NOT EXISTS (SELECT 1 FROM location AS l WHERE l.id = cw.location_id)
					`),
				(cause): WeatherError => ({ kind: "load_failed", operation: "location.derive", cause: to_error(cause) })
			);
			if (!derived.ok) return fail(derived.error);

			emit({ type: "locations_derive", inserted: derived.value.changes });
			return ok(derived.value.changes);
		},
	};
}

export type LocationReaderOptions = {
	database: WeatherDatabase;
	on_event?: EventHandler;
};

/**
 * Creates a {@link LocationReader}. Each `list_saved` call re-queries the table.
 */
export function create_location_reader(options: LocationReaderOptions): LocationReader {
	const { database, on_event } = options;
	const emit = create_emitter(on_event);

	return {
		list_saved(): Result<SavedLocation[], WeatherError> {
			const rows = try_catch(
				() =>
					database.db
						.selectDistinct({ id: location.id, name: location.name, lat: location.lat, lon: location.lon })
						.from(location)
						.orderBy(location.id)
						.all(),
				(cause): WeatherError => ({ kind: "storage_unavailable", path: database.path, cause: to_error(cause) })
			);
			if (!rows.ok) {
				emit({ type: "error", error: rows.error });
				return rows;
			}

			emit({ type: "locations_list", count: rows.value.length });
			return ok(rows.value);
		},
	};
}
