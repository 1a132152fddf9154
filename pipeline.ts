/**
 * @module Pipeline
 * @description Wires geocoding, fetching, snapshotting and loading into the two ingestion flows.
 */

import type {
	BootstrapSummary,
	EventHandler,
	Geocoder,
	RefreshSummary,
	Result,
	SavedLocation,
	SnapshotWriter,
	WeatherConfig,
	WeatherError,
	WeatherFetcher,
} from "./types.js";
import { ok } from "./types.js";
import { pipe } from "./result.js";
import { parallel_map } from "./concurrency.js";
import { create_emitter } from "./utils.js";
import { create_geocoder } from "./openweather/geocoder.js";
import { create_weather_fetcher } from "./openweather/fetcher.js";
import { create_snapshot_writer } from "./backend/snapshot.js";
import { create_location_reader, create_sqlite_loader, with_database } from "./backend/sqlite.js";

export type PipelineOptions = {
	config: WeatherConfig;
	on_event?: EventHandler;
	/** Maximum concurrent locations during refresh. Defaults to 1. */
	concurrency?: number;
	/** Clock for snapshot file names. */
	now?: () => Date;
	geocoder?: Geocoder;
	fetcher?: WeatherFetcher;
	writer?: SnapshotWriter;
};

export type Pipeline = {
	bootstrap: (zip?: string) => Promise<Result<BootstrapSummary, WeatherError>>;
	refresh: () => Promise<Result<RefreshSummary, WeatherError>>;
};

/**
 * Creates the ingestion pipeline.
 *
 * - `bootstrap(zip)` - geocode, fetch, snapshot, load, then derive locations.
 *   The first failure ends the flow and is returned.
 * - `refresh()` - fetch, snapshot and load every saved location. A failure is
 *   reported as `refresh_location_failed` and recorded in the summary; the
 *   remaining locations still run. Locations are derived afterwards; a failure
 *   there is emitted as an `error` event and the summary is still returned.
 *
 * Each flow holds one database connection for its duration and closes it on exit.
 *
 * @example
 * ```ts
 * const pipeline = create_pipeline({ config, on_event: e => console.log(e.type) })
 * const result = await pipeline.bootstrap('85374')
 * ```
 */
export function create_pipeline(options: PipelineOptions): Pipeline {
	const { config, on_event, concurrency = 1, now } = options;
	const emit = create_emitter(on_event);
	const geocoder = options.geocoder ?? create_geocoder({ config, on_event });
	const fetcher = options.fetcher ?? create_weather_fetcher({ config, on_event });
	const writer = options.writer ?? create_snapshot_writer({ config, on_event, now });

	// Refresh reports each failure once, as refresh_location_failed.
	const on_refresh_event: EventHandler | undefined =
		on_event &&
		(event => {
			if (event.type !== "error") on_event(event);
		});
	const refresh_fetcher = options.fetcher ?? create_weather_fetcher({ config, on_event: on_refresh_event });
	const refresh_writer = options.writer ?? create_snapshot_writer({ config, on_event: on_refresh_event, now });

	return {
		async bootstrap(zip): Promise<Result<BootstrapSummary, WeatherError>> {
			const code = zip?.trim() || config.default_zip;

			const coordinates = await geocoder.resolve(code);
			if (!coordinates.ok) return coordinates;

			const observation = await fetcher.fetch_current(coordinates.value);
			if (!observation.ok) return observation;

			const snapshot_path = await writer.persist(observation.value);
			if (!snapshot_path.ok) return snapshot_path;

			return with_database<BootstrapSummary>(config.db_path, async database => {
				const loader = create_sqlite_loader({ database, on_event });

				const loaded = await loader.load_observation(snapshot_path.value);
				if (!loaded.ok) return loaded;

				const derived = loader.derive_locations();
				if (!derived.ok) return derived;

				return ok({
					coordinates: coordinates.value,
					location_id: observation.value.id,
					snapshot_path: snapshot_path.value,
					locations_inserted: derived.value,
				});
			});
		},

		async refresh(): Promise<Result<RefreshSummary, WeatherError>> {
			return with_database<RefreshSummary>(config.db_path, async database => {
				const saved = create_location_reader({ database, on_event }).list_saved();
				if (!saved.ok) return saved;

				const loader = create_sqlite_loader({ database, on_event: on_refresh_event });

				const refresh_one = (location: SavedLocation): Promise<Result<SavedLocation, WeatherError>> =>
					pipe(refresh_fetcher.fetch_current({ lat: location.lat, lon: location.lon }))
						.flat_map(observation => refresh_writer.persist(observation))
						.flat_map(path => loader.load_observation(path))
						.map(() => location)
						.tap_err(error => emit({ type: "refresh_location_failed", location, error }))
						.result();

				const outcomes = await parallel_map(saved.value, refresh_one, concurrency);

				const summary: RefreshSummary = { loaded: [], failed: [] };
				outcomes.forEach((outcome, index) => {
					if (outcome.ok) {
						summary.loaded.push(outcome.value);
						return;
					}
					const location = saved.value[index];
					if (location) summary.failed.push({ location, error: outcome.error });
				});

				// The loader emits a failed derive as an error event; the loaded rows stand.
				create_sqlite_loader({ database, on_event }).derive_locations();

				return ok(summary);
			});
		},
	};
}
