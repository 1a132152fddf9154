export { create_pipeline, type Pipeline, type PipelineOptions } from "./pipeline.js";

export { create_geocoder, geocode_url, type GeocoderOptions } from "./openweather/geocoder.js";
export { create_weather_fetcher, current_weather_url, type WeatherFetcherOptions } from "./openweather/fetcher.js";
export { ObservationSchema, GeocodeResponseSchema, type Observation, type GeocodeResponse } from "./openweather/schema.js";

export { create_snapshot_writer, snapshot_path, type SnapshotWriterConfig } from "./backend/snapshot.js";
export {
	open_database,
	ensure_tables,
	with_database,
	observation_to_row,
	create_sqlite_loader,
	create_location_reader,
	type WeatherDatabase,
	type SqliteLoaderOptions,
	type LocationReaderOptions,
} from "./backend/sqlite.js";

export { current_weather, location, WEATHER_MIGRATION_SQL, type CurrentWeatherRow, type CurrentWeatherInsert, type LocationRow } from "./schema.js";

export { json_codec, observation_codec, type Codec } from "./codec.js";
export { load_config, type Env } from "./config.js";
export { run, parse_cli_args, describe_error, exit_code_for, create_console_handler, format_event, EXIT_CODES, type RunOptions } from "./cli.js";

export type {
	WeatherError,
	WeatherErrorKind,
	WeatherEvent,
	EventHandler,
	Result,
	Units,
	WeatherConfig,
	Coordinates,
	SavedLocation,
	Geocoder,
	WeatherFetcher,
	SnapshotWriter,
	RelationalLoader,
	LocationReader,
	RefreshSummary,
	BootstrapSummary,
} from "./types.js";

export { ok, err } from "./types.js";

export { match, unwrap_or, unwrap, unwrap_err, try_catch, try_catch_async, fetch_result, pipe, format_error, to_error, type FetchError, type Pipe } from "./result.js";

export { Semaphore, parallel_map } from "./concurrency.js";
export { create_emitter, minute_stamp, epoch_to_date } from "./utils.js";
