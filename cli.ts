/**
 * @module CLI
 * @description Command-line surface: argument parsing, console event logging and exit codes.
 */

import { parseArgs } from "node:util";
import type { EventHandler, Result, WeatherError, WeatherErrorKind, WeatherEvent } from "./types.js";
import { ok, err } from "./types.js";
import { format_error, try_catch, type FetchError } from "./result.js";
import { load_config, type Env } from "./config.js";
import { create_pipeline, type PipelineOptions } from "./pipeline.js";

export const USAGE = `Usage: weather-ingest [--zip <code>] [--concurrency <n>]

  -z, --zip <code>         Bootstrap a new location from a zip/postal code
  -c, --concurrency <n>    Locations fetched at once during refresh (default 1)
  -h, --help               Show this message

Without --zip, every saved location is refreshed.`;

export const EXIT_CODES: Record<WeatherErrorKind, number> = {
	invalid_config: 1,
	lookup_failed: 2,
	fetch_failed: 3,
	load_failed: 4,
	storage_unavailable: 5,
};

export const exit_code_for = (error: WeatherError): number => EXIT_CODES[error.kind];

export type CliArgs = {
	zip?: string;
	concurrency: number;
	help: boolean;
};

export function parse_cli_args(argv: string[]): Result<CliArgs, WeatherError> {
	const parsed = try_catch(
		() =>
			parseArgs({
				args: argv,
				options: {
					zip: { type: "string", short: "z" },
					concurrency: { type: "string", short: "c" },
					help: { type: "boolean", short: "h" },
				},
				strict: true,
				allowPositionals: false,
			}),
		(cause): WeatherError => ({ kind: "invalid_config", message: format_error(cause) })
	);
	if (!parsed.ok) return parsed;

	const { values } = parsed.value;
	const concurrency = values.concurrency === undefined ? 1 : Number(values.concurrency);
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		return err({ kind: "invalid_config", message: `--concurrency must be a positive integer, got "${values.concurrency}"` });
	}

	return ok({ zip: values.zip, concurrency, help: values.help ?? false });
}

type Cause = FetchError | { type: "missing_coordinates" | "invalid_body"; message: string };

function describe_cause(cause: Cause): string {
	switch (cause.type) {
		case "http":
			return cause.status_text ? `HTTP ${cause.status} ${cause.status_text}` : `HTTP ${cause.status}`;
		case "timeout":
			return "request timed out";
		case "network":
			return `network error: ${format_error(cause.cause)}`;
		case "missing_coordinates":
		case "invalid_body":
			return cause.message;
	}
}

/**
 * One-line, human-readable description of a pipeline error.
 *
 * @example
 * ```ts
 * describe_error({ kind: 'lookup_failed', zip: '00000', cause: { type: 'http', status: 404, status_text: 'Not Found' } })
 * // => 'lookup failed for zip 00000: HTTP 404 Not Found'
 * ```
 */
export function describe_error(error: WeatherError): string {
	switch (error.kind) {
		case "lookup_failed":
			return `lookup failed for zip ${error.zip}: ${describe_cause(error.cause)}`;
		case "fetch_failed":
			return `fetch failed for ${error.lat},${error.lon}: ${describe_cause(error.cause)}`;
		case "load_failed":
			return `load failed during ${error.operation}${error.path ? ` (${error.path})` : ""}: ${error.cause.message}`;
		case "storage_unavailable":
			return `storage unavailable at ${error.path}: ${error.cause.message}`;
		case "invalid_config":
			return `invalid configuration: ${error.message}`;
	}
}

export type LogLine = { level: "info" | "error"; message: string };

export function format_event(event: WeatherEvent): LogLine {
	switch (event.type) {
		case "geocode":
			return { level: "info", message: `[geocode] ${event.zip} ${event.found ? "resolved" : "not resolved"}` };
		case "weather_fetch":
			return { level: "info", message: `[fetch] ${event.lat},${event.lon} -> ${event.location_id ?? "no observation"}` };
		case "snapshot_write":
			return { level: "info", message: `[snapshot] ${event.location_id} -> ${event.path} (${event.size_bytes} bytes)` };
		case "observation_load":
			return { level: "info", message: `[load] ${event.location_name} (${event.location_id})` };
		case "locations_derive":
			return { level: "info", message: `[locations] ${event.inserted} new` };
		case "locations_list":
			return { level: "info", message: `[locations] ${event.count} saved` };
		case "refresh_location_failed":
			return { level: "error", message: `[refresh] ${event.location.name} (${event.location.id}) failed: ${describe_error(event.error)}` };
		case "error":
			return { level: "error", message: `[error] ${describe_error(event.error)}` };
	}
}

type Sink = Pick<Console, "log" | "error">;

/**
 * Event handler that prints every event; errors go to stderr.
 */
export function create_console_handler(sink: Sink = console): EventHandler {
	return event => {
		const line = format_event(event);
		if (line.level === "error") sink.error(line.message);
		else sink.log(line.message);
	};
}

export type RunOptions = Omit<PipelineOptions, "config" | "concurrency"> & {
	sink?: Sink;
};

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function run(argv: string[], env: Env, options: RunOptions = {}): Promise<number> {
	const { sink = console, ...pipeline_options } = options;

	const args = parse_cli_args(argv);
	if (!args.ok) {
		sink.error(describe_error(args.error));
		sink.error(USAGE);
		return exit_code_for(args.error);
	}
	if (args.value.help) {
		sink.log(USAGE);
		return 0;
	}

	const config = load_config(env);
	if (!config.ok) {
		sink.error(describe_error(config.error));
		return exit_code_for(config.error);
	}

	const pipeline = create_pipeline({
		on_event: create_console_handler(sink),
		...pipeline_options,
		config: config.value,
		concurrency: args.value.concurrency,
	});

	if (args.value.zip !== undefined) {
		const result = await pipeline.bootstrap(args.value.zip);
		if (!result.ok) {
			sink.error(`bootstrap failed: ${describe_error(result.error)}`);
			return exit_code_for(result.error);
		}
		sink.log(`bootstrapped location ${result.value.location_id} from ${result.value.snapshot_path}`);
		return 0;
	}

	const result = await pipeline.refresh();
	if (!result.ok) {
		sink.error(`refresh failed: ${describe_error(result.error)}`);
		return exit_code_for(result.error);
	}

	const { loaded, failed } = result.value;
	if (loaded.length === 0 && failed.length === 0) {
		sink.log("no saved locations; run with --zip <code> to add one");
		return 0;
	}
	sink.log(`refreshed ${loaded.length} location(s), ${failed.length} failed`);

	const [first_failure] = failed;
	if (loaded.length === 0 && first_failure) return exit_code_for(first_failure.error);
	return 0;
}
