/**
 * @module Config
 * @description Loads and validates the runtime configuration from the environment.
 */

import { z } from "zod";
import type { Result, WeatherConfig, WeatherError } from "./types.js";
import { ok, err } from "./types.js";
import { format_issues } from "./openweather/schema.js";

export const DEFAULT_BASE_URL = "http://api.openweathermap.org/";
export const DEFAULT_DB_PATH = "data/weather.db";
export const DEFAULT_JSON_DIR = "data/json";
export const DEFAULT_ZIP = "85374";
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
/** Largest delay a Node timer accepts. */
export const MAX_REQUEST_TIMEOUT_MS = 2_147_483_647;

const blank_to_undefined = (value: unknown): unknown => (typeof value === "string" && value.trim().length === 0 ? undefined : value);

const optional_string = (fallback: string) => z.preprocess(blank_to_undefined, z.string().trim().default(fallback));

const EnvSchema = z.object({
	OPEN_WEATHER_API_KEY: z.preprocess(blank_to_undefined, z.string({ required_error: "OPEN_WEATHER_API_KEY must be set" }).trim()),
	OPEN_WEATHER_BASE_URL: z.preprocess(blank_to_undefined, z.string().trim().url().default(DEFAULT_BASE_URL)),
	WEATHER_DB_PATH: optional_string(DEFAULT_DB_PATH),
	WEATHER_JSON_DIR: optional_string(DEFAULT_JSON_DIR),
	WEATHER_UNITS: z.preprocess(blank_to_undefined, z.enum(["standard", "metric", "imperial"]).default("imperial")),
	WEATHER_DEFAULT_ZIP: optional_string(DEFAULT_ZIP),
	WEATHER_REQUEST_TIMEOUT_MS: z.preprocess(blank_to_undefined, z.coerce.number().int().positive().max(MAX_REQUEST_TIMEOUT_MS).default(DEFAULT_REQUEST_TIMEOUT_MS)),
});

export type Env = Record<string, string | undefined>;

/**
 * Builds a frozen {@link WeatherConfig} from environment variables.
 *
 * `OPEN_WEATHER_API_KEY` is required; everything else has a default.
 * The base URL always ends with `/` so endpoint paths resolve beneath it.
 *
 * @example
 * ```ts
 * import 'dotenv/config'
 * const config = load_config(process.env)
 * if (!config.ok) process.exit(1)
 * ```
 */
export function load_config(env: Env): Result<WeatherConfig, WeatherError> {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		return err({ kind: "invalid_config", message: format_issues(parsed.error) });
	}

	const values = parsed.data;
	const base_url = values.OPEN_WEATHER_BASE_URL.endsWith("/") ? values.OPEN_WEATHER_BASE_URL : `${values.OPEN_WEATHER_BASE_URL}/`;

	return ok(
		Object.freeze({
			api_key: values.OPEN_WEATHER_API_KEY,
			base_url,
			db_path: values.WEATHER_DB_PATH,
			json_dir: values.WEATHER_JSON_DIR,
			units: values.WEATHER_UNITS,
			default_zip: values.WEATHER_DEFAULT_ZIP,
			request_timeout_ms: values.WEATHER_REQUEST_TIMEOUT_MS,
		})
	);
}
