/**
 * @module WeatherFetcher
 * @description Retrieves current conditions for a coordinate pair.
 */

import type { Coordinates, EventHandler, Result, WeatherConfig, WeatherError, WeatherFetcher } from "../types.js";
import { ok, err } from "../types.js";
import { fetch_result } from "../result.js";
import { create_emitter } from "../utils.js";
import { ObservationSchema, format_issues, type Observation } from "./schema.js";

export type WeatherFetcherOptions = {
	config: Pick<WeatherConfig, "api_key" | "base_url" | "units" | "request_timeout_ms">;
	on_event?: EventHandler;
};

export function current_weather_url(config: WeatherFetcherOptions["config"], coordinates: Coordinates): URL {
	const url = new URL("data/2.5/weather", config.base_url);
	url.searchParams.set("lat", String(coordinates.lat));
	url.searchParams.set("lon", String(coordinates.lon));
	url.searchParams.set("units", config.units);
	url.searchParams.set("appid", config.api_key);
	return url;
}

/**
 * Creates a {@link WeatherFetcher} backed by `GET data/2.5/weather`.
 *
 * One attempt per call. The body is validated against {@link ObservationSchema};
 * a body that does not match is a `fetch_failed` with cause `invalid_body`.
 */
export function create_weather_fetcher(options: WeatherFetcherOptions): WeatherFetcher {
	const { config, on_event } = options;
	const emit = create_emitter(on_event);

	return {
		async fetch_current(coordinates): Promise<Result<Observation, WeatherError>> {
			const { lat, lon } = coordinates;
			const response = await fetch_result<unknown, WeatherError>(
				current_weather_url(config, coordinates),
				{ signal: AbortSignal.timeout(config.request_timeout_ms) },
				cause => ({ kind: "fetch_failed", lat, lon, cause })
			);

			if (!response.ok) {
				emit({ type: "weather_fetch", lat, lon, location_id: null });
				emit({ type: "error", error: response.error });
				return response;
			}

			const parsed = ObservationSchema.safeParse(response.value);
			emit({ type: "weather_fetch", lat, lon, location_id: parsed.success ? parsed.data.id : null });
			if (!parsed.success) {
				const error: WeatherError = { kind: "fetch_failed", lat, lon, cause: { type: "invalid_body", message: format_issues(parsed.error) } };
				emit({ type: "error", error });
				return err(error);
			}
			return ok(parsed.data);
		},
	};
}
