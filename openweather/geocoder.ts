/**
 * @module Geocoder
 * @description Resolves a zip/postal code to coordinates via the OpenWeather geocoding API.
 */

import type { Coordinates, EventHandler, Geocoder, Result, WeatherConfig, WeatherError } from "../types.js";
import { ok, err } from "../types.js";
import { fetch_result } from "../result.js";
import { create_emitter } from "../utils.js";
import { GeocodeResponseSchema, format_issues } from "./schema.js";

export type GeocoderOptions = {
	config: Pick<WeatherConfig, "api_key" | "base_url" | "request_timeout_ms">;
	on_event?: EventHandler;
};

export function geocode_url(base_url: string, zip: string, api_key: string): URL {
	const url = new URL("geo/1.0/zip", base_url);
	url.searchParams.set("zip", zip);
	url.searchParams.set("appid", api_key);
	return url;
}

/**
 * Creates a {@link Geocoder} backed by `GET geo/1.0/zip`.
 *
 * Every call hits the network; nothing is cached. Transport errors, non-2xx
 * responses, timeouts and bodies without numeric `lat`/`lon` all come back as
 * `lookup_failed`.
 *
 * @example
 * ```ts
 * const geocoder = create_geocoder({ config })
 * const result = await geocoder.resolve('85374')
 * if (result.ok) console.log(result.value) // { lat: 33.63, lon: -112.3314 }
 * ```
 */
export function create_geocoder(options: GeocoderOptions): Geocoder {
	const { config, on_event } = options;
	const emit = create_emitter(on_event);

	function fail(error: WeatherError): Result<never, WeatherError> {
		emit({ type: "error", error });
		return err(error);
	}

	return {
		async resolve(zip): Promise<Result<Coordinates, WeatherError>> {
			const response = await fetch_result<unknown, WeatherError>(
				geocode_url(config.base_url, zip, config.api_key),
				{ signal: AbortSignal.timeout(config.request_timeout_ms) },
				cause => ({ kind: "lookup_failed", zip, cause })
			);
			if (!response.ok) {
				emit({ type: "geocode", zip, found: false });
				return fail(response.error);
			}

			const parsed = GeocodeResponseSchema.safeParse(response.value);
			emit({ type: "geocode", zip, found: parsed.success });
			if (!parsed.success) {
				return fail({
					kind: "lookup_failed",
					zip,
					cause: { type: "missing_coordinates", message: format_issues(parsed.error) },
				});
			}

			return ok({ lat: parsed.data.lat, lon: parsed.data.lon });
		},
	};
}
