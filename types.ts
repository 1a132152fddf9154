/**
 * @module Types
 * @description Type definitions for the weather ingestion pipeline.
 */

import type { FetchError } from './result.js'
import type { Observation } from './openweather/schema.js'

/**
 * Error types that can occur while ingesting weather data.
 * @category Types
 * @group Error Types
 *
 * Uses discriminated unions for type-safe error handling via the `kind` field:
 * - `lookup_failed` - Geocoding a zip/postal code produced no coordinates
 * - `fetch_failed` - The current-conditions request failed or returned an unusable body
 * - `load_failed` - A snapshot could not be written, read, decoded or inserted
 * - `storage_unavailable` - The database file or its tables could not be opened/created
 * - `invalid_config` - Configuration or command-line error during setup
 *
 * @example
 * ```ts
 * const result = await geocoder.resolve('85374')
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case 'lookup_failed':
 *       console.log(`No coordinates for ${result.error.zip}`)
 *       break
 *   }
 * }
 * ```
 */
export type WeatherError =
  | { kind: 'lookup_failed'; zip: string; cause: FetchError | { type: 'missing_coordinates'; message: string } }
  | { kind: 'fetch_failed'; lat: number; lon: number; cause: FetchError | { type: 'invalid_body'; message: string } }
  | { kind: 'load_failed'; operation: string; cause: Error; path?: string }
  | { kind: 'storage_unavailable'; path: string; cause: Error }
  | { kind: 'invalid_config'; message: string }

export type WeatherErrorKind = WeatherError['kind']

/**
 * A discriminated union representing either success or failure.
 * @category Types
 * @group Result Types
 */
export type Result<T, E = WeatherError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing a value.
 *
 * @category Core
 * @group Result Helpers
 *
 * @example
 * ```ts
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) return err('Division by zero')
 *   return ok(a / b)
 * }
 * ```
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing an error.
 *
 * @category Core
 * @group Result Helpers
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

export type WeatherEvent =
  | { type: 'geocode'; zip: string; found: boolean }
  | { type: 'weather_fetch'; lat: number; lon: number; location_id: number | null }
  | { type: 'snapshot_write'; location_id: number; path: string; size_bytes: number }
  | { type: 'observation_load'; location_id: number; location_name: string }
  | { type: 'locations_derive'; inserted: number }
  | { type: 'locations_list'; count: number }
  | { type: 'refresh_location_failed'; location: SavedLocation; error: WeatherError }
  | { type: 'error'; error: WeatherError }

export type EventHandler = (event: WeatherEvent) => void

export type Units = 'standard' | 'metric' | 'imperial'

/**
 * Immutable runtime configuration, loaded once at startup and passed into
 * every component factory.
 * @category Types
 * @group Config Types
 */
export type WeatherConfig = {
  readonly api_key: string
  readonly base_url: string
  readonly db_path: string
  readonly json_dir: string
  readonly units: Units
  readonly default_zip: string
  readonly request_timeout_ms: number
}

export type Coordinates = {
  lat: number
  lon: number
}

/**
 * A location previously derived into the `location` table.
 * Drives the refresh-all flow.
 */
export type SavedLocation = {
  id: number
  name: string
  lat: number
  lon: number
}

export type Geocoder = {
  resolve: (zip: string) => Promise<Result<Coordinates>>
}

export type WeatherFetcher = {
  fetch_current: (coordinates: Coordinates) => Promise<Result<Observation>>
}

export type SnapshotWriter = {
  persist: (observation: Observation) => Promise<Result<string>>
}

/**
 * Loads observations into `current_weather` and derives `location` rows.
 *
 * - `load_observation` - Read a snapshot file and insert its row
 * - `insert_observation` - Insert an in-memory observation
 * - `derive_locations` - Anti-join insert of unseen locations, returns the inserted count
 */
export type RelationalLoader = {
  load_observation: (path: string) => Promise<Result<void>>
  insert_observation: (observation: Observation) => Result<void>
  derive_locations: () => Result<number>
}

export type LocationReader = {
  list_saved: () => Result<SavedLocation[]>
}

export type RefreshSummary = {
  loaded: SavedLocation[]
  failed: { location: SavedLocation; error: WeatherError }[]
}

export type BootstrapSummary = {
  coordinates: Coordinates
  location_id: number
  snapshot_path: string
  locations_inserted: number
}
