/**
 * @module Backends
 * @description File-system snapshot writer for raw provider responses.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { EventHandler, Result, SnapshotWriter, WeatherConfig, WeatherError } from "../types.js";
import { ok, err } from "../types.js";
import { try_catch_async, to_error } from "../result.js";
import { observation_codec } from "../codec.js";
import { create_emitter, minute_stamp } from "../utils.js";

export type SnapshotWriterConfig = {
	config: Pick<WeatherConfig, "json_dir">;
	on_event?: EventHandler;
	/** Clock used for the file name. Defaults to `() => new Date()`. */
	now?: () => Date;
};

/**
 * Builds the snapshot path for a location at a given instant:
 * `<json_dir>/<location_id>_<YYYYMMDDHHmm>.json` (UTC minutes).
 */
export function snapshot_path(json_dir: string, location_id: number, at: Date): string {
	return join(json_dir, `${location_id}_${minute_stamp(at)}.json`);
}

/**
 * Creates a {@link SnapshotWriter} that stores each observation verbatim.
 *
 * Directory structure:
 * ```
 * json_dir/
 *   <location_id>_<YYYYMMDDHHmm>.json
 * ```
 *
 * Two observations for the same location within the same minute share a path;
 * the later write replaces the earlier one.
 *
 * @example
 * ```ts
 * const writer = create_snapshot_writer({ config: { json_dir: './data/json' } })
 * const path = await writer.persist(observation) // => Result<'data/json/123456_202406011705.json'>
 * ```
 */
export function create_snapshot_writer(options: SnapshotWriterConfig): SnapshotWriter {
	const { config, on_event, now = () => new Date() } = options;
	const emit = create_emitter(on_event);

	return {
		async persist(observation): Promise<Result<string, WeatherError>> {
			const path = snapshot_path(config.json_dir, observation.id, now());
			const bytes = observation_codec.encode(observation);

			const written = await try_catch_async(
				async () => {
					await mkdir(config.json_dir, { recursive: true });
					await writeFile(path, bytes);
				},
				(cause): WeatherError => ({ kind: "load_failed", operation: "snapshot.write", cause: to_error(cause), path })
			);
			if (!written.ok) {
				emit({ type: "error", error: written.error });
				return err(written.error);
			}

			emit({ type: "snapshot_write", location_id: observation.id, path, size_bytes: bytes.length });
			return ok(path);
		},
	};
}
