/**
 * @module Codecs
 * @description Serialization for snapshot files.
 */

import { ObservationSchema, type Observation } from "./openweather/schema.js";

// Use a structural type that matches both Zod 3.x and 4.x
type ZodLike<T> = { parse: (data: unknown) => T };

/**
 * Converts between typed values and the bytes written to disk.
 * `decode` validates, `encode` does not.
 */
export type Codec<T> = {
	content_type: string;
	encode: (value: T) => Uint8Array;
	decode: (bytes: Uint8Array) => T;
};

export function json_codec<T>(schema: ZodLike<T>): Codec<T> {
	return {
		content_type: "application/json",
		encode: (value) => new TextEncoder().encode(JSON.stringify(value)),
		decode: (bytes) => schema.parse(JSON.parse(new TextDecoder().decode(bytes))),
	};
}

export const observation_codec: Codec<Observation> = json_codec(ObservationSchema);
