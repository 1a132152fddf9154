/**
 * @module Utilities
 * @description Small helpers shared by the pipeline components.
 */

import type { EventHandler, WeatherEvent } from "./types.js";

/**
 * Create an event emitter function from an optional handler.
 */
export function create_emitter(handler?: EventHandler): (event: WeatherEvent) => void {
	return (event: WeatherEvent) => handler?.(event);
}

const pad = (n: number, width = 2): string => n.toString().padStart(width, "0");

/**
 * Formats a date as `YYYYMMDDHHmm` in UTC.
 *
 * @example
 * ```ts
 * minute_stamp(new Date('2024-06-01T17:05:42Z')) // => '202406011705'
 * ```
 */
export function minute_stamp(date: Date): string {
	return [
		pad(date.getUTCFullYear(), 4),
		pad(date.getUTCMonth() + 1),
		pad(date.getUTCDate()),
		pad(date.getUTCHours()),
		pad(date.getUTCMinutes()),
	].join("");
}

/**
 * Converts provider epoch seconds into a Date.
 */
export function epoch_to_date(seconds: number): Date {
	return new Date(seconds * 1000);
}
