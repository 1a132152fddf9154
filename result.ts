/**
 * @module Result
 * @description Utilities for working with Result types.
 *
 * Provides functional utilities for error handling without exceptions:
 * - Pattern matching with `match`
 * - Safe unwrapping with `unwrap_or`, `unwrap`, `unwrap_err`
 * - Exception-to-Result conversion with `try_catch`, `try_catch_async`
 * - Fetch wrapper with `fetch_result`
 * - Composable pipelines with `pipe`
 */

import { ok, err, type Result } from "./types.js";

/**
 * Pattern match on a Result, extracting the value with appropriate handler.
 *
 * @example
 * ```ts
 * const line = match(
 *   await geocoder.resolve(zip),
 *   ({ lat, lon }) => `${zip} -> ${lat},${lon}`,
 *   error => `lookup failed: ${error.kind}`
 * )
 * ```
 */
export const match = <T, E, R>(result: Result<T, E>, on_ok: (value: T) => R, on_err: (error: E) => R): R => {
	if (result.ok) return on_ok(result.value);
	return on_err(result.error);
};

/**
 * Extract value from Result, returning default if error.
 *
 * @example
 * ```ts
 * const saved = unwrap_or(reader.list_saved(), [])
 * ```
 */
export const unwrap_or = <T, E>(result: Result<T, E>, default_value: T): T => (result.ok ? result.value : default_value);

/**
 * Extract value from Result, throwing if error.
 * Use only when you're certain the Result is Ok, or in tests.
 *
 * @throws Error if Result is an error
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/**
 * Extract error from Result, throwing if Ok.
 * Use only when you're certain the Result is Err, or in tests.
 *
 * @throws Error if Result is Ok
 *
 * @example
 * ```ts
 * // In tests
 * const error = unwrap_err(await geocoder.resolve('00000'))
 * expect(error.kind).toBe('lookup_failed')
 * ```
 */
export const unwrap_err = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrap_err called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};

/**
 * Execute a function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = try_catch(
 *   () => JSON.parse(input),
 *   e => ({ kind: 'load_failed', operation: 'snapshot.parse', cause: to_error(e) })
 * )
 * ```
 */
export const try_catch = <T, E>(fn: () => T, on_error: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Execute an async function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = await try_catch_async(
 *   () => readFile(path),
 *   e => ({ kind: 'load_failed', operation: 'snapshot.read', cause: to_error(e), path })
 * )
 * ```
 */
export const try_catch_async = async <T, E>(fn: () => Promise<T>, on_error: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Error types for fetch operations.
 */
export type FetchError =
	| { type: "network"; cause: unknown }
	| { type: "timeout" }
	| { type: "http"; status: number; status_text: string };

const is_timeout = (e: unknown): boolean => e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");

/**
 * Fetch wrapper that returns Result instead of throwing.
 *
 * An aborted request (e.g. `AbortSignal.timeout` in `init.signal`) is reported
 * as `{ type: "timeout" }`.
 *
 * @example
 * ```ts
 * const result = await fetch_result(
 *   url,
 *   { signal: AbortSignal.timeout(5000) },
 *   e => e.type === 'http' ? `HTTP ${e.status}` : e.type
 * )
 * ```
 */
export const fetch_result = async <T, E>(input: string | URL | Request, init: RequestInit | undefined, on_error: (e: FetchError) => E, parse_body: (response: Response) => Promise<T> = r => r.json() as Promise<T>): Promise<Result<T, E>> => {
	try {
		const response = await fetch(input, init);
		if (!response.ok) {
			return err(on_error({ type: "http", status: response.status, status_text: response.statusText }));
		}
		return ok(await parse_body(response));
	} catch (e) {
		if (is_timeout(e)) return err(on_error({ type: "timeout" }));
		return err(on_error({ type: "network", cause: e }));
	}
};

type MaybePromise<T> = T | Promise<T>;

/**
 * A composable pipeline for chaining Result operations.
 *
 * All operations are lazy - nothing executes until `.result()` or `.unwrap_or()` is called.
 *
 * @example
 * ```ts
 * const path = await pipe(geocoder.resolve(zip))
 *   .flat_map(coords => fetcher.fetch_current(coords))
 *   .flat_map(observation => writer.persist(observation))
 *   .result()
 * ```
 */
export type Pipe<T, E> = {
	/** Transform the success value */
	map: <U>(fn: (value: T) => U) => Pipe<U, E>;
	/** Chain with another Result-returning operation */
	flat_map: <U>(fn: (value: T) => MaybePromise<Result<U, E>>) => Pipe<U, E>;
	/** Transform the error value */
	map_err: <F>(fn: (error: E) => F) => Pipe<T, F>;
	/** Execute side effect on success */
	tap: (fn: (value: T) => MaybePromise<void>) => Pipe<T, E>;
	/** Execute side effect on error (logging) */
	tap_err: (fn: (error: E) => MaybePromise<void>) => Pipe<T, E>;
	/** Extract value with fallback */
	unwrap_or: (default_value: T) => Promise<T>;
	/** Get the underlying Result */
	result: () => Promise<Result<T, E>>;
};

const create_pipe = <T, E>(promised: Promise<Result<T, E>>): Pipe<T, E> => ({
	map: <U>(fn: (value: T) => U): Pipe<U, E> =>
		create_pipe(
			promised.then((r): Result<U, E> => {
				if (r.ok) return ok(fn(r.value));
				return err(r.error);
			})
		),
	flat_map: <U>(fn: (value: T) => MaybePromise<Result<U, E>>): Pipe<U, E> =>
		create_pipe(
			promised.then((r): MaybePromise<Result<U, E>> => {
				if (r.ok) return fn(r.value);
				return err(r.error);
			})
		),
	map_err: <F>(fn: (error: E) => F): Pipe<T, F> =>
		create_pipe(
			promised.then((r): Result<T, F> => {
				if (r.ok) return ok(r.value);
				return err(fn(r.error));
			})
		),
	tap: (fn: (value: T) => MaybePromise<void>): Pipe<T, E> =>
		create_pipe(
			promised.then(async (r): Promise<Result<T, E>> => {
				if (r.ok) await fn(r.value);
				return r;
			})
		),
	tap_err: (fn: (error: E) => MaybePromise<void>): Pipe<T, E> =>
		create_pipe(
			promised.then(async (r): Promise<Result<T, E>> => {
				if (!r.ok) await fn(r.error);
				return r;
			})
		),
	unwrap_or: (default_value: T): Promise<T> => promised.then(r => (r.ok ? r.value : default_value)),
	result: (): Promise<Result<T, E>> => promised,
});

/**
 * Create a composable pipeline from a Result or Promise<Result>.
 */
export const pipe = <T, E>(initial: MaybePromise<Result<T, E>>): Pipe<T, E> => create_pipe(Promise.resolve(initial));

/** Create a pipe starting with an Ok value */
pipe.ok = <T>(value: T): Pipe<T, never> => pipe(ok(value));

/**
 * Format an unknown error to a string message.
 */
export const format_error = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Coerce an unknown thrown value into an Error, keeping Error instances as-is.
 */
export const to_error = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
