import { describe, test, expect, vi, afterEach } from "vitest";
import { match, unwrap_or, unwrap, unwrap_err, try_catch, try_catch_async, fetch_result, type FetchError, pipe, format_error, to_error } from "../../result.js";
import { ok, err, type Result } from "../../types.js";

describe("Result Utilities", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	describe("match", () => {
		test("calls on_ok for success result", () => {
			const output = match(
				ok(42),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("success: 42");
		});

		test("calls on_err for error result", () => {
			const output = match(
				err("something went wrong"),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("error: something went wrong");
		});
	});

	describe("unwrap_or", () => {
		test("returns value for ok result", () => {
			expect(unwrap_or(ok(42), 0)).toBe(42);
		});

		test("returns empty array as default", () => {
			const result: Result<number[], string> = err("no data");
			expect(unwrap_or(result, [])).toEqual([]);
		});
	});

	describe("unwrap / unwrap_err", () => {
		test("unwrap returns the value", () => {
			expect(unwrap(ok("value"))).toBe("value");
		});

		test("unwrap throws with the serialized error", () => {
			expect(() => unwrap(err({ kind: "invalid_config", message: "bad" }))).toThrow(
				'unwrap called on error result: {"kind":"invalid_config","message":"bad"}'
			);
		});

		test("unwrap_err returns the error", () => {
			expect(unwrap_err(err("boom"))).toBe("boom");
		});

		test("unwrap_err throws for ok result", () => {
			expect(() => unwrap_err(ok(1))).toThrow("unwrap_err called on ok result: 1");
		});
	});

	describe("try_catch", () => {
		test("wraps the return value", () => {
			expect(try_catch(() => JSON.parse('{"a":1}'), () => "parse_error")).toEqual({ ok: true, value: { a: 1 } });
		});

		test("maps a thrown exception", () => {
			const result = try_catch(
				() => JSON.parse("{"),
				e => format_error(e).length > 0
			);
			expect(result).toEqual({ ok: false, error: true });
		});
	});

	describe("try_catch_async", () => {
		test("wraps a resolved value", async () => {
			expect(await try_catch_async(async () => 7, () => "failed")).toEqual({ ok: true, value: 7 });
		});

		test("maps a rejection", async () => {
			const result = await try_catch_async(
				() => Promise.reject(new Error("disk full")),
				e => format_error(e)
			);
			expect(result).toEqual({ ok: false, error: "disk full" });
		});
	});

	describe("fetch_result", () => {
		const on_error = (e: FetchError): FetchError => e;

		test("parses a JSON body on 2xx", async () => {
			vi.stubGlobal("fetch", vi.fn(async () => new Response(JSON.stringify({ lat: 1 }), { status: 200 })));
			const result = await fetch_result<{ lat: number }, FetchError>("http://weather.test/", undefined, on_error);
			expect(result).toEqual({ ok: true, value: { lat: 1 } });
		});

		test("reports non-2xx as http error", async () => {
			vi.stubGlobal("fetch", vi.fn(async () => new Response("nope", { status: 401, statusText: "Unauthorized" })));
			const result = await fetch_result("http://weather.test/", undefined, on_error);
			expect(result).toEqual({ ok: false, error: { type: "http", status: 401, status_text: "Unauthorized" } });
		});

		test("reports a rejected fetch as network error", async () => {
			const cause = new TypeError("fetch failed");
			vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(cause)));
			const result = await fetch_result("http://weather.test/", undefined, on_error);
			expect(result).toEqual({ ok: false, error: { type: "network", cause } });
		});

		test("reports an aborted request as timeout", async () => {
			const cause = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
			vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(cause)));
			const result = await fetch_result("http://weather.test/", undefined, on_error);
			expect(result).toEqual({ ok: false, error: { type: "timeout" } });
		});
	});

	describe("pipe", () => {
		test("chains ok values through flat_map and map", async () => {
			const result = await pipe(ok(2))
				.flat_map(n => Promise.resolve(ok(n * 10)))
				.map(n => n + 1)
				.result();
			expect(result).toEqual({ ok: true, value: 21 });
		});

		test("short-circuits on the first error", async () => {
			const later = vi.fn((n: number): Result<number, string> => ok(n));
			const result = await pipe<number, string>(err("geocode"))
				.flat_map(later)
				.result();
			expect(result).toEqual({ ok: false, error: "geocode" });
			expect(later).not.toHaveBeenCalled();
		});

		test("tap_err runs only for errors", async () => {
			const seen: string[] = [];
			await pipe<number, string>(err("fetch")).tap_err(e => { seen.push(e); }).result();
			await pipe.ok(1).tap_err(() => { seen.push("unexpected"); }).result();
			expect(seen).toEqual(["fetch"]);
		});

		test("map_err and unwrap_or", async () => {
			const mapped = await pipe<number, string>(err("x")).map_err(e => e.toUpperCase()).result();
			expect(mapped).toEqual({ ok: false, error: "X" });
			expect(await pipe<number, string>(err("x")).unwrap_or(5)).toBe(5);
		});

		test("tap sees the value without changing it", async () => {
			const seen: number[] = [];
			const result = await pipe.ok(3).tap(n => { seen.push(n); }).result();
			expect(result).toEqual({ ok: true, value: 3 });
			expect(seen).toEqual([3]);
		});
	});

	describe("format_error / to_error", () => {
		test("formats Error and non-Error values", () => {
			expect(format_error(new Error("boom"))).toBe("boom");
			expect(format_error(404)).toBe("404");
		});

		test("keeps Error instances and wraps others", () => {
			const original = new Error("kept");
			expect(to_error(original)).toBe(original);
			expect(to_error("text").message).toBe("text");
		});
	});
});
