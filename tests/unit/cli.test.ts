import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { run, parse_cli_args, describe_error, exit_code_for, format_event, USAGE } from '../../cli.js'
import { with_database } from '../../backend/sqlite.js'
import { location } from '../../schema.js'
import { unwrap, unwrap_err } from '../../result.js'
import { ok } from '../../types.js'
import { GEOCODE_BODY, TEST_BASE_URL, make_payload, json_response, stub_fetch } from '../fixtures.js'

const make_sink = () => ({ log: vi.fn(), error: vi.fn() })

describe('parse_cli_args', () => {
  test('defaults to refresh with concurrency 1', () => {
    expect(unwrap(parse_cli_args([]))).toEqual({ zip: undefined, concurrency: 1, help: false })
  })

  test('reads --zip and --concurrency', () => {
    expect(unwrap(parse_cli_args(['--zip', '85374', '-c', '3']))).toEqual({ zip: '85374', concurrency: 3, help: false })
  })

  test('rejects a non-positive concurrency', () => {
    expect(unwrap_err(parse_cli_args(['--concurrency', '0']))).toEqual({
      kind: 'invalid_config',
      message: '--concurrency must be a positive integer, got "0"',
    })
  })

  test('rejects unknown flags', () => {
    expect(unwrap_err(parse_cli_args(['--bogus'])).kind).toBe('invalid_config')
  })
})

describe('error reporting', () => {
  test('maps every error kind to its own exit code', () => {
    expect(exit_code_for({ kind: 'invalid_config', message: 'x' })).toBe(1)
    expect(exit_code_for({ kind: 'lookup_failed', zip: '1', cause: { type: 'timeout' } })).toBe(2)
    expect(exit_code_for({ kind: 'fetch_failed', lat: 1, lon: 2, cause: { type: 'timeout' } })).toBe(3)
    expect(exit_code_for({ kind: 'load_failed', operation: 'snapshot.read', cause: new Error('x') })).toBe(4)
    expect(exit_code_for({ kind: 'storage_unavailable', path: 'db', cause: new Error('x') })).toBe(5)
  })

  test('describes errors in one line', () => {
    expect(describe_error({ kind: 'lookup_failed', zip: '00000', cause: { type: 'http', status: 404, status_text: 'Not Found' } }))
      .toBe('lookup failed for zip 00000: HTTP 404 Not Found')
    expect(describe_error({ kind: 'fetch_failed', lat: 1, lon: 2, cause: { type: 'timeout' } }))
      .toBe('fetch failed for 1,2: request timed out')
    expect(describe_error({ kind: 'fetch_failed', lat: 1, lon: 2, cause: { type: 'network', cause: new TypeError('fetch failed') } }))
      .toBe('fetch failed for 1,2: network error: fetch failed')
    expect(describe_error({ kind: 'load_failed', operation: 'snapshot.read', cause: new Error('ENOENT'), path: 'a.json' }))
      .toBe('load failed during snapshot.read (a.json): ENOENT')
    expect(describe_error({ kind: 'storage_unavailable', path: 'w.db', cause: new Error('locked') }))
      .toBe('storage unavailable at w.db: locked')
  })

  test('names the location in refresh failures', () => {
    expect(format_event({
      type: 'refresh_location_failed',
      location: { id: 7, name: 'Peoria', lat: 1, lon: 2 },
      error: { kind: 'fetch_failed', lat: 1, lon: 2, cause: { type: 'http', status: 500, status_text: '' } },
    })).toEqual({ level: 'error', message: '[refresh] Peoria (7) failed: fetch failed for 1,2: HTTP 500' })
  })
})

describe('run', () => {
  let dir: string
  let env: Record<string, string>

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'weather-cli-'))
    env = {
      OPEN_WEATHER_API_KEY: 'test-key',
      OPEN_WEATHER_BASE_URL: TEST_BASE_URL,
      WEATHER_DB_PATH: join(dir, 'weather.db'),
      WEATHER_JSON_DIR: join(dir, 'json'),
    }
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    await rm(dir, { recursive: true, force: true })
  })

  test('prints usage for --help', async () => {
    const sink = make_sink()
    expect(await run(['--help'], env, { sink })).toBe(0)
    expect(sink.log).toHaveBeenCalledWith(USAGE)
  })

  test('exits 1 without an API key', async () => {
    const sink = make_sink()
    expect(await run(['--zip', '85374'], {}, { sink })).toBe(1)
    expect(sink.error).toHaveBeenCalledTimes(1)
  })

  test('exits 1 for an unknown flag', async () => {
    const sink = make_sink()
    expect(await run(['--nope'], env, { sink })).toBe(1)
    expect(sink.error).toHaveBeenLastCalledWith(USAGE)
  })

  test('bootstraps a zip code', async () => {
    stub_fetch(url => (url.pathname === '/geo/1.0/zip' ? json_response(GEOCODE_BODY) : json_response(make_payload())))
    const sink = make_sink()

    const code = await run(['--zip', '85374'], env, { sink, now: () => new Date('2024-06-01T17:05:00Z') })

    expect(code).toBe(0)
    expect(sink.log).toHaveBeenCalledWith('[geocode] 85374 resolved')
    expect(sink.log).toHaveBeenCalledWith('[load] Surprise (123456)')
    expect(sink.log).toHaveBeenCalledWith('[locations] 1 new')
    expect(sink.log).toHaveBeenLastCalledWith(`bootstrapped location 123456 from ${join(dir, 'json', '123456_202406011705.json')}`)
    expect(sink.error).not.toHaveBeenCalled()
  })

  test('exits 2 when the zip cannot be geocoded', async () => {
    stub_fetch(() => json_response({ cod: '404' }, 404, 'Not Found'))
    const sink = make_sink()

    expect(await run(['--zip', '85374'], env, { sink })).toBe(2)
    expect(sink.error).toHaveBeenCalledWith('[error] lookup failed for zip 85374: HTTP 404 Not Found')
    expect(sink.error).toHaveBeenLastCalledWith('bootstrap failed: lookup failed for zip 85374: HTTP 404 Not Found')
  })

  test('refresh with nothing saved exits 0', async () => {
    const sink = make_sink()
    expect(await run([], env, { sink })).toBe(0)
    expect(sink.log).toHaveBeenLastCalledWith('no saved locations; run with --zip <code> to add one')
  })

  test('refresh exits with the failure code when every location fails', async () => {
    unwrap(await with_database(env.WEATHER_DB_PATH ?? '', database => {
      database.db.insert(location).values({ id: 5, name: 'Surprise', country: 'US', lat: 33.63, lon: -112.3314 }).run()
      return ok(undefined)
    }))
    stub_fetch(() => json_response({}, 500, 'Internal Server Error'))
    const sink = make_sink()

    expect(await run([], env, { sink })).toBe(3)
    expect(sink.error).toHaveBeenCalledTimes(1)
    expect(sink.error).toHaveBeenCalledWith('[refresh] Surprise (5) failed: fetch failed for 33.63,-112.3314: HTTP 500 Internal Server Error')
    expect(sink.log).toHaveBeenLastCalledWith('refreshed 0 location(s), 1 failed')
  })
})
