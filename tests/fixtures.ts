import { vi } from 'vitest'
import type { WeatherConfig } from '../types.js'

export const TEST_BASE_URL = 'http://weather.test/'

export const make_config = (overrides: Partial<WeatherConfig> = {}): WeatherConfig => ({
  api_key: 'test-key',
  base_url: TEST_BASE_URL,
  db_path: ':memory:',
  json_dir: 'unused',
  units: 'imperial',
  default_zip: '85374',
  request_timeout_ms: 1000,
  ...overrides,
})

export const GEOCODE_BODY = {
  zip: '85374',
  name: 'Surprise',
  lat: 33.63,
  lon: -112.3314,
  country: 'US',
}

export type PayloadOverrides = {
  id?: number
  name?: string
  lat?: number
  lon?: number
  temp?: number
}

/** A current-conditions body shaped like the provider's. */
export const make_payload = (overrides: PayloadOverrides = {}) => ({
  coord: { lon: overrides.lon ?? -112.3314, lat: overrides.lat ?? 33.63 },
  weather: [{ id: 800, main: 'Clear', description: 'clear sky', icon: '01d' }],
  base: 'stations',
  main: {
    temp: overrides.temp ?? 98.6,
    feels_like: 96.1,
    temp_min: 95.2,
    temp_max: 101.3,
    pressure: 1009,
    humidity: 12,
  },
  visibility: 10000,
  wind: { speed: 5.75, deg: 240 },
  clouds: { all: 20 },
  dt: 1717261500,
  sys: { type: 2, id: 2000001, country: 'US', sunrise: 1717244400, sunset: 1717295400 },
  timezone: -25200,
  id: overrides.id ?? 123456,
  name: overrides.name ?? 'Surprise',
  cod: 200,
})

export const json_response = (body: unknown, status = 200, status_text = 'OK'): Response =>
  new Response(JSON.stringify(body), {
    status,
    statusText: status_text,
    headers: { 'content-type': 'application/json' },
  })

export type Route = (url: URL) => Response | Promise<Response>

/**
 * Replaces `fetch` with a handler that receives the parsed request URL.
 * Returns the mock so tests can inspect calls.
 */
export const stub_fetch = (route: Route) => {
  const mock = vi.fn(async (input: string | URL | Request) => {
    const url = new URL(input instanceof Request ? input.url : input.toString())
    return route(url)
  })
  vi.stubGlobal('fetch', mock)
  return mock
}

export const requested_url = (mock: ReturnType<typeof stub_fetch>, call = 0): URL => {
  const args = mock.mock.calls[call]
  if (!args) throw new Error(`fetch was not called ${call + 1} time(s)`)
  const [input] = args
  return new URL(input instanceof Request ? input.url : input.toString())
}

/**
 * Replaces `fetch` with one that never answers and rejects only when the
 * request's `signal` aborts.
 */
export const stub_unanswered_fetch = () => {
  const mock = vi.fn(
    (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal
        if (!signal) return
        signal.addEventListener('abort', () => reject(signal.reason), { once: true })
      })
  )
  vi.stubGlobal('fetch', mock)
  return mock
}
