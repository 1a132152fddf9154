/**
 * @module OpenWeatherSchema
 * @description Zod schemas for the OpenWeather geocoding and current-conditions responses.
 */

import { z } from 'zod'

/**
 * Response of `GET geo/1.0/zip`. Only `lat`/`lon` are required; the
 * remaining fields are informational.
 */
export const GeocodeResponseSchema = z.object({
  zip: z.string().optional(),
  name: z.string().optional(),
  country: z.string().optional(),
  lat: z.number(),
  lon: z.number(),
})

export type GeocodeResponse = z.infer<typeof GeocodeResponseSchema>

const ConditionSchema = z.object({
  id: z.number().optional(),
  main: z.string(),
  description: z.string(),
  icon: z.string().optional(),
}).passthrough()

/**
 * Response of `GET data/2.5/weather`.
 *
 * Objects are `passthrough` so a snapshot written from a parsed value keeps
 * every field the provider sent.
 */
export const ObservationSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  dt: z.number().int(),
  coord: z.object({
    lon: z.number(),
    lat: z.number(),
  }).passthrough(),
  sys: z.object({
    country: z.string(),
    sunrise: z.number().int(),
    sunset: z.number().int(),
  }).passthrough(),
  weather: z.array(ConditionSchema).nonempty(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    temp_min: z.number(),
    temp_max: z.number(),
    pressure: z.number(),
    humidity: z.number(),
  }).passthrough(),
  wind: z.object({
    speed: z.number(),
    deg: z.number(),
  }).passthrough(),
  clouds: z.object({
    all: z.number(),
  }).passthrough(),
}).passthrough()

export type Observation = z.infer<typeof ObservationSchema>

/**
 * Flattens a ZodError into `path: message; path: message`.
 */
export function format_issues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
}
