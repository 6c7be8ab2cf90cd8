/**
 * Forecast types shared by the client, pipeline and dispatcher.
 */
import { z } from 'zod';

/** Current weather for one city, stamped with the time it was fetched. */
export interface Forecast {
  madeAt: Date;
  description: string;
  /** Celsius. */
  temperature: number;
  /** Celsius. */
  feelsLike: number;
  /** Percent. */
  humidity: number;
  /** m/s. */
  windSpeed: number;
}

/** Anything that turns a city name into a forecast. */
export interface ForecastFetcher {
  fetch(city: string, signal?: AbortSignal): Promise<Forecast>;
}

/**
 * Subset of the OpenWeatherMap "current weather" body the bot reads.
 * https://openweathermap.org/current#current_JSON
 */
export const providerForecastSchema = z.object({
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number().int(),
  }),
  weather: z
    .array(z.object({ description: z.string() }))
    .min(1, 'weather must hold at least one condition'),
  wind: z.object({
    speed: z.number(),
  }),
});
