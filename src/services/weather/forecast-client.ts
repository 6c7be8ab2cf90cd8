/**
 * Forecast client for the OpenWeatherMap current-weather-by-city endpoint.
 *
 * One HTTP call per fetch, never retried. The outcome is classified into
 * CityNotFound / ExternalProvider / CorruptedCall / Decode errors.
 */
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { AppLogger } from '@/services/logger';
import {
  CancelledError,
  CityNotFoundError,
  ConfigError,
  CorruptedCallError,
  DecodeError,
  ExternalProviderError,
} from '@/utils/errors';
import { toIssues } from '@/utils/validation';
import { providerForecastSchema, type Forecast, type ForecastFetcher } from './types';

export const DEFAULT_FORECAST_URL = 'https://api.openweathermap.org/data/2.5/weather';

export interface ForecastClientOptions {
  apiToken: string;
  logger: AppLogger;
  endpoint?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => Date;
}

export class ForecastClient implements ForecastFetcher {
  private readonly apiToken: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly now: () => Date;
  private readonly logger: AppLogger;

  constructor(options: ForecastClientOptions) {
    if (!options.apiToken) {
      throw new ConfigError([{ path: 'apiToken', message: 'Missing OpenWeatherMap API token' }]);
    }
    this.apiToken = options.apiToken;
    this.endpoint = options.endpoint ?? DEFAULT_FORECAST_URL;
    this.timeoutMs = options.timeoutMs ?? 1000;
    this.http = options.http ?? axios.create();
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  async fetch(city: string, signal?: AbortSignal): Promise<Forecast> {
    this.logger.info('forecast:request', { city });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.endpoint, {
        params: { units: 'metric', q: city, appid: this.apiToken },
        timeout: this.timeoutMs,
        signal,
        // Statuses are classified below, not thrown by axios.
        validateStatus: () => true,
      });
    } catch (err) {
      if (signal?.aborted) {
        this.logger.info('forecast:cancelled', { city });
        throw new CancelledError(`forecast for ${city} cancelled`);
      }
      this.logger.warn('forecast:transport_error', {
        city,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new CorruptedCallError(err);
    }

    this.logger.info('forecast:response', { city, status: response.status });

    if (response.status === 404) {
      throw new CityNotFoundError(city);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new ExternalProviderError(response.status);
    }

    const parsed = providerForecastSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new DecodeError(toIssues(parsed.error));
    }
    const body = parsed.data;

    return {
      madeAt: this.now(),
      description: body.weather[0].description,
      temperature: body.main.temp,
      feelsLike: body.main.feels_like,
      humidity: body.main.humidity,
      windSpeed: body.wind.speed,
    };
  }
}
