/**
 * Chat command dispatcher.
 *
 * Turns one parsed chat command into the reply text. Forecasts are queued on
 * the pipeline and, once delivered, recorded in the store.
 */
import type { AppLogger } from '@/services/logger';
import type { ForecastRepository } from '@/services/storage/forecast-store';
import type { Forecast } from '@/services/weather/types';
import {
  CityNotFoundError,
  CorruptedCallError,
  DecodeError,
  ExternalProviderError,
  NoDataError,
  PipelineBusyError,
  errorMessage,
  isWeatherBotError,
} from '@/utils/errors';
import { formatForecast, formatStatistics } from './format';

export interface ChatCommand {
  chatId: number;
  messageId: number;
  /** Command name without the leading slash or bot mention. */
  command: string;
  args: string;
}

/** The part of the forecast pipeline the dispatcher needs. */
export interface Forecaster {
  forecast(city: string, signal?: AbortSignal): Promise<Forecast>;
}

export interface DispatcherDeps {
  forecaster: Forecaster;
  store: ForecastRepository;
  logger: AppLogger;
}

export const REPLIES = {
  invalidCity: 'invalid city, try again',
  unknownCity: 'unknown city, try again',
  forecastError: 'forecast error, try again',
  busy: 'too many requests, try again later',
  internalError: 'internal error, try again',
  noStatData: 'no stat data',
  statError: 'could not stat, try again',
  start: 'Enter "/info city_name" to forecast',
  help: '/info city_name - do forecast\n/stat - take statistics',
  unknownCommand: "I don't know that command",
} as const;

// https://stackoverflow.com/a/25677072
const CITY_NAME = /^([a-zA-Z\u0080-\u024F]+(?:. |-| |'))*[a-zA-Z\u0080-\u024F]*$/;
const MAX_CITY_LENGTH = 100;

export function isValidCityName(city: string): boolean {
  const trimmed = city.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_CITY_LENGTH && CITY_NAME.test(trimmed);
}

export class CommandDispatcher {
  private readonly logger: AppLogger;

  constructor(private readonly deps: DispatcherDeps) {
    this.logger = deps.logger.getSubLogger({ name: 'dispatcher' });
  }

  async handle(cmd: ChatCommand, signal?: AbortSignal): Promise<string> {
    switch (cmd.command) {
      case 'info':
        return this.info(cmd, signal);
      case 'stat':
        return this.stat(cmd);
      case 'start':
        return REPLIES.start;
      case 'help':
        return REPLIES.help;
      default:
        return REPLIES.unknownCommand;
    }
  }

  private async info(cmd: ChatCommand, signal?: AbortSignal): Promise<string> {
    const city = cmd.args.trim();
    if (!isValidCityName(city)) {
      this.logger.info('dispatch:invalid_city', { chatId: cmd.chatId, messageId: cmd.messageId });
      return REPLIES.invalidCity;
    }

    let forecast: Forecast;
    try {
      forecast = await this.deps.forecaster.forecast(city, signal);
    } catch (err) {
      this.logger.error('dispatch:forecast_failed', {
        chatId: cmd.chatId,
        messageId: cmd.messageId,
        city,
        code: isWeatherBotError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
      return forecastFailureReply(err);
    }
    this.logger.debug('dispatch:forecast', { city, forecast });

    try {
      await this.deps.store.insert({
        messageId: cmd.messageId,
        city,
        description: forecast.description,
        temperature: forecast.temperature,
        humidity: forecast.humidity,
        windSpeed: forecast.windSpeed,
        madeAt: forecast.madeAt,
      });
    } catch (err) {
      // The user still gets the forecast.
      this.logger.error('dispatch:record_failed', { messageId: cmd.messageId, city, error: errorMessage(err) });
    }

    return formatForecast(forecast);
  }

  private async stat(cmd: ChatCommand): Promise<string> {
    try {
      const stat = await this.deps.store.stat();
      this.logger.debug('dispatch:stat', { total: stat.totalRecords });
      return formatStatistics(stat);
    } catch (err) {
      if (err instanceof NoDataError) {
        return REPLIES.noStatData;
      }
      this.logger.error('dispatch:stat_failed', { chatId: cmd.chatId, error: errorMessage(err) });
      return REPLIES.statError;
    }
  }
}

function forecastFailureReply(err: unknown): string {
  if (err instanceof CityNotFoundError) return REPLIES.unknownCity;
  if (err instanceof ExternalProviderError || err instanceof CorruptedCallError || err instanceof DecodeError) {
    return REPLIES.forecastError;
  }
  if (err instanceof PipelineBusyError) return REPLIES.busy;
  return REPLIES.internalError;
}
