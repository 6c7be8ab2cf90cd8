import { beforeEach, describe, expect, it, vi } from 'vitest';
import { silentLogger } from '@/services/logger';
import type { ForecastRecord, ForecastRepository, ForecastStatistics } from '@/services/storage/forecast-store';
import type { Forecast } from '@/services/weather/types';
import {
  CancelledError,
  CityNotFoundError,
  CorruptedCallError,
  DecodeError,
  ExternalProviderError,
  NoDataError,
  PipelineBusyError,
  PipelineClosedError,
  QueryError,
  TransactionError,
  ValidationError,
} from '@/utils/errors';
import { CommandDispatcher, REPLIES, isValidCityName, type ChatCommand } from './dispatcher';

const PARIS: Forecast = {
  madeAt: new Date('2024-06-01T08:30:00.000Z'),
  description: 'clear sky',
  temperature: 24.25,
  feelsLike: 23.9,
  humidity: 35,
  windSpeed: 4.1,
};

const PARIS_REPLY = 'clear sky\n\ntemp: 24.25 C\nfeels like: 23.90 C\n\nhum: 35 %\nwind: 4.10 m/s';

const STATS: ForecastStatistics = {
  totalRecords: 2,
  firstRecordAt: new Date('2024-06-01T08:30:00.000Z'),
  recordHolders: {
    temperature: { city: 'Paris', value: 24.25 },
    humidity: { city: 'Oslo', value: 80 },
    wind: { city: 'Oslo', value: 6 },
  },
};

function command(command: string, args = ''): ChatCommand {
  return { chatId: 42, messageId: 7, command, args };
}

describe('isValidCityName', () => {
  it.each(['Paris', 'New York', 'Saint-Étienne', "L'Aquila", 'St. Petersburg', 'São Paulo', 'Zürich'])(
    'accepts %s',
    (city) => {
      expect(isValidCityName(city)).toBe(true);
    },
  );

  it.each(['', '   ', 'Paris1', '12345', 'Paris!', 'a'.repeat(101)])('rejects %j', (city) => {
    expect(isValidCityName(city)).toBe(false);
  });
});

describe('CommandDispatcher', () => {
  const forecast = vi.fn<(city: string, signal?: AbortSignal) => Promise<Forecast>>();
  const insert = vi.fn<(record: ForecastRecord) => Promise<void>>();
  const stat = vi.fn<() => Promise<ForecastStatistics>>();
  const store: ForecastRepository = { insert, stat };
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    forecast.mockReset();
    insert.mockReset().mockResolvedValue(undefined);
    stat.mockReset();
    dispatcher = new CommandDispatcher({ forecaster: { forecast }, store, logger: silentLogger() });
  });

  it('answers start, help and unknown commands with fixed texts', async () => {
    await expect(dispatcher.handle(command('start'))).resolves.toBe('Enter "/info city_name" to forecast');
    await expect(dispatcher.handle(command('help'))).resolves.toBe('/info city_name - do forecast\n/stat - take statistics');
    await expect(dispatcher.handle(command('weather', 'Paris'))).resolves.toBe("I don't know that command");
  });

  it('forecasts a city, records it and replies with the rendering', async () => {
    forecast.mockResolvedValue(PARIS);
    const signal = new AbortController().signal;

    const reply = await dispatcher.handle(command('info', '  Paris '), signal);

    expect(reply).toBe(PARIS_REPLY);
    expect(forecast).toHaveBeenCalledWith('Paris', signal);
    expect(insert).toHaveBeenCalledWith({
      messageId: 7,
      city: 'Paris',
      description: 'clear sky',
      temperature: 24.25,
      humidity: 35,
      windSpeed: 4.1,
      madeAt: PARIS.madeAt,
    });
  });

  it.each(['', 'Paris2', '!!!'])('rejects city %j without calling the provider', async (args) => {
    await expect(dispatcher.handle(command('info', args))).resolves.toBe(REPLIES.invalidCity);
    expect(forecast).not.toHaveBeenCalled();
    expect(insert).not.toHaveBeenCalled();
  });

  it.each([
    ['city not found', new CityNotFoundError('Atlantis'), 'unknown city, try again'],
    ['an external error', new ExternalProviderError(502), 'forecast error, try again'],
    ['a corrupted call', new CorruptedCallError(new Error('ECONNRESET')), 'forecast error, try again'],
    ['a decode error', new DecodeError([{ path: 'main', message: 'Required' }]), 'forecast error, try again'],
    ['a full queue', new PipelineBusyError(100), 'too many requests, try again later'],
    ['a closed pipeline', new PipelineClosedError(), 'internal error, try again'],
    ['a cancelled call', new CancelledError(), 'internal error, try again'],
    ['an unexpected error', new Error('boom'), 'internal error, try again'],
  ])('maps %s to its reply and records nothing', async (_label, error, expected) => {
    forecast.mockRejectedValue(error);

    await expect(dispatcher.handle(command('info', 'Atlantis'))).resolves.toBe(expected);
    expect(insert).not.toHaveBeenCalled();
  });

  it('still replies with the forecast when recording it fails', async () => {
    forecast.mockResolvedValue(PARIS);
    insert.mockRejectedValue(new TransactionError('commit', 'insert forecast', new Error('connection lost')));

    await expect(dispatcher.handle(command('info', 'Paris'))).resolves.toBe(PARIS_REPLY);
    expect(insert).toHaveBeenCalledTimes(1);
  });

  it('renders statistics', async () => {
    stat.mockResolvedValue(STATS);

    await expect(dispatcher.handle(command('stat'))).resolves.toBe(
      'Total\n  records: 2\n  1st at: 2024-06-01T08:30:00.000Z\n\nTop forecasts\n  temp: Paris, 24.25 C\n  hum: Oslo, 80 %\n  wind: Oslo, 6.00 m/s',
    );
  });

  it.each([
    ['no data', new NoDataError(), 'no stat data'],
    ['a query error', new QueryError('stat forecasts', new Error('timeout')), 'could not stat, try again'],
    ['a validation error', new ValidationError([]), 'could not stat, try again'],
  ])('maps %s from stat to its reply', async (_label, error, expected) => {
    stat.mockRejectedValue(error);

    await expect(dispatcher.handle(command('stat'))).resolves.toBe(expected);
  });
});
