/**
 * Error taxonomy shared by the forecast client, pipeline and store.
 *
 * Every error carries a stable `code` so the dispatcher (and logs) can tell
 * the kinds apart without string matching. The original error, when there is
 * one, travels in `cause`.
 */

export type ErrorCode =
  | 'city_not_found'
  | 'external'
  | 'corrupted_call'
  | 'decode'
  | 'no_data'
  | 'transaction'
  | 'validation'
  | 'query'
  | 'cancelled'
  | 'pipeline_closed'
  | 'pipeline_busy'
  | 'config';

export interface ErrorIssue {
  path: string;
  message: string;
}

export abstract class WeatherBotError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The provider answered 404 for the requested city. */
export class CityNotFoundError extends WeatherBotError {
  readonly code = 'city_not_found';

  constructor(readonly city: string) {
    super(`city not found: ${city}`);
  }
}

/** The provider answered with an error status (400, 502, ...). */
export class ExternalProviderError extends WeatherBotError {
  readonly code = 'external';

  constructor(readonly status: number) {
    super(`forecast provider error: status ${status}`);
  }
}

/** No HTTP response at all: DNS, connection reset, timeout. */
export class CorruptedCallError extends WeatherBotError {
  readonly code = 'corrupted_call';

  constructor(cause: unknown) {
    super('corrupted call', { cause });
  }
}

export class DecodeError extends WeatherBotError {
  readonly code = 'decode';

  constructor(readonly issues: ErrorIssue[]) {
    super(`unable to decode forecast: ${formatIssues(issues)}`);
  }
}

export class NoDataError extends WeatherBotError {
  readonly code = 'no_data';

  constructor() {
    super('no data');
  }
}

export type TransactionPhase = 'connect' | 'begin' | 'commit' | 'rollback';

export class TransactionError extends WeatherBotError {
  readonly code = 'transaction';

  constructor(readonly phase: TransactionPhase, operation: string, cause: unknown) {
    super(`${operation}: ${phase} failed`, { cause });
  }
}

export class ValidationError extends WeatherBotError {
  readonly code = 'validation';

  constructor(readonly issues: ErrorIssue[], options?: { cause?: unknown }) {
    super(`invalid forecast record: ${formatIssues(issues)}`, options);
  }
}

export class QueryError extends WeatherBotError {
  readonly code = 'query';

  constructor(operation: string, cause: unknown) {
    super(`${operation}: query failed`, { cause });
  }
}

export class CancelledError extends WeatherBotError {
  readonly code = 'cancelled';

  constructor(message = 'operation cancelled') {
    super(message);
  }
}

export class PipelineClosedError extends WeatherBotError {
  readonly code = 'pipeline_closed';

  constructor() {
    super('forecast pipeline is closed');
  }
}

export class PipelineBusyError extends WeatherBotError {
  readonly code = 'pipeline_busy';

  constructor(readonly limit: number) {
    super(`forecast queue is full (${limit} waiting)`);
  }
}

export class ConfigError extends WeatherBotError {
  readonly code = 'config';

  constructor(readonly issues: ErrorIssue[]) {
    super(`invalid configuration: ${formatIssues(issues)}`);
  }
}

export function isWeatherBotError(err: unknown): err is WeatherBotError {
  return err instanceof WeatherBotError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatIssues(issues: ErrorIssue[]): string {
  return issues.map((i) => `${i.path}: ${i.message}`).join('; ');
}
