// Structured logging for the bot (tslog).
import { Logger, type ILogObj } from 'tslog';

export type AppLogger = Logger<ILogObj>;

export type LogLevel = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'pretty' | 'json' | 'hidden';

const LEVELS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  format?: LogFormat;
}

export function createLogger({ name = 'weather-bot', level = 'info', format = 'pretty' }: LoggerOptions = {}): AppLogger {
  return new Logger<ILogObj>({
    name,
    minLevel: LEVELS[level],
    prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
    type: format,
  });
}

/** Logger that swallows everything; used by tests. */
export function silentLogger(): AppLogger {
  return createLogger({ format: 'hidden' });
}
