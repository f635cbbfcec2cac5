import pino, { stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger };

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const loggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  const base = loggerOptions(options.level ?? 'info');
  return pino(options.name ? { ...base, name: options.name } : base);
}

/** Logger for library code that was not handed one. */
export const silentLogger: Logger = pino({ level: 'silent' });
