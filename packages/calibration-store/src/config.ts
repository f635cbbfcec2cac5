import { z } from 'zod';

import type { CalibrationStoreOptions } from './calibrationStore';
import { booleanVar, integerVar, parseEnv, stringVar, type EnvSource } from './envConfig';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  CALIBRATION_CACHE_DIR: stringVar({ required: true }),
  CALIBRATION_INSTRUMENT: stringVar({ required: true }),
  CALIBRATION_LOCAL_DATABASE_FILENAME: stringVar(),
  CALIBRATION_REMOTE_ENABLED: booleanVar(false),
  CALIBRATION_REMOTE_URL: stringVar(),
  CALIBRATION_REMOTE_TOKEN: stringVar(),
  CALIBRATION_REMOTE_TIMEOUT_MS: integerVar({ defaultValue: 30_000, min: 1 }),
  CALIBRATION_DEFAULT_ORIGIN: stringVar(),
  CALIBRATION_USE_CACHED: booleanVar(true),
  CALIBRATION_LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim().toLowerCase() : 'info'))
    .pipe(z.enum(LOG_LEVELS))
});

export interface RemoteArchiveConfig {
  baseUrl: string;
  token: string | null;
  timeoutMs: number;
}

export interface CalibrationConfig {
  cacheDir: string;
  instrument: string;
  databaseFilename: string;
  remote: RemoteArchiveConfig | null;
  defaultOrigin: string;
  useCached: boolean;
  logLevel: LogLevel;
}

export interface LoadCalibrationConfigOptions {
  env?: EnvSource;
  overrides?: Partial<CalibrationConfig>;
}

export function defaultDatabaseFilename(instrument: string): string {
  return `${instrument.toLowerCase()}_calibrations.db`;
}

export function loadCalibrationConfig(options: LoadCalibrationConfigOptions = {}): CalibrationConfig {
  const env = parseEnv(envSchema, options.env ?? process.env);

  const cacheDir = env.CALIBRATION_CACHE_DIR ?? '';
  const instrument = env.CALIBRATION_INSTRUMENT ?? '';

  let remote: RemoteArchiveConfig | null = null;
  if (env.CALIBRATION_REMOTE_ENABLED) {
    if (!env.CALIBRATION_REMOTE_URL) {
      throw new ConfigurationError('CALIBRATION_REMOTE_URL is required when CALIBRATION_REMOTE_ENABLED is set');
    }
    remote = {
      baseUrl: env.CALIBRATION_REMOTE_URL,
      token: env.CALIBRATION_REMOTE_TOKEN ?? null,
      timeoutMs: env.CALIBRATION_REMOTE_TIMEOUT_MS
    };
  }

  return {
    cacheDir,
    instrument,
    databaseFilename: env.CALIBRATION_LOCAL_DATABASE_FILENAME ?? defaultDatabaseFilename(instrument),
    remote,
    defaultOrigin: env.CALIBRATION_DEFAULT_ORIGIN ?? 'LOCAL',
    useCached: env.CALIBRATION_USE_CACHED,
    logLevel: env.CALIBRATION_LOG_LEVEL,
    ...options.overrides
  };
}

/** Store options derived from configuration; the caller adds the remote client and logger. */
export function calibrationStoreOptionsFromConfig(
  config: CalibrationConfig
): Pick<CalibrationStoreOptions, 'instrument' | 'cacheDir' | 'databaseFilename' | 'defaultOrigin' | 'useCached'> {
  return {
    instrument: config.instrument,
    cacheDir: config.cacheDir,
    databaseFilename: config.databaseFilename,
    defaultOrigin: config.defaultOrigin,
    useCached: config.useCached
  };
}
