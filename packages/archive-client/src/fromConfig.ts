import {
  CalibrationStore,
  calibrationStoreOptionsFromConfig,
  createLogger,
  type CalibrationConfig,
  type Logger
} from '@calvault/calibration-store';

import { ArchiveClient } from './client';

export interface CreateFromConfigOptions {
  logger?: Logger;
  userAgent?: string;
}

/** `null` when the configuration has no remote archive enabled. */
export function createArchiveClient(
  config: CalibrationConfig,
  options: Pick<CreateFromConfigOptions, 'userAgent'> = {}
): ArchiveClient | null {
  if (!config.remote) {
    return null;
  }
  return new ArchiveClient({
    baseUrl: config.remote.baseUrl,
    instrument: config.instrument,
    token: config.remote.token ?? undefined,
    fetchTimeoutMs: config.remote.timeoutMs,
    userAgent: options.userAgent
  });
}

/**
 * Builds a cache manager, its archive client and its logger from loaded
 * configuration.
 */
export function createCalibrationStore(
  config: CalibrationConfig,
  options: CreateFromConfigOptions = {}
): CalibrationStore {
  const logger = options.logger ?? createLogger({ level: config.logLevel, name: 'calibration-store' });
  return new CalibrationStore({
    ...calibrationStoreOptionsFromConfig(config),
    remote: createArchiveClient(config, options),
    logger
  });
}
