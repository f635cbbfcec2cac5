import type { CalibrationQueryFilters } from './filters';
import type { CalibrationRecord, CalibrationRecordInput } from './schema';

export interface RemoteDownloadOptions {
  /** Name to give the downloaded file; defaults to the archive member's name. */
  filename?: string;
}

export interface RemoteAddResult {
  added: number;
}

/**
 * Source of truth for calibration records and files. The Cache Manager only
 * talks to the archive through this contract.
 */
export interface RemoteArchive {
  query(filters: CalibrationQueryFilters): Promise<CalibrationRecord[]>;
  getLastUpdated(): Promise<string | null>;
  add(records: readonly CalibrationRecordInput[]): Promise<RemoteAddResult>;
  /** Resolves to the absolute path of the downloaded file inside `outputDir`. */
  download(calibrationId: string, outputDir: string, options?: RemoteDownloadOptions): Promise<string>;
}
