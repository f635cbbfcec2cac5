import { EventEmitter } from 'node:events';
import { mkdirSync, promises as fs } from 'node:fs';
import path from 'node:path';

import { computeFileMd5 } from './checksum';
import { defaultDatabaseFilename } from './config';
import {
  CalibrationNotFoundError,
  CalibrationStoreError,
  CalibrationUnavailableError,
  ConfigurationError
} from './errors';
import type { CalibrationQueryFilters } from './filters';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { MEMORY_DATABASE, RecordStore, type ResetOptions } from './recordStore';
import type { RemoteArchive } from './remote';
import {
  isCalibrationId,
  parseRecordInput,
  type CalibrationRecord,
  type CalibrationRecordInput,
  type NormalizedRecordInput
} from './schema';
import type { CalibrationSelector } from './selector';
import { VersionAllocator, type VersionCollision } from './versioning';

/** What a freshly produced calibration must offer to be registered. */
export interface SupportsCalibrationIO {
  /** Writes the calibration file into `outputDir` and returns its path. */
  save(outputDir: string): string | Promise<string>;
  toRecord(): CalibrationRecordInput;
}

export interface CalibrationStoreOptions {
  instrument: string;
  cacheDir: string;
  databaseFilename?: string;
  remote?: RemoteArchive | null;
  defaultOrigin?: string | null;
  useCached?: boolean;
  versionFamilyColumns?: readonly string[];
  logger?: Logger;
}

export interface CachedCalibration {
  path: string;
  record: CalibrationRecord;
}

export interface GetOptions {
  useCached?: boolean;
}

export interface RegisterOptions {
  origin?: string | null;
  newVersion?: boolean;
}

export type SkipReason = 'duplicate-id' | 'version-family-exists';

export type RegisterResult =
  | { status: 'registered'; path: string; record: CalibrationRecord }
  | { status: 'skipped'; reason: SkipReason; existing: CalibrationRecord };

export interface PopulateOptions {
  origin?: string | null;
}

export interface PopulateResult {
  written: CalibrationRecord[];
  unchanged: string[];
  missingFiles: string[];
}

export type RecordSide = 'local' | 'remote';

export type SyncMode = 'id' | 'last_updated';

export interface SyncResult {
  direction: 'from-remote' | 'to-remote';
  mode: SyncMode;
  records: CalibrationRecord[];
}

type CalibrationStoreEvents = {
  'calibration:registered': [record: CalibrationRecord, filePath: string];
  'calibration:skipped': [reason: SkipReason, existing: CalibrationRecord];
  'calibration:downloaded': [record: CalibrationRecord, filePath: string];
  'sync:completed': [result: SyncResult];
};

interface RecordSource {
  query(filters: CalibrationQueryFilters): Promise<CalibrationRecord[]>;
  getLastUpdated(): Promise<string | null>;
}

export class CalibrationStore extends EventEmitter<CalibrationStoreEvents> {
  readonly instrument: string;
  readonly cacheDir: string;
  readonly calibrationsDir: string;
  readonly databasePath: string;
  readonly recordStore: RecordStore;
  readonly remote: RemoteArchive | null;
  private readonly allocator: VersionAllocator;
  private readonly useCached: boolean;
  private readonly logger: Logger;
  private operationQueue: Promise<void> = Promise.resolve();

  constructor(options: CalibrationStoreOptions) {
    super();
    const instrument = options.instrument.trim();
    if (!instrument) {
      throw new ConfigurationError('An instrument name is required');
    }
    if (!options.cacheDir || !options.cacheDir.trim()) {
      throw new ConfigurationError('A cache directory is required');
    }

    this.instrument = instrument;
    this.cacheDir = path.resolve(options.cacheDir);
    this.calibrationsDir = path.join(this.cacheDir, 'calibrations', instrument);
    const databaseDir = path.join(this.cacheDir, 'database');
    mkdirSync(this.calibrationsDir, { recursive: true });
    mkdirSync(databaseDir, { recursive: true });

    const databaseFilename = options.databaseFilename ?? defaultDatabaseFilename(instrument);
    this.databasePath =
      databaseFilename === MEMORY_DATABASE ? MEMORY_DATABASE : path.join(databaseDir, databaseFilename);
    this.logger = options.logger ?? silentLogger;
    this.recordStore = new RecordStore({ databasePath: this.databasePath, logger: this.logger });
    this.allocator = new VersionAllocator(this.recordStore, {
      familyColumns: options.versionFamilyColumns,
      defaultOrigin: options.defaultOrigin
    });
    this.remote = options.remote ?? null;
    this.useCached = options.useCached ?? true;
  }

  async selectAndGet<TInput, TOptions>(
    input: TInput,
    selector: CalibrationSelector<TInput, TOptions>,
    options: TOptions,
    getOptions: GetOptions = {}
  ): Promise<CachedCalibration> {
    const record = selector.select(input, this.recordStore, options);
    if (!record) {
      throw new CalibrationNotFoundError('selection', 'No calibration matched the selection input');
    }
    return this.get(record, getOptions);
  }

  /**
   * Resolves a record, id or filename to a local file, fetching the record
   * and then the file from the remote archive when they are not cached.
   */
  async get(identifier: string | CalibrationRecord, options: GetOptions = {}): Promise<CachedCalibration> {
    const record = await this.resolveRecord(identifier);
    const filePath = this.getLocalFilepath(record);
    const useCached = options.useCached ?? this.useCached;
    const cached = await this.isCached(record);

    if (cached && useCached) {
      return { path: filePath, record };
    }

    if (!this.remote) {
      if (cached) {
        this.logger.warn(
          { id: record.id, filename: record.filename },
          'Cached file bypass requested but no remote archive is configured; using cached file'
        );
        return { path: filePath, record };
      }
      throw new CalibrationUnavailableError(record.id, record.filename);
    }

    const downloadedPath = await this.remote.download(record.id, this.calibrationsDir, {
      filename: record.filename
    });
    this.logger.info({ id: record.id, filename: record.filename }, 'Downloaded calibration file');
    this.emit('calibration:downloaded', record, downloadedPath);
    return { path: downloadedPath, record };
  }

  async register(calibration: SupportsCalibrationIO, options: RegisterOptions = {}): Promise<RegisterResult> {
    return this.enqueue(async () => {
      const input = parseRecordInput(calibration.toRecord());

      const duplicate = this.recordStore.queryById(input.id);
      if (duplicate) {
        return this.skip('duplicate-id', duplicate);
      }

      const origin = this.allocator.resolveOrigin(input, options.origin);
      if (!options.newVersion) {
        const [member] = this.allocator.findFamilyMembers(input, origin);
        if (member) {
          return this.skip('version-family-exists', member);
        }
      }

      const calVersion = this.allocator.nextVersion(input, origin);
      const savedPath = path.resolve(await calibration.save(this.calibrationsDir));
      if (path.dirname(savedPath) !== this.calibrationsDir) {
        throw new CalibrationStoreError(
          `Calibration ${input.id} was saved to ${savedPath}, outside ${this.calibrationsDir}`
        );
      }
      const fileMd5 = await computeFileMd5(savedPath);

      const [record] = this.recordStore.add([
        {
          ...input,
          filename: path.basename(savedPath),
          origin,
          calVersion,
          fileMd5,
          lastUpdated: undefined
        }
      ]);
      if (!record) {
        throw new CalibrationStoreError(`Calibration ${input.id} could not be stored`);
      }

      this.logger.info(
        { id: record.id, filename: record.filename, calVersion: record.calVersion },
        'Registered calibration'
      );
      this.emit('calibration:registered', record, savedPath);
      return { status: 'registered', path: savedPath, record };
    });
  }

  /**
   * Rebuilds records for calibration files already present in the cache
   * directory. Files are checksummed, not rewritten.
   */
  async populateFromCache(
    calibrations: Iterable<SupportsCalibrationIO>,
    options: PopulateOptions = {}
  ): Promise<PopulateResult> {
    return this.enqueue(async () => {
      const result: PopulateResult = { written: [], unchanged: [], missingFiles: [] };

      for (const calibration of calibrations) {
        const input = parseRecordInput(calibration.toRecord());
        const filePath = this.getLocalFilepath(input);
        if (!(await fileExists(filePath))) {
          this.logger.warn({ id: input.id, filename: input.filename }, 'Calibration file missing from cache');
          result.missingFiles.push(input.id);
          continue;
        }

        const fileMd5 = await computeFileMd5(filePath);
        const existing = this.recordStore.queryById(input.id);
        const origin = this.allocator.resolveOrigin(existing ?? input, options.origin);
        const calVersion = existing?.calVersion ?? input.calVersion ?? this.allocator.nextVersion(input, origin);

        if (
          existing &&
          existing.fileMd5 === fileMd5 &&
          existing.origin === origin &&
          existing.calVersion === calVersion &&
          existing.filename === input.filename
        ) {
          result.unchanged.push(existing.id);
          continue;
        }

        const [record] = this.recordStore.add([{ ...input, origin, calVersion, fileMd5, lastUpdated: undefined }]);
        if (record) {
          result.written.push(record);
        }
      }

      this.logger.info(
        { written: result.written.length, unchanged: result.unchanged.length, missing: result.missingFiles.length },
        'Populated records from cache directory'
      );
      return result;
    });
  }

  /**
   * Records present on `source` and absent from the other side.
   *
   * `last_updated` mode takes source records at or after the target's cursor,
   * minus those the target already holds at exactly that cursor.
   */
  async getMissingRecords(source: RecordSide, mode: SyncMode = 'last_updated'): Promise<CalibrationRecord[]> {
    const from = this.recordSource(source);
    const target = this.recordSource(source === 'local' ? 'remote' : 'local');

    if (mode === 'id') {
      const [sourceRecords, targetRecords] = await Promise.all([from.query({}), target.query({})]);
      const known = new Set(targetRecords.map((record) => record.id));
      return sourceRecords.filter((record) => !known.has(record.id));
    }

    const cursor = await target.getLastUpdated();
    if (cursor === null) {
      return from.query({});
    }

    const [candidates, boundary] = await Promise.all([
      from.query({ lastUpdatedStart: cursor }),
      target.query({ lastUpdatedStart: cursor, lastUpdatedEnd: cursor })
    ]);
    const atCursor = new Set(boundary.map((record) => record.id));
    return candidates.filter((record) => !(record.lastUpdated === cursor && atCursor.has(record.id)));
  }

  async syncFromRemote(mode: SyncMode = 'last_updated'): Promise<SyncResult> {
    this.requireRemote();
    return this.enqueue(async () => {
      const missing = await this.getMissingRecords('remote', mode);
      const records = this.recordStore.add(missing);
      return this.completeSync({ direction: 'from-remote', mode, records });
    });
  }

  /** Uploads missing metadata. File bytes are not transferred. */
  async syncToRemote(mode: SyncMode = 'last_updated'): Promise<SyncResult> {
    const remote = this.requireRemote();
    return this.enqueue(async () => {
      const records = await this.getMissingRecords('local', mode);
      if (records.length > 0) {
        await remote.add(records);
      }
      return this.completeSync({ direction: 'to-remote', mode, records });
    });
  }

  async getMissingLocalFiles(): Promise<CalibrationRecord[]> {
    const missing: CalibrationRecord[] = [];
    for (const record of this.recordStore.query()) {
      if (!(await this.isCached(record))) {
        missing.push(record);
      }
    }
    return missing;
  }

  findVersionCollisions(): VersionCollision[] {
    return this.allocator.findCollisions();
  }

  /** Deletes this instrument's files and records. Requires `confirm: true`. */
  async reset(options: ResetOptions = {}): Promise<boolean> {
    if (options.confirm !== true) {
      this.logger.warn({ instrument: this.instrument }, 'Calibration cache reset requested without confirmation');
      return false;
    }

    return this.enqueue(async () => {
      await fs.rm(this.calibrationsDir, { recursive: true, force: true });
      await fs.mkdir(this.calibrationsDir, { recursive: true });
      this.recordStore.reset({ confirm: true });
      this.logger.info({ instrument: this.instrument }, 'Calibration cache reset');
      return true;
    });
  }

  getLocalFilepath(record: Pick<NormalizedRecordInput, 'filename'>): string {
    if (path.basename(record.filename) !== record.filename) {
      throw new CalibrationStoreError(`Calibration filename ${record.filename} must be a bare file name`);
    }
    return path.join(this.calibrationsDir, record.filename);
  }

  async isCached(record: Pick<NormalizedRecordInput, 'filename'>): Promise<boolean> {
    return fileExists(this.getLocalFilepath(record));
  }

  close(): void {
    this.recordStore.close();
  }

  private async resolveRecord(identifier: string | CalibrationRecord): Promise<CalibrationRecord> {
    const byId = typeof identifier !== 'string' || isCalibrationId(identifier);
    const key = typeof identifier === 'string' ? identifier : identifier.id;

    const local = byId ? this.recordStore.queryById(key) : this.recordStore.queryByFilename(key);
    if (local) {
      return local;
    }
    if (!this.remote) {
      throw new CalibrationNotFoundError(key);
    }

    const remoteRecords = await this.remote.query(byId ? { calId: key } : { filename: key });
    const found = remoteRecords.reduce<CalibrationRecord | null>(
      (latest, candidate) => (latest === null || candidate.lastUpdated > latest.lastUpdated ? candidate : latest),
      null
    );
    if (!found) {
      throw new CalibrationNotFoundError(key);
    }

    const [stored] = this.recordStore.add([found]);
    this.logger.info({ id: found.id, filename: found.filename }, 'Fetched calibration record from remote archive');
    return stored ?? found;
  }

  private skip(reason: SkipReason, existing: CalibrationRecord): RegisterResult {
    this.logger.info(
      { id: existing.id, filename: existing.filename, calVersion: existing.calVersion, reason },
      'Skipped calibration registration'
    );
    this.emit('calibration:skipped', reason, existing);
    return { status: 'skipped', reason, existing };
  }

  private completeSync(result: SyncResult): SyncResult {
    this.logger.info(
      { direction: result.direction, mode: result.mode, records: result.records.length },
      'Calibration records synchronized'
    );
    this.emit('sync:completed', result);
    return result;
  }

  private requireRemote(): RemoteArchive {
    if (!this.remote) {
      throw new ConfigurationError('No remote archive is configured for this calibration store');
    }
    return this.remote;
  }

  private recordSource(side: RecordSide): RecordSource {
    if (side === 'local') {
      return {
        query: async (filters) => this.recordStore.query(filters),
        getLastUpdated: async () => this.recordStore.getLastUpdated()
      };
    }
    const remote = this.requireRemote();
    return {
      query: (filters) => remote.query(filters),
      getLastUpdated: () => remote.getLastUpdated()
    };
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.operationQueue.then(operation);
    this.operationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
