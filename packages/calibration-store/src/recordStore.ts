import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';

import { CalibrationStoreError, RecordStoreError, RecordValidationError } from './errors';
import {
  compileFilters,
  quoteIdentifier,
  toSqlParameter,
  type CalibrationQueryFilters,
  type SqlParameter
} from './filters';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import {
  CORE_COLUMNS,
  COLUMN_NAME_PATTERN,
  isCoreColumn,
  parseFlatRecord,
  parseRecordInput,
  toFlatRecord,
  type CalibrationRecord,
  type CalibrationRecordInput,
  type ScalarValue
} from './schema';
import { formatTimestamp } from './timestamps';

export const MEMORY_DATABASE = ':memory:';

export type ColumnKind = 'string' | 'number' | 'boolean';

export type SortDirection = 'asc' | 'desc';

export interface RecordQueryOptions {
  orderBy?: string;
  direction?: SortDirection;
  limit?: number;
}

export interface RecordStoreOptions {
  databasePath: string;
  logger?: Logger;
}

export interface ResetOptions {
  confirm?: boolean;
}

export interface ColumnDescription {
  name: string;
  /** `null` for core columns and for columns created outside this store. */
  kind: ColumnKind | null;
}

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isColumnKind(value: unknown): value is ColumnKind {
  return value === 'string' || value === 'number' || value === 'boolean';
}

function kindOf(value: string | number | boolean): ColumnKind {
  if (typeof value === 'boolean') {
    return 'boolean';
  }
  return typeof value === 'number' ? 'number' : 'string';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SQLite-backed table of calibration records keyed by id.
 *
 * Attribute columns are added on first sight. Every mutation runs in a single
 * transaction; a failed one leaves the table and the column registry untouched.
 */
export class RecordStore {
  readonly databasePath: string;
  private readonly logger: Logger;
  private db: SqliteDatabase | null = null;
  private columns: string[] = [];
  private columnsByLowerName = new Map<string, string>();
  private columnKinds = new Map<string, ColumnKind>();

  constructor(options: RecordStoreOptions) {
    this.databasePath =
      options.databasePath === MEMORY_DATABASE ? MEMORY_DATABASE : path.resolve(options.databasePath);
    this.logger = options.logger ?? silentLogger;

    try {
      if (this.databasePath !== MEMORY_DATABASE) {
        mkdirSync(path.dirname(this.databasePath), { recursive: true });
      }
      this.db = new Database(this.databasePath);
    } catch (error) {
      throw new RecordStoreError(
        `Failed to open calibration database at ${this.databasePath}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const db = this.getDb();
    db.pragma('busy_timeout = 5000');
    if (this.databasePath !== MEMORY_DATABASE) {
      db.pragma('journal_mode = WAL');
    }
    this.createSchema(db);
    this.loadColumns();
  }

  /**
   * Upserts records by id. Records without `lastUpdated` share one timestamp
   * for the whole batch; records that carry one keep it.
   */
  add(records: readonly CalibrationRecordInput[]): CalibrationRecord[] {
    if (records.length === 0) {
      return [];
    }

    const stamp = formatTimestamp(new Date());
    const batch = this.matchAttributeColumns(
      records.map((input) => {
        const parsed = parseRecordInput(input);
        return { ...parsed, lastUpdated: parsed.lastUpdated ?? stamp };
      })
    );

    this.mutate('write calibration records', (db) => {
      this.ensureAttributeColumns(db, batch);
      const columns = [...this.columns];
      const columnList = columns.map(quoteIdentifier).join(', ');
      const placeholders = columns.map(() => '?').join(', ');
      const updates = columns
        .filter((column) => column !== 'id')
        .map((column) => `${quoteIdentifier(column)} = excluded.${quoteIdentifier(column)}`)
        .join(', ');
      const upsert = db.prepare(
        `INSERT INTO calibrations (${columnList}) VALUES (${placeholders})
         ON CONFLICT(id) DO UPDATE SET ${updates}`
      );

      for (const record of batch) {
        const flat = toFlatRecord(record);
        upsert.run(...columns.map((column) => toSqlParameter(flat[column] ?? null)));
      }
    });

    return batch.map((record) => ({ ...record, attributes: { ...record.attributes } }));
  }

  query(filters: CalibrationQueryFilters = {}, options: RecordQueryOptions = {}): CalibrationRecord[] {
    if (filters.calId !== undefined) {
      const record = this.queryById(filters.calId);
      return record ? [record] : [];
    }
    if (filters.filename !== undefined) {
      const record = this.queryByFilename(filters.filename);
      return record ? [record] : [];
    }

    const compiled = compileFilters(filters, (name) => this.hasColumn(name));
    if (compiled.unsatisfiable) {
      return [];
    }

    const orderBy = options.orderBy ?? 'last_updated';
    if (!COLUMN_NAME_PATTERN.test(orderBy) || !this.hasColumn(orderBy)) {
      throw new RecordValidationError(`Cannot order by unknown column ${orderBy}`, { orderBy });
    }
    const direction = options.direction === 'desc' ? 'DESC' : 'ASC';

    const params: SqlParameter[] = [...compiled.params];
    let sql = 'SELECT * FROM calibrations';
    if (compiled.clauses.length > 0) {
      sql += ` WHERE ${compiled.clauses.map((clause) => `(${clause})`).join(' AND ')}`;
    }
    sql += ` ORDER BY ${quoteIdentifier(orderBy)} ${direction}, rowid ASC`;
    if (options.limit !== undefined) {
      if (!Number.isInteger(options.limit) || options.limit < 0) {
        throw new RecordValidationError(`Invalid query limit ${options.limit}`, { limit: options.limit });
      }
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    return this.readRows(sql, params);
  }

  queryFirst(filters: CalibrationQueryFilters = {}, options: RecordQueryOptions = {}): CalibrationRecord | null {
    const [first] = this.query(filters, { ...options, limit: 1 });
    return first ?? null;
  }

  queryById(id: string): CalibrationRecord | null {
    const [record] = this.readRows('SELECT * FROM calibrations WHERE id = ? LIMIT 1', [id]);
    return record ?? null;
  }

  /** Most recently updated record with the given filename. */
  queryByFilename(filename: string): CalibrationRecord | null {
    const [record] = this.readRows(
      'SELECT * FROM calibrations WHERE filename = ? ORDER BY last_updated DESC, rowid DESC LIMIT 1',
      [filename]
    );
    return record ?? null;
  }

  delete(id: string): boolean {
    return this.mutate('delete calibration record', (db) => {
      const result = db.prepare('DELETE FROM calibrations WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  getLastUpdated(): string | null {
    const row: unknown = this.getDb().prepare('SELECT MAX(last_updated) AS lastUpdated FROM calibrations').get();
    if (isRow(row) && typeof row.lastUpdated === 'string') {
      return row.lastUpdated;
    }
    return null;
  }

  count(): number {
    const row: unknown = this.getDb().prepare('SELECT COUNT(*) AS total FROM calibrations').get();
    return isRow(row) && typeof row.total === 'number' ? row.total : 0;
  }

  listColumns(): ColumnDescription[] {
    return this.columns.map((name) => ({ name, kind: this.columnKinds.get(name) ?? null }));
  }

  /** Column names compare case-insensitively, as they do in SQLite. */
  hasColumn(name: string): boolean {
    return this.columnsByLowerName.has(name.toLowerCase());
  }

  /** Drops and recreates the tables. Without `confirm: true` nothing happens. */
  reset(options: ResetOptions = {}): boolean {
    if (options.confirm !== true) {
      this.logger.warn({ databasePath: this.databasePath }, 'Record store reset requested without confirmation');
      return false;
    }

    this.mutate('reset calibration database', (db) => {
      db.exec('DROP TABLE IF EXISTS calibrations');
      db.exec('DROP TABLE IF EXISTS calibration_columns');
      this.createSchema(db);
    });
    this.loadColumns();
    this.logger.info({ databasePath: this.databasePath }, 'Record store reset');
    return true;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  private getDb(): SqliteDatabase {
    if (!this.db) {
      throw new RecordStoreError('Record store is closed');
    }
    return this.db;
  }

  private createSchema(db: SqliteDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS calibrations (
        id TEXT PRIMARY KEY,
        filename TEXT NOT NULL,
        cal_type TEXT NOT NULL,
        datetime_obs TEXT NOT NULL,
        cal_version TEXT,
        origin TEXT,
        last_updated TEXT NOT NULL,
        master_cal INTEGER NOT NULL DEFAULT 0,
        file_md5 TEXT
      );
      CREATE INDEX IF NOT EXISTS calibrations_cal_type_idx ON calibrations (cal_type, datetime_obs);
      CREATE INDEX IF NOT EXISTS calibrations_filename_idx ON calibrations (filename);
      CREATE INDEX IF NOT EXISTS calibrations_last_updated_idx ON calibrations (last_updated);
      CREATE TABLE IF NOT EXISTS calibration_columns (
        name TEXT PRIMARY KEY,
        kind TEXT NOT NULL
      );
    `);
  }

  private loadColumns(): void {
    const db = this.getDb();
    const columns: string[] = [];
    for (const row of db.prepare("SELECT name FROM pragma_table_info('calibrations') ORDER BY cid").all()) {
      if (isRow(row) && typeof row.name === 'string') {
        columns.push(row.name);
      }
    }

    const kinds = new Map<string, ColumnKind>();
    for (const row of db.prepare('SELECT name, kind FROM calibration_columns').all()) {
      if (isRow(row) && typeof row.name === 'string' && isColumnKind(row.kind)) {
        kinds.set(row.name, row.kind);
      }
    }

    this.columns = columns.length > 0 ? columns : [...CORE_COLUMNS];
    this.columnsByLowerName = new Map(this.columns.map((name) => [name.toLowerCase(), name]));
    this.columnKinds = kinds;
  }

  /**
   * Renames attributes to the spelling of the column that stores them and
   * rejects values whose kind would not read back from that column.
   */
  private matchAttributeColumns(records: CalibrationRecord[]): CalibrationRecord[] {
    const introduced = new Map<string, { name: string; kind: ColumnKind }>();

    return records.map((record) => {
      const attributes: Record<string, ScalarValue> = {};
      for (const [name, value] of Object.entries(record.attributes)) {
        const lowerName = name.toLowerCase();
        const existing = this.columnsByLowerName.get(lowerName);
        const pending = introduced.get(lowerName);

        let column: string;
        let kind: ColumnKind | null;
        if (existing !== undefined) {
          column = existing;
          kind = this.columnKinds.get(existing) ?? null;
        } else if (pending !== undefined) {
          column = pending.name;
          kind = pending.kind;
        } else {
          introduced.set(lowerName, { name, kind: kindOf(value) });
          attributes[name] = value;
          continue;
        }

        if ((kind === 'boolean') !== (typeof value === 'boolean')) {
          throw new RecordValidationError(
            `Attribute ${name} of calibration ${record.id} is a ${kindOf(value)} but column ${column} holds ${kind ?? 'untyped'} values`,
            { id: record.id, attribute: name, column, columnKind: kind, valueKind: kindOf(value) }
          );
        }
        attributes[column] = value;
      }
      return { ...record, attributes };
    });
  }

  private ensureAttributeColumns(db: SqliteDatabase, records: CalibrationRecord[]): void {
    for (const record of records) {
      for (const [name, value] of Object.entries(record.attributes)) {
        if (this.hasColumn(name)) {
          continue;
        }
        // No declared type: values keep the storage class they were written with.
        db.exec(`ALTER TABLE calibrations ADD COLUMN ${quoteIdentifier(name)}`);
        db.prepare('INSERT OR REPLACE INTO calibration_columns (name, kind) VALUES (?, ?)').run(name, kindOf(value));
        this.columns.push(name);
        this.columnsByLowerName.set(name.toLowerCase(), name);
        this.columnKinds.set(name, kindOf(value));
        this.logger.debug({ column: name, kind: kindOf(value) }, 'Added calibration attribute column');
      }
    }
  }

  private mutate<T>(description: string, operation: (db: SqliteDatabase) => T): T {
    const db = this.getDb();
    const transaction = db.transaction(() => operation(db));
    try {
      return transaction();
    } catch (error) {
      this.loadColumns();
      if (error instanceof CalibrationStoreError) {
        throw error;
      }
      throw new RecordStoreError(`Failed to ${description}: ${describeError(error)}`, { cause: error });
    }
  }

  private readRows(sql: string, params: SqlParameter[]): CalibrationRecord[] {
    const rows: unknown[] = this.getDb().prepare(sql).all(...params);
    return rows.filter(isRow).map((row) => this.decodeRow(row));
  }

  private decodeRow(row: Row): CalibrationRecord {
    const flat: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(row)) {
      flat[name] = !isCoreColumn(name) && this.columnKinds.get(name) === 'boolean' ? decodeBoolean(value) : value;
    }
    try {
      return parseFlatRecord(flat);
    } catch (error) {
      if (error instanceof RecordValidationError) {
        throw new RecordValidationError(`Stored calibration ${String(row.id)} failed validation`, error.issues);
      }
      throw error;
    }
  }
}

function decodeBoolean(value: unknown): unknown {
  if (value === 0 || value === 1) {
    return value === 1;
  }
  return value;
}
