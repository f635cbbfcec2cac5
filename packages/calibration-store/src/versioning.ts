import { ConfigurationError, VersionOverflowError } from './errors';
import type { RecordStore } from './recordStore';
import {
  COLUMN_NAME_PATTERN,
  collidesWithCoreColumn,
  isCoreColumn,
  toFlatRecord,
  type CalibrationRecord,
  type FlatValue,
  type NormalizedRecordInput
} from './schema';

export const DEFAULT_VERSION_FAMILY_COLUMNS: readonly string[] = ['cal_type', 'datetime_obs'];

export const MAX_CAL_VERSION = 999;

export function formatCalVersion(version: number): string {
  return String(version).padStart(3, '0');
}

function toSnakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/** Validates family column names, folding core columns to their stored spelling. */
export function normalizeFamilyColumns(columns: readonly string[]): string[] {
  const normalized: string[] = [];
  for (const column of columns) {
    if (!COLUMN_NAME_PATTERN.test(column)) {
      throw new ConfigurationError(`Invalid version family column ${JSON.stringify(column)}`);
    }
    const snake = toSnakeCase(column);
    if (snake !== column && !collidesWithCoreColumn(column) && isCoreColumn(snake)) {
      throw new ConfigurationError(`Version family column ${column} looks like a field name; use ${snake}`);
    }
    const name = collidesWithCoreColumn(column) ? column.toLowerCase() : column;
    if (name !== 'origin' && !normalized.includes(name)) {
      normalized.push(name);
    }
  }
  return normalized;
}

export interface VersionAllocatorOptions {
  familyColumns?: readonly string[];
  defaultOrigin?: string | null;
}

export interface VersionCollision {
  familyKey: Record<string, FlatValue>;
  origin: string | null;
  calVersion: string;
  ids: string[];
}

type VersionedRecord = NormalizedRecordInput | CalibrationRecord;

/**
 * Allocates `cal_version` values within a version family: records sharing the
 * family columns and origin.
 *
 * Allocation reads the current maximum and does not lock; callers in one
 * process serialize through the Cache Manager's operation queue.
 */
export class VersionAllocator {
  readonly familyColumns: readonly string[];
  private readonly defaultOrigin: string | null;

  constructor(
    private readonly store: RecordStore,
    options: VersionAllocatorOptions = {}
  ) {
    this.familyColumns = normalizeFamilyColumns(options.familyColumns ?? DEFAULT_VERSION_FAMILY_COLUMNS);
    if (this.familyColumns.length === 0) {
      throw new ConfigurationError('At least one version family column is required');
    }
    this.defaultOrigin = options.defaultOrigin ?? null;
  }

  resolveOrigin(record: VersionedRecord, origin?: string | null): string {
    const resolved = origin ?? record.origin ?? this.defaultOrigin;
    if (!resolved) {
      throw new ConfigurationError(
        `No origin for calibration ${record.id}: pass one explicitly, set it on the record or configure a default`
      );
    }
    return resolved;
  }

  familyKey(record: VersionedRecord): Record<string, FlatValue> {
    const flat = toFlatRecord(record);
    const key: Record<string, FlatValue> = {};
    for (const column of this.familyColumns) {
      const match = Object.keys(flat).find((name) => name.toLowerCase() === column.toLowerCase());
      key[column] = match === undefined ? null : flat[match] ?? null;
    }
    return key;
  }

  findFamilyMembers(record: VersionedRecord, origin?: string | null): CalibrationRecord[] {
    const resolvedOrigin = this.resolveOrigin(record, origin);
    return this.store.query({ where: { ...this.familyKey(record), origin: resolvedOrigin } });
  }

  nextVersion(record: VersionedRecord, origin?: string | null): string {
    let highest = 0;
    for (const member of this.findFamilyMembers(record, origin)) {
      if (member.calVersion === null) {
        continue;
      }
      const value = Number.parseInt(member.calVersion, 10);
      if (Number.isInteger(value) && value > highest) {
        highest = value;
      }
    }

    const next = highest + 1;
    if (next > MAX_CAL_VERSION) {
      throw new VersionOverflowError(next, MAX_CAL_VERSION);
    }
    return formatCalVersion(next);
  }

  /** Groups of records sharing family, origin and version. Advisory only. */
  findCollisions(): VersionCollision[] {
    const groups = new Map<string, VersionCollision>();
    for (const record of this.store.query()) {
      if (record.calVersion === null) {
        continue;
      }
      const familyKey = this.familyKey(record);
      const groupKey = JSON.stringify([familyKey, record.origin, record.calVersion]);
      const group = groups.get(groupKey);
      if (group) {
        group.ids.push(record.id);
      } else {
        groups.set(groupKey, {
          familyKey,
          origin: record.origin,
          calVersion: record.calVersion,
          ids: [record.id]
        });
      }
    }

    return Array.from(groups.values()).filter((group) => group.ids.length > 1);
  }
}
