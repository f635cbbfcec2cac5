import { RecordValidationError } from './errors';
import { COLUMN_NAME_PATTERN, type FlatValue } from './schema';
import { normalizeTimestamp } from './timestamps';

/**
 * Filter vocabulary shared by the local Record Store and the remote archive.
 * All clauses are combined with AND; range bounds are inclusive.
 */
export interface CalibrationQueryFilters {
  calType?: string;
  calId?: string;
  filename?: string;
  origin?: string;
  masterCal?: boolean;
  dateTimeStart?: string;
  dateTimeEnd?: string;
  lastUpdatedStart?: string;
  lastUpdatedEnd?: string;
  calVersionMin?: string | number;
  calVersionMax?: string | number;
  /** Equality on arbitrary columns, with `IS` semantics so that `null` matches missing values. */
  where?: Record<string, FlatValue>;
}

export type SqlParameter = string | number | null;

export interface CompiledFilters {
  clauses: string[];
  params: SqlParameter[];
  /** Set when a clause can never match, e.g. a value filter on a column the table does not have. */
  unsatisfiable: boolean;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function toSqlParameter(value: FlatValue): SqlParameter {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function requireTimestamp(name: string, value: string): string {
  const normalized = normalizeTimestamp(value);
  if (normalized === null) {
    throw new RecordValidationError(`Invalid ${name} filter: ${value}`, { [name]: value });
  }
  return normalized;
}

function requireVersionNumber(name: string, value: string | number): number {
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  if (!Number.isInteger(parsed)) {
    throw new RecordValidationError(`Invalid ${name} filter: ${value}`, { [name]: value });
  }
  return parsed;
}

/**
 * Compiles filters to SQL clauses. `calId` and `filename` are not handled here:
 * the Record Store short-circuits on them before compiling the rest.
 */
export function compileFilters(
  filters: CalibrationQueryFilters,
  hasColumn: (name: string) => boolean
): CompiledFilters {
  const clauses: string[] = [];
  const params: SqlParameter[] = [];
  let unsatisfiable = false;

  if (filters.calType !== undefined) {
    clauses.push('cal_type = ?');
    params.push(filters.calType);
  }
  if (filters.origin !== undefined) {
    clauses.push('origin = ?');
    params.push(filters.origin);
  }
  if (filters.masterCal !== undefined) {
    clauses.push('master_cal = ?');
    params.push(filters.masterCal ? 1 : 0);
  }
  if (filters.dateTimeStart !== undefined) {
    clauses.push('datetime_obs >= ?');
    params.push(requireTimestamp('dateTimeStart', filters.dateTimeStart));
  }
  if (filters.dateTimeEnd !== undefined) {
    clauses.push('datetime_obs <= ?');
    params.push(requireTimestamp('dateTimeEnd', filters.dateTimeEnd));
  }
  if (filters.lastUpdatedStart !== undefined) {
    clauses.push('last_updated >= ?');
    params.push(requireTimestamp('lastUpdatedStart', filters.lastUpdatedStart));
  }
  if (filters.lastUpdatedEnd !== undefined) {
    clauses.push('last_updated <= ?');
    params.push(requireTimestamp('lastUpdatedEnd', filters.lastUpdatedEnd));
  }
  if (filters.calVersionMin !== undefined) {
    clauses.push('cal_version IS NOT NULL AND CAST(cal_version AS INTEGER) >= ?');
    params.push(requireVersionNumber('calVersionMin', filters.calVersionMin));
  }
  if (filters.calVersionMax !== undefined) {
    clauses.push('cal_version IS NOT NULL AND CAST(cal_version AS INTEGER) <= ?');
    params.push(requireVersionNumber('calVersionMax', filters.calVersionMax));
  }

  for (const [column, value] of Object.entries(filters.where ?? {})) {
    if (!COLUMN_NAME_PATTERN.test(column)) {
      throw new RecordValidationError(`Invalid filter column: ${column}`, { column });
    }
    if (!hasColumn(column)) {
      if (value !== null) {
        unsatisfiable = true;
      }
      continue;
    }
    clauses.push(`${quoteIdentifier(column)} IS ?`);
    params.push(toSqlParameter(value));
  }

  return { clauses, params, unsatisfiable };
}

/** Serializes filters to the snake_case query parameters the remote archive understands. */
export function filtersToSearchParams(filters: CalibrationQueryFilters): Record<string, string | undefined> {
  const asString = (value: string | number | undefined) => (value === undefined ? undefined : String(value));
  const where = filters.where && Object.keys(filters.where).length > 0 ? JSON.stringify(filters.where) : undefined;

  return {
    cal_type: filters.calType,
    cal_id: filters.calId,
    filename: filters.filename,
    origin: filters.origin,
    master_cal: filters.masterCal === undefined ? undefined : String(filters.masterCal),
    date_time_start: filters.dateTimeStart,
    date_time_end: filters.dateTimeEnd,
    last_updated_start: filters.lastUpdatedStart,
    last_updated_end: filters.lastUpdatedEnd,
    cal_version_min: asString(filters.calVersionMin),
    cal_version_max: asString(filters.calVersionMax),
    where
  };
}
