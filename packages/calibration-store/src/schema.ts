import { z } from 'zod';
import { RecordValidationError } from './errors';
import { normalizeTimestamp } from './timestamps';

export type ScalarValue = string | number | boolean;

export type FlatValue = ScalarValue | null;

/** Row/wire shape: snake_case columns with attributes inlined. */
export type FlatCalibrationRecord = Record<string, FlatValue>;

export const CORE_COLUMNS = [
  'id',
  'filename',
  'cal_type',
  'datetime_obs',
  'cal_version',
  'origin',
  'last_updated',
  'master_cal',
  'file_md5'
] as const;

export type CoreColumn = (typeof CORE_COLUMNS)[number];

const CORE_COLUMN_SET = new Set<string>(CORE_COLUMNS);

export const COLUMN_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const UUID_V4_PATTERN = /^[a-f0-9]{8}-[a-f0-9]{4}-4[a-f0-9]{3}-[89ab][a-f0-9]{3}-[a-f0-9]{12}$/i;

export function isCalibrationId(value: string): boolean {
  return UUID_V4_PATTERN.test(value);
}

export function isCoreColumn(name: string): name is CoreColumn {
  return CORE_COLUMN_SET.has(name);
}

/** SQLite column names are case-insensitive; `FILENAME` names the same column as `filename`. */
export function collidesWithCoreColumn(name: string): boolean {
  return CORE_COLUMN_SET.has(name.toLowerCase());
}

export const calibrationIdSchema = z
  .string()
  .regex(UUID_V4_PATTERN, 'Calibration id must be a UUID v4 string');

export const timestampSchema = z.string().transform((value, ctx) => {
  const normalized = normalizeTimestamp(value);
  if (normalized === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return normalized;
});

export const calVersionSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const text = typeof value === 'number' ? String(value) : value.trim();
    if (!/^\d{1,3}$/.test(text) || Number.parseInt(text, 10) < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calibration version: ${value}` });
      return z.NEVER;
    }
    return text.padStart(3, '0');
  });

export const scalarValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const attributeNameSchema = z
  .string()
  .regex(COLUMN_NAME_PATTERN, 'Attribute names must be SQL identifiers')
  .refine((name) => !collidesWithCoreColumn(name), { message: 'Attribute name collides with a calibration column' });

export const calibrationRecordInputSchema = z.object({
  id: calibrationIdSchema,
  filename: z.string().trim().min(1, 'filename is required'),
  calType: z.string().trim().min(1, 'calType is required'),
  datetimeObs: timestampSchema,
  calVersion: calVersionSchema.nullable().optional(),
  origin: z.string().trim().min(1).nullable().optional(),
  lastUpdated: timestampSchema.optional(),
  masterCal: z.boolean().default(false),
  fileMd5: z.string().min(1).nullable().optional(),
  attributes: z
    .record(attributeNameSchema, scalarValueSchema.nullable())
    .default({})
    .superRefine((attributes, ctx) => {
      const seen = new Map<string, string>();
      for (const name of Object.keys(attributes)) {
        const previous = seen.get(name.toLowerCase());
        if (previous !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [name],
            message: `Attribute ${name} differs from ${previous} only in case`
          });
        }
        seen.set(name.toLowerCase(), name);
      }
    })
    .transform((attributes) => {
      const kept: Record<string, ScalarValue> = {};
      for (const [name, value] of Object.entries(attributes)) {
        if (value !== null) {
          kept[name] = value;
        }
      }
      return kept;
    })
});

export type CalibrationRecordInput = z.input<typeof calibrationRecordInputSchema>;

type ParsedRecordInput = z.output<typeof calibrationRecordInputSchema>;

export interface CalibrationRecord {
  id: string;
  filename: string;
  calType: string;
  datetimeObs: string;
  calVersion: string | null;
  origin: string | null;
  lastUpdated: string;
  masterCal: boolean;
  fileMd5: string | null;
  attributes: Record<string, ScalarValue>;
}

export type NormalizedRecordInput = Omit<CalibrationRecord, 'lastUpdated'> & { lastUpdated: string | null };

function normalizeParsed(parsed: ParsedRecordInput): NormalizedRecordInput {
  return {
    id: parsed.id,
    filename: parsed.filename,
    calType: parsed.calType,
    datetimeObs: parsed.datetimeObs,
    calVersion: parsed.calVersion ?? null,
    origin: parsed.origin ?? null,
    lastUpdated: parsed.lastUpdated ?? null,
    masterCal: parsed.masterCal,
    fileMd5: parsed.fileMd5 ?? null,
    attributes: parsed.attributes
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates and normalizes a record coming from a caller, a calibration model or the wire.
 * `lastUpdated` stays `null` when absent so that the Record Store can stamp the batch.
 */
export function parseRecordInput(input: unknown): NormalizedRecordInput {
  const result = calibrationRecordInputSchema.safeParse(input);
  if (!result.success) {
    throw new RecordValidationError(`Invalid calibration record: ${formatIssues(result.error)}`, result.error.format());
  }
  return normalizeParsed(result.data);
}

export function parseRecord(input: unknown): CalibrationRecord {
  const normalized = parseRecordInput(input);
  if (normalized.lastUpdated === null) {
    throw new RecordValidationError('Invalid calibration record: lastUpdated is required', null);
  }
  return { ...normalized, lastUpdated: normalized.lastUpdated };
}

export function toFlatRecord(record: CalibrationRecord | NormalizedRecordInput): FlatCalibrationRecord {
  return {
    ...record.attributes,
    id: record.id,
    filename: record.filename,
    cal_type: record.calType,
    datetime_obs: record.datetimeObs,
    cal_version: record.calVersion,
    origin: record.origin,
    last_updated: record.lastUpdated,
    master_cal: record.masterCal,
    file_md5: record.fileMd5
  };
}

function readMasterCal(value: unknown): unknown {
  if (value === 0 || value === 1) {
    return value === 1;
  }
  if (value === null || value === undefined) {
    return undefined;
  }
  return value;
}

function nullToUndefined(value: unknown): unknown {
  return value === null ? undefined : value;
}

/**
 * Splits a flat snake_case record into known fields and attributes.
 * The result still has to go through `parseRecordInput` / `parseRecord`.
 */
export function fromFlatRecord(flat: Record<string, unknown>): Record<string, unknown> {
  const attributes: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(flat)) {
    if (!isCoreColumn(name) && value !== null && value !== undefined) {
      attributes[name] = value;
    }
  }

  return {
    id: flat.id,
    filename: flat.filename,
    calType: flat.cal_type,
    datetimeObs: flat.datetime_obs,
    calVersion: flat.cal_version,
    origin: flat.origin,
    lastUpdated: nullToUndefined(flat.last_updated),
    masterCal: readMasterCal(flat.master_cal),
    fileMd5: flat.file_md5,
    attributes
  };
}

export function parseFlatRecord(flat: Record<string, unknown>): CalibrationRecord {
  return parseRecord(fromFlatRecord(flat));
}
