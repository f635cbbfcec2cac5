import { z } from 'zod';

import { ConfigurationError } from './errors';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map(({ path, message }) => `  - ${path.length > 0 ? path.join('.') : '<root>'}: ${message}`)
    .join('\n');
}

export function parseEnv<S extends z.ZodTypeAny>(schema: S, env: EnvSource): z.output<S> {
  const result = schema.safeParse({ ...env });
  if (!result.success) {
    throw new ConfigurationError(`Invalid calibration store configuration\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

const isBlank = (value: string | undefined): value is undefined | '' =>
  value === undefined || value.trim() === '';

const lastPathSegment = (path: (string | number)[]): string => String(path[path.length - 1] ?? 'value');

export function booleanVar(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (isBlank(value)) {
        return defaultValue;
      }
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${lastPathSegment(ctx.path)}. Accepted boolean values: ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
      });
      return z.NEVER;
    });
}

export function integerVar(options: { defaultValue: number; min?: number }) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (isBlank(value)) {
        return options.defaultValue;
      }
      const parsed = Number(value.trim());
      if (!Number.isInteger(parsed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected ${lastPathSegment(ctx.path)} to be an integer`
        });
        return z.NEVER;
      }
      if (options.min !== undefined && parsed < options.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${lastPathSegment(ctx.path)} must be >= ${options.min}`
        });
        return z.NEVER;
      }
      return parsed;
    });
}

/** Trimmed string; blank values count as absent. */
export function stringVar(options: { required?: boolean } = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (isBlank(value)) {
        if (options.required) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${lastPathSegment(ctx.path)}` });
          return z.NEVER;
        }
        return undefined;
      }
      return value.trim();
    });
}
