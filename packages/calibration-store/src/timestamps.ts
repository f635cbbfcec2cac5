const ZONELESS_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.(\d+))?$/;
const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ZONED_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;
const HTTP_DATE_PATTERN = /^[A-Z][a-z]{2}, \d{2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Formats a date as `YYYY-MM-DDTHH:MM:SS.sss` in UTC, without a zone suffix.
 * This is the canonical timestamp shape stored in `datetime_obs` and `last_updated`.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 23);
}

/**
 * Normalizes a timestamp string to millisecond precision without a zone.
 *
 * Zone-less inputs are taken as UTC and rewritten textually, so no local-time
 * interpretation sneaks in. Zoned ISO strings and HTTP dates
 * (`Thu, 12 Feb 2026 00:00:00 GMT`) are converted to UTC first.
 *
 * Returns `null` for anything it cannot read.
 */
export function normalizeTimestamp(value: string): string | null {
  const trimmed = value.trim();

  const zoneless = ZONELESS_PATTERN.exec(trimmed);
  if (zoneless) {
    const [, date, time, fraction = ''] = zoneless;
    const millis = fraction.padEnd(3, '0').slice(0, 3);
    return isRealDate(`${date}T${time}.${millis}Z`) ? `${date}T${time}.${millis}` : null;
  }

  if (DATE_ONLY_PATTERN.test(trimmed)) {
    return isRealDate(`${trimmed}T00:00:00.000Z`) ? `${trimmed}T00:00:00.000` : null;
  }

  if (ZONED_PATTERN.test(trimmed) || HTTP_DATE_PATTERN.test(trimmed)) {
    const parsed = new Date(trimmed);
    return Number.isNaN(parsed.getTime()) ? null : formatTimestamp(parsed);
  }

  return null;
}

function isRealDate(isoUtc: string): boolean {
  const parsed = new Date(isoUtc);
  if (Number.isNaN(parsed.getTime())) {
    return false;
  }
  // Date rolls 2024-02-30 over into March; reject instead.
  return parsed.toISOString().slice(0, 10) === isoUtc.slice(0, 10);
}
