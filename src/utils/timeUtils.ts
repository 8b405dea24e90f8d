import type { Logger } from './logger';

/**
 * Timestamp parsing for observation times.
 * Upstream collections are not consistent about precision, separators or offsets, so
 * parsing tries ISO-8601 first and then a short list of fixed layouts.
 * Values without an offset are read as UTC.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;
const MAX_PAST_DAYS = 365;

// Date and time may be separated by "T" or a single space.
// All layouts share the same named groups so one builder handles every match
const ISO_8601 =
  /^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})(?:[T ](?<hour>\d{2}):(?<minute>\d{2})(?::(?<second>\d{2})(?:\.(?<fraction>\d{1,9}))?)?)?(?<offset>Z|[+-]\d{2}(?::?\d{2})?)?$/;

const FALLBACK_LAYOUTS: ReadonlyArray<{ name: string; pattern: RegExp }> = [
  {
    name: 'YYYYMMDDTHHMMSSZ',
    pattern:
      /^(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})T(?<hour>\d{2})(?<minute>\d{2})(?<second>\d{2})(?<offset>Z)?$/,
  },
];

function toNumber(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10);
}

/** Offset in minutes east of UTC, e.g. "-05:00" -> -300 */
function parseOffset(offset: string | undefined): number {
  if (!offset || offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2, 4), 10) : 0;
  return sign * (hours * 60 + minutes);
}

function buildInstant(groups: Record<string, string | undefined>): Date | null {
  const year = toNumber(groups.year);
  const month = toNumber(groups.month);
  const day = toNumber(groups.day);
  const hour = toNumber(groups.hour);
  const minute = toNumber(groups.minute);
  const second = toNumber(groups.second);
  // Sub-millisecond digits are truncated
  const millis = groups.fraction ? Number.parseInt(groups.fraction.padEnd(3, '0').slice(0, 3), 10) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const epoch = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(epoch);
  // Rejects calendar overflow such as 2025-02-30
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  const offsetMinutes = parseOffset(groups.offset);
  if (Math.abs(offsetMinutes) > 18 * 60) return null;

  return new Date(epoch - offsetMinutes * MS_PER_MINUTE);
}

/**
 * Parse a timestamp string to a UTC instant.
 * @returns null when the value is absent or matches no known layout
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();

  const iso = ISO_8601.exec(trimmed);
  if (iso?.groups) {
    return buildInstant(iso.groups);
  }

  for (const layout of FALLBACK_LAYOUTS) {
    const match = layout.pattern.exec(trimmed);
    if (match?.groups) {
      return buildInstant(match.groups);
    }
  }

  return null;
}

export interface TimestampWindowOptions {
  maxFutureDays: number;
  now: Date;
  logger?: Logger;
}

/**
 * Check that an instant is no more than maxFutureDays ahead of now and
 * no more than a year behind it.
 */
export function validateTimestamp(instant: Date, raw: string, options: TimestampWindowOptions): boolean {
  const { maxFutureDays, now, logger } = options;

  if (instant.getTime() > now.getTime() + maxFutureDays * MS_PER_DAY) {
    logger?.warn(
      { raw, parsed: instant.toISOString(), maxFutureDays },
      'Rejected future timestamp'
    );
    return false;
  }

  if (instant.getTime() < now.getTime() - MAX_PAST_DAYS * MS_PER_DAY) {
    logger?.warn(
      { raw, parsed: instant.toISOString(), maxPastDays: MAX_PAST_DAYS },
      'Rejected old timestamp'
    );
    return false;
  }

  return true;
}

/** Parse, then apply the acceptance window. Unparsable and out-of-window values both yield null. */
export function parseObservationTime(
  value: string | null | undefined,
  options: TimestampWindowOptions
): Date | null {
  const instant = parseTimestamp(value);
  if (!instant || !value) return null;
  return validateTimestamp(instant, value, options) ? instant : null;
}

export function subtractMinutes(instant: Date, minutes: number): Date {
  return new Date(instant.getTime() - minutes * MS_PER_MINUTE);
}

export function subtractDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() - days * MS_PER_DAY);
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Compact UTC stamp used in artifact names, e.g. 20250115123000 */
export function formatCompactUtc(instant: Date): string {
  return [
    instant.getUTCFullYear().toString(),
    pad(instant.getUTCMonth() + 1),
    pad(instant.getUTCDate()),
    pad(instant.getUTCHours()),
    pad(instant.getUTCMinutes()),
    pad(instant.getUTCSeconds()),
  ].join('');
}

/** Hive-style date partition, e.g. year=2025/month=01/day=15 */
export function formatDatePartition(instant: Date): string {
  return `year=${instant.getUTCFullYear()}/month=${pad(instant.getUTCMonth() + 1)}/day=${pad(instant.getUTCDate())}`;
}
