import { DateTime } from 'luxon';

/** Monday 1970-01-05, the origin of absolute week indices. */
const EPOCH_MONDAY = DateTime.fromObject({ year: 1970, month: 1, day: 5 }, { zone: 'utc' });

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isValidTimeOfDay(value: string): boolean {
  return TIME_OF_DAY_PATTERN.test(value);
}

/** Parses an `HH:mm` wall-clock time. */
export function parseTimeOfDay(value: string): { hour: number; minute: number } {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) {
    throw new Error(`"${value}" is not a valid HH:mm time`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/** Midnight on the Monday of `date`'s week, in `zone`. */
export function startOfWeekMonday(date: DateTime, zone: string): DateTime {
  return date.setZone(zone).startOf('week');
}

/**
 * Absolute week number of the local calendar week containing `date`.
 * Counted on calendar dates, so DST changes never shift it.
 */
export function weekIndexOf(date: DateTime, zone: string): number {
  const monday = startOfWeekMonday(date, zone);
  const mondayAsUtcDate = DateTime.fromObject(
    { year: monday.year, month: monday.month, day: monday.day },
    { zone: 'utc' },
  );
  return Math.round(mondayAsUtcDate.diff(EPOCH_MONDAY, 'days').days / 7);
}

/** `[start, end)` of the local calendar day containing `date`. */
export function localDayWindow(date: DateTime, zone: string): { start: DateTime; end: DateTime } {
  const start = date.setZone(zone).startOf('day');
  return { start, end: start.plus({ days: 1 }) };
}

/** Storage representation: UTC ISO-8601 with milliseconds, which sorts lexically. */
export function toStorageTimestamp(date: DateTime): string {
  const iso = date.toUTC().toISO();
  if (iso === null) {
    throw new Error(`Cannot store invalid date: ${date.invalidExplanation ?? date.invalidReason ?? 'unknown'}`);
  }
  return iso;
}

export function fromStorageTimestamp(value: string, zone: string): DateTime {
  return DateTime.fromISO(value, { zone: 'utc' }).setZone(zone);
}

/**
 * Accepts either a DateTime or an ISO date/date-time string and returns it in `zone`.
 * Strings without an offset are read as local time in `zone`.
 */
export function toZonedDateTime(value: DateTime | string, zone: string): DateTime {
  const date = typeof value === 'string' ? DateTime.fromISO(value, { zone }) : value.setZone(zone);
  if (!date.isValid) {
    throw new Error(`"${String(value)}" is not a valid date`);
  }
  return date;
}
