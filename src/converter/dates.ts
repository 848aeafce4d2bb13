const EPOCH_SECONDS = /^-?\d+(?:\.\d+)?$/;
const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})$/i;
// "2023-03-15 13:20:00.000", "2023-03-15 13:20:00" and "2023-03-15T13:20:00.000", all UTC
const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/;
const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export const MIN_STORAGE_YEAR = 0;
export const MAX_STORAGE_YEAR = 9999;

/** Whether the date's UTC year fits the four-digit storage form. */
export function isStorableDate(date: Date): boolean {
  const year = date.getUTCFullYear();
  return year >= MIN_STORAGE_YEAR && year <= MAX_STORAGE_YEAR;
}

/** Engine-facing text form of a date: `YYYY-MM-DD HH:MM:SS.mmm` in UTC. */
export function formatStorageDate(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)} ` +
    `${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}` +
    `.${pad(date.getUTCMilliseconds(), 3)}`
  );
}

export function dateFromEpochSeconds(seconds: number): Date | null {
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

function fractionToMillis(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number.parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10);
}

function utcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, millis);
  // invalid days roll over (Feb 30 -> Mar 2); reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function offsetMinutes(zone: string): number {
  if (zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = Number.parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes);
}

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10);
}

/**
 * Parses textual dates in the order: epoch seconds, ISO-8601 with a zone designator, then the
 * zone-less patterns SQLite commonly produces (read as UTC). Returns null when nothing matches.
 */
export function parseStorageDate(text: string): Date | null {
  const trimmed = text.trim();

  if (EPOCH_SECONDS.test(trimmed)) {
    return dateFromEpochSeconds(Number(trimmed));
  }

  const iso = ISO_8601.exec(trimmed);
  if (iso) {
    const [, y, mo, d, h, mi, s, fraction, zone] = iso;
    const date = utcDate(
      toInt(y),
      toInt(mo),
      toInt(d),
      toInt(h),
      toInt(mi),
      toInt(s),
      fractionToMillis(fraction)
    );
    if (!date) return null;
    return new Date(date.getTime() - offsetMinutes(zone ?? 'Z') * 60_000);
  }

  const local = LOCAL_DATE_TIME.exec(trimmed);
  if (local) {
    const [, y, mo, d, h, mi, s, fraction] = local;
    return utcDate(
      toInt(y),
      toInt(mo),
      toInt(d),
      toInt(h),
      toInt(mi),
      toInt(s),
      fractionToMillis(fraction)
    );
  }

  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly) {
    const [, y, mo, d] = dateOnly;
    return utcDate(toInt(y), toInt(mo), toInt(d));
  }

  return null;
}
