// YYYY-MM-DD, optionally followed by a time and an offset. Postgres prints
// whole-hour offsets as `+00`, so the offset minutes are optional.
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

export type TimestampParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  // Minutes east of UTC; null when the value carries no offset.
  offsetMinutes: number | null;
};

function offsetOf(zone: string | undefined): number | null {
  if (zone === undefined) return null;
  if (zone === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2) || 0));
}

/**
 * Splits a timestamp into its written calendar fields. Returns null for text
 * that is not an ISO-8601 date or date-time, and for impossible dates such as
 * `2023-02-30`.
 */
export function parseTimestamp(value: string): TimestampParts | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return null;
  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", zone] = match;
  const parts: TimestampParts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    millisecond: Number(fraction.padEnd(3, "0").slice(0, 3)),
    offsetMinutes: offsetOf(zone)
  };
  const calendar = new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
  const sameDay =
    calendar.getUTCFullYear() === parts.year &&
    calendar.getUTCMonth() === parts.month - 1 &&
    calendar.getUTCDate() === parts.day;
  if (!sameDay || parts.hour > 23 || parts.minute > 59 || parts.second > 59) return null;
  if (parts.offsetMinutes !== null && Math.abs(parts.offsetMinutes) > 18 * 60) return null;
  return parts;
}

function wallClock(parts: TimestampParts): number {
  return Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, parts.millisecond);
}

/**
 * Orders two timestamps without consulting the host time zone. When both carry
 * an offset they compare as instants; otherwise the written wall-clock fields
 * are compared, a bare date reading as midnight.
 */
export function compareTimestamps(a: string, b: string): number {
  const left = parseTimestamp(a);
  const right = parseTimestamp(b);
  if (!left || !right) return a < b ? -1 : a > b ? 1 : 0;
  if (left.offsetMinutes !== null && right.offsetMinutes !== null) {
    return wallClock(left) - left.offsetMinutes * 60_000 - (wallClock(right) - right.offsetMinutes * 60_000);
  }
  return wallClock(left) - wallClock(right);
}

/**
 * Year-month key (`YYYY-MM`) read straight from the timestamp's calendar
 * fields; the offset, if any, is ignored rather than converted.
 */
export function periodOf(timestamp: string): string {
  return timestamp.slice(0, 7);
}

export function monthIndex(period: string): number {
  const [year, month] = period.split("-").map(Number);
  return year * 12 + (month - 1);
}
