/**
 * @icsjson/ics -- UTC timestamp parsing and formatting.
 *
 * Accepts only the DATE-TIME form with a trailing "Z"
 * (YYYYMMDDThhmmssZ). Floating times, TZID-qualified times and DATE
 * values are rejected.
 */

import { TIMESTAMP_LAYOUT } from "./constants";
import { IcsValueFormatError } from "./errors";

const TIMESTAMP_RE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one.
  const d = new Date(0);
  d.setUTCFullYear(year, month, 0);
  return d.getUTCDate();
}

/**
 * Parse a YYYYMMDDThhmmssZ value into a Date.
 *
 * @param value - Property value, e.g. "20110601T100000Z"
 * @param line - Physical line number, used in the error
 */
export function parseTimestamp(value: string, line?: number): Date {
  const match = TIMESTAMP_RE.exec(value);
  if (!match) {
    throw new IcsValueFormatError(`bad timestamp "${value}", expected ${TIMESTAMP_LAYOUT}`, line);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);

  const outOfRange = (field: string): IcsValueFormatError =>
    new IcsValueFormatError(`bad timestamp "${value}": ${field} out of range`, line);

  if (month < 1 || month > 12) throw outOfRange("month");
  if (day < 1 || day > daysInMonth(year, month)) throw outOfRange("day");
  if (hour > 23) throw outOfRange("hour");
  if (minute > 59) throw outOfRange("minute");
  if (second > 59) throw outOfRange("second");

  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

/** Format a Date as ISO 8601 at second precision, e.g. "2011-06-01T10:00:00Z". */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
