import { format, isValid, parse } from "date-fns";

export const TIMESTAMP_PATTERN = "yyyy-MM-dd HH:mm:ss";

const DATE_PATTERN = "yyyy-MM-dd";
const TIMESTAMP_SHAPE = /^(\d{4}-\d{2}-\d{2}) ([01]\d|2[0-3]):([0-5]\d):([0-5]\d)$/;

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_PATTERN);
}

/**
 * Parses canonical `YYYY-MM-DD HH:MM:SS` text as local time, or returns
 * `null` when the text has another shape or names a day or time of day that
 * does not exist on the calendar.
 * A time of day that a local daylight-saving jump skips is still accepted.
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_SHAPE.exec(text);
  if (!match) {
    return null;
  }

  // A zone that skips midnight starts the day at 01:00, still the same date.
  const day = parse(match[1], DATE_PATTERN, new Date(0));
  if (!isValid(day) || format(day, DATE_PATTERN) !== match[1]) {
    return null;
  }

  return parse(text, TIMESTAMP_PATTERN, new Date(0));
}

export function isCanonicalTimestamp(text: string): boolean {
  return parseTimestamp(text) !== null;
}
