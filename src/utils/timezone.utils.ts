/**
 * Date Utility Functions
 *
 * Timestamps are stored as TIMESTAMPTZ (UTC). Line dates are calendar dates
 * (YYYY-MM-DD) on the district's wall clock, which is what a cafeteria means
 * by "today's lunch line".
 */

import { formatInTimeZone } from "date-fns-tz";
import { isValid, parse } from "date-fns";

export const LINE_DATE_FORMAT = "yyyy-MM-dd";

/**
 * Calendar date of a moment in the given timezone
 *
 * @example
 * const utc = new Date('2025-11-26T03:00:00Z'); // 3 AM UTC Tuesday
 * getBusinessDate(utc, 'America/Denver');
 * // Returns: "2025-11-25" (still Monday in Denver)
 */
export function getBusinessDate(timestamp: Date, timezone: string): string {
  return formatInTimeZone(timestamp, timezone, LINE_DATE_FORMAT);
}

/**
 * True for real calendar dates in YYYY-MM-DD form ("2025-02-30" is rejected)
 */
export function isValidLineDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = parse(value, LINE_DATE_FORMAT, new Date(0));
  return isValid(parsed);
}

export function isValidTimezone(timezone: string): boolean {
  try {
    Intl.DateTimeFormat(undefined, { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
