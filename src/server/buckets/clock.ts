/**
 * Reference instant for bucket calculations, localized to a user's timezone.
 */

import { TZDate } from "@date-fns/tz";
import { logger } from "@/lib/logger";

export const DEFAULT_TIMEZONE = "UTC";

/**
 * Checks whether the runtime knows an IANA timezone name.
 */
export function isValidTimezone(timezone: string): boolean {
  if (timezone === "") {
    return false;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Returns `at` (default: now) as seen from `timezone`.
 * Unknown timezones fall back to UTC.
 */
export function nowInTimezone(timezone: string, at: Date = new Date()): TZDate {
  if (!isValidTimezone(timezone)) {
    logger.warn("Unknown timezone, using UTC", { timezone });
    return new TZDate(at.getTime(), DEFAULT_TIMEZONE);
  }
  return new TZDate(at.getTime(), timezone);
}
