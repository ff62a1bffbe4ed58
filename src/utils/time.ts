/**
 * Calendar year utilities for yearly projections.
 */

/**
 * Date window of an income or expense entry. Only the year part is used.
 */
export interface ActivityWindow {
  readonly startDate?: string;
  readonly endDate?: string;
}

/**
 * Returns the calendar year (UTC) of the given instant.
 * Only the outer shells call this; the engine takes the year as a parameter.
 *
 * @param now - Instant to read, defaults to the system clock
 */
export function currentYear(now: Date = new Date()): number {
  return now.getUTCFullYear();
}

/**
 * Reads the year from the leading four characters of a date string.
 *
 * @param date - Date such as "2025-01-01" or "2025"
 * @returns The year, or undefined when the date is missing or does not start with four digits
 *
 * @example
 * ```ts
 * parseYear("2028-12-31") // returns 2028
 * parseYear("12/31/2028") // returns undefined
 * ```
 */
export function parseYear(date: string | undefined): number | undefined {
  if (!date) {
    return undefined;
  }
  const token = date.slice(0, 4);
  return /^\d{4}$/.test(token) ? Number(token) : undefined;
}

/**
 * Checks whether an entry contributes in the given year.
 * A missing or unreadable bound leaves that side of the window open.
 */
export function isActive(entry: ActivityWindow, year: number): boolean {
  const startYear = parseYear(entry.startDate);
  const endYear = parseYear(entry.endDate);

  if (startYear !== undefined && year < startYear) {
    return false;
  }
  if (endYear !== undefined && year > endYear) {
    return false;
  }
  return true;
}

/**
 * Builds the shared year axis: firstYear through firstYear + horizonYears, inclusive.
 * A horizon of 0 gives a single year, a negative horizon gives no years.
 */
export function buildYearAxis(firstYear: number, horizonYears: number): number[] {
  const years: number[] = [];
  for (let offset = 0; offset <= horizonYears; offset++) {
    years.push(firstYear + offset);
  }
  return years;
}
