/**
 * Date Utilities
 * Calendar-date helpers and the clock the ledger reads "today" from.
 *
 * Calendar dates travel as ISO strings ("YYYY-MM-DD") with no time component.
 */

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const DATE_ISO_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Source of the current calendar date
 */
export interface Clock {
  today(): string;
}

export interface YearMonth {
  year: number;
  month: number;
}

export interface MonthBounds {
  first: string;
  last: string;
}

/**
 * Clock backed by the system time, resolved in an IANA timezone
 *
 * @param timeZone - IANA zone name, e.g. "Europe/Madrid"
 * @param now - Time source (defaults to the system clock)
 *
 * @example
 * systemClock('Asia/Tokyo', () => new Date('2026-01-31T23:30:00Z')).today() // "2026-02-01"
 */
export function systemClock(timeZone: string, now: () => Date = () => new Date()): Clock {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });

  return {
    today(): string {
      const parts = formatter.formatToParts(now());
      const part = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find((p) => p.type === type)?.value ?? '';

      return `${part('year').padStart(4, '0')}-${part('month')}-${part('day')}`;
    },
  };
}

/**
 * Clock pinned to a single date (tests, replays)
 */
export function fixedClock(dateISO: string): Clock {
  parseDateISO(dateISO);
  return {
    today: () => dateISO,
  };
}

/**
 * Check that a timezone name is understood by the runtime
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Timezone of the host process
 */
export function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

function assertYearMonth(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new RangeError(`Invalid year: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid month: ${month}`);
  }
}

/**
 * Number of days in a month, leap years included
 */
export function daysInMonth(year: number, month: number): number {
  assertYearMonth(year, month);

  // Day 0 of the following month is the last day of this one.
  // setUTCFullYear keeps years below 100 from mapping onto 19xx.
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

/**
 * Format year, month and day as an ISO date string
 */
export function toDateISO(year: number, month: number, day: number): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

/**
 * Parse and validate an ISO date string
 *
 * @throws RangeError if the string is not a real calendar date
 */
export function parseDateISO(dateISO: string): YearMonth & { day: number } {
  const match = DATE_ISO_REGEX.exec(dateISO);
  if (!match) {
    throw new RangeError(`Invalid ISO date: ${dateISO}`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  assertYearMonth(year, month);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new RangeError(`Invalid ISO date: ${dateISO}`);
  }

  return { year, month, day };
}

/**
 * Year and month of an ISO date
 */
export function yearMonthOf(dateISO: string): YearMonth {
  const { year, month } = parseDateISO(dateISO);
  return { year, month };
}

/**
 * Inclusive first and last day of a month
 *
 * @example
 * monthBounds(2024, 2) // { first: "2024-02-01", last: "2024-02-29" }
 */
export function monthBounds(year: number, month: number): MonthBounds {
  return {
    first: toDateISO(year, month, 1),
    last: toDateISO(year, month, daysInMonth(year, month)),
  };
}

/**
 * English month name for a 1-based month number
 */
export function monthName(month: number): string {
  assertYearMonth(1, month);
  return MONTH_NAMES[month - 1];
}
