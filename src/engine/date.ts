/**
 * Partially-precise dates.
 *
 * A date always has a year; month and day are optional, and a day is only
 * allowed alongside a month. The precision is carried explicitly so that
 * comparisons can order missing components first instead of zero-filling.
 */

import type { Day, Month, Year } from './types';
import { MAX_YEAR, MIN_YEAR } from './types';

// =============================================================================
// Date Variants
// =============================================================================

export interface YearDate {
  readonly precision: 'YEAR';
  readonly year: Year;
}

export interface MonthDate {
  readonly precision: 'MONTH';
  readonly year: Year;
  readonly month: Month;
}

export interface DayDate {
  readonly precision: 'DAY';
  readonly year: Year;
  readonly month: Month;
  readonly day: Day;
}

export type PartialDate = YearDate | MonthDate | DayDate;

// =============================================================================
// Errors
// =============================================================================

export type DateErrorReason =
  | 'INVALID_YEAR'
  | 'INVALID_MONTH'
  | 'INVALID_DAY'
  | 'INVALID_FIELDS';

export class DateError extends Error {
  readonly reason: DateErrorReason;

  constructor(reason: DateErrorReason, message: string) {
    super(message);
    this.name = 'DateError';
    this.reason = reason;
  }
}

// =============================================================================
// Construction
// =============================================================================

function assertYear(year: number): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new DateError('INVALID_YEAR', `Year \`${year}\` is not allowed`);
  }
}

function assertMonth(month: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new DateError('INVALID_MONTH', `Month \`${month}\` is not allowed`);
  }
}

function assertDay(day: number): void {
  if (!Number.isInteger(day) || day < 1 || day > 31) {
    throw new DateError('INVALID_DAY', `Day \`${day}\` is not allowed`);
  }
}

/**
 * Create a validated date.
 *
 * @throws DateError when a component is out of range, or a day is given
 *   without a month
 */
export function createDate(year: Year, month?: Month | null, day?: Day | null): PartialDate {
  assertYear(year);

  if (month === undefined || month === null) {
    if (day !== undefined && day !== null) {
      throw new DateError('INVALID_FIELDS', "Can't set a day without setting a month");
    }
    return { precision: 'YEAR', year };
  }

  assertMonth(month);
  if (day === undefined || day === null) {
    return { precision: 'MONTH', year, month };
  }

  assertDay(day);
  return { precision: 'DAY', year, month, day };
}

/**
 * Build an optional date from nullable storage columns.
 * All three columns null means "no date".
 */
export function dateFromParts(
  year: Year | null,
  month: Month | null,
  day: Day | null
): PartialDate | null {
  if (year === null) {
    if (month !== null || day !== null) {
      throw new DateError('INVALID_FIELDS', 'Day and/or month is set, but year is not');
    }
    return null;
  }
  return createDate(year, month, day);
}

// =============================================================================
// Accessors
// =============================================================================

export function getMonth(date: PartialDate): Month | null {
  return date.precision === 'YEAR' ? null : date.month;
}

export function getDay(date: PartialDate): Day | null {
  return date.precision === 'DAY' ? date.day : null;
}

// =============================================================================
// Comparison
// =============================================================================

/** Compare two optional components, a missing one sorting first */
function compareComponent(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

/**
 * Total order over dates.
 *
 * Year first; on a tie, a date missing its month sorts before one that has
 * it, then months compare; the same rule repeats for days. 1914 sorts before
 * June 1914, which sorts before 28 June 1914.
 */
export function compareDates(a: PartialDate, b: PartialDate): number {
  if (a.year !== b.year) return a.year - b.year;

  const byMonth = compareComponent(getMonth(a), getMonth(b));
  if (byMonth !== 0) return byMonth;

  return compareComponent(getDay(a), getDay(b));
}

/**
 * Compare two dates using only the components both of them carry.
 * June 1914 and 28 June 1914 are equal at their shared (month) precision.
 */
export function compareAtSharedPrecision(a: PartialDate, b: PartialDate): number {
  if (a.year !== b.year) return a.year - b.year;

  const aMonth = getMonth(a);
  const bMonth = getMonth(b);
  if (aMonth === null || bMonth === null) return 0;
  if (aMonth !== bMonth) return aMonth - bMonth;

  const aDay = getDay(a);
  const bDay = getDay(b);
  if (aDay === null || bDay === null) return 0;
  return aDay - bDay;
}

export function datesEqual(a: PartialDate, b: PartialDate): boolean {
  return a.precision === b.precision && compareDates(a, b) === 0;
}

// =============================================================================
// Formatting
// =============================================================================

const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

/** e.g. "28 Jun 1914", "Jun 1914" or "1914" */
export function formatLongDate(date: PartialDate): string {
  const month = getMonth(date);
  const day = getDay(date);
  const monthName = month === null ? '' : (MONTH_ABBREVIATIONS[month - 1] ?? '');
  return `${day ?? ''} ${monthName} ${date.year}`.trim().replace(/\s+/g, ' ');
}

/** dd / mm / yyyy, with "-" for unknown components */
export function formatShortDate(date: PartialDate): string {
  const month = getMonth(date);
  const day = getDay(date);
  return `${day ?? '-'} / ${month ?? '-'} / ${date.year}`;
}

/** ISO-like key: "1914", "1914-06", "1914-06-28" */
export function formatDateKey(date: PartialDate): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  switch (date.precision) {
    case 'YEAR':
      return `${date.year}`;
    case 'MONTH':
      return `${date.year}-${pad(date.month)}`;
    case 'DAY':
      return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
  }
}

/** Start of the decade containing the year (1914 -> 1910, -5 -> -10) */
export function decadeOf(year: Year): Year {
  return Math.floor(year / 10) * 10;
}
