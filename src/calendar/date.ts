/**
 * Calendar date arithmetic on plain year/month/day values (proleptic Gregorian).
 *
 * Dates never carry a time or timezone, so all arithmetic goes through an
 * epoch-day count instead of `Date`.
 */

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface YearMonth {
  year: number;
  month: number;
}

export type WeekStart = 'sunday' | 'monday';

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

/** Range of dates that round-trip through four-digit ISO years. */
export const MIN_DATE: CalendarDate = { year: 1, month: 1, day: 1 };
export const MAX_DATE: CalendarDate = { year: 9999, month: 12, day: 31 };

const WEEKDAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export function isValidDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (year < MIN_DATE.year || year > MAX_DATE.year) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

export function makeDate(year: number, month: number, day: number): CalendarDate | null {
  const date = { year, month, day };
  return isValidDate(date) ? date : null;
}

// Days since 1970-01-01 (civil-from-days / days-from-civil).
export function toEpochDay(date: CalendarDate): number {
  const y = date.month <= 2 ? date.year - 1 : date.year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const mp = (date.month + 9) % 12;
  const doy = Math.floor((153 * mp + 2) / 5) + date.day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146097 + doe - 719468;
}

export function fromEpochDay(epochDay: number): CalendarDate {
  const z = epochDay + 719468;
  const era = Math.floor(z / 146097);
  const doe = z - era * 146097;
  const yoe = Math.floor((doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) - Math.floor(doe / 146096)) / 365);
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/**
 * Move by whole months, keeping the day of month when it exists and clamping
 * to the last day of the target month otherwise (Jan 31 + 1 month = Feb 28/29).
 */
export function addMonthsClamped(date: CalendarDate, months: number): CalendarDate {
  const index = date.year * 12 + (date.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  return { year, month, day: Math.min(date.day, daysInMonth(year, month)) };
}

/** 0 = Sunday … 6 = Saturday */
export function dayOfWeek(date: CalendarDate): number {
  return (((toEpochDay(date) + 4) % 7) + 7) % 7;
}

export function startOfMonth(date: CalendarDate): CalendarDate {
  return { year: date.year, month: date.month, day: 1 };
}

export function endOfMonth(date: CalendarDate): CalendarDate {
  return { year: date.year, month: date.month, day: daysInMonth(date.year, date.month) };
}

function weekStartIndex(weekStart: WeekStart): number {
  return weekStart === 'monday' ? 1 : 0;
}

export function startOfWeek(date: CalendarDate, weekStart: WeekStart): CalendarDate {
  const offset = (dayOfWeek(date) - weekStartIndex(weekStart) + 7) % 7;
  return addDays(date, -offset);
}

export function endOfWeek(date: CalendarDate, weekStart: WeekStart): CalendarDate {
  return addDays(startOfWeek(date, weekStart), 6);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toEpochDay(a) - toEpochDay(b);
}

export function isSameDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function clampDate(date: CalendarDate): CalendarDate {
  if (compareDates(date, MIN_DATE) < 0) return { ...MIN_DATE };
  if (compareDates(date, MAX_DATE) > 0) return { ...MAX_DATE };
  return date;
}

export function monthOf(date: CalendarDate): YearMonth {
  return { year: date.year, month: date.month };
}

export function formatIsoDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a date string in YYYY-MM-DD format. Returns null for malformed or
 * impossible dates (e.g. 2025-02-30).
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;
  const [, year, month, day] = match;
  return makeDate(Number(year), Number(month), Number(day));
}

export function formatMonthTitle(month: YearMonth): string {
  return `${MONTH_NAMES[month.month - 1] ?? '?'} ${month.year}`;
}

export function weekdayLabels(weekStart: WeekStart): string[] {
  const start = weekStartIndex(weekStart);
  return WEEKDAY_NAMES.map((_, i) => WEEKDAY_NAMES[(start + i) % 7] ?? '');
}

/**
 * The six full weeks shown for a month, starting on the configured week day.
 */
export function monthGrid(month: YearMonth, weekStart: WeekStart): CalendarDate[][] {
  const first = startOfWeek({ year: month.year, month: month.month, day: 1 }, weekStart);
  const weeks: CalendarDate[][] = [];
  for (let w = 0; w < 6; w++) {
    const week: CalendarDate[] = [];
    for (let d = 0; d < 7; d++) {
      week.push(addDays(first, w * 7 + d));
    }
    weeks.push(week);
  }
  return weeks;
}

/** The seven days of the week containing `date`. */
export function weekDates(date: CalendarDate, weekStart: WeekStart): CalendarDate[] {
  const first = startOfWeek(date, weekStart);
  return Array.from({ length: 7 }, (_, i) => addDays(first, i));
}

/**
 * Resolve the digits typed before a goto command into a date.
 *
 * - 8 digits: MMDDYYYY
 * - 6 digits: MMYYYY (first of the month)
 * - 4 digits: MMDD in the cursor's year
 * - 1-2 digits: day of the cursor's month
 */
export function resolveGotoSpec(digits: string, cursor: CalendarDate): CalendarDate | null {
  if (!/^\d+$/.test(digits)) return null;
  const num = (from: number, to: number): number => Number(digits.slice(from, to));
  switch (digits.length) {
    case 8:
      return makeDate(num(4, 8), num(0, 2), num(2, 4));
    case 6:
      return makeDate(num(2, 6), num(0, 2), 1);
    case 4:
      return makeDate(cursor.year, num(0, 2), num(2, 4));
    case 1:
    case 2:
      return makeDate(cursor.year, cursor.month, Number(digits));
    default:
      return null;
  }
}

export function todayDate(now: Date = new Date()): CalendarDate {
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}
