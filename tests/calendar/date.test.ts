import { describe, expect, it } from 'vitest';
import {
  addDays,
  addMonthsClamped,
  clampDate,
  dayOfWeek,
  daysInMonth,
  endOfWeek,
  formatIsoDate,
  fromEpochDay,
  isLeapYear,
  isValidDate,
  monthGrid,
  parseIsoDate,
  resolveGotoSpec,
  startOfWeek,
  toEpochDay,
  weekDates,
  weekdayLabels,
} from '../../src/calendar/date.js';

const d = (year: number, month: number, day: number) => ({ year, month, day });

describe('leap years and month lengths', () => {
  it('follows the Gregorian leap year rule', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2025)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });

  it('knows month lengths', () => {
    expect(daysInMonth(2025, 2)).toBe(28);
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2026, 4)).toBe(30);
    expect(daysInMonth(2026, 12)).toBe(31);
  });

  it('rejects impossible dates', () => {
    expect(isValidDate(d(2025, 2, 29))).toBe(false);
    expect(isValidDate(d(2024, 2, 29))).toBe(true);
    expect(isValidDate(d(2026, 13, 1))).toBe(false);
    expect(isValidDate(d(2026, 4, 31))).toBe(false);
    expect(isValidDate(d(2026, 1, 0))).toBe(false);
  });

  it('only accepts years that fit four ISO digits', () => {
    expect(isValidDate(d(1, 1, 1))).toBe(true);
    expect(isValidDate(d(9999, 12, 31))).toBe(true);
    expect(isValidDate(d(0, 12, 31))).toBe(false);
    expect(isValidDate(d(10000, 1, 1))).toBe(false);
    expect(isValidDate(d(-6307, 7, 19))).toBe(false);
  });
});

describe('epoch days', () => {
  it('maps known dates', () => {
    expect(toEpochDay(d(1970, 1, 1))).toBe(0);
    expect(toEpochDay(d(1969, 12, 31))).toBe(-1);
    expect(toEpochDay(d(2000, 3, 1))).toBe(11017);
    expect(fromEpochDay(11017)).toEqual(d(2000, 3, 1));
  });

  it('inverts across leap days', () => {
    for (const date of [d(2024, 2, 28), d(2024, 2, 29), d(2024, 3, 1), d(1600, 2, 29)]) {
      expect(fromEpochDay(toEpochDay(date))).toEqual(date);
    }
  });
});

describe('date arithmetic', () => {
  it('adds days across month and year boundaries', () => {
    expect(addDays(d(2024, 2, 28), 1)).toEqual(d(2024, 2, 29));
    expect(addDays(d(2023, 12, 31), 1)).toEqual(d(2024, 1, 1));
    expect(addDays(d(2026, 3, 1), -1)).toEqual(d(2026, 2, 28));
  });

  it('clamps the day when adding months', () => {
    expect(addMonthsClamped(d(2025, 1, 31), 1)).toEqual(d(2025, 2, 28));
    expect(addMonthsClamped(d(2024, 1, 31), 1)).toEqual(d(2024, 2, 29));
    expect(addMonthsClamped(d(2025, 12, 15), 1)).toEqual(d(2026, 1, 15));
    expect(addMonthsClamped(d(2026, 1, 31), -2)).toEqual(d(2025, 11, 30));
  });

  it('computes weekdays and week bounds', () => {
    expect(dayOfWeek(d(2026, 10, 19))).toBe(1);
    expect(dayOfWeek(d(2026, 10, 1))).toBe(4);
    expect(startOfWeek(d(2026, 10, 21), 'sunday')).toEqual(d(2026, 10, 18));
    expect(startOfWeek(d(2026, 10, 21), 'monday')).toEqual(d(2026, 10, 19));
    expect(endOfWeek(d(2026, 10, 21), 'sunday')).toEqual(d(2026, 10, 24));
    expect(endOfWeek(d(2026, 10, 21), 'monday')).toEqual(d(2026, 10, 25));
  });
});

describe('ISO dates', () => {
  it('formats with zero padding', () => {
    expect(formatIsoDate(d(2026, 3, 7))).toBe('2026-03-07');
  });

  it('parses only real dates', () => {
    expect(parseIsoDate('2024-02-29')).toEqual(d(2024, 2, 29));
    expect(parseIsoDate('2025-02-30')).toBeNull();
    expect(parseIsoDate('2025-13-01')).toBeNull();
    expect(parseIsoDate('2025-1-01')).toBeNull();
    expect(parseIsoDate('0000-01-01')).toBeNull();
  });

  it('round-trips the first and last supported dates', () => {
    expect(formatIsoDate(d(1, 1, 1))).toBe('0001-01-01');
    expect(parseIsoDate(formatIsoDate(d(1, 1, 1)))).toEqual(d(1, 1, 1));
    expect(parseIsoDate(formatIsoDate(d(9999, 12, 31)))).toEqual(d(9999, 12, 31));
  });

  it('clamps dates into the supported range', () => {
    expect(clampDate(d(10360, 1, 19))).toEqual(d(9999, 12, 31));
    expect(clampDate(d(-6307, 7, 19))).toEqual(d(1, 1, 1));
    expect(clampDate(d(2026, 10, 19))).toEqual(d(2026, 10, 19));
  });
});

describe('monthGrid', () => {
  it('covers six weeks starting on the configured weekday', () => {
    const grid = monthGrid({ year: 2026, month: 10 }, 'sunday');
    expect(grid).toHaveLength(6);
    expect(grid[0]?.[0]).toEqual(d(2026, 9, 27));
    expect(grid[5]?.[6]).toEqual(d(2026, 11, 7));
  });

  it('lists the days of one week', () => {
    const week = weekDates(d(2026, 10, 21), 'monday');
    expect(week[0]).toEqual(d(2026, 10, 19));
    expect(week[6]).toEqual(d(2026, 10, 25));
    expect(week).toHaveLength(7);
  });

  it('labels weekdays from the week start', () => {
    expect(weekdayLabels('monday')).toEqual(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);
  });
});

describe('resolveGotoSpec', () => {
  const cursor = d(2026, 10, 19);

  it('reads MMDDYYYY, MMYYYY, MMDD and DD', () => {
    expect(resolveGotoSpec('10312026', cursor)).toEqual(d(2026, 10, 31));
    expect(resolveGotoSpec('022027', cursor)).toEqual(d(2027, 2, 1));
    expect(resolveGotoSpec('1225', cursor)).toEqual(d(2026, 12, 25));
    expect(resolveGotoSpec('15', cursor)).toEqual(d(2026, 10, 15));
  });

  it('rejects impossible dates and other lengths', () => {
    expect(resolveGotoSpec('0230', cursor)).toBeNull();
    expect(resolveGotoSpec('32', cursor)).toBeNull();
    expect(resolveGotoSpec('123', cursor)).toBeNull();
  });
});
