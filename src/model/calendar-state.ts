import {
  addDays,
  addMonthsClamped,
  clampDate,
  endOfMonth,
  endOfWeek,
  isSameDate,
  monthOf,
  startOfMonth,
  startOfWeek,
  type CalendarDate,
  type WeekStart,
  type YearMonth,
} from '../calendar/date.js';

export interface CalendarState {
  readonly cursor: CalendarDate;
  readonly displayedMonth: YearMonth;
  /** Index into the cursor day's visible tasks. */
  readonly selectedTaskIndex: number;
}

export type DateMotion = 'left' | 'right' | 'up' | 'down' | 'monthStart' | 'monthEnd' | 'weekStart' | 'weekEnd' | 'nextMonth' | 'prevMonth';

export function initialCalendarState(today: CalendarDate): CalendarState {
  return { cursor: today, displayedMonth: monthOf(today), selectedTaskIndex: 0 };
}

/**
 * Place the cursor on a date, kept within years 1-9999. The displayed month
 * always follows the cursor, and the task selection resets whenever the day
 * changes.
 */
export function withCursor(state: CalendarState, target: CalendarDate): CalendarState {
  const cursor = clampDate(target);
  return {
    cursor,
    displayedMonth: monthOf(cursor),
    selectedTaskIndex: isSameDate(state.cursor, cursor) ? state.selectedTaskIndex : 0,
  };
}

export function applyDateMotion(
  state: CalendarState,
  motion: DateMotion,
  steps: number,
  weekStart: WeekStart
): CalendarState {
  const { cursor } = state;
  switch (motion) {
    case 'left':
      return withCursor(state, addDays(cursor, -steps));
    case 'right':
      return withCursor(state, addDays(cursor, steps));
    case 'up':
      return withCursor(state, addDays(cursor, -7 * steps));
    case 'down':
      return withCursor(state, addDays(cursor, 7 * steps));
    case 'monthStart':
      return withCursor(state, startOfMonth(cursor));
    case 'monthEnd':
      return withCursor(state, endOfMonth(cursor));
    case 'weekStart':
      return withCursor(state, startOfWeek(cursor, weekStart));
    case 'weekEnd':
      return withCursor(state, endOfWeek(cursor, weekStart));
    case 'nextMonth':
      return withCursor(state, addMonthsClamped(cursor, steps));
    case 'prevMonth':
      return withCursor(state, addMonthsClamped(cursor, -steps));
  }
}

export function withSelectedTask(state: CalendarState, index: number, taskCount: number): CalendarState {
  const clamped = taskCount === 0 ? 0 : Math.min(Math.max(index, 0), taskCount - 1);
  if (clamped === state.selectedTaskIndex) return state;
  return { ...state, selectedTaskIndex: clamped };
}
