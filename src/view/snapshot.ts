import { monthGrid, weekDates, type CalendarDate, type WeekStart } from '../calendar/date.js';
import type { CalendarView, Mode } from '../grammar/actions.js';
import type { TextInputState } from '../grammar/text-input.js';
import type { CalendarState } from '../model/calendar-state.js';
import type { CalendarStore } from '../model/calendar-store.js';
import type { Color, Subcalendar, Task } from '../model/types.js';

export interface StatusMessage {
  text: string;
  level: 'info' | 'error';
}

/**
 * Everything the renderer needs for one frame. Built after a keystroke has
 * been fully applied and never changed afterwards.
 */
export interface ViewSnapshot {
  readonly calendar: CalendarState;
  readonly today: CalendarDate;
  readonly mode: Mode;
  /** Count and keys typed so far in normal mode. */
  readonly pending: string;
  /** Text buffer of insert / command-line mode. */
  readonly input: TextInputState | null;
  readonly subcalendars: readonly Subcalendar[];
  readonly hiddenSubcalendars: number;
  readonly activeSubcalendar: Subcalendar | null;
  readonly colorFilter: Color | null;
  readonly weekStart: WeekStart;
  readonly view: CalendarView;
  /** Six weeks of the displayed month, or the cursor's week alone. */
  readonly grid: readonly (readonly CalendarDate[])[];
  /** Visible tasks dated inside the grid, ordered by date. */
  readonly tasks: readonly Task[];
  readonly cursorTasks: readonly Task[];
  readonly selectedTask: Task | null;
  readonly message: StatusMessage | null;
}

export interface ProjectionInput {
  store: CalendarStore;
  calendar: CalendarState;
  today: CalendarDate;
  mode: Mode;
  pending: string;
  input: TextInputState | null;
  activeSubcalendarId: number | null;
  colorFilter: Color | null;
  weekStart: WeekStart;
  view?: CalendarView;
  message: StatusMessage | null;
}

export function projectView(input: ProjectionInput): ViewSnapshot {
  const { store, calendar, colorFilter } = input;
  const all = store.listSubcalendars();
  const visible = all.filter((sub) => sub.visible);
  const view = input.view ?? 'month';
  const grid =
    view === 'week' ? [weekDates(calendar.cursor, input.weekStart)] : monthGrid(calendar.displayedMonth, input.weekStart);
  const first = grid[0]?.[0] ?? calendar.cursor;
  const last = grid[grid.length - 1]?.[6] ?? calendar.cursor;
  const filter = { visibleOnly: true, color: colorFilter };
  const cursorTasks = store.tasksOn(calendar.cursor, filter);

  return Object.freeze({
    calendar,
    today: input.today,
    mode: input.mode,
    pending: input.pending,
    input: input.input,
    subcalendars: Object.freeze(visible),
    hiddenSubcalendars: all.length - visible.length,
    activeSubcalendar:
      input.activeSubcalendarId === null ? null : (store.getSubcalendar(input.activeSubcalendarId) ?? null),
    colorFilter,
    weekStart: input.weekStart,
    view,
    grid,
    tasks: Object.freeze(store.tasksBetween(first, last, filter)),
    cursorTasks: Object.freeze(cursorTasks),
    selectedTask: cursorTasks[calendar.selectedTaskIndex] ?? null,
    message: input.message,
  });
}
