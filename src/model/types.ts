import type { CalendarDate } from '../calendar/date.js';
import type { Color, Subcalendar } from '../schema/index.js';

export type { Color, Subcalendar };

export interface Task {
  readonly id: number;
  readonly subcalendarId: number;
  readonly date: CalendarDate;
  readonly title: string;
  readonly completed: boolean;
}

export interface NewTask {
  subcalendarId: number;
  date: CalendarDate;
  title: string;
}

export type TaskPatch = Partial<Pick<Task, 'subcalendarId' | 'date' | 'title' | 'completed'>>;

export interface TaskFilter {
  /** Skip tasks owned by hidden subcalendars. */
  visibleOnly?: boolean;
  /** Only tasks whose subcalendar has this colour. */
  color?: Color | null;
}
