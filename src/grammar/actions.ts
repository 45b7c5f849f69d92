import type { CalendarDate } from '../calendar/date.js';
import type { DateMotion } from '../model/calendar-state.js';
import type { Color } from '../schema/index.js';

export type Mode = 'normal' | 'insert' | 'commandLine';

export type Motion = DateMotion | 'nextSubcalendar' | 'prevSubcalendar' | 'nextTask' | 'prevTask';

export type InsertTarget = 'newTask' | 'editTitle';

/** `active`: the active subcalendar; `origin`: the subcalendar the task was yanked from. */
export type PasteTarget = 'active' | 'origin';

export type CalendarView = 'month' | 'week';

/**
 * Everything a keystroke can resolve to. The interpreter switches over `type`
 * exhaustively, so a new variant fails to compile until it is handled.
 */
export type Action =
  | { type: 'moveCursor'; motion: Motion; steps: number }
  | { type: 'goto'; digits: string | null }
  | { type: 'enterInsert'; target: InsertTarget }
  | { type: 'enterCommandLine' }
  | { type: 'toggleCompleted' }
  | { type: 'deleteTask' }
  | { type: 'toggleVisibility' }
  | { type: 'cycleColorFilter' }
  | { type: 'yank' }
  | { type: 'paste'; target: PasteTarget; steps: number }
  | { type: 'undo'; steps: number }
  | { type: 'redo'; steps: number }
  | { type: 'write' }
  | { type: 'quit'; write: boolean }
  | { type: 'clearPending' }
  | { type: 'editText'; key: string }
  | { type: 'commitText' }
  | { type: 'cancelText' };

export type TaskField =
  | { field: 'title'; value: string }
  | { field: 'date'; value: CalendarDate }
  | { field: 'subcalendar'; value: string }
  | { field: 'completed'; value: boolean };

/** Structured commands accepted on the `:` command line. */
export type LineCommand =
  | { type: 'write'; path: string | null }
  | { type: 'quit' }
  | { type: 'writeQuit' }
  | { type: 'createSubcalendar'; name: string; color: Color | null }
  | { type: 'renameSubcalendar'; name: string; newName: string }
  | { type: 'deleteSubcalendar'; name: string }
  | { type: 'setSubcalendarColor'; name: string; color: Color }
  | { type: 'setSubcalendarVisibility'; name: string; visible: boolean }
  | { type: 'useSubcalendar'; name: string }
  | { type: 'createTask'; title: string }
  | { type: 'deleteTask' }
  | { type: 'toggleCompleted' }
  | { type: 'editTask'; edit: TaskField }
  | { type: 'goto'; date: CalendarDate | 'today' }
  | { type: 'yank' }
  | { type: 'paste'; target: PasteTarget }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'setView'; view: CalendarView }
  | { type: 'help' };
