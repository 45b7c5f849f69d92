import { resolveGotoSpec, todayDate, type CalendarDate, type WeekStart } from '../calendar/date.js';
import type { Action, CalendarView, InsertTarget, LineCommand, Motion, PasteTarget, TaskField } from '../grammar/actions.js';
import { commandHelpLines, parseCommandLine } from '../grammar/command-line.js';
import { resolveKey } from '../grammar/command-grammar.js';
import { applyTextInputKey, createTextInput, type TextInputState } from '../grammar/text-input.js';
import {
  applyDateMotion,
  initialCalendarState,
  withCursor,
  withSelectedTask,
  type CalendarState,
} from '../model/calendar-state.js';
import { CalendarStore } from '../model/calendar-store.js';
import {
  CalendarError,
  DuplicateNameError,
  EmptyHistoryError,
  EmptyRegisterError,
  InvalidKeystrokeError,
  NoTaskAtCursorError,
  ReferentialViolationError,
} from '../model/errors.js';
import type { Color, Subcalendar, Task, TaskPatch } from '../model/types.js';
import { COLORS, type StoreDocument } from '../schema/index.js';
import type { PersistenceGateway } from '../storage/gateway.js';
import { projectView, type StatusMessage, type ViewSnapshot } from '../view/snapshot.js';

/**
 * Mode plus the buffer that belongs to it. Switching modes always builds a new
 * value, so no buffer survives a mode change.
 */
export type ModeState =
  | { mode: 'normal'; pending: string }
  | { mode: 'insert'; target: InsertTarget; taskId: number | null; input: TextInputState }
  | { mode: 'commandLine'; input: TextInputState };

export type FeedResult = { status: 'continue' } | { status: 'quit' };

/** A copied task: what `p` recreates on the cursor date. */
export interface YankedTask {
  title: string;
  completed: boolean;
  subcalendarId: number;
}

export interface InterpreterOptions {
  store: CalendarStore;
  gateway: PersistenceGateway;
  /** Clock for the initial cursor and `gg`. */
  today?: () => CalendarDate;
  weekStart?: WeekStart;
  view?: CalendarView;
}

const CONTINUE: FeedResult = { status: 'continue' };
const QUIT: FeedResult = { status: 'quit' };
const NORMAL: ModeState = { mode: 'normal', pending: '' };

/** Saved states kept for undo. */
export const MAX_HISTORY = 50;

function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Turns keystrokes into calendar navigation and task edits.
 *
 * Every mutation goes through `commit`, which saves the whole model before
 * returning; if the save fails the model is restored to the last saved state.
 */
export class ModalInterpreter {
  private storeRef: CalendarStore;
  private durable: StoreDocument;
  private modeState: ModeState = NORMAL;
  private calendar: CalendarState;
  private activeSubcalendarId: number | null;
  private colorFilter: Color | null = null;
  private message: StatusMessage | null = null;
  private view: CalendarView;
  private register: YankedTask | null = null;
  private undoStack: StoreDocument[] = [];
  private redoStack: StoreDocument[] = [];
  private readonly gateway: PersistenceGateway;
  private readonly today: () => CalendarDate;
  private readonly weekStart: WeekStart;

  constructor(options: InterpreterOptions) {
    this.storeRef = options.store;
    this.gateway = options.gateway;
    this.today = options.today ?? (() => todayDate());
    this.weekStart = options.weekStart ?? 'sunday';
    this.view = options.view ?? 'month';
    this.durable = this.storeRef.toDocument();
    this.calendar = initialCalendarState(this.today());
    this.activeSubcalendarId = this.storeRef.listSubcalendars()[0]?.id ?? null;
  }

  get store(): CalendarStore {
    return this.storeRef;
  }

  get state(): ModeState {
    return this.modeState;
  }

  get calendarState(): CalendarState {
    return this.calendar;
  }

  get status(): StatusMessage | null {
    return this.message;
  }

  get yanked(): YankedTask | null {
    return this.register;
  }

  get history(): { undo: number; redo: number } {
    return { undo: this.undoStack.length, redo: this.redoStack.length };
  }

  feed(key: string): FeedResult {
    this.message = null;
    const result = resolveKey(this.modeState.mode, this.pendingBuffer(), key);

    switch (result.kind) {
      case 'pending':
        this.modeState = { mode: 'normal', pending: result.pending };
        return CONTINUE;
      case 'invalid':
        if (this.modeState.mode === 'normal') this.modeState = NORMAL;
        this.fail(new InvalidKeystrokeError(key, result.reason));
        return CONTINUE;
      case 'resolved':
        break;
    }

    try {
      return this.apply(result.action);
    } catch (error) {
      if (error instanceof CalendarError) {
        this.fail(error);
        return CONTINUE;
      }
      throw error;
    } finally {
      this.clampSelection();
    }
  }

  snapshot(): ViewSnapshot {
    const state = this.modeState;
    return projectView({
      store: this.storeRef,
      calendar: this.calendar,
      today: this.today(),
      mode: state.mode,
      pending: state.mode === 'normal' ? state.pending : '',
      input: state.mode === 'normal' ? null : state.input,
      activeSubcalendarId: this.activeSubcalendarId,
      colorFilter: this.colorFilter,
      weekStart: this.weekStart,
      view: this.view,
      message: this.message,
    });
  }

  private pendingBuffer(): string {
    const state = this.modeState;
    return state.mode === 'normal' ? state.pending : state.input.value;
  }

  private apply(action: Action): FeedResult {
    if (this.modeState.mode === 'normal') this.modeState = NORMAL;

    switch (action.type) {
      case 'moveCursor':
        this.move(action.motion, action.steps);
        return CONTINUE;
      case 'goto':
        this.goto(action.digits);
        return CONTINUE;
      case 'enterInsert':
        this.enterInsert(action.target);
        return CONTINUE;
      case 'enterCommandLine':
        this.modeState = { mode: 'commandLine', input: createTextInput() };
        return CONTINUE;
      case 'toggleCompleted':
        this.toggleCompleted();
        return CONTINUE;
      case 'deleteTask':
        this.deleteTaskAtCursor();
        return CONTINUE;
      case 'toggleVisibility':
        this.toggleActiveVisibility();
        return CONTINUE;
      case 'cycleColorFilter':
        this.cycleColorFilter();
        return CONTINUE;
      case 'yank':
        this.yank();
        return CONTINUE;
      case 'paste':
        this.paste(action.target, action.steps);
        return CONTINUE;
      case 'undo':
        this.travel('undo', action.steps);
        return CONTINUE;
      case 'redo':
        this.travel('redo', action.steps);
        return CONTINUE;
      case 'write':
        this.write();
        return CONTINUE;
      case 'quit':
        if (action.write) this.write();
        return QUIT;
      case 'clearPending':
        return CONTINUE;
      case 'editText':
        this.editText(action.key);
        return CONTINUE;
      case 'commitText':
        return this.commitText();
      case 'cancelText':
        this.modeState = NORMAL;
        return CONTINUE;
    }
  }

  // Motions

  private move(motion: Motion, steps: number): void {
    switch (motion) {
      case 'nextSubcalendar':
        this.cycleActiveSubcalendar(steps);
        return;
      case 'prevSubcalendar':
        this.cycleActiveSubcalendar(-steps);
        return;
      case 'nextTask':
        this.selectTask(this.calendar.selectedTaskIndex + steps);
        return;
      case 'prevTask':
        this.selectTask(this.calendar.selectedTaskIndex - steps);
        return;
      default:
        this.calendar = applyDateMotion(this.calendar, motion, steps, this.weekStart);
    }
  }

  private goto(digits: string | null): void {
    if (digits === null) {
      this.calendar = withCursor(this.calendar, this.today());
      return;
    }
    const target = resolveGotoSpec(digits, this.calendar.cursor);
    if (!target) {
      throw new InvalidKeystrokeError('gg', `Invalid date: ${digits}`);
    }
    this.calendar = withCursor(this.calendar, target);
  }

  private cycleActiveSubcalendar(delta: number): void {
    const subs = this.storeRef.listSubcalendars();
    if (subs.length === 0) return;
    const current = Math.max(
      0,
      subs.findIndex((sub) => sub.id === this.activeSubcalendarId)
    );
    const next = subs[(((current + delta) % subs.length) + subs.length) % subs.length];
    if (next) {
      this.activeSubcalendarId = next.id;
      this.info(`Active subcalendar: ${next.name}`);
    }
  }

  private selectTask(index: number): void {
    this.calendar = withSelectedTask(this.calendar, index, this.cursorTasks().length);
  }

  private cycleColorFilter(): void {
    const index = this.colorFilter === null ? -1 : COLORS.indexOf(this.colorFilter);
    this.colorFilter = COLORS[index + 1] ?? null;
    this.info(this.colorFilter ? `Color filter: ${this.colorFilter}` : 'Color filter off');
  }

  // Task and subcalendar lookups

  private cursorTasks(): Task[] {
    return this.storeRef.tasksOn(this.calendar.cursor, { visibleOnly: true, color: this.colorFilter });
  }

  private taskAtCursor(): Task {
    const task = this.cursorTasks()[this.calendar.selectedTaskIndex];
    if (!task) throw new NoTaskAtCursorError();
    return task;
  }

  private clampSelection(): void {
    this.calendar = withSelectedTask(this.calendar, this.calendar.selectedTaskIndex, this.cursorTasks().length);
  }

  private requireActiveSubcalendar(): Subcalendar {
    const sub = this.activeSubcalendarId === null ? undefined : this.storeRef.getSubcalendar(this.activeSubcalendarId);
    if (!sub) throw new ReferentialViolationError('No active subcalendar; create one with :new-subcalendar');
    return sub;
  }

  private requireSubcalendarNamed(name: string): Subcalendar {
    const sub = this.storeRef.findSubcalendarByName(name);
    if (!sub) throw new ReferentialViolationError(`No subcalendar named '${name}'`);
    return sub;
  }

  private ensureUniqueName(name: string, exceptId?: number): void {
    const existing = this.storeRef.findSubcalendarByName(name.trim());
    if (existing && existing.id !== exceptId) throw new DuplicateNameError(name.trim());
  }

  private ensureActiveSubcalendar(): void {
    if (this.activeSubcalendarId !== null && this.storeRef.getSubcalendar(this.activeSubcalendarId)) return;
    this.activeSubcalendarId = this.storeRef.listSubcalendars()[0]?.id ?? null;
  }

  // Persistence

  /**
   * Apply a mutation and save it. Any failure, before or after the store was
   * touched, restores the last saved model and rethrows.
   */
  private commit<T>(mutate: (store: CalendarStore) => T, describe: (result: T) => string): T {
    let result: T;
    let doc: StoreDocument;
    try {
      result = mutate(this.storeRef);
      doc = this.storeRef.toDocument();
      this.gateway.save(doc);
    } catch (error) {
      this.rollback();
      throw error;
    }
    this.pushHistory(this.undoStack, [this.durable]);
    this.redoStack = [];
    this.durable = doc;
    this.info(describe(result));
    return result;
  }

  private pushHistory(stack: StoreDocument[], docs: StoreDocument[]): void {
    stack.push(...docs);
    if (stack.length > MAX_HISTORY) stack.splice(0, stack.length - MAX_HISTORY);
  }

  /**
   * Step back (or forward) through saved states. The restored state is saved
   * like any other change; id counters never go backwards.
   */
  private travel(direction: 'undo' | 'redo', steps: number): void {
    const from = direction === 'undo' ? this.undoStack : this.redoStack;
    const to = direction === 'undo' ? this.redoStack : this.undoStack;
    const passed: StoreDocument[] = [];
    let target = this.durable;
    for (let i = 0; i < steps; i++) {
      const next = from.pop();
      if (!next) break;
      passed.push(target);
      target = next;
    }
    if (passed.length === 0) throw new EmptyHistoryError(direction);

    const store = CalendarStore.fromDocument(target, this.storeRef.nextIds());
    const doc = store.toDocument();
    try {
      this.gateway.save(doc);
    } catch (error) {
      from.push(target, ...passed.slice(1).reverse());
      throw error;
    }
    this.pushHistory(to, passed);
    this.storeRef = store;
    this.durable = doc;
    this.ensureActiveSubcalendar();
    const verb = direction === 'undo' ? 'Undid' : 'Redid';
    this.info(`${verb} ${pluralize(passed.length, 'change')}`);
  }

  private rollback(): void {
    this.storeRef = CalendarStore.fromDocument(this.durable, this.storeRef.nextIds());
    this.ensureActiveSubcalendar();
  }

  private write(): void {
    const doc = this.storeRef.toDocument();
    this.gateway.save(doc);
    this.durable = doc;
    this.info(`Wrote ${pluralize(doc.tasks.length, 'task')} to ${this.gateway.location}`);
  }

  // Normal-mode edits

  private toggleCompleted(): void {
    const task = this.taskAtCursor();
    this.commit(
      (store) => store.toggleTaskCompleted(task.id),
      (next) => `${next.completed ? 'Completed' : 'Reopened'} '${next.title}'`
    );
  }

  private deleteTaskAtCursor(): void {
    const task = this.taskAtCursor();
    this.commit(
      (store) => store.deleteTask(task.id),
      (deleted) => `Deleted '${deleted.title}'`
    );
    this.register = { title: task.title, completed: task.completed, subcalendarId: task.subcalendarId };
  }

  private yank(): void {
    const task = this.taskAtCursor();
    this.register = { title: task.title, completed: task.completed, subcalendarId: task.subcalendarId };
    this.info(`Yanked '${task.title}'`);
  }

  private paste(target: PasteTarget, steps: number): void {
    const yanked = this.register;
    if (!yanked) throw new EmptyRegisterError();
    const origin = target === 'origin' ? this.storeRef.getSubcalendar(yanked.subcalendarId) : undefined;
    const sub = origin ?? this.requireActiveSubcalendar();
    const date = this.calendar.cursor;
    const created = this.commit(
      (store) =>
        Array.from({ length: steps }, () => {
          const task = store.createTask({ subcalendarId: sub.id, date, title: yanked.title });
          return yanked.completed ? store.toggleTaskCompleted(task.id) : task;
        }),
      (tasks) => `Pasted ${tasks.length === 1 ? `'${yanked.title}'` : pluralize(tasks.length, 'task')} into ${sub.name}`
    );
    const last = created[created.length - 1];
    const index = this.cursorTasks().findIndex((task) => task.id === last?.id);
    if (index >= 0) this.selectTask(index);
  }

  private toggleActiveVisibility(): void {
    const sub = this.requireActiveSubcalendar();
    this.commit(
      (store) => store.toggleSubcalendarVisibility(sub.id),
      (next) => `${next.visible ? 'Showing' : 'Hid'} '${next.name}'`
    );
  }

  // Insert mode

  private enterInsert(target: InsertTarget): void {
    if (target === 'editTitle') {
      const task = this.taskAtCursor();
      this.modeState = { mode: 'insert', target, taskId: task.id, input: createTextInput(task.title) };
      return;
    }
    this.modeState = { mode: 'insert', target, taskId: null, input: createTextInput() };
  }

  private editText(key: string): void {
    const state = this.modeState;
    if (state.mode === 'normal') return;
    const next = applyTextInputKey(state.input, key);
    if (!next) throw new InvalidKeystrokeError(key);
    this.modeState = { ...state, input: next };
  }

  private commitText(): FeedResult {
    const state = this.modeState;
    this.modeState = NORMAL;
    switch (state.mode) {
      case 'normal':
        return CONTINUE;
      case 'insert':
        if (state.taskId === null) {
          this.createTaskAtCursor(state.input.value);
        } else {
          this.editTask(state.taskId, { title: state.input.value });
        }
        return CONTINUE;
      case 'commandLine': {
        const line = state.input.value.trim();
        if (!line) return CONTINUE;
        return this.execute(parseCommandLine(line));
      }
    }
  }

  private createTaskAtCursor(title: string): void {
    const sub = this.requireActiveSubcalendar();
    const created = this.commit(
      (store) => store.createTask({ subcalendarId: sub.id, date: this.calendar.cursor, title }),
      (task) => `Added '${task.title}' to ${sub.name}`
    );
    const index = this.cursorTasks().findIndex((task) => task.id === created.id);
    if (index >= 0) this.selectTask(index);
  }

  private editTask(taskId: number, patch: TaskPatch): void {
    this.commit(
      (store) => store.updateTask(taskId, patch),
      (task) => `Updated '${task.title}'`
    );
  }

  // Command-line mode

  private execute(command: LineCommand): FeedResult {
    switch (command.type) {
      case 'write':
        if (command.path === null) {
          this.write();
        } else {
          this.gateway.saveTo(this.storeRef.toDocument(), command.path);
          this.info(`Wrote ${command.path}`);
        }
        return CONTINUE;
      case 'quit':
        return QUIT;
      case 'writeQuit':
        this.write();
        return QUIT;
      case 'createSubcalendar':
        this.createSubcalendar(command.name, command.color);
        return CONTINUE;
      case 'renameSubcalendar': {
        const sub = this.requireSubcalendarNamed(command.name);
        this.ensureUniqueName(command.newName, sub.id);
        this.commit(
          (store) => store.renameSubcalendar(sub.id, command.newName),
          (renamed) => `Renamed '${sub.name}' to '${renamed.name}'`
        );
        return CONTINUE;
      }
      case 'deleteSubcalendar': {
        const sub = this.requireSubcalendarNamed(command.name);
        this.commit(
          (store) => store.deleteSubcalendar(sub.id),
          ({ removedTasks }) => `Deleted '${sub.name}' and ${pluralize(removedTasks, 'task')}`
        );
        this.ensureActiveSubcalendar();
        return CONTINUE;
      }
      case 'setSubcalendarColor': {
        const sub = this.requireSubcalendarNamed(command.name);
        this.commit(
          (store) => store.setSubcalendarColor(sub.id, command.color),
          (next) => `'${next.name}' is now ${next.color}`
        );
        return CONTINUE;
      }
      case 'setSubcalendarVisibility': {
        const sub = this.requireSubcalendarNamed(command.name);
        this.commit(
          (store) => store.setSubcalendarVisibility(sub.id, command.visible),
          (next) => `${next.visible ? 'Showing' : 'Hid'} '${next.name}'`
        );
        return CONTINUE;
      }
      case 'useSubcalendar': {
        const sub = this.requireSubcalendarNamed(command.name);
        this.activeSubcalendarId = sub.id;
        this.info(`Active subcalendar: ${sub.name}`);
        return CONTINUE;
      }
      case 'createTask':
        this.createTaskAtCursor(command.title);
        return CONTINUE;
      case 'deleteTask':
        this.deleteTaskAtCursor();
        return CONTINUE;
      case 'toggleCompleted':
        this.toggleCompleted();
        return CONTINUE;
      case 'editTask':
        this.editTask(this.taskAtCursor().id, this.toPatch(command.edit));
        return CONTINUE;
      case 'goto':
        this.calendar = withCursor(this.calendar, command.date === 'today' ? this.today() : command.date);
        return CONTINUE;
      case 'yank':
        this.yank();
        return CONTINUE;
      case 'paste':
        this.paste(command.target, 1);
        return CONTINUE;
      case 'undo':
        this.travel('undo', 1);
        return CONTINUE;
      case 'redo':
        this.travel('redo', 1);
        return CONTINUE;
      case 'setView':
        this.view = command.view;
        this.info(command.view === 'week' ? 'Week view' : 'Month view');
        return CONTINUE;
      case 'help':
        this.info(commandHelpLines().join(' | '));
        return CONTINUE;
    }
  }

  private createSubcalendar(name: string, color: Color | null): void {
    this.ensureUniqueName(name);
    const used = new Set(this.storeRef.listSubcalendars().map((sub) => sub.color));
    const chosen = color ?? COLORS.find((c) => !used.has(c)) ?? 'blue';
    const created = this.commit(
      (store) => store.createSubcalendar(name, chosen),
      (sub) => `Created '${sub.name}' (${sub.color})`
    );
    this.activeSubcalendarId = created.id;
  }

  private toPatch(edit: TaskField): TaskPatch {
    switch (edit.field) {
      case 'title':
        return { title: edit.value };
      case 'date':
        return { date: edit.value };
      case 'subcalendar':
        return { subcalendarId: this.requireSubcalendarNamed(edit.value).id };
      case 'completed':
        return { completed: edit.value };
    }
  }

  // Status line

  private info(text: string): void {
    this.message = { text, level: 'info' };
  }

  private fail(error: CalendarError): void {
    this.message = { text: error.message, level: 'error' };
  }
}
