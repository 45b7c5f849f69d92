import { compareDates, formatIsoDate, isSameDate, isValidDate, parseIsoDate, type CalendarDate } from '../calendar/date.js';
import type { NextIds, StoreDocument, StoreFile } from '../schema/index.js';
import { EmptyTitleError, ReferentialViolationError } from './errors.js';
import type { Color, NewTask, Subcalendar, Task, TaskFilter, TaskPatch } from './types.js';

function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new EmptyTitleError();
  return trimmed;
}

/**
 * In-memory calendar model: subcalendars, their tasks, and the ownership
 * index used for cascade deletion.
 *
 * Entities are replaced, never mutated, so arrays handed out by the query
 * methods stay consistent after later edits.
 */
export class CalendarStore {
  private readonly subcalendars = new Map<number, Subcalendar>();
  private readonly tasks = new Map<number, Task>();
  private readonly tasksBySubcalendar = new Map<number, Set<number>>();
  private nextSubcalendarId = 1;
  private nextTaskId = 1;

  static empty(): CalendarStore {
    return new CalendarStore();
  }

  /**
   * Build a store from a validated store file. Throws a ReferentialViolationError
   * on duplicate ids or tasks that point at a missing subcalendar.
   */
  static fromDocument(doc: StoreFile, minimumNextIds?: NextIds): CalendarStore {
    const store = new CalendarStore();

    for (const sub of doc.subcalendars) {
      if (store.subcalendars.has(sub.id)) {
        throw new ReferentialViolationError(`Duplicate subcalendar id ${sub.id}`);
      }
      store.subcalendars.set(sub.id, { ...sub });
      store.tasksBySubcalendar.set(sub.id, new Set());
    }

    for (const record of doc.tasks) {
      if (store.tasks.has(record.id)) {
        throw new ReferentialViolationError(`Duplicate task id ${record.id}`);
      }
      const owned = store.tasksBySubcalendar.get(record.subcalendar_id);
      if (!owned) {
        throw new ReferentialViolationError(
          `Task ${record.id} references missing subcalendar ${record.subcalendar_id}`
        );
      }
      const date = parseIsoDate(record.date);
      if (!date) {
        throw new ReferentialViolationError(`Task ${record.id} has an invalid date '${record.date}'`);
      }
      store.tasks.set(record.id, {
        id: record.id,
        subcalendarId: record.subcalendar_id,
        date,
        title: record.title,
        completed: record.completed,
      });
      owned.add(record.id);
    }

    const maxSubId = Math.max(0, ...store.subcalendars.keys());
    const maxTaskId = Math.max(0, ...store.tasks.keys());
    store.nextSubcalendarId = Math.max(
      maxSubId + 1,
      doc.nextIds?.subcalendar ?? 1,
      minimumNextIds?.subcalendar ?? 1
    );
    store.nextTaskId = Math.max(maxTaskId + 1, doc.nextIds?.task ?? 1, minimumNextIds?.task ?? 1);
    return store;
  }

  toDocument(): StoreDocument {
    return {
      version: 1,
      nextIds: this.nextIds(),
      subcalendars: [...this.subcalendars.values()].map((sub) => ({ ...sub })),
      tasks: [...this.tasks.values()].map((task) => ({
        id: task.id,
        subcalendar_id: task.subcalendarId,
        date: formatIsoDate(task.date),
        title: task.title,
        completed: task.completed,
      })),
    };
  }

  nextIds(): NextIds {
    return { subcalendar: this.nextSubcalendarId, task: this.nextTaskId };
  }

  // Subcalendars

  listSubcalendars(): Subcalendar[] {
    return [...this.subcalendars.values()];
  }

  getSubcalendar(id: number): Subcalendar | undefined {
    return this.subcalendars.get(id);
  }

  /** Exact name first, then a case-insensitive match. */
  findSubcalendarByName(name: string): Subcalendar | undefined {
    const all = this.listSubcalendars();
    const exact = all.find((sub) => sub.name === name);
    if (exact) return exact;
    const lower = name.toLowerCase();
    return all.find((sub) => sub.name.toLowerCase() === lower);
  }

  createSubcalendar(name: string, color: Color): Subcalendar {
    const trimmed = name.trim();
    if (!trimmed) throw new ReferentialViolationError('Subcalendar name cannot be empty');
    const sub: Subcalendar = { id: this.nextSubcalendarId++, name: trimmed, color, visible: true };
    this.subcalendars.set(sub.id, sub);
    this.tasksBySubcalendar.set(sub.id, new Set());
    return sub;
  }

  renameSubcalendar(id: number, name: string): Subcalendar {
    const trimmed = name.trim();
    if (!trimmed) throw new ReferentialViolationError('Subcalendar name cannot be empty');
    return this.replaceSubcalendar(id, { name: trimmed });
  }

  setSubcalendarColor(id: number, color: Color): Subcalendar {
    return this.replaceSubcalendar(id, { color });
  }

  setSubcalendarVisibility(id: number, visible: boolean): Subcalendar {
    return this.replaceSubcalendar(id, { visible });
  }

  toggleSubcalendarVisibility(id: number): Subcalendar {
    const current = this.requireSubcalendar(id);
    return this.replaceSubcalendar(id, { visible: !current.visible });
  }

  /**
   * Remove a subcalendar and every task it owns.
   */
  deleteSubcalendar(id: number): { subcalendar: Subcalendar; removedTasks: number } {
    const subcalendar = this.requireSubcalendar(id);
    const owned = this.tasksBySubcalendar.get(id) ?? new Set<number>();
    for (const taskId of owned) {
      this.tasks.delete(taskId);
    }
    this.tasksBySubcalendar.delete(id);
    this.subcalendars.delete(id);
    return { subcalendar, removedTasks: owned.size };
  }

  // Tasks

  getTask(id: number): Task | undefined {
    return this.tasks.get(id);
  }

  get taskCount(): number {
    return this.tasks.size;
  }

  createTask(input: NewTask): Task {
    const title = normalizeTitle(input.title);
    const owned = this.ownedTasks(input.subcalendarId);
    if (!isValidDate(input.date)) {
      throw new ReferentialViolationError(`Invalid date ${formatIsoDate(input.date)}`);
    }
    const task: Task = {
      id: this.nextTaskId++,
      subcalendarId: input.subcalendarId,
      date: { ...input.date },
      title,
      completed: false,
    };
    this.tasks.set(task.id, task);
    owned.add(task.id);
    return task;
  }

  updateTask(id: number, patch: TaskPatch): Task {
    const current = this.requireTask(id);
    const title = patch.title === undefined ? current.title : normalizeTitle(patch.title);
    const subcalendarId = patch.subcalendarId ?? current.subcalendarId;
    const target = this.ownedTasks(subcalendarId);
    if (patch.date && !isValidDate(patch.date)) {
      throw new ReferentialViolationError(`Invalid date ${formatIsoDate(patch.date)}`);
    }

    const next: Task = {
      id,
      subcalendarId,
      date: patch.date ? { ...patch.date } : current.date,
      title,
      completed: patch.completed ?? current.completed,
    };
    if (subcalendarId !== current.subcalendarId) {
      this.tasksBySubcalendar.get(current.subcalendarId)?.delete(id);
      target.add(id);
    }
    this.tasks.set(id, next);
    return next;
  }

  toggleTaskCompleted(id: number): Task {
    const current = this.requireTask(id);
    return this.updateTask(id, { completed: !current.completed });
  }

  deleteTask(id: number): Task {
    const task = this.requireTask(id);
    this.tasks.delete(id);
    this.tasksBySubcalendar.get(task.subcalendarId)?.delete(id);
    return task;
  }

  tasksOf(subcalendarId: number): Task[] {
    const owned = this.tasksBySubcalendar.get(subcalendarId);
    if (!owned) return [];
    return this.sortTasks([...owned].flatMap((id) => this.tasks.get(id) ?? []));
  }

  tasksOn(date: CalendarDate, filter: TaskFilter = {}): Task[] {
    return this.sortTasks(
      [...this.tasks.values()].filter((task) => isSameDate(task.date, date) && this.matches(task, filter))
    );
  }

  /** Tasks with `from <= date <= to`, ordered by date. */
  tasksBetween(from: CalendarDate, to: CalendarDate, filter: TaskFilter = {}): Task[] {
    return this.sortTasks(
      [...this.tasks.values()].filter(
        (task) => compareDates(task.date, from) >= 0 && compareDates(task.date, to) <= 0 && this.matches(task, filter)
      )
    );
  }

  private matches(task: Task, filter: TaskFilter): boolean {
    const sub = this.subcalendars.get(task.subcalendarId);
    if (!sub) return false;
    if (filter.visibleOnly && !sub.visible) return false;
    if (filter.color && sub.color !== filter.color) return false;
    return true;
  }

  // Date, then subcalendar order, then creation order.
  private sortTasks(tasks: Task[]): Task[] {
    const order = new Map<number, number>();
    let i = 0;
    for (const id of this.subcalendars.keys()) order.set(id, i++);
    return tasks.sort(
      (a, b) =>
        compareDates(a.date, b.date) ||
        (order.get(a.subcalendarId) ?? 0) - (order.get(b.subcalendarId) ?? 0) ||
        a.id - b.id
    );
  }

  private ownedTasks(subcalendarId: number): Set<number> {
    const owned = this.tasksBySubcalendar.get(subcalendarId);
    if (!owned) {
      throw new ReferentialViolationError(`Subcalendar ${subcalendarId} does not exist`);
    }
    return owned;
  }

  private requireSubcalendar(id: number): Subcalendar {
    const sub = this.subcalendars.get(id);
    if (!sub) throw new ReferentialViolationError(`Subcalendar ${id} does not exist`);
    return sub;
  }

  private requireTask(id: number): Task {
    const task = this.tasks.get(id);
    if (!task) throw new ReferentialViolationError(`Task ${id} does not exist`);
    return task;
  }

  private replaceSubcalendar(id: number, patch: Partial<Omit<Subcalendar, 'id'>>): Subcalendar {
    const next = { ...this.requireSubcalendar(id), ...patch, id };
    this.subcalendars.set(id, next);
    return next;
  }
}
