import { describe, expect, it } from 'vitest';
import type { CalendarDate } from '../../src/calendar/date.js';
import { initialCalendarState } from '../../src/model/calendar-state.js';
import { CalendarStore } from '../../src/model/calendar-store.js';
import { projectView, type ProjectionInput } from '../../src/view/snapshot.js';

const d = (year: number, month: number, day: number): CalendarDate => ({ year, month, day });

function fixture() {
  const store = CalendarStore.empty();
  const home = store.createSubcalendar('Home', 'blue');
  const work = store.createSubcalendar('Work', 'red');
  const gym = store.createSubcalendar('Gym', 'green');
  store.createTask({ subcalendarId: work.id, date: d(2026, 10, 19), title: 'Standup' });
  store.createTask({ subcalendarId: home.id, date: d(2026, 10, 19), title: 'Laundry' });
  store.createTask({ subcalendarId: home.id, date: d(2026, 9, 27), title: 'Leading edge' });
  store.createTask({ subcalendarId: home.id, date: d(2026, 9, 26), title: 'Outside grid' });
  store.createTask({ subcalendarId: gym.id, date: d(2026, 11, 7), title: 'Trailing edge' });
  store.setSubcalendarVisibility(gym.id, false);

  const input: ProjectionInput = {
    store,
    calendar: initialCalendarState(d(2026, 10, 19)),
    today: d(2026, 10, 19),
    mode: 'normal',
    pending: '',
    input: null,
    activeSubcalendarId: home.id,
    colorFilter: null,
    weekStart: 'sunday',
    message: null,
  };
  return { store, input };
}

describe('projectView', () => {
  it('lists visible tasks inside the grid range', () => {
    const { input } = fixture();
    const view = projectView(input);
    expect(view.grid).toHaveLength(6);
    expect(view.tasks.map((task) => task.title)).toEqual(['Leading edge', 'Laundry', 'Standup']);
    expect(view.subcalendars.map((sub) => sub.name)).toEqual(['Home', 'Work']);
    expect(view.hiddenSubcalendars).toBe(1);
    expect(view.activeSubcalendar?.name).toBe('Home');
  });

  it('shows only the cursor week in the week view', () => {
    const { input } = fixture();
    expect(projectView(input).view).toBe('month');
    const view = projectView({ ...input, view: 'week' });
    expect(view.view).toBe('week');
    expect(view.grid).toHaveLength(1);
    expect(view.grid[0]?.[0]).toEqual(d(2026, 10, 18));
    expect(view.grid[0]?.[6]).toEqual(d(2026, 10, 24));
    expect(view.tasks.map((task) => task.title)).toEqual(['Laundry', 'Standup']);
  });

  it('orders cursor tasks by subcalendar and selects by index', () => {
    const { input } = fixture();
    const view = projectView({ ...input, calendar: { ...input.calendar, selectedTaskIndex: 1 } });
    expect(view.cursorTasks.map((task) => task.title)).toEqual(['Laundry', 'Standup']);
    expect(view.selectedTask?.title).toBe('Standup');
  });

  it('applies the color filter', () => {
    const { input } = fixture();
    const view = projectView({ ...input, colorFilter: 'red' });
    expect(view.tasks.map((task) => task.title)).toEqual(['Standup']);
    expect(view.cursorTasks.map((task) => task.title)).toEqual(['Standup']);
    expect(view.selectedTask?.title).toBe('Standup');
  });

  it('is frozen and unaffected by later store edits', () => {
    const { store, input } = fixture();
    const view = projectView(input);
    store.deleteSubcalendar(1);
    expect(Object.isFrozen(view)).toBe(true);
    expect(view.tasks).toHaveLength(3);
    expect(view.subcalendars[0]?.name).toBe('Home');
  });

  it('reports a missing active subcalendar as null', () => {
    const { input } = fixture();
    expect(projectView({ ...input, activeSubcalendarId: 42 }).activeSubcalendar).toBeNull();
  });
});
