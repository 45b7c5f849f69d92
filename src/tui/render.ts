import terminalKit from 'terminal-kit';
import { formatIsoDate, formatMonthTitle, isSameDate, weekdayLabels, type CalendarDate } from '../calendar/date.js';
import type { Mode } from '../grammar/actions.js';
import type { Color, Subcalendar, Task } from '../model/types.js';
import type { ViewSnapshot } from '../view/snapshot.js';
import { computeLayout, visibleTaskLines, type FrameLayout } from './layout.js';
import { inputCursorColumn, setCursorVisible, type Term } from './term-cursor.js';

export interface RenderOptions {
  colorsDisabled: boolean;
  dataFile: string;
}

const MODE_LABELS: Record<Mode, string> = {
  normal: 'NORMAL',
  insert: 'INSERT',
  commandLine: 'COMMAND',
};

function truncateToWidth(s: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(s) <= maxWidth) return s;
  if (maxWidth === 1) return '…';
  return `${terminalKit.truncateString(s, maxWidth - 1)}…`;
}

function padToWidth(s: string, width: number): string {
  const shown = truncateToWidth(s, width);
  return shown + ' '.repeat(Math.max(0, width - terminalKit.stringWidth(shown)));
}

function paint(term: Term, color: Color, text: string): void {
  switch (color) {
    case 'blue':
      term.blue(text);
      return;
    case 'green':
      term.green(text);
      return;
    case 'red':
      term.red(text);
      return;
    case 'yellow':
      term.yellow(text);
      return;
    case 'magenta':
      term.magenta(text);
      return;
    case 'cyan':
      term.cyan(text);
      return;
    case 'white':
      term.white(text);
      return;
  }
}

function taskLabel(task: Task): string {
  return `${task.completed ? '✓' : '•'} ${task.title}`;
}

function colorsById(subcalendars: readonly Subcalendar[]): Map<number, Color> {
  return new Map(subcalendars.map((sub) => [sub.id, sub.color]));
}

function groupByDate(tasks: readonly Task[]): Map<string, Task[]> {
  const byDate = new Map<string, Task[]>();
  for (const task of tasks) {
    const key = formatIsoDate(task.date);
    const list = byDate.get(key) ?? [];
    list.push(task);
    byDate.set(key, list);
  }
  return byDate;
}

function renderHeader(term: Term, snapshot: ViewSnapshot, layout: FrameLayout, options: RenderOptions): void {
  term.moveTo(1, 1);
  term.eraseLineAfter();
  const title = formatMonthTitle(snapshot.calendar.displayedMonth);
  if (options.colorsDisabled) term(title);
  else term.bold(title);

  term.moveTo(1, 2);
  term.eraseLineAfter();
  const labels = weekdayLabels(snapshot.weekStart);
  labels.forEach((label, i) => {
    term.moveTo(layout.gridLeft + i * layout.cellWidth, 2);
    if (options.colorsDisabled) term(truncateToWidth(label, layout.cellWidth));
    else term.dim(truncateToWidth(label, layout.cellWidth));
  });
}

/** How a composed line is drawn. Colours are only used when colours are enabled. */
export type Tone = 'plain' | 'bold' | 'dim' | 'inverse' | Color;

export interface PanelLine {
  text: string;
  tone: Tone;
}

function paintLine(term: Term, line: PanelLine): void {
  switch (line.tone) {
    case 'plain':
      term(line.text);
      return;
    case 'bold':
      term.bold(line.text);
      return;
    case 'dim':
      term.dim(line.text);
      return;
    case 'inverse':
      term.inverse(line.text);
      return;
    default:
      paint(term, line.tone, line.text);
  }
}

/**
 * Lines of one grid cell: the day number, then as many tasks as fit, then a
 * "+N more" line when some do not. Always exactly `cellHeight` lines.
 */
export function composeCell(
  snapshot: ViewSnapshot,
  date: CalendarDate,
  tasks: readonly Task[],
  cellWidth: number,
  cellHeight: number,
  colorsDisabled: boolean
): PanelLine[] {
  const width = Math.max(1, cellWidth - 1);
  const colors = colorsById(snapshot.subcalendars);
  const isCursor = isSameDate(date, snapshot.calendar.cursor);
  const isToday = isSameDate(date, snapshot.today);
  const inMonth = date.month === snapshot.calendar.displayedMonth.month;
  const dayLabel = padToWidth(String(date.day).padStart(2, ' '), width);

  let labelTone: Tone = 'dim';
  if (isCursor) labelTone = 'inverse';
  else if (colorsDisabled || inMonth) labelTone = isToday && !colorsDisabled ? 'bold' : 'plain';
  const lines: PanelLine[] = [{ text: dayLabel, tone: labelTone }];

  const { shown, overflow } = visibleTaskLines(cellHeight, tasks.length);
  for (const task of tasks.slice(0, shown)) {
    const color = colors.get(task.subcalendarId);
    let tone: Tone = 'plain';
    if (!colorsDisabled && color) tone = task.completed ? 'dim' : color;
    lines.push({ text: padToWidth(taskLabel(task), width), tone });
  }
  if (overflow > 0) lines.push({ text: padToWidth(`+${overflow} more`, width), tone: 'dim' });
  while (lines.length < cellHeight) lines.push({ text: ' '.repeat(width), tone: 'plain' });
  return lines;
}

function renderGrid(term: Term, snapshot: ViewSnapshot, layout: FrameLayout, options: RenderOptions): void {
  const byDate = groupByDate(snapshot.tasks);
  snapshot.grid.forEach((week, w) => {
    week.forEach((date, d) => {
      const x = layout.gridLeft + d * layout.cellWidth;
      const y = layout.gridTop + w * layout.cellHeight;
      const tasks = byDate.get(formatIsoDate(date)) ?? [];
      composeCell(snapshot, date, tasks, layout.cellWidth, layout.cellHeight, options.colorsDisabled).forEach(
        (line, i) => {
          term.moveTo(x, y + i);
          term.styleReset();
          paintLine(term, line);
        }
      );
    });
  });
}

// Window of `rows` lines that keeps `selected` in view.
function taskWindow(total: number, selected: number, rows: number): { start: number; end: number } {
  if (total <= rows) return { start: 0, end: total };
  const shown = Math.max(0, rows - 1);
  const start = Math.min(Math.max(0, selected - shown + 1), total - shown);
  return { start, end: start + shown };
}

/**
 * Lines of the side panel: the cursor day's tasks and the subcalendar
 * legend, never more than `maxLines`. Tasks that do not fit scroll with the
 * selection and the rest is summarised as "+N more".
 */
export function composeSidePanel(
  snapshot: ViewSnapshot,
  width: number,
  maxLines: number,
  colorsDisabled: boolean
): PanelLine[] {
  if (maxLines <= 0) return [];
  const colors = colorsById(snapshot.subcalendars);

  const legend: PanelLine[] = [
    { text: '', tone: 'plain' },
    { text: 'Subcalendars', tone: 'bold' },
  ];
  for (const sub of snapshot.subcalendars) {
    const marker = snapshot.activeSubcalendar?.id === sub.id ? '>' : ' ';
    legend.push({ text: truncateToWidth(`${marker} ${sub.name}`, width), tone: colorsDisabled ? 'plain' : sub.color });
  }
  const active = snapshot.activeSubcalendar;
  if (active && !active.visible) {
    legend.push({ text: truncateToWidth(`> ${active.name} (hidden)`, width), tone: 'dim' });
  }
  if (snapshot.hiddenSubcalendars > 0) {
    legend.push({ text: `${snapshot.hiddenSubcalendars} hidden`, tone: 'dim' });
  }
  if (snapshot.colorFilter) {
    legend.push({ text: `filter: ${snapshot.colorFilter}`, tone: 'dim' });
  }

  const lines: PanelLine[] = [{ text: truncateToWidth(formatIsoDate(snapshot.calendar.cursor), width), tone: 'bold' }];
  const tasks = snapshot.cursorTasks;
  if (tasks.length === 0) {
    lines.push({ text: 'No tasks', tone: 'dim' });
  } else {
    const rows = Math.max(1, maxLines - 1 - legend.length);
    const { start, end } = taskWindow(tasks.length, snapshot.calendar.selectedTaskIndex, rows);
    for (const task of tasks.slice(start, end)) {
      let tone: Tone = colorsDisabled ? 'plain' : (colors.get(task.subcalendarId) ?? 'white');
      if (snapshot.selectedTask?.id === task.id) tone = 'inverse';
      lines.push({ text: padToWidth(taskLabel(task), width), tone });
    }
    const hidden = tasks.length - (end - start);
    if (hidden > 0) lines.push({ text: `+${hidden} more`, tone: 'dim' });
  }
  lines.push(...legend);

  if (lines.length <= maxLines) return lines;
  const kept = lines.slice(0, Math.max(0, maxLines - 1));
  return [...kept, { text: `+${lines.length - kept.length} more`, tone: 'dim' }];
}

function renderSidePanel(term: Term, snapshot: ViewSnapshot, layout: FrameLayout, options: RenderOptions): void {
  if (layout.sideWidth === 0) return;
  const maxLines = layout.footerTop - layout.gridTop;
  composeSidePanel(snapshot, layout.sideWidth, maxLines, options.colorsDisabled).forEach((line, i) => {
    const y = layout.gridTop + i;
    term.moveTo(layout.sideLeft, y);
    term.styleReset();
    term(' '.repeat(layout.sideWidth));
    term.moveTo(layout.sideLeft, y);
    paintLine(term, line);
  });
}

function renderFooter(term: Term, snapshot: ViewSnapshot, layout: FrameLayout, options: RenderOptions): void {
  const statusY = layout.footerTop;
  const inputY = layout.footerTop + 1;

  term.moveTo(1, statusY);
  term.styleReset();
  term.eraseLineAfter();
  const mode = ` ${MODE_LABELS[snapshot.mode]} `;
  if (options.colorsDisabled) term(mode);
  else term.inverse(mode);
  const active = snapshot.activeSubcalendar ? `  [${snapshot.activeSubcalendar.name}]` : '  [no subcalendar]';
  term(active);
  if (snapshot.pending) term.dim(`  ${snapshot.pending}`);
  term.dim(`  ${options.dataFile}`);

  term.moveTo(1, inputY);
  term.styleReset();
  term.eraseLineAfter();

  if (snapshot.input) {
    const prefix = snapshot.mode === 'commandLine' ? ':' : 'Task: ';
    term(prefix + snapshot.input.value);
    term.moveTo(inputCursorColumn(terminalKit.stringWidth(prefix), snapshot.input, terminalKit.stringWidth), inputY);
    setCursorVisible(term, true);
    return;
  }

  setCursorVisible(term, false);
  if (snapshot.message) {
    const text = truncateToWidth(snapshot.message.text, term.width);
    if (snapshot.message.level === 'error' && !options.colorsDisabled) term.red(text);
    else term(text);
  }
}

/**
 * Draw one full frame from a snapshot. Never reads anything but the snapshot.
 */
export function renderFrame(term: Term, snapshot: ViewSnapshot, options: RenderOptions): void {
  const layout = computeLayout(term.width, term.height, Math.max(1, snapshot.grid.length));
  setCursorVisible(term, false);
  term.styleReset();
  term.clear();
  renderHeader(term, snapshot, layout, options);
  renderGrid(term, snapshot, layout, options);
  renderSidePanel(term, snapshot, layout, options);
  renderFooter(term, snapshot, layout, options);
  term.styleReset();
}
