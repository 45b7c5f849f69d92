import type { Action, Mode, Motion } from './actions.js';
import { describeKey, isDigitKey, isSpaceKeyName } from './keys.js';
import { isTextInputKey } from './text-input.js';

export type GrammarResult =
  | { kind: 'resolved'; action: Action }
  | { kind: 'pending'; pending: string }
  | { kind: 'invalid'; reason: string };

/** Counts above this are clamped; they only ever multiply a motion. */
export const MAX_COUNT = 99_999;

interface Count {
  /** Parsed count, or null when none was typed. */
  value: number | null;
  digits: string;
}

type Binding = (count: Count) => Action;

const motion =
  (m: Motion): Binding =>
  (count) => ({ type: 'moveCursor', motion: m, steps: count.value ?? 1 });

const fixed =
  (action: Action): Binding =>
  () =>
    action;

/**
 * Normal-mode bindings. Shared prefixes: `g` (gg, g0, g$), `d` (dd), `c` (cc)
 * and `Z` (ZZ, ZQ). None of the prefixes is itself bound, so the table is
 * prefix-free and a sequence resolves as soon as it matches.
 */
const NORMAL_BINDINGS: Record<string, Binding> = {
  h: motion('left'),
  LEFT: motion('left'),
  l: motion('right'),
  RIGHT: motion('right'),
  k: motion('up'),
  UP: motion('up'),
  j: motion('down'),
  DOWN: motion('down'),
  '0': motion('monthStart'),
  $: motion('monthEnd'),
  g0: motion('weekStart'),
  g$: motion('weekEnd'),
  '}': motion('nextMonth'),
  PAGE_DOWN: motion('nextMonth'),
  '{': motion('prevMonth'),
  PAGE_UP: motion('prevMonth'),
  ']': motion('nextSubcalendar'),
  '[': motion('prevSubcalendar'),
  J: motion('nextTask'),
  K: motion('prevTask'),
  gg: (count) => ({ type: 'goto', digits: count.value === null ? null : count.digits }),
  i: fixed({ type: 'enterInsert', target: 'newTask' }),
  cc: fixed({ type: 'enterInsert', target: 'editTitle' }),
  ':': fixed({ type: 'enterCommandLine' }),
  x: fixed({ type: 'toggleCompleted' }),
  ' ': fixed({ type: 'toggleCompleted' }),
  dd: fixed({ type: 'deleteTask' }),
  z: fixed({ type: 'toggleVisibility' }),
  f: fixed({ type: 'cycleColorFilter' }),
  y: fixed({ type: 'yank' }),
  p: (count) => ({ type: 'paste', target: 'active', steps: count.value ?? 1 }),
  P: (count) => ({ type: 'paste', target: 'origin', steps: count.value ?? 1 }),
  u: (count) => ({ type: 'undo', steps: count.value ?? 1 }),
  U: (count) => ({ type: 'redo', steps: count.value ?? 1 }),
  CTRL_R: (count) => ({ type: 'redo', steps: count.value ?? 1 }),
  CTRL_S: fixed({ type: 'write' }),
  ZZ: fixed({ type: 'quit', write: true }),
  ZQ: fixed({ type: 'quit', write: false }),
};

const PREFIXES = new Set(['g', 'd', 'c', 'Z']);

function splitPending(pending: string): { digits: string; keys: string } {
  const match = pending.match(/^([1-9][0-9]*)?(.*)$/s);
  return { digits: match?.[1] ?? '', keys: match?.[2] ?? '' };
}

function toCount(digits: string): Count {
  if (!digits) return { value: null, digits };
  return { value: Math.min(Number(digits), MAX_COUNT), digits };
}

function resolveNormalKey(pending: string, key: string): GrammarResult {
  if (key === 'ESCAPE' || key === 'CTRL_C') {
    return { kind: 'resolved', action: { type: 'clearPending' } };
  }
  const { digits, keys } = splitPending(pending);
  const name = isSpaceKeyName(key) ? ' ' : key;

  // Count digits; a leading 0 is the month-start motion instead.
  if (keys === '' && isDigitKey(name) && (digits !== '' || name !== '0')) {
    return { kind: 'pending', pending: pending + name };
  }

  // Multi-character key names ('LEFT', 'CTRL_S') only bind on their own.
  const sequence = keys === '' ? name : keys + name;
  const binding = Object.hasOwn(NORMAL_BINDINGS, sequence) ? NORMAL_BINDINGS[sequence] : undefined;
  if (binding) {
    return { kind: 'resolved', action: binding(toCount(digits)) };
  }
  if (keys === '' && PREFIXES.has(name)) {
    return { kind: 'pending', pending: pending + name };
  }
  return { kind: 'invalid', reason: `Unknown command: ${digits}${keys}${describeKey(name)}` };
}

function resolveTextKey(mode: Mode, text: string, key: string): GrammarResult {
  if (key === 'ENTER' || key === 'KP_ENTER') return { kind: 'resolved', action: { type: 'commitText' } };
  if (key === 'ESCAPE' || key === 'CTRL_C') return { kind: 'resolved', action: { type: 'cancelText' } };
  if (mode === 'commandLine' && key === 'BACKSPACE' && text === '') {
    return { kind: 'resolved', action: { type: 'cancelText' } };
  }
  if (!isTextInputKey(key)) {
    return { kind: 'invalid', reason: `Key not allowed here: ${describeKey(key)}` };
  }
  return { kind: 'resolved', action: { type: 'editText', key } };
}

/**
 * Resolve one keystroke. In normal mode `pending` is the count and keys typed
 * so far (e.g. "12g"); in insert and command-line mode it is the text buffer.
 */
export function resolveKey(mode: Mode, pending: string, key: string): GrammarResult {
  switch (mode) {
    case 'normal':
      return resolveNormalKey(pending, key);
    case 'insert':
    case 'commandLine':
      return resolveTextKey(mode, pending, key);
  }
}
