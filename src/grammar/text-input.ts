import { isPrintableKey, isSpaceKeyName } from './keys.js';

export interface TextInputState {
  readonly value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  readonly cursor: number;
}

type TextEdit = 'left' | 'right' | 'home' | 'end' | 'wordLeft' | 'wordRight' | 'backspace' | 'delete' | 'deleteWord' | 'killBefore' | 'killAfter';

const EDIT_KEYS: Record<string, TextEdit> = {
  LEFT: 'left',
  CTRL_B: 'left',
  RIGHT: 'right',
  CTRL_F: 'right',
  HOME: 'home',
  CTRL_A: 'home',
  END: 'end',
  CTRL_E: 'end',
  ALT_LEFT: 'wordLeft',
  CTRL_LEFT: 'wordLeft',
  ALT_B: 'wordLeft',
  ALT_RIGHT: 'wordRight',
  CTRL_RIGHT: 'wordRight',
  ALT_F: 'wordRight',
  BACKSPACE: 'backspace',
  DELETE: 'delete',
  CTRL_D: 'delete',
  CTRL_W: 'deleteWord',
  ALT_BACKSPACE: 'deleteWord',
  CTRL_U: 'killBefore',
  CTRL_K: 'killAfter',
};

function toChars(value: string): string[] {
  return Array.from(value);
}

export function toCodeUnitCursor(value: string, cursorCodepoints: number): number {
  const chars = toChars(value);
  const clamped = Math.max(0, Math.min(cursorCodepoints, chars.length));
  return chars.slice(0, clamped).join('').length;
}

function clampCursor(value: string, cursor: number): number {
  return Math.max(0, Math.min(cursor, toChars(value).length));
}

export function createTextInput(initial = ''): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

/** Whether `applyTextInputKey` does something with this key. */
export function isTextInputKey(name: string): boolean {
  return Object.hasOwn(EDIT_KEYS, name) || isSpaceKeyName(name) || isPrintableKey(name);
}

function withCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function insertAt(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const insertChars = toChars(text);
  chars.splice(state.cursor, 0, ...insertChars);
  return { value: chars.join(''), cursor: state.cursor + insertChars.length };
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return state;
  chars.splice(from, to - from);
  return { value: chars.join(''), cursor: from };
}

function wordLeftOf(chars: string[], cursor: number): number {
  let i = cursor;
  while (i > 0 && /\s/.test(chars[i - 1] ?? '')) i--;
  while (i > 0 && !/\s/.test(chars[i - 1] ?? '')) i--;
  return i;
}

function wordRightOf(chars: string[], cursor: number): number {
  let i = cursor;
  while (i < chars.length && /\s/.test(chars[i] ?? '')) i++;
  while (i < chars.length && !/\s/.test(chars[i] ?? '')) i++;
  return i;
}

/**
 * Apply a readline-style editing key. Returns null for keys that are not text
 * editing keys (submit and cancel are handled by the caller).
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputState | null {
  const current = withCursor(state, state.cursor);
  const chars = toChars(current.value);
  const edit = Object.hasOwn(EDIT_KEYS, name) ? EDIT_KEYS[name] : undefined;

  switch (edit) {
    case 'left':
      return withCursor(current, current.cursor - 1);
    case 'right':
      return withCursor(current, current.cursor + 1);
    case 'home':
      return withCursor(current, 0);
    case 'end':
      return withCursor(current, chars.length);
    case 'wordLeft':
      return withCursor(current, wordLeftOf(chars, current.cursor));
    case 'wordRight':
      return withCursor(current, wordRightOf(chars, current.cursor));
    case 'backspace':
      return deleteRange(current, current.cursor - 1, current.cursor);
    case 'delete':
      return deleteRange(current, current.cursor, current.cursor + 1);
    case 'deleteWord':
      return deleteRange(current, wordLeftOf(chars, current.cursor), current.cursor);
    case 'killBefore':
      return deleteRange(current, 0, current.cursor);
    case 'killAfter':
      return deleteRange(current, current.cursor, chars.length);
    case undefined:
      break;
  }

  if (isSpaceKeyName(name)) return insertAt(current, ' ');
  if (isPrintableKey(name)) return insertAt(current, name);
  return null;
}
