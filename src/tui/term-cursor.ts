import type terminalKit from 'terminal-kit';
import type { TextInputState } from '../grammar/text-input.js';
import { toCodeUnitCursor } from '../grammar/text-input.js';

export type Term = typeof terminalKit.terminal;

export function setCursorVisible(term: Term, visible: boolean): void {
  term.hideCursor(!visible);
}

/** Column (1-based) of the text cursor after `prefix` is drawn at column 1. */
export function inputCursorColumn(prefixWidth: number, input: TextInputState, stringWidth: (s: string) => number): number {
  const beforeCursor = input.value.slice(0, toCodeUnitCursor(input.value, input.cursor));
  return 1 + prefixWidth + stringWidth(beforeCursor);
}
