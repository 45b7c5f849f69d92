import { describe, expect, it } from 'vitest';
import { MAX_COUNT, resolveKey, type GrammarResult } from '../../src/grammar/command-grammar.js';

/** Feed keys from an empty pending buffer, threading pending state along. */
function feedNormal(keys: string[]): GrammarResult {
  let pending = '';
  let result: GrammarResult = { kind: 'pending', pending };
  for (const key of keys) {
    result = resolveKey('normal', pending, key);
    pending = result.kind === 'pending' ? result.pending : '';
  }
  return result;
}

describe('normal mode grammar', () => {
  it('resolves single-key motions with a step of one', () => {
    expect(feedNormal(['l'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'right', steps: 1 },
    });
    expect(feedNormal(['UP'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'up', steps: 1 },
    });
  });

  it('applies a count to motions', () => {
    expect(resolveKey('normal', '', '1')).toEqual({ kind: 'pending', pending: '1' });
    expect(resolveKey('normal', '1', '2')).toEqual({ kind: 'pending', pending: '12' });
    expect(feedNormal(['1', '2', 'j'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'down', steps: 12 },
    });
  });

  it('treats a leading zero as month start but keeps zeros inside a count', () => {
    expect(feedNormal(['0'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'monthStart', steps: 1 },
    });
    expect(feedNormal(['1', '0', 'l'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'right', steps: 10 },
    });
  });

  it('clamps very large counts', () => {
    expect(feedNormal(['9', '9', '9', '9', '9', '9', 'l'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'right', steps: MAX_COUNT },
    });
  });

  it('waits on prefixes and resolves two-key commands', () => {
    expect(resolveKey('normal', '', 'g')).toEqual({ kind: 'pending', pending: 'g' });
    expect(feedNormal(['g', '0'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'weekStart', steps: 1 },
    });
    expect(feedNormal(['d', 'd'])).toEqual({ kind: 'resolved', action: { type: 'deleteTask' } });
    expect(feedNormal(['c', 'c'])).toEqual({ kind: 'resolved', action: { type: 'enterInsert', target: 'editTitle' } });
    expect(feedNormal(['Z', 'Z'])).toEqual({ kind: 'resolved', action: { type: 'quit', write: true } });
    expect(feedNormal(['Z', 'Q'])).toEqual({ kind: 'resolved', action: { type: 'quit', write: false } });
  });

  it('passes the typed digits to gg', () => {
    expect(feedNormal(['g', 'g'])).toEqual({ kind: 'resolved', action: { type: 'goto', digits: null } });
    expect(feedNormal(['1', '0', '3', '1', 'g', 'g'])).toEqual({
      kind: 'resolved',
      action: { type: 'goto', digits: '1031' },
    });
  });

  it('does not count digits after a prefix', () => {
    expect(feedNormal(['g', '5'])).toEqual({ kind: 'invalid', reason: 'Unknown command: g5' });
  });

  it('reports unknown sequences with the count and keys typed', () => {
    expect(feedNormal(['3', 'd', 'x'])).toEqual({ kind: 'invalid', reason: 'Unknown command: 3dx' });
    expect(feedNormal(['q'])).toEqual({ kind: 'invalid', reason: 'Unknown command: q' });
    expect(feedNormal(['F1'])).toEqual({ kind: 'invalid', reason: 'Unknown command: <F1>' });
  });

  it('clears a pending prefix on escape', () => {
    expect(resolveKey('normal', '2g', 'ESCAPE')).toEqual({ kind: 'resolved', action: { type: 'clearPending' } });
  });

  it('maps space and its key name to toggle completed', () => {
    const toggle = { kind: 'resolved', action: { type: 'toggleCompleted' } };
    expect(feedNormal(['SPACE'])).toEqual(toggle);
    expect(feedNormal([' '])).toEqual(toggle);
    expect(feedNormal(['x'])).toEqual(toggle);
  });

  it('binds the remaining single keys', () => {
    expect(feedNormal(['i'])).toEqual({ kind: 'resolved', action: { type: 'enterInsert', target: 'newTask' } });
    expect(feedNormal([':'])).toEqual({ kind: 'resolved', action: { type: 'enterCommandLine' } });
    expect(feedNormal(['z'])).toEqual({ kind: 'resolved', action: { type: 'toggleVisibility' } });
    expect(feedNormal(['f'])).toEqual({ kind: 'resolved', action: { type: 'cycleColorFilter' } });
    expect(feedNormal(['CTRL_S'])).toEqual({ kind: 'resolved', action: { type: 'write' } });
    expect(feedNormal([']'])).toEqual({
      kind: 'resolved',
      action: { type: 'moveCursor', motion: 'nextSubcalendar', steps: 1 },
    });
  });

  it('binds yank, paste, undo and redo with counts', () => {
    expect(feedNormal(['y'])).toEqual({ kind: 'resolved', action: { type: 'yank' } });
    expect(feedNormal(['p'])).toEqual({ kind: 'resolved', action: { type: 'paste', target: 'active', steps: 1 } });
    expect(feedNormal(['3', 'P'])).toEqual({
      kind: 'resolved',
      action: { type: 'paste', target: 'origin', steps: 3 },
    });
    expect(feedNormal(['2', 'u'])).toEqual({ kind: 'resolved', action: { type: 'undo', steps: 2 } });
    expect(feedNormal(['U'])).toEqual({ kind: 'resolved', action: { type: 'redo', steps: 1 } });
    expect(feedNormal(['4', 'CTRL_R'])).toEqual({ kind: 'resolved', action: { type: 'redo', steps: 4 } });
  });

  it('ignores inherited object keys', () => {
    expect(feedNormal(['toString'])).toEqual({ kind: 'invalid', reason: 'Unknown command: <toString>' });
  });
});

describe('text mode grammar', () => {
  it('commits and cancels', () => {
    expect(resolveKey('insert', 'abc', 'ENTER')).toEqual({ kind: 'resolved', action: { type: 'commitText' } });
    expect(resolveKey('insert', 'abc', 'ESCAPE')).toEqual({ kind: 'resolved', action: { type: 'cancelText' } });
  });

  it('leaves the command line on backspace when it is empty', () => {
    expect(resolveKey('commandLine', '', 'BACKSPACE')).toEqual({ kind: 'resolved', action: { type: 'cancelText' } });
    expect(resolveKey('commandLine', 'w', 'BACKSPACE')).toEqual({
      kind: 'resolved',
      action: { type: 'editText', key: 'BACKSPACE' },
    });
    expect(resolveKey('insert', '', 'BACKSPACE')).toEqual({
      kind: 'resolved',
      action: { type: 'editText', key: 'BACKSPACE' },
    });
  });

  it('passes editing keys through and rejects others', () => {
    expect(resolveKey('insert', '', 'a')).toEqual({ kind: 'resolved', action: { type: 'editText', key: 'a' } });
    expect(resolveKey('insert', '', 'CTRL_W')).toEqual({
      kind: 'resolved',
      action: { type: 'editText', key: 'CTRL_W' },
    });
    expect(resolveKey('insert', '', 'F5')).toEqual({ kind: 'invalid', reason: 'Key not allowed here: <F5>' });
  });
});
