import { describe, expect, it } from 'vitest';
import { commandHelpLines, parseCommandLine, tokenize } from '../../src/grammar/command-line.js';
import { MalformedCommandLineError } from '../../src/model/errors.js';

describe('tokenize', () => {
  it('splits on whitespace and keeps quoted strings together', () => {
    expect(tokenize('rename-subcalendar "Day job"  Work')).toEqual(['rename-subcalendar', 'Day job', 'Work']);
    expect(tokenize('a "say \\"hi\\"" ""')).toEqual(['a', 'say "hi"', '']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => tokenize('new-subcalendar "Home')).toThrow('Unterminated quote');
  });
});

describe('parseCommandLine', () => {
  it('parses write with and without a path', () => {
    expect(parseCommandLine('w')).toEqual({ type: 'write', path: null });
    expect(parseCommandLine('write /tmp/copy.json')).toEqual({ type: 'write', path: '/tmp/copy.json' });
  });

  it('accepts quit and write-quit aliases', () => {
    expect(parseCommandLine('q')).toEqual({ type: 'quit' });
    expect(parseCommandLine('q!')).toEqual({ type: 'quit' });
    expect(parseCommandLine('wq')).toEqual({ type: 'writeQuit' });
    expect(parseCommandLine('x')).toEqual({ type: 'writeQuit' });
  });

  it('parses subcalendar commands', () => {
    expect(parseCommandLine('newcal Work RED')).toEqual({ type: 'createSubcalendar', name: 'Work', color: 'red' });
    expect(parseCommandLine('new-subcalendar "Side project"')).toEqual({
      type: 'createSubcalendar',
      name: 'Side project',
      color: null,
    });
    expect(parseCommandLine('renamecal Work Job')).toEqual({ type: 'renameSubcalendar', name: 'Work', newName: 'Job' });
    expect(parseCommandLine('delete-subcalendar Default')).toEqual({ type: 'deleteSubcalendar', name: 'Default' });
    expect(parseCommandLine('color Work cyan')).toEqual({ type: 'setSubcalendarColor', name: 'Work', color: 'cyan' });
    expect(parseCommandLine('hide Work')).toEqual({ type: 'setSubcalendarVisibility', name: 'Work', visible: false });
    expect(parseCommandLine('show Work')).toEqual({ type: 'setSubcalendarVisibility', name: 'Work', visible: true });
    expect(parseCommandLine('use Work')).toEqual({ type: 'useSubcalendar', name: 'Work' });
  });

  it('takes the rest of the line as a task title', () => {
    expect(parseCommandLine('task  Buy milk and eggs ')).toEqual({ type: 'createTask', title: 'Buy milk and eggs' });
    expect(parseCommandLine('newtask "  padded "')).toEqual({ type: 'createTask', title: '  padded ' });
  });

  it('parses task field edits', () => {
    expect(parseCommandLine('set title Call the bank')).toEqual({
      type: 'editTask',
      edit: { field: 'title', value: 'Call the bank' },
    });
    expect(parseCommandLine('set date 2026-11-02')).toEqual({
      type: 'editTask',
      edit: { field: 'date', value: { year: 2026, month: 11, day: 2 } },
    });
    expect(parseCommandLine('set subcalendar Side project')).toEqual({
      type: 'editTask',
      edit: { field: 'subcalendar', value: 'Side project' },
    });
    expect(parseCommandLine('set completed yes')).toEqual({
      type: 'editTask',
      edit: { field: 'completed', value: true },
    });
  });

  it('parses goto', () => {
    expect(parseCommandLine('goto today')).toEqual({ type: 'goto', date: 'today' });
    expect(parseCommandLine('goto 2027-02-28')).toEqual({ type: 'goto', date: { year: 2027, month: 2, day: 28 } });
  });

  it('reports malformed lines', () => {
    expect(() => parseCommandLine('   ')).toThrow('Empty command');
    expect(() => parseCommandLine('frobnicate')).toThrow('Unknown command: frobnicate');
    expect(() => parseCommandLine('color Work')).toThrow('Usage: color <name> <color>');
    expect(() => parseCommandLine('color Work purple')).toThrow(
      "Unknown color 'purple' (expected one of: blue, green, red, yellow, magenta, cyan, white)"
    );
    expect(() => parseCommandLine('goto 2026-02-30')).toThrow("Invalid date '2026-02-30' (expected YYYY-MM-DD)");
    expect(() => parseCommandLine('set completed maybe')).toThrow("Expected true or false, got 'maybe'");
    expect(() => parseCommandLine('set colour red')).toThrow(MalformedCommandLineError);
    expect(() => parseCommandLine('task   ')).toThrow('Usage: task <title>');
    expect(() => parseCommandLine('delete now')).toThrow('Usage: delete');
  });

  it('parses history, register and view commands', () => {
    expect(parseCommandLine('undo')).toEqual({ type: 'undo' });
    expect(parseCommandLine('u')).toEqual({ type: 'undo' });
    expect(parseCommandLine('red')).toEqual({ type: 'redo' });
    expect(parseCommandLine('yank')).toEqual({ type: 'yank' });
    expect(parseCommandLine('paste')).toEqual({ type: 'paste', target: 'active' });
    expect(parseCommandLine('paste origin')).toEqual({ type: 'paste', target: 'origin' });
    expect(parseCommandLine('week')).toEqual({ type: 'setView', view: 'week' });
    expect(parseCommandLine('month')).toEqual({ type: 'setView', view: 'month' });
    expect(() => parseCommandLine('paste Work')).toThrow('Usage: paste [origin]');
    expect(() => parseCommandLine('undo 2')).toThrow('Usage: undo');
  });

  it('lists every command in the help lines', () => {
    const lines = commandHelpLines();
    expect(lines).toHaveLength(22);
    expect(lines[0]).toBe('write [path] — save now, optionally to another file');
  });
});
