import { parseIsoDate } from '../calendar/date.js';
import { MalformedCommandLineError } from '../model/errors.js';
import { COLORS, ColorSchema, type Color } from '../schema/index.js';
import type { LineCommand, TaskField } from './actions.js';

interface CommandSpec {
  names: readonly string[];
  usage: string;
  summary: string;
  parse: (args: string[], rest: string) => LineCommand;
}

/**
 * Split on whitespace, keeping double-quoted strings together. Inside quotes
 * `\"` and `\\` are escapes.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quoted = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i] ?? '';
    if (quoted) {
      if (ch === '\\' && i + 1 < input.length) {
        current += input[i + 1] ?? '';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
      inToken = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = '';
      inToken = false;
      continue;
    }
    current += ch;
    inToken = true;
  }

  if (quoted) {
    throw new MalformedCommandLineError('Unterminated quote');
  }
  if (inToken) tokens.push(current);
  return tokens;
}

/** Free text argument: the remainder of the line, unquoted if fully quoted. */
function freeText(rest: string): string {
  const trimmed = rest.trim();
  if (/^"(?:[^"\\]|\\.)*"$/.test(trimmed)) {
    return tokenize(trimmed)[0] ?? '';
  }
  return trimmed;
}

function parseColor(value: string): Color {
  const parsed = ColorSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new MalformedCommandLineError(`Unknown color '${value}' (expected one of: ${COLORS.join(', ')})`);
  }
  return parsed.data;
}

function parseBoolean(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      throw new MalformedCommandLineError(`Expected true or false, got '${value}'`);
  }
}

function usageError(spec: CommandSpec): MalformedCommandLineError {
  return new MalformedCommandLineError(`Usage: ${spec.usage}`);
}

function parseTaskField(spec: CommandSpec, args: string[], rest: string): TaskField {
  const [field, value] = args;
  if (!field || value === undefined) throw usageError(spec);
  const afterField = rest.trim().slice(field.length);

  switch (field) {
    case 'title': {
      const title = freeText(afterField);
      if (!title) throw usageError(spec);
      return { field: 'title', value: title };
    }
    case 'date': {
      const date = parseIsoDate(value);
      if (!date) throw new MalformedCommandLineError(`Invalid date '${value}' (expected YYYY-MM-DD)`);
      return { field: 'date', value: date };
    }
    case 'subcalendar':
      return { field: 'subcalendar', value: freeText(afterField) };
    case 'completed':
      return { field: 'completed', value: parseBoolean(value) };
    default:
      throw new MalformedCommandLineError(`Unknown task field '${field}' (expected title, date, subcalendar, completed)`);
  }
}

function exactly(spec: CommandSpec, args: string[], count: number): string[] {
  if (args.length !== count) throw usageError(spec);
  return args;
}

export const COMMANDS: readonly CommandSpec[] = [
  {
    names: ['write', 'w'],
    usage: 'write [path]',
    summary: 'save now, optionally to another file',
    parse(args) {
      if (args.length > 1) throw usageError(this);
      return { type: 'write', path: args[0] ?? null };
    },
  },
  {
    names: ['quit', 'q', 'quit!', 'q!'],
    usage: 'quit',
    summary: 'leave the calendar',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'quit' };
    },
  },
  {
    names: ['wq', 'x', 'writequit'],
    usage: 'wq',
    summary: 'save, then quit',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'writeQuit' };
    },
  },
  {
    names: ['new-subcalendar', 'newcal'],
    usage: 'new-subcalendar <name> [color]',
    summary: 'create a subcalendar',
    parse(args) {
      const [name, color] = args;
      if (!name || args.length > 2) throw usageError(this);
      return { type: 'createSubcalendar', name, color: color ? parseColor(color) : null };
    },
  },
  {
    names: ['rename-subcalendar', 'renamecal'],
    usage: 'rename-subcalendar <name> <new-name>',
    summary: 'rename a subcalendar',
    parse(args) {
      const [name = '', newName = ''] = exactly(this, args, 2);
      return { type: 'renameSubcalendar', name, newName };
    },
  },
  {
    names: ['delete-subcalendar', 'delcal'],
    usage: 'delete-subcalendar <name>',
    summary: 'delete a subcalendar and all of its tasks',
    parse(args) {
      const [name = ''] = exactly(this, args, 1);
      return { type: 'deleteSubcalendar', name };
    },
  },
  {
    names: ['color'],
    usage: 'color <name> <color>',
    summary: 'change a subcalendar color',
    parse(args) {
      const [name = '', color = ''] = exactly(this, args, 2);
      return { type: 'setSubcalendarColor', name, color: parseColor(color) };
    },
  },
  {
    names: ['hide'],
    usage: 'hide <name>',
    summary: 'hide a subcalendar',
    parse(args) {
      const [name = ''] = exactly(this, args, 1);
      return { type: 'setSubcalendarVisibility', name, visible: false };
    },
  },
  {
    names: ['show'],
    usage: 'show <name>',
    summary: 'show a hidden subcalendar',
    parse(args) {
      const [name = ''] = exactly(this, args, 1);
      return { type: 'setSubcalendarVisibility', name, visible: true };
    },
  },
  {
    names: ['use'],
    usage: 'use <name>',
    summary: 'make a subcalendar the target for new tasks',
    parse(args) {
      const [name = ''] = exactly(this, args, 1);
      return { type: 'useSubcalendar', name };
    },
  },
  {
    names: ['task', 'newtask'],
    usage: 'task <title>',
    summary: 'add a task on the cursor date',
    parse(_args, rest) {
      const title = freeText(rest);
      if (!title) throw usageError(this);
      return { type: 'createTask', title };
    },
  },
  {
    names: ['delete'],
    usage: 'delete',
    summary: 'delete the task at the cursor',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'deleteTask' };
    },
  },
  {
    names: ['complete'],
    usage: 'complete',
    summary: 'toggle the task at the cursor',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'toggleCompleted' };
    },
  },
  {
    names: ['set'],
    usage: 'set <title|date|subcalendar|completed> <value>',
    summary: 'edit a field of the task at the cursor',
    parse(args, rest) {
      return { type: 'editTask', edit: parseTaskField(this, args, rest) };
    },
  },
  {
    names: ['goto'],
    usage: 'goto <YYYY-MM-DD|today>',
    summary: 'move the cursor to a date',
    parse(args) {
      const [target = ''] = exactly(this, args, 1);
      if (target === 'today') return { type: 'goto', date: 'today' };
      const date = parseIsoDate(target);
      if (!date) throw new MalformedCommandLineError(`Invalid date '${target}' (expected YYYY-MM-DD)`);
      return { type: 'goto', date };
    },
  },
  {
    names: ['yank'],
    usage: 'yank',
    summary: 'copy the task at the cursor',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'yank' };
    },
  },
  {
    names: ['paste'],
    usage: 'paste [origin]',
    summary: 'paste the copied task on the cursor date',
    parse(args) {
      if (args.length > 1) throw usageError(this);
      const [target] = args;
      if (target === undefined) return { type: 'paste', target: 'active' };
      if (target === 'origin') return { type: 'paste', target: 'origin' };
      throw usageError(this);
    },
  },
  {
    names: ['undo', 'u'],
    usage: 'undo',
    summary: 'undo the last change',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'undo' };
    },
  },
  {
    names: ['redo', 'red'],
    usage: 'redo',
    summary: 'redo the last undone change',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'redo' };
    },
  },
  {
    names: ['month'],
    usage: 'month',
    summary: 'show the whole month',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'setView', view: 'month' };
    },
  },
  {
    names: ['week'],
    usage: 'week',
    summary: 'show the cursor week only',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'setView', view: 'week' };
    },
  },
  {
    names: ['help', 'h'],
    usage: 'help',
    summary: 'list commands',
    parse(args) {
      exactly(this, args, 0);
      return { type: 'help' };
    },
  },
];

const COMMAND_BY_NAME = new Map<string, CommandSpec>(
  COMMANDS.flatMap((spec) => spec.names.map((name): [string, CommandSpec] => [name, spec]))
);

/**
 * Parse a committed command line (without the leading ':').
 * Throws MalformedCommandLineError for unknown commands or bad arguments.
 */
export function parseCommandLine(line: string): LineCommand {
  const trimmed = line.trim();
  const match = trimmed.match(/^(\S+)\s*(.*)$/s);
  if (!match) {
    throw new MalformedCommandLineError('Empty command');
  }
  const [, name = '', rest = ''] = match;
  const spec = COMMAND_BY_NAME.get(name);
  if (!spec) {
    throw new MalformedCommandLineError(`Unknown command: ${name}`);
  }
  return spec.parse(tokenize(rest), rest);
}

export function commandHelpLines(): string[] {
  return COMMANDS.map((spec) => `${spec.usage} — ${spec.summary}`);
}
