import { commandHelpLines } from '../grammar/command-line.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const lines = [
    'mcal — modal terminal calendar',
    '',
    'Usage: mcal [options]',
    '',
    formatSection('Options', [
      ['--data, -d <path>', 'Calendar store (default ~/.local/share/mcal/calendar.json)'],
      ['--config, -c <path>', 'Config file (default ~/.config/mcal/config.json)'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Normal mode', [
      ['h j k l, arrows', 'Move by day / week (prefix a count: 3l)'],
      ['0  $', 'Start / end of month'],
      ['g0  g$', 'Start / end of week'],
      ['{  }', 'Previous / next month'],
      ['[  ]', 'Previous / next active subcalendar'],
      ['J  K', 'Select next / previous task on the day'],
      ['gg', 'Today, or a date typed as a count (1031gg, 10312026gg)'],
      ['i  cc', 'New task / edit selected task title'],
      ['x, Space', 'Toggle completed'],
      ['dd', 'Delete selected task (and copy it)'],
      ['y  p  P', 'Copy task / paste into active / into its own subcalendar'],
      ['u  U, Ctrl-R', 'Undo / redo (counts repeat)'],
      ['z', 'Hide / show active subcalendar'],
      ['f', 'Cycle color filter'],
      [':', 'Command line'],
      ['Ctrl-S', 'Write'],
      ['ZZ  ZQ', 'Write and quit / quit'],
    ]),
    '',
    'Command line:',
    ...commandHelpLines().map((line) => `  :${line}`),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${name.padEnd(maxLen)}  ${desc}`);
  return [title, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
