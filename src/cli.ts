#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleRunCommand } from './cli/run-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';
import { PersistenceCorruptError } from './model/errors.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const flags = extractBooleanFlags(args, ['--help', '-h', '--version', '-v']);
  if (flags.has('--help') || flags.has('-h')) {
    printHelp();
    return;
  }
  if (flags.has('--version') || flags.has('-v')) {
    printVersion(VERSION);
    return;
  }

  try {
    await handleRunCommand(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof PersistenceCorruptError) {
      console.error(`Error: calendar store is unreadable: ${error.message}`);
      console.error('The file was left untouched. Fix or move it, or start with --data <other path>.');
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  }
);
