/**
 * mcal — start the interactive calendar session
 */

import { loadConfig, resolveDataFile, type Config } from '../config/loader.js';
import { ModalInterpreter } from '../interpreter/interpreter.js';
import { FileStoreGateway } from '../storage/gateway.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { CliUsageError } from './errors.js';
import { extractFlags } from './flag-utils.js';

export interface RunOptions {
  dataFile: string;
  config: Config;
}

export function parseRunFlags(args: string[]): RunOptions {
  const valueFlags = extractFlags(args, ['--config', '-c', '--data', '-d']);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0]}'.`);
  }

  const configPath = valueFlags['--config'] ?? valueFlags['-c'];
  const config = loadConfig(configPath);
  const dataFile = resolveDataFile(config, valueFlags['--data'] ?? valueFlags['-d']);
  return { dataFile, config };
}

export function openInterpreter(options: RunOptions): { interpreter: ModalInterpreter; created: boolean } {
  const { config, dataFile } = options;
  const gateway = new FileStoreGateway(dataFile, config.defaultSubcalendar);
  const loaded = gateway.load();
  const interpreter = new ModalInterpreter({
    store: loaded.store,
    gateway,
    weekStart: config.weekStart,
  });
  return { interpreter, created: loaded.kind === 'created' };
}

export async function handleRunCommand(args: string[]): Promise<void> {
  const options = parseRunFlags(args);
  const { interpreter, created } = openInterpreter(options);
  if (created) {
    console.error(`No calendar at ${options.dataFile}; starting a new one.`);
  }

  await runInteractiveTui({
    interpreter,
    dataFile: options.dataFile,
    colorsDisabled: Boolean(options.config.colors?.disable),
  });
}
