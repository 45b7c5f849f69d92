import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ColorSchema } from '../schema/index.js';
import { getDefaultDataPath } from '../storage/gateway.js';

export const ConfigSchema = z.object({
  dataFile: z.string().optional(),
  weekStart: z.enum(['sunday', 'monday']).default('sunday'),
  colors: z
    .object({
      disable: z.boolean().optional(),
    })
    .optional(),
  defaultSubcalendar: z
    .object({
      name: z.string().min(1).default('Default'),
      color: ColorSchema.default('blue'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  const configHome =
    process.env.XDG_CONFIG_HOME || path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config');
  return path.join(configHome, 'mcal', 'config.json');
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return ConfigSchema.parse({});
  }

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    if (error instanceof z.ZodError) {
      const issue = error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new Error(`Invalid config file ${pathToLoad}: ${where}${issue?.message ?? 'invalid value'}`);
    }
    throw error;
  }
}

function expandHome(filePath: string): string {
  if (filePath === '~' || filePath.startsWith('~/')) {
    return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', filePath.slice(1));
  }
  return filePath;
}

/** `--data` wins over the config file, which wins over the per-user default. */
export function resolveDataFile(config: Config, dataFlag?: string): string {
  return path.resolve(expandHome(dataFlag ?? config.dataFile ?? getDefaultDataPath()));
}
