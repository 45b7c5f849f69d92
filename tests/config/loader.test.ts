import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getGlobalConfigPath, loadConfig, resolveDataFile } from '../../src/config/loader.js';

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcal-config-'));
  vi.stubEnv('HOME', tempDir);
  vi.stubEnv('XDG_CONFIG_HOME', '');
  vi.stubEnv('XDG_DATA_HOME', '');
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeGlobalConfig(content: string): string {
  const dir = path.join(tempDir, '.config', 'mcal');
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, 'config.json');
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

describe('config loader', () => {
  it('uses defaults when no config file exists', () => {
    expect(loadConfig()).toEqual({
      weekStart: 'sunday',
      defaultSubcalendar: { name: 'Default', color: 'blue' },
    });
    expect(resolveDataFile(loadConfig())).toBe(path.join(tempDir, '.local', 'share', 'mcal', 'calendar.json'));
  });

  it('reads the per-user config file', () => {
    writeGlobalConfig(
      JSON.stringify({
        weekStart: 'monday',
        dataFile: '~/calendars/main.json',
        colors: { disable: true },
        defaultSubcalendar: { name: 'Inbox' },
      })
    );
    const config = loadConfig();
    expect(config.weekStart).toBe('monday');
    expect(config.colors?.disable).toBe(true);
    expect(config.defaultSubcalendar).toEqual({ name: 'Inbox', color: 'blue' });
    expect(resolveDataFile(config)).toBe(path.join(tempDir, 'calendars', 'main.json'));
  });

  it('lets the --data flag override the config file', () => {
    writeGlobalConfig(JSON.stringify({ dataFile: '/ignored/calendar.json' }));
    const override = path.join(tempDir, 'other.json');
    expect(resolveDataFile(loadConfig(), override)).toBe(override);
  });

  it('honors XDG_CONFIG_HOME', () => {
    vi.stubEnv('XDG_CONFIG_HOME', path.join(tempDir, 'xdg'));
    expect(getGlobalConfigPath()).toBe(path.join(tempDir, 'xdg', 'mcal', 'config.json'));
  });

  it('fails on an explicit path that does not exist', () => {
    const missing = path.join(tempDir, 'nope.json');
    expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it('reports invalid JSON', () => {
    const file = writeGlobalConfig('{ weekStart: ');
    expect(() => loadConfig()).toThrow(`Invalid JSON in config file: ${file}`);
  });

  it('names the field that fails validation', () => {
    const file = path.join(tempDir, 'custom.json');
    fs.writeFileSync(file, JSON.stringify({ weekStart: 'friday' }), 'utf-8');
    expect(() => loadConfig(file)).toThrow(`Invalid config file ${file}: weekStart: `);
  });
});
