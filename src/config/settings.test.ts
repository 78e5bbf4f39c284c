import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { loadEnvSettings, loadSettings } from './settings.js';

describe('loadSettings', () => {
  it('applies defaults', () => {
    expect(loadSettings({})).toEqual({
      exportPath: 'partial_export_event.json',
      outputDir: 'output',
      homeCountries: ['', 'DE', 'Germany', 'Deutschland'],
      tracingMode: 'disabled',
    });
  });

  it('reads the environment', () => {
    expect(
      loadSettings({
        EVENT_EXPORT_PATH: 'data/export.json',
        EVENT_OUTPUT_DIR: 'build',
        HOME_COUNTRIES: 'AT, Austria,',
        TRACING_MODE: 'console',
      })
    ).toEqual({
      exportPath: 'data/export.json',
      outputDir: 'build',
      homeCountries: ['', 'AT', 'Austria'],
      tracingMode: 'console',
    });
  });

  it('enables console tracing in development', () => {
    expect(loadSettings({ NODE_ENV: 'development' }).tracingMode).toBe('console');
  });

  it('rejects unknown tracing modes', () => {
    expect(() => loadSettings({ TRACING_MODE: 'remote' })).toThrow(/^Invalid settings: TRACING_MODE: /);
  });
});

describe('loadEnvSettings', () => {
  const keys = ['EVENT_OUTPUT_DIR', 'HOME_COUNTRIES'] as const;
  const saved = new Map(keys.map((key) => [key, process.env[key]]));
  let directory: string | null = null;

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    if (directory) fs.rmSync(directory, { recursive: true, force: true });
    directory = null;
  });

  it('reads variables from an env file', () => {
    for (const key of keys) delete process.env[key];
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'event-graph-env-'));
    const envPath = path.join(directory, '.env');
    fs.writeFileSync(envPath, 'EVENT_OUTPUT_DIR=from-file\nHOME_COUNTRIES=CH\n');

    const settings = loadEnvSettings(envPath);
    expect(settings.outputDir).toBe('from-file');
    expect(settings.homeCountries).toEqual(['', 'CH']);
  });

  it('keeps variables already set in the environment', () => {
    process.env['EVENT_OUTPUT_DIR'] = 'from-env';
    delete process.env['HOME_COUNTRIES'];
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'event-graph-env-'));
    const envPath = path.join(directory, '.env');
    fs.writeFileSync(envPath, 'EVENT_OUTPUT_DIR=from-file\n');

    expect(loadEnvSettings(envPath).outputDir).toBe('from-env');
  });
});
