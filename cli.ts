#!/usr/bin/env tsx

/**
 * Inspect a partial export
 *
 * Usage: tsx cli.ts [--input <file>] [--match <regex>] [target ...]
 *
 * Without targets prints a summary of the loaded event; with targets prints their render tasks as
 * JSON on stdout.
 */

import { loadEnvSettings } from './src/config/settings.js';
import { initTracing } from './src/config/tracing.js';
import { ExportError } from './src/errors.js';
import { inspect } from './src/inspect.js';

try {
  const settings = loadEnvSettings();
  initTracing(settings.tracingMode);
  process.exitCode = inspect(process.argv.slice(2), settings);
} catch (error) {
  if (error instanceof ExportError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('❌ Unexpected error:', error);
  }
  process.exitCode = 1;
}
