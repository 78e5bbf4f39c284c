/**
 * Environment settings
 *
 * Environment Variables:
 * - EVENT_EXPORT_PATH: partial export read by the CLI (default: partial_export_event.json)
 * - EVENT_OUTPUT_DIR: output directory handed to render targets (default: output)
 * - HOME_COUNTRIES: comma-separated country spellings left out of address blocks
 * - TRACING_MODE: 'console' | 'disabled' (default: 'console' in development, 'disabled' otherwise)
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_HOME_COUNTRIES } from '../constants/export.js';

const TracingModeSchema = z.enum(['console', 'disabled']);

export type TracingMode = z.infer<typeof TracingModeSchema>;

const SettingsSchema = z.object({
  EVENT_EXPORT_PATH: z.string().min(1).default('partial_export_event.json'),
  EVENT_OUTPUT_DIR: z.string().min(1).default('output'),
  HOME_COUNTRIES: z.string().optional(),
  TRACING_MODE: TracingModeSchema.optional(),
  NODE_ENV: z.string().optional(),
});

export interface Settings {
  exportPath: string;
  outputDir: string;
  homeCountries: string[];
  tracingMode: TracingMode;
}

/**
 * Read settings from an environment, `process.env` by default
 *
 * @throws Error listing the invalid variables
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid settings: ${issues}`);
  }

  const values = result.data;
  // Empty string stays a home country: addresses without country are domestic
  const homeCountries =
    values.HOME_COUNTRIES !== undefined
      ? ['', ...values.HOME_COUNTRIES.split(',').map((country) => country.trim()).filter((country) => country !== '')]
      : [...DEFAULT_HOME_COUNTRIES];

  return {
    exportPath: values.EVENT_EXPORT_PATH,
    outputDir: values.EVENT_OUTPUT_DIR,
    homeCountries,
    tracingMode: values.TRACING_MODE ?? (values.NODE_ENV === 'development' ? 'console' : 'disabled'),
  };
}

/**
 * Load `.env` into `process.env`, then read the settings
 */
export function loadEnvSettings(path?: string): Settings {
  dotenv.config(path !== undefined ? { path } : undefined);
  return loadSettings(process.env);
}
