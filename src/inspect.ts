/**
 * Inspection command behind cli.ts
 *
 * Without targets prints a summary of the loaded event. With targets stdout carries nothing but the
 * JSON array of render tasks; progress goes to stderr.
 */

import type { Settings } from './config/settings.js';
import { loadInputFile } from './loader/index.js';
import { registerDefaultTargets, runTarget } from './render/defaultTargets.js';
import { TargetRegistry, type TargetContext } from './render/targets.js';
import { getActiveRegistrations } from './utils/queries.js';

export interface InspectArgs {
  input: string | null;
  match: string | null;
  targets: string[];
}

export function parseInspectArgs(argv: readonly string[]): InspectArgs {
  const parsed: InspectArgs = { input: null, match: null, targets: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--input' || arg === '--match') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      if (arg === '--input') parsed.input = value;
      else parsed.match = value;
      i++;
    } else if (arg !== undefined) {
      parsed.targets.push(arg);
    }
  }
  return parsed;
}

/**
 * Run the inspection
 *
 * @returns Process exit code
 * @throws ExportError if the input is not a usable export
 */
export function inspect(argv: readonly string[], settings: Settings): number {
  const args = parseInspectArgs(argv);
  const registry = registerDefaultTargets(new TargetRegistry());
  const progress = args.targets.length > 0 ? console.error : console.log;

  const unknown = args.targets.filter((name) => !registry.get(name));
  if (unknown.length > 0) {
    console.error(`Error: Unknown target(s): ${unknown.join(', ')}`);
    console.error(`Available: ${registry.list().map((target) => target.name).join(', ')}`);
    return 1;
  }

  const input = args.input ?? settings.exportPath;
  progress(`📂 Loading ${input}`);
  const event = loadInputFile(input);
  if (!event) {
    console.error('Error: No export data. Pass --input <file> or set EVENT_EXPORT_PATH.');
    return 1;
  }
  progress(`✅ Loaded '${event.title}' (export version ${event.exportVersion.join('.')})`);

  if (args.targets.length === 0) {
    console.log(`   Parts:         ${event.parts.length}`);
    console.log(`   Tracks:        ${event.tracks.length}`);
    console.log(`   Courses:       ${event.courses.length}`);
    console.log(`   Lodgements:    ${event.lodgements.length}`);
    console.log(`   Registrations: ${event.registrations.length}`);
    console.log(`   Participants:  ${getActiveRegistrations(event).length}`);
    console.log('\nTargets:');
    for (const target of registry.list()) {
      console.log(`   ${target.name.padEnd(12)} ${target.description}`);
    }
    return 0;
  }

  const context: TargetContext = {
    outputDir: settings.outputDir,
    match: args.match,
    homeCountries: settings.homeCountries,
  };
  const tasks = args.targets.flatMap((name) => {
    const targetTasks = runTarget(registry, name, event, context);
    progress(`✅ Target '${name}' produced ${targetTasks.length} task(s)`);
    return targetTasks;
  });
  console.log(JSON.stringify(tasks, null, 2));
  return 0;
}
