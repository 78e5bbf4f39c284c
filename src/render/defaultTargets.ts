import { join } from 'path';
import type { Event } from '../graph/event.js';
import { formatAddress } from '../utils/address.js';
import { common } from '../utils/names.js';
import { generatePartJobnames, getActiveRegistrations } from '../utils/queries.js';
import { TraceAttributes, setSpanAttributes, withSpanSync } from '../utils/tracing.js';
import type { RenderTask, TargetContext, TargetRegistry } from './targets.js';

/**
 * One letter per participant. `match` is a regular expression tested against the common name.
 */
export function tnletters(event: Event, context: TargetContext): RenderTask[] {
  const pattern = context.match !== null ? new RegExp(context.match) : null;
  const outputDir = join(context.outputDir, 'tnletters');

  return getActiveRegistrations(event)
    .filter((registration) => pattern === null || pattern.test(common(registration.name)))
    .map((registration) => ({
      templateName: 'tnletter.tex',
      jobName: `tnletter_${registration.id}`,
      args: {
        registrationId: registration.id,
        address: formatAddress(registration.address, context.homeCountries),
      },
      doubleTex: false,
      outputDir,
    }));
}

/**
 * Nametags of all participants and guests, one document per part
 */
export function nametags(event: Event): RenderTask[] {
  const jobnames = generatePartJobnames(event);

  return event.parts.map((part) => ({
    templateName: 'nametags.tex',
    jobName: `nametags_${jobnames.get(part.id) ?? part.id}`,
    args: {
      partId: part.id,
      registrationIds: getActiveRegistrations(event, { parts: [part], includeGuests: true }).map(
        (registration) => registration.id
      ),
    },
    doubleTex: true,
  }));
}

/**
 * Run a registered target inside a span
 */
export function runTarget(
  registry: TargetRegistry,
  name: string,
  event: Event,
  context: TargetContext
): RenderTask[] {
  const target = registry.get(name);
  if (!target) {
    throw new Error(`Unknown render target '${name}'`);
  }
  return withSpanSync('render.target', { [TraceAttributes.TARGET_NAME]: name }, () => {
    const tasks = target.run(event, context);
    setSpanAttributes({ [TraceAttributes.TASK_COUNT]: tasks.length });
    return tasks;
  });
}

export function registerDefaultTargets(registry: TargetRegistry): TargetRegistry {
  return registry
    .register('tnletters', 'Letters to all participants', tnletters)
    .register('nametags', 'Nametags of all participants and guests, per part', nametags);
}
