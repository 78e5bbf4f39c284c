export * from './constants/export.js';
export * from './errors.js';
export type * from './types/graph.js';
export { Event, type EventContents, type ResolvedAttendee, type ResolvedInhabitant } from './graph/event.js';
export { buildEvent, loadEvent, loadInputFile, parseExportDocument } from './loader/index.js';
export { checkExportVersion } from './loader/versionGate.js';
export { calculateAge, coerceFieldValue, parseDate, parseDateTime } from './loader/parsers.js';
export * from './utils/status.js';
export * from './utils/sorting.js';
export * from './utils/queries.js';
export * as names from './utils/names.js';
export { formatAddress, isHomeCountry } from './utils/address.js';
export {
  TargetRegistry,
  type RenderTarget,
  type RenderTask,
  type TargetContext,
  type TargetFunction,
} from './render/targets.js';
export { nametags, registerDefaultTargets, runTarget, tnletters } from './render/defaultTargets.js';
export { loadEnvSettings, loadSettings, type Settings, type TracingMode } from './config/settings.js';
export { initTracing } from './config/tracing.js';
