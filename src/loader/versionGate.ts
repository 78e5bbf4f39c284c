import {
  EXPORT_KIND,
  MAXIMUM_EXPORT_VERSION,
  MINIMUM_EXPORT_VERSION,
  type ExportVersion,
} from '../constants/export.js';
import { ExportFormatError, ExportVersionError, compareVersions } from '../errors.js';
import { ExportVersionTagSchema } from '../schemas/export.js';

const VERSION_KEY = 'EVENT_SCHEMA_VERSION';

/**
 * Version Gate
 *
 * Checks the format marker and schema version of a parsed export document before anything else
 * looks at it. A legacy single-integer version `n` is read as `[n, 0]`.
 *
 * @returns The normalized `[major, minor]` version
 * @throws ExportFormatError if the kind marker or the version tag is missing or malformed
 * @throws ExportVersionError if the version is outside the supported range
 */
export function checkExportVersion(
  document: unknown,
  minimum: ExportVersion = MINIMUM_EXPORT_VERSION,
  maximum: ExportVersion = MAXIMUM_EXPORT_VERSION
): ExportVersion {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new ExportFormatError('Export must be a JSON object. This tool requires a partial export.');
  }

  const kind: unknown = Reflect.get(document, 'kind');
  if (kind !== EXPORT_KIND) {
    throw new ExportFormatError(
      `Export kind is ${kind === undefined ? 'missing' : JSON.stringify(kind)}, expected "${EXPORT_KIND}". ` +
        'This tool requires a partial export.'
    );
  }

  if (!(VERSION_KEY in document)) {
    throw new ExportFormatError(`No ${VERSION_KEY} tag found. This tool requires a partial export.`);
  }
  const tag = ExportVersionTagSchema.safeParse(Reflect.get(document, VERSION_KEY));
  if (!tag.success) {
    throw new ExportFormatError(`Malformed ${VERSION_KEY} tag, expected [major, minor] or an integer`);
  }

  const version: ExportVersion = typeof tag.data === 'number' ? [tag.data, 0] : tag.data;
  if (compareVersions(version, minimum) < 0 || compareVersions(version, maximum) > 0) {
    throw new ExportVersionError(version, minimum, maximum);
  }
  return version;
}
