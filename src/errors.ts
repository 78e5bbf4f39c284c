import type { ExportVersion } from './constants/export.js';

// ============================================================================
// Error classes
// ============================================================================

/**
 * Base error for everything that makes a partial export unusable.
 * All of these abort the load; none of them is retryable.
 */
export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportError';
  }
}

/**
 * The document is not a partial export: invalid JSON, wrong or missing kind marker,
 * missing version tag or a structure the export schema rejects.
 */
export class ExportFormatError extends ExportError {
  constructor(message: string) {
    super(message);
    this.name = 'ExportFormatError';
  }
}

/**
 * The export's schema version lies outside the supported range
 */
export class ExportVersionError extends ExportError {
  readonly version: ExportVersion;
  readonly minimum: ExportVersion;
  readonly maximum: ExportVersion;

  constructor(version: ExportVersion, minimum: ExportVersion, maximum: ExportVersion) {
    const tooOld = compareVersions(version, minimum) < 0;
    super(
      `Export schema version ${formatVersion(version)} is not supported ` +
        `(supported: ${formatVersion(minimum)} to ${formatVersion(maximum)}). ` +
        (tooOld
          ? 'Please create a fresh export from the registration database.'
          : 'Please update this tool to read exports of this version.')
    );
    this.name = 'ExportVersionError';
    this.version = version;
    this.minimum = minimum;
    this.maximum = maximum;
  }
}

/**
 * A value inside the export is corrupt, such as a malformed date or an unknown code
 */
export class ExportDataError extends ExportError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'ExportDataError';
    this.path = path;
  }
}

// ============================================================================
// Version helpers
// ============================================================================

export function compareVersions(a: ExportVersion, b: ExportVersion): number {
  return a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1];
}

export function formatVersion(version: ExportVersion): string {
  return version[1] === Number.MAX_SAFE_INTEGER ? `${version[0]}.x` : `${version[0]}.${version[1]}`;
}
