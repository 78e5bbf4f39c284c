/**
 * Primitive parsers
 *
 * Pure conversions from export strings and raw custom field values to typed values.
 * Calendar dates are represented as `Date` objects at UTC midnight; all date arithmetic here uses
 * the UTC accessors so the host timezone never shifts a day.
 */

import { FIELD_ASSOCIATION_CODES, FIELD_DATATYPE_CODES, type FieldAssociation, type FieldDatatype } from '../constants/export.js';
import { ExportDataError } from '../errors.js';
import type { FieldDefinitionData } from '../schemas/export.js';
import type { FieldDefinition, FieldMap, FieldValue } from '../types/graph.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// Offset colons are stripped before matching, so only the compact offset form remains
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{4})$/;

// ============================================================================
// Dates and timestamps
// ============================================================================

/**
 * Parse a strict `YYYY-MM-DD` date
 *
 * @param path - Location in the export, used in error messages
 * @returns The date at UTC midnight
 */
export function parseDate(value: string, path = 'date'): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ExportDataError(path, `Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  // Date.UTC reads years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new ExportDataError(path, `Invalid date "${value}", no such calendar day`);
  }
  return date;
}

/**
 * Parse a strict ISO-8601 timestamp with timezone offset
 *
 * The exporter writes offsets as `+02:00` or `+0200`; colons are removed from the offset first.
 */
export function parseDateTime(value: string, path = 'datetime'): Date {
  const normalized = value.replace(/([+-]\d{2}):(\d{2})$/, '$1$2');
  const match = DATETIME_PATTERN.exec(normalized);
  if (!match) {
    throw new ExportDataError(path, `Invalid timestamp "${value}", expected ISO 8601 with timezone offset`);
  }

  const [, year, month, day, hour, minute, second = '0', fraction = '0', offset] = match;
  const local = new Date(0);
  local.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  local.setUTCHours(Number(hour), Number(minute), Number(second), Math.floor(Number(`0.${fraction}`) * 1000));
  if (
    local.getUTCFullYear() !== Number(year) ||
    local.getUTCMonth() !== Number(month) - 1 ||
    local.getUTCDate() !== Number(day) ||
    local.getUTCHours() !== Number(hour) ||
    local.getUTCMinutes() !== Number(minute)
  ) {
    throw new ExportDataError(path, `Invalid timestamp "${value}", no such point in time`);
  }

  let offsetMinutes = 0;
  if (offset !== undefined && offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    offsetMinutes = sign * (Number(offset.slice(1, 3)) * 60 + Number(offset.slice(3, 5)));
  }
  return new Date(local.getTime() - offsetMinutes * 60_000);
}

/**
 * Whole years between birthday and reference, counting the birthday itself as passed
 */
export function calculateAge(reference: Date, birthday: Date): number {
  const years = reference.getUTCFullYear() - birthday.getUTCFullYear();
  const referenceMonth = reference.getUTCMonth();
  const birthdayMonth = birthday.getUTCMonth();
  const beforeBirthday =
    referenceMonth < birthdayMonth ||
    (referenceMonth === birthdayMonth && reference.getUTCDate() < birthday.getUTCDate());
  return beforeBirthday ? years - 1 : years;
}

// ============================================================================
// Custom fields
// ============================================================================

/**
 * Decode the export's field declarations through the datatype and association code tables
 */
export function parseFieldDefinitions(
  raw: Record<string, FieldDefinitionData>
): Map<string, FieldDefinition> {
  const definitions = new Map<string, FieldDefinition>();
  for (const [name, data] of Object.entries(raw)) {
    const datatype: FieldDatatype | undefined = FIELD_DATATYPE_CODES[data.kind];
    if (datatype === undefined) {
      throw new ExportDataError(`event.fields.${name}.kind`, `Unknown field datatype code ${data.kind}`);
    }

    let association: FieldAssociation | null = null;
    if (data.association !== null && data.association !== undefined) {
      const decoded: FieldAssociation | undefined = FIELD_ASSOCIATION_CODES[data.association];
      if (decoded === undefined) {
        throw new ExportDataError(
          `event.fields.${name}.association`,
          `Unknown field association code ${data.association}`
        );
      }
      association = decoded;
    }

    definitions.set(name, { name, datatype, association });
  }
  return definitions;
}

/**
 * Coerce one raw custom field value to the declared datatype. `null` passes through.
 */
export function coerceFieldValue(value: unknown, datatype: FieldDatatype, path = 'field'): FieldValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (datatype) {
    case 'str':
      if (typeof value === 'string') return value;
      break;
    case 'bool':
      if (typeof value === 'boolean') return value;
      break;
    case 'int':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      break;
    case 'float':
      if (typeof value === 'number') return value;
      break;
    case 'date':
      if (typeof value === 'string') return parseDate(value, path);
      break;
    case 'datetime':
      if (typeof value === 'string') return parseDateTime(value, path);
      break;
  }
  throw new ExportDataError(path, `Value ${JSON.stringify(value)} does not match field datatype "${datatype}"`);
}

/**
 * Coerce the custom fields of one entity. Fields without a declaration for the entity's
 * association are dropped.
 */
export function parseFields(
  raw: Record<string, unknown>,
  definitions: ReadonlyMap<string, FieldDefinition>,
  association: FieldAssociation,
  path = 'fields'
): FieldMap {
  const fields: Record<string, FieldValue> = {};
  for (const [name, value] of Object.entries(raw)) {
    const definition = definitions.get(name);
    if (!definition || (definition.association !== null && definition.association !== association)) {
      continue;
    }
    fields[name] = coerceFieldValue(value, definition.datatype, `${path}.${name}`);
  }
  return fields;
}
