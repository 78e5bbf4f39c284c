import { describe, it, expect } from 'vitest';
import { ExportDataError } from '../errors.js';
import {
  calculateAge,
  coerceFieldValue,
  parseDate,
  parseDateTime,
  parseFieldDefinitions,
  parseFields,
} from './parsers.js';

describe('parseDate', () => {
  it('returns UTC midnight of the calendar day', () => {
    expect(parseDate('2022-01-01').toISOString()).toBe('2022-01-01T00:00:00.000Z');
  });

  it('keeps years below 100', () => {
    expect(parseDate('0050-01-01').toISOString()).toBe('0050-01-01T00:00:00.000Z');
    expect(parseDate('0000-02-29').getUTCFullYear()).toBe(0);
  });

  it('rejects other formats and impossible days', () => {
    expect(() => parseDate('2022-1-1')).toThrow(ExportDataError);
    expect(() => parseDate('01.01.2022')).toThrow(ExportDataError);
    expect(() => parseDate('2022-02-30', 'registrations.1.payment')).toThrow(
      'registrations.1.payment: Invalid date "2022-02-30", no such calendar day'
    );
  });
});

describe('parseDateTime', () => {
  it('applies offsets with and without colon', () => {
    expect(parseDateTime('2020-02-20T12:00:00+01:00').toISOString()).toBe('2020-02-20T11:00:00.000Z');
    expect(parseDateTime('2020-02-20T12:00:00+0100').toISOString()).toBe('2020-02-20T11:00:00.000Z');
    expect(parseDateTime('2020-02-20T00:30:00-02:00').toISOString()).toBe('2020-02-20T02:30:00.000Z');
  });

  it('accepts UTC and fractional seconds', () => {
    expect(parseDateTime('2020-02-20T12:00:00.250Z').toISOString()).toBe('2020-02-20T12:00:00.250Z');
    expect(parseDateTime('2020-02-20 12:00Z').toISOString()).toBe('2020-02-20T12:00:00.000Z');
  });

  it('keeps years below 100', () => {
    expect(parseDateTime('0050-01-01T00:00:00Z').toISOString()).toBe('0050-01-01T00:00:00.000Z');
    expect(parseDateTime('0099-12-31T23:30:00-01:00').toISOString()).toBe('0100-01-01T00:30:00.000Z');
  });

  it('requires a timezone offset', () => {
    expect(() => parseDateTime('2020-02-20T12:00:00')).toThrow(ExportDataError);
  });

  it('rejects impossible points in time', () => {
    expect(() => parseDateTime('2020-13-01T12:00:00Z')).toThrow(ExportDataError);
    expect(() => parseDateTime('2020-02-20T25:00:00Z')).toThrow(ExportDataError);
  });
});

describe('calculateAge', () => {
  const birthday = parseDate('2000-03-01');

  it('counts the birthday itself as passed', () => {
    expect(calculateAge(parseDate('2020-03-01'), birthday)).toBe(20);
  });

  it('counts one year less on the day before', () => {
    expect(calculateAge(parseDate('2020-02-29'), birthday)).toBe(19);
  });
});

describe('custom fields', () => {
  const definitions = parseFieldDefinitions({
    arrival: { kind: 5, association: 1 },
    level: { kind: 3, association: 1 },
    room: { kind: 1, association: 2 },
    note: { kind: 1 },
  });

  it('decodes datatype and association codes', () => {
    expect(definitions.get('arrival')).toEqual({ name: 'arrival', datatype: 'date', association: 'registration' });
    expect(definitions.get('note')).toEqual({ name: 'note', datatype: 'str', association: null });
  });

  it('rejects unknown codes', () => {
    expect(() => parseFieldDefinitions({ broken: { kind: 7 } })).toThrow(
      'event.fields.broken.kind: Unknown field datatype code 7'
    );
    expect(() => parseFieldDefinitions({ broken: { kind: 1, association: 9 } })).toThrow(ExportDataError);
  });

  it('decodes a declared date field and drops undeclared ones', () => {
    const fields = parseFields({ arrival: '2022-01-01', undeclared: 'x' }, definitions, 'registration');
    expect(Object.keys(fields)).toEqual(['arrival']);
    expect(fields['arrival']).toEqual(new Date(Date.UTC(2022, 0, 1)));
  });

  it('drops fields declared for another association', () => {
    expect(parseFields({ room: 'Hall', note: 'hello' }, definitions, 'registration')).toEqual({ note: 'hello' });
  });

  it('passes null through and rejects mismatched values', () => {
    expect(coerceFieldValue(null, 'int')).toBeNull();
    expect(coerceFieldValue(2.5, 'float')).toBe(2.5);
    expect(() => coerceFieldValue(2.5, 'int', 'courses.1.fields.size')).toThrow(
      'courses.1.fields.size: Value 2.5 does not match field datatype "int"'
    );
    expect(() => coerceFieldValue('yes', 'bool')).toThrow(ExportDataError);
  });
});
