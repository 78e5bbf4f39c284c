/**
 * Centralized constants for the partial export format
 * Defines the supported schema versions, the closed value sets of the graph and the integer code
 * tables of the exporting registration database.
 */

// ============================================================================
// Format marker and supported schema versions
// ============================================================================

export const EXPORT_KIND = 'partial';

export type ExportVersion = readonly [major: number, minor: number];

/** Inclusive bounds, compared lexicographically on (major, minor) */
export const MINIMUM_EXPORT_VERSION: ExportVersion = [12, 0];
export const MAXIMUM_EXPORT_VERSION: ExportVersion = [15, Number.MAX_SAFE_INTEGER];

// ============================================================================
// Closed value sets
// ============================================================================

export const Genders = {
  Female: 'female',
  Male: 'male',
  Other: 'other',
  NotSpecified: 'not_specified',
} as const;

export type Gender = typeof Genders[keyof typeof Genders];

export const RegistrationPartStatuses = {
  NotApplied: 'not_applied',
  Applied: 'applied',
  Participant: 'participant',
  Waitlist: 'waitlist',
  Guest: 'guest',
  Cancelled: 'cancelled',
  Rejected: 'rejected',
} as const;

export type RegistrationPartStatus = typeof RegistrationPartStatuses[keyof typeof RegistrationPartStatuses];

export const CourseTrackStatuses = {
  NotOffered: 'not_offered',
  Cancelled: 'cancelled',
  Active: 'active',
} as const;

export type CourseTrackStatus = typeof CourseTrackStatuses[keyof typeof CourseTrackStatuses];

export const AgeClasses = {
  Full: 'full',
  U18: 'u18',
  U16: 'u16',
  U14: 'u14',
} as const;

export type AgeClass = typeof AgeClasses[keyof typeof AgeClasses];

export const FieldDatatypes = {
  Str: 'str',
  Bool: 'bool',
  Int: 'int',
  Float: 'float',
  Date: 'date',
  DateTime: 'datetime',
} as const;

export type FieldDatatype = typeof FieldDatatypes[keyof typeof FieldDatatypes];

export const FieldAssociations = {
  Registration: 'registration',
  Course: 'course',
  Lodgement: 'lodgement',
} as const;

export type FieldAssociation = typeof FieldAssociations[keyof typeof FieldAssociations];

// ============================================================================
// Code lookup tables (integer codes of the exporting system)
// ============================================================================

export const GENDER_CODES: Readonly<Record<number, Gender>> = {
  1: Genders.Female,
  2: Genders.Male,
  10: Genders.Other,
  20: Genders.NotSpecified,
};

export const REGISTRATION_PART_STATUS_CODES: Readonly<Record<number, RegistrationPartStatus>> = {
  [-1]: RegistrationPartStatuses.NotApplied,
  1: RegistrationPartStatuses.Applied,
  2: RegistrationPartStatuses.Participant,
  3: RegistrationPartStatuses.Waitlist,
  4: RegistrationPartStatuses.Guest,
  5: RegistrationPartStatuses.Cancelled,
  6: RegistrationPartStatuses.Rejected,
};

export const FIELD_DATATYPE_CODES: Readonly<Record<number, FieldDatatype>> = {
  1: FieldDatatypes.Str,
  2: FieldDatatypes.Bool,
  3: FieldDatatypes.Int,
  4: FieldDatatypes.Float,
  5: FieldDatatypes.Date,
  6: FieldDatatypes.DateTime,
};

export const FIELD_ASSOCIATION_CODES: Readonly<Record<number, FieldAssociation>> = {
  1: FieldAssociations.Registration,
  2: FieldAssociations.Course,
  3: FieldAssociations.Lodgement,
};

// ============================================================================
// Address formatting
// ============================================================================

/** Country spellings treated as the operator's home country (no country line printed) */
export const DEFAULT_HOME_COUNTRIES: readonly string[] = ['', 'DE', 'Germany', 'Deutschland'];
