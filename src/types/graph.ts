/**
 * Event Graph Entity Types
 *
 * In-memory shape of a loaded partial export. Every entity is owned by the Event; relations between
 * entities are stored as ids (and maps keyed by the related entity's id) and resolved through the
 * lookup methods of the Event class.
 */

import type {
  CourseTrackStatus,
  FieldAssociation,
  FieldDatatype,
  Gender,
  RegistrationPartStatus,
} from '../constants/export.js';

// ============================================================================
// Custom fields
// ============================================================================

export type FieldValue = string | number | boolean | Date | null;

/** Coerced custom field values, keyed by field name */
export type FieldMap = Readonly<Record<string, FieldValue>>;

export interface FieldDefinition {
  name: string;
  datatype: FieldDatatype;
  association: FieldAssociation | null; // null: usable on every entity kind
}

// ============================================================================
// Event structure
// ============================================================================

export interface EventPart {
  readonly id: number;
  readonly title: string;
  readonly shortname: string;
  readonly begin: Date; // UTC midnight
  readonly end: Date; // UTC midnight, inclusive
  readonly trackIds: number[]; // in track sort order
}

export interface EventTrack {
  readonly id: number;
  readonly partId: number;
  readonly title: string;
  readonly shortname: string;
  readonly sortkey: number;
  readonly numChoices: number;
  readonly minChoices: number;
}

// ============================================================================
// Courses
// ============================================================================

export interface CourseAttendee {
  readonly registrationId: number;
  readonly isInstructor: boolean;
}

export interface CourseTrack {
  readonly courseId: number;
  readonly trackId: number;
  readonly status: CourseTrackStatus;
  readonly attendees: CourseAttendee[]; // in registration order
}

export interface Course {
  readonly id: number;
  readonly nr: string; // may be empty
  readonly title: string;
  readonly shortname: string;
  readonly description: string;
  readonly instructors: string;
  readonly minSize: number | null;
  readonly maxSize: number | null;
  readonly notes: string;
  readonly fields: FieldMap;
  tracks: ReadonlyMap<number, CourseTrack>; // keyed by track id, one entry per event track
}

// ============================================================================
// Lodgements
// ============================================================================

export interface LodgementGroup {
  readonly id: number;
  readonly title: string;
  readonly lodgementIds: number[]; // in lodgement order
}

export interface LodgementInhabitant {
  readonly registrationId: number;
  readonly isCampingMat: boolean;
}

export interface LodgementPart {
  readonly lodgementId: number;
  readonly partId: number;
  readonly inhabitants: LodgementInhabitant[]; // in registration order
}

export interface Lodgement {
  readonly id: number;
  readonly title: string;
  readonly groupId: number | null;
  readonly regularCapacity: number;
  readonly campingMatCapacity: number;
  readonly notes: string;
  readonly fields: FieldMap;
  readonly parts: ReadonlyMap<number, LodgementPart>; // keyed by part id, one entry per event part
}

// ============================================================================
// Persons
// ============================================================================

export interface Name {
  readonly title: string;
  readonly givenNames: string;
  readonly familyName: string;
  readonly nameSupplement: string;
  readonly displayName: string;
}

export interface Address {
  readonly address: string;
  readonly addressSupplement: string;
  readonly postalCode: string;
  readonly location: string;
  readonly country: string;
}

// ============================================================================
// Registrations
// ============================================================================

export interface RegistrationPart {
  readonly partId: number;
  readonly status: RegistrationPartStatus;
  readonly lodgementId: number | null;
  readonly isCampingMat: boolean;
}

export interface RegistrationTrack {
  readonly trackId: number;
  readonly partId: number;
  readonly courseId: number | null; // assigned course
  readonly instructorCourseId: number | null; // course offered by this registration
  readonly choices: (number | null)[]; // length = track's numChoices
}

export interface Registration {
  readonly id: number;
  readonly personaId: number;
  readonly name: Name;
  readonly gender: Gender;
  readonly birthday: Date;
  readonly age: number; // at the begin of the event
  readonly email: string;
  readonly telephone: string;
  readonly mobile: string;
  readonly address: Address;
  readonly listConsent: boolean;
  readonly isOrga: boolean;
  readonly notes: string;
  readonly orgaNotes: string;
  readonly payment: Date | null;
  readonly amountPaid: number;
  readonly checkin: Date | null;
  readonly parentalAgreement: boolean;
  readonly mixedLodging: boolean;
  readonly fields: FieldMap;
  parts: ReadonlyMap<number, RegistrationPart>; // keyed by part id, one entry per event part
  tracks: ReadonlyMap<number, RegistrationTrack>; // keyed by track id
}
