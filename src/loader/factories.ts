/**
 * Entity Factories
 *
 * One factory per entity kind. Each converts a validated JSON fragment, plus lookup tables of the
 * entities built before it, into a graph record with its direct relationships wired. References
 * to ids missing from the export are left unset. Entries a fragment does not mention (course
 * segments, registration parts and tracks) are left for the resolver.
 */

import {
  CourseTrackStatuses,
  FieldAssociations,
  GENDER_CODES,
  REGISTRATION_PART_STATUS_CODES,
  type Gender,
  type RegistrationPartStatus,
} from '../constants/export.js';
import { ExportDataError } from '../errors.js';
import type {
  CourseData,
  LodgementData,
  LodgementGroupData,
  PartData,
  PersonaData,
  RegistrationData,
  RegistrationPartData,
  RegistrationTrackData,
  TrackData,
} from '../schemas/export.js';
import type {
  Address,
  Course,
  CourseTrack,
  EventPart,
  EventTrack,
  FieldDefinition,
  Lodgement,
  LodgementGroup,
  LodgementPart,
  Name,
  Registration,
  RegistrationPart,
  RegistrationTrack,
} from '../types/graph.js';
import { calculateAge, parseDate, parseDateTime, parseFields } from './parsers.js';

/**
 * Lookup tables available once parts, tracks, courses and lodgements exist
 */
export interface RegistrationContext {
  referenceDate: Date;
  partsById: ReadonlyMap<number, EventPart>;
  tracksById: ReadonlyMap<number, EventTrack>;
  coursesById: ReadonlyMap<number, Course>;
  lodgementsById: ReadonlyMap<number, Lodgement>;
  fieldDefinitions: ReadonlyMap<string, FieldDefinition>;
}

/** Object keys of export collections are string-encoded integer ids */
export function parseId(key: string): number {
  return Number.parseInt(key, 10);
}

// ============================================================================
// Event structure
// ============================================================================

export function createEventPart(id: number, data: PartData): EventPart {
  const path = `event.parts.${id}`;
  return {
    id,
    title: data.title,
    shortname: data.shortname,
    begin: parseDate(data.part_begin, `${path}.part_begin`),
    end: parseDate(data.part_end, `${path}.part_end`),
    trackIds: [],
  };
}

/**
 * Build a track and register it with its part. Tracks must be created in sort order so the
 * part's track list comes out sorted too.
 */
export function createEventTrack(id: number, data: TrackData, part: EventPart): EventTrack {
  part.trackIds.push(id);
  return {
    id,
    partId: part.id,
    title: data.title,
    shortname: data.shortname,
    sortkey: data.sortkey,
    numChoices: data.num_choices,
    minChoices: data.min_choices ?? 0,
  };
}

// ============================================================================
// Courses
// ============================================================================

/**
 * Build a course with a CourseTrack for every segment of a known track.
 * A segment flagged inactive is a cancelled course; tracks without segment get no entry here.
 */
export function createCourse(
  id: number,
  data: CourseData,
  tracksById: ReadonlyMap<number, EventTrack>,
  fieldDefinitions: ReadonlyMap<string, FieldDefinition>
): Course {
  const tracks = new Map<number, CourseTrack>();
  for (const [trackKey, isActive] of Object.entries(data.segments)) {
    const trackId = parseId(trackKey);
    if (!tracksById.has(trackId)) {
      continue;
    }
    tracks.set(trackId, {
      courseId: id,
      trackId,
      status: isActive ? CourseTrackStatuses.Active : CourseTrackStatuses.Cancelled,
      attendees: [],
    });
  }

  return {
    id,
    nr: data.nr,
    title: data.title,
    shortname: data.shortname,
    description: data.description,
    instructors: data.instructors,
    minSize: data.min_size ?? null,
    maxSize: data.max_size ?? null,
    notes: data.notes,
    fields: parseFields(data.fields, fieldDefinitions, FieldAssociations.Course, `courses.${id}.fields`),
    tracks,
  };
}

// ============================================================================
// Lodgements
// ============================================================================

export function createLodgementGroup(id: number, data: LodgementGroupData): LodgementGroup {
  return {
    id,
    title: data.title,
    lodgementIds: [],
  };
}

/**
 * Build a lodgement with one empty LodgementPart per event part and register it with its group.
 * An unknown group id leaves the lodgement ungrouped.
 */
export function createLodgement(
  id: number,
  data: LodgementData,
  parts: readonly EventPart[],
  groupsById: ReadonlyMap<number, LodgementGroup>,
  fieldDefinitions: ReadonlyMap<string, FieldDefinition>
): Lodgement {
  const group = data.group_id !== null ? groupsById.get(data.group_id) : undefined;
  group?.lodgementIds.push(id);

  const lodgementParts = new Map<number, LodgementPart>();
  for (const part of parts) {
    lodgementParts.set(part.id, { lodgementId: id, partId: part.id, inhabitants: [] });
  }

  return {
    id,
    title: data.title,
    groupId: group ? group.id : null,
    regularCapacity: data.regular_capacity ?? 0,
    campingMatCapacity: data.camping_mat_capacity ?? 0,
    notes: data.notes,
    fields: parseFields(data.fields, fieldDefinitions, FieldAssociations.Lodgement, `lodgements.${id}.fields`),
    parts: lodgementParts,
  };
}

// ============================================================================
// Persons
// ============================================================================

export function createName(persona: PersonaData): Name {
  return {
    title: persona.title,
    givenNames: persona.given_names,
    familyName: persona.family_name,
    nameSupplement: persona.name_supplement,
    displayName: persona.display_name,
  };
}

export function createAddress(persona: PersonaData): Address {
  return {
    address: persona.address,
    addressSupplement: persona.address_supplement,
    postalCode: persona.postal_code,
    location: persona.location,
    country: persona.country,
  };
}

function decodeGender(code: number, path: string): Gender {
  const gender: Gender | undefined = GENDER_CODES[code];
  if (gender === undefined) {
    throw new ExportDataError(path, `Unknown gender code ${code}`);
  }
  return gender;
}

function decodeStatus(code: number, path: string): RegistrationPartStatus {
  const status: RegistrationPartStatus | undefined = REGISTRATION_PART_STATUS_CODES[code];
  if (status === undefined) {
    throw new ExportDataError(path, `Unknown registration status code ${code}`);
  }
  return status;
}

// ============================================================================
// Registrations
// ============================================================================

function createRegistrationPart(
  partId: number,
  data: RegistrationPartData,
  lodgementsById: ReadonlyMap<number, Lodgement>,
  path: string
): RegistrationPart {
  return {
    partId,
    status: decodeStatus(data.status, `${path}.status`),
    lodgementId: data.lodgement_id !== null && lodgementsById.has(data.lodgement_id) ? data.lodgement_id : null,
    isCampingMat: data.is_camping_mat,
  };
}

function createRegistrationTrack(
  track: EventTrack,
  data: RegistrationTrackData,
  coursesById: ReadonlyMap<number, Course>
): RegistrationTrack {
  const knownCourse = (courseId: number | null | undefined): number | null =>
    courseId !== null && courseId !== undefined && coursesById.has(courseId) ? courseId : null;

  return {
    trackId: track.id,
    partId: track.partId,
    courseId: knownCourse(data.course_id),
    instructorCourseId: knownCourse(data.course_instructor),
    choices: Array.from({ length: track.numChoices }, (_, rank) => knownCourse(data.choices[rank])),
  };
}

/**
 * Build a registration with the part and track entries its JSON actually contains.
 * Entries for unknown parts or tracks are ignored; missing entries are synthesized by the resolver.
 */
export function createRegistration(id: number, data: RegistrationData, context: RegistrationContext): Registration {
  const path = `registrations.${id}`;
  const persona = data.persona;
  const birthday = parseDate(persona.birthday, `${path}.persona.birthday`);

  const parts = new Map<number, RegistrationPart>();
  for (const [partKey, partData] of Object.entries(data.parts)) {
    const partId = parseId(partKey);
    if (context.partsById.has(partId)) {
      parts.set(partId, createRegistrationPart(partId, partData, context.lodgementsById, `${path}.parts.${partKey}`));
    }
  }

  const tracks = new Map<number, RegistrationTrack>();
  for (const [trackKey, trackData] of Object.entries(data.tracks)) {
    const track = context.tracksById.get(parseId(trackKey));
    if (track) {
      tracks.set(track.id, createRegistrationTrack(track, trackData, context.coursesById));
    }
  }

  return {
    id,
    personaId: persona.id,
    name: createName(persona),
    gender: decodeGender(persona.gender, `${path}.persona.gender`),
    birthday,
    age: calculateAge(context.referenceDate, birthday),
    email: persona.username,
    telephone: persona.telephone,
    mobile: persona.mobile,
    address: createAddress(persona),
    listConsent: data.list_consent,
    isOrga: persona.is_orga,
    notes: data.notes,
    orgaNotes: data.orga_notes,
    payment: data.payment ? parseDate(data.payment, `${path}.payment`) : null,
    amountPaid: data.amount_paid,
    checkin: data.checkin ? parseDateTime(data.checkin, `${path}.checkin`) : null,
    parentalAgreement: data.parental_agreement,
    mixedLodging: data.mixed_lodging,
    fields: parseFields(data.fields, context.fieldDefinitions, FieldAssociations.Registration, `${path}.fields`),
    parts,
    tracks,
  };
}
