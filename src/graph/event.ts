import type { ExportVersion } from '../constants/export.js';
import type {
  Course,
  CourseTrack,
  EventPart,
  EventTrack,
  FieldDefinition,
  Lodgement,
  LodgementGroup,
  LodgementPart,
  Registration,
  RegistrationPart,
  RegistrationTrack,
} from '../types/graph.js';

/**
 * Sorted entity collections handed over by the loader
 */
export interface EventContents {
  title: string;
  shortname: string;
  courseRoomField: string | null;
  timestamp: Date;
  exportVersion: ExportVersion;
  fieldDefinitions: ReadonlyMap<string, FieldDefinition>;
  parts: readonly EventPart[];
  tracks: readonly EventTrack[];
  courses: readonly Course[];
  lodgementGroups: readonly LodgementGroup[];
  lodgements: readonly Lodgement[];
  registrations: readonly Registration[];
}

export interface ResolvedAttendee {
  registration: Registration;
  isInstructor: boolean;
}

export interface ResolvedInhabitant {
  registration: Registration;
  isCampingMat: boolean;
}

function indexById<T extends { id: number }>(entities: readonly T[]): Map<number, T> {
  return new Map(entities.map((entity) => [entity.id, entity]));
}

function lookup<T>(index: ReadonlyMap<number, T>, id: number, kind: string): T {
  const entity = index.get(id);
  if (entity === undefined) {
    throw new Error(`Unknown ${kind} id ${id}`);
  }
  return entity;
}

/**
 * The event graph
 *
 * Owns every entity of a loaded export in its sort order and resolves the id references between
 * them. Instances are frozen on construction and only ever read.
 */
export class Event {
  readonly title: string;
  readonly shortname: string;
  readonly courseRoomField: string | null;
  readonly timestamp: Date;
  readonly exportVersion: ExportVersion;
  readonly fieldDefinitions: ReadonlyMap<string, FieldDefinition>;

  readonly parts: readonly EventPart[];
  readonly tracks: readonly EventTrack[];
  readonly courses: readonly Course[];
  readonly lodgementGroups: readonly LodgementGroup[];
  readonly lodgements: readonly Lodgement[];
  readonly registrations: readonly Registration[];

  private readonly partsById: Map<number, EventPart>;
  private readonly tracksById: Map<number, EventTrack>;
  private readonly coursesById: Map<number, Course>;
  private readonly lodgementGroupsById: Map<number, LodgementGroup>;
  private readonly lodgementsById: Map<number, Lodgement>;
  private readonly registrationsById: Map<number, Registration>;

  constructor(contents: EventContents) {
    this.title = contents.title;
    this.shortname = contents.shortname;
    this.courseRoomField = contents.courseRoomField;
    this.timestamp = contents.timestamp;
    this.exportVersion = Object.freeze([contents.exportVersion[0], contents.exportVersion[1]] as const);
    this.fieldDefinitions = contents.fieldDefinitions;

    this.parts = Object.freeze([...contents.parts]);
    this.tracks = Object.freeze([...contents.tracks]);
    this.courses = Object.freeze([...contents.courses]);
    this.lodgementGroups = Object.freeze([...contents.lodgementGroups]);
    this.lodgements = Object.freeze([...contents.lodgements]);
    this.registrations = Object.freeze([...contents.registrations]);

    this.partsById = indexById(this.parts);
    this.tracksById = indexById(this.tracks);
    this.coursesById = indexById(this.courses);
    this.lodgementGroupsById = indexById(this.lodgementGroups);
    this.lodgementsById = indexById(this.lodgements);
    this.registrationsById = indexById(this.registrations);

    Object.freeze(this);
  }

  // ==========================================================================
  // Lookups by id (throw on ids that are not part of the graph)
  // ==========================================================================

  part(id: number): EventPart {
    return lookup(this.partsById, id, 'part');
  }

  track(id: number): EventTrack {
    return lookup(this.tracksById, id, 'track');
  }

  course(id: number): Course {
    return lookup(this.coursesById, id, 'course');
  }

  lodgementGroup(id: number): LodgementGroup {
    return lookup(this.lodgementGroupsById, id, 'lodgement group');
  }

  lodgement(id: number): Lodgement {
    return lookup(this.lodgementsById, id, 'lodgement');
  }

  registration(id: number): Registration {
    return lookup(this.registrationsById, id, 'registration');
  }

  // ==========================================================================
  // Relationship navigation
  // ==========================================================================

  tracksOf(part: EventPart): EventTrack[] {
    return part.trackIds.map((id) => this.track(id));
  }

  partOf(track: EventTrack): EventPart {
    return this.part(track.partId);
  }

  lodgementsOf(group: LodgementGroup): Lodgement[] {
    return group.lodgementIds.map((id) => this.lodgement(id));
  }

  groupOf(lodgement: Lodgement): LodgementGroup | null {
    return lodgement.groupId !== null ? this.lodgementGroup(lodgement.groupId) : null;
  }

  lodgementOf(registrationPart: RegistrationPart): Lodgement | null {
    return registrationPart.lodgementId !== null ? this.lodgement(registrationPart.lodgementId) : null;
  }

  courseOf(registrationTrack: RegistrationTrack): Course | null {
    return registrationTrack.courseId !== null ? this.course(registrationTrack.courseId) : null;
  }

  instructedCourseOf(registrationTrack: RegistrationTrack): Course | null {
    return registrationTrack.instructorCourseId !== null ? this.course(registrationTrack.instructorCourseId) : null;
  }

  choicesOf(registrationTrack: RegistrationTrack): (Course | null)[] {
    return registrationTrack.choices.map((id) => (id !== null ? this.course(id) : null));
  }

  attendeesOf(courseTrack: CourseTrack): ResolvedAttendee[] {
    return courseTrack.attendees.map(({ registrationId, isInstructor }) => ({
      registration: this.registration(registrationId),
      isInstructor,
    }));
  }

  inhabitantsOf(lodgementPart: LodgementPart): ResolvedInhabitant[] {
    return lodgementPart.inhabitants.map(({ registrationId, isCampingMat }) => ({
      registration: this.registration(registrationId),
      isCampingMat,
    }));
  }

  /** RegistrationPart of the part a registration track belongs to */
  registrationPartOf(registration: Registration, registrationTrack: RegistrationTrack): RegistrationPart {
    const registrationPart = registration.parts.get(registrationTrack.partId);
    if (!registrationPart) {
      throw new Error(`Registration ${registration.id} has no entry for part ${registrationTrack.partId}`);
    }
    return registrationPart;
  }
}
