/**
 * Cross-Link Resolver
 *
 * Second pass over the primary entities. The phases run in a fixed order:
 *   1. prune registration tracks of parts the registration has no entry for
 *   2. synthesize default entries for every missing (registration, part), (registration, track)
 *      and (course, track) pair
 *   3. wire attendee and inhabitant back-references, iterating registrations in their final order
 *   4. freeze the graph
 *
 * Phase 3 appends while walking the sorted registrations, which is what puts every attendee and
 * inhabitant list in registration order. It must see the complete, synthesized maps of phase 2.
 */

import { CourseTrackStatuses, RegistrationPartStatuses } from '../constants/export.js';
import type {
  Course,
  CourseTrack,
  EventPart,
  EventTrack,
  Lodgement,
  LodgementGroup,
  Registration,
  RegistrationPart,
  RegistrationTrack,
} from '../types/graph.js';
import { isInstructor } from '../utils/status.js';

/**
 * Sorted primary entities as built by the factories
 */
export interface ResolverInput {
  parts: readonly EventPart[];
  tracks: readonly EventTrack[];
  courses: readonly Course[];
  lodgementGroups: readonly LodgementGroup[];
  lodgements: readonly Lodgement[];
  registrations: readonly Registration[];
}

export interface ResolverStats {
  prunedTracks: number;
  synthesizedRegistrationParts: number;
  synthesizedRegistrationTracks: number;
  synthesizedCourseTracks: number;
  attendees: number;
  inhabitants: number;
}

// ============================================================================
// Default records
// ============================================================================

export function defaultRegistrationPart(part: EventPart): RegistrationPart {
  return {
    partId: part.id,
    status: RegistrationPartStatuses.NotApplied,
    lodgementId: null,
    isCampingMat: false,
  };
}

export function defaultRegistrationTrack(track: EventTrack): RegistrationTrack {
  return {
    trackId: track.id,
    partId: track.partId,
    courseId: null,
    instructorCourseId: null,
    choices: new Array<number | null>(track.numChoices).fill(null),
  };
}

export function defaultCourseTrack(course: Course, track: EventTrack): CourseTrack {
  return {
    courseId: course.id,
    trackId: track.id,
    status: CourseTrackStatuses.NotOffered,
    attendees: [],
  };
}

// ============================================================================
// Phase 1: pruning
// ============================================================================

/**
 * Drop track entries whose part the registration never mentions
 *
 * @returns Number of dropped entries
 */
export function pruneRegistrationTracks(registrations: readonly Registration[]): number {
  let pruned = 0;
  for (const registration of registrations) {
    const kept = [...registration.tracks].filter(([, track]) => registration.parts.has(track.partId));
    pruned += registration.tracks.size - kept.length;
    registration.tracks = new Map(kept);
  }
  return pruned;
}

// ============================================================================
// Phase 2: default synthesis
// ============================================================================

/**
 * Complete every registration's part and track maps and every course's track map.
 * The maps are rebuilt in event part/track order.
 */
export function synthesizeDefaults(
  input: ResolverInput
): Pick<ResolverStats, 'synthesizedRegistrationParts' | 'synthesizedRegistrationTracks' | 'synthesizedCourseTracks'> {
  const stats = { synthesizedRegistrationParts: 0, synthesizedRegistrationTracks: 0, synthesizedCourseTracks: 0 };

  for (const registration of input.registrations) {
    const parts = new Map<number, RegistrationPart>();
    for (const part of input.parts) {
      const existing = registration.parts.get(part.id);
      if (!existing) stats.synthesizedRegistrationParts++;
      parts.set(part.id, existing ?? defaultRegistrationPart(part));
    }
    registration.parts = parts;

    const tracks = new Map<number, RegistrationTrack>();
    for (const track of input.tracks) {
      const existing = registration.tracks.get(track.id);
      if (!existing) stats.synthesizedRegistrationTracks++;
      tracks.set(track.id, existing ?? defaultRegistrationTrack(track));
    }
    registration.tracks = tracks;
  }

  for (const course of input.courses) {
    const tracks = new Map<number, CourseTrack>();
    for (const track of input.tracks) {
      const existing = course.tracks.get(track.id);
      if (!existing) stats.synthesizedCourseTracks++;
      tracks.set(track.id, existing ?? defaultCourseTrack(course, track));
    }
    course.tracks = tracks;
  }

  return stats;
}

// ============================================================================
// Phase 3: back-references
// ============================================================================

/**
 * Append each registration to the lodgements it sleeps in and the courses it attends.
 * Registrations must already be in their final order.
 */
export function wireBackReferences(input: ResolverInput): Pick<ResolverStats, 'attendees' | 'inhabitants'> {
  const coursesById = new Map(input.courses.map((course) => [course.id, course]));
  const lodgementsById = new Map(input.lodgements.map((lodgement) => [lodgement.id, lodgement]));
  const stats = { attendees: 0, inhabitants: 0 };

  for (const registration of input.registrations) {
    for (const registrationPart of registration.parts.values()) {
      if (registrationPart.lodgementId === null) continue;
      const lodgementPart = lodgementsById.get(registrationPart.lodgementId)?.parts.get(registrationPart.partId);
      if (!lodgementPart) {
        throw new Error(
          `Lodgement ${registrationPart.lodgementId} has no entry for part ${registrationPart.partId}`
        );
      }
      lodgementPart.inhabitants.push({
        registrationId: registration.id,
        isCampingMat: registrationPart.isCampingMat,
      });
      stats.inhabitants++;
    }

    for (const registrationTrack of registration.tracks.values()) {
      // Tracks of parts without an explicit entry were pruned and re-synthesized without course
      if (registrationTrack.courseId === null) continue;
      const courseTrack = coursesById.get(registrationTrack.courseId)?.tracks.get(registrationTrack.trackId);
      if (!courseTrack) {
        throw new Error(`Course ${registrationTrack.courseId} has no entry for track ${registrationTrack.trackId}`);
      }
      courseTrack.attendees.push({
        registrationId: registration.id,
        isInstructor: isInstructor(registrationTrack),
      });
      stats.attendees++;
    }
  }

  return stats;
}

// ============================================================================
// Phase 4: freezing
// ============================================================================

function freezeAll(values: Iterable<object>): void {
  for (const value of values) {
    Object.freeze(value);
  }
}

/**
 * Freeze every entity, nested record and list of the graph
 */
export function freezeGraph(input: ResolverInput): void {
  for (const part of input.parts) {
    Object.freeze(part.trackIds);
  }
  freezeAll(input.parts);
  freezeAll(input.tracks);

  for (const course of input.courses) {
    for (const courseTrack of course.tracks.values()) {
      Object.freeze(courseTrack.attendees);
      Object.freeze(courseTrack);
    }
    Object.freeze(course.fields);
  }
  freezeAll(input.courses);

  for (const group of input.lodgementGroups) {
    Object.freeze(group.lodgementIds);
  }
  freezeAll(input.lodgementGroups);

  for (const lodgement of input.lodgements) {
    for (const lodgementPart of lodgement.parts.values()) {
      Object.freeze(lodgementPart.inhabitants);
      Object.freeze(lodgementPart);
    }
    Object.freeze(lodgement.fields);
  }
  freezeAll(input.lodgements);

  for (const registration of input.registrations) {
    freezeAll(registration.parts.values());
    for (const registrationTrack of registration.tracks.values()) {
      Object.freeze(registrationTrack.choices);
      Object.freeze(registrationTrack);
    }
    Object.freeze(registration.name);
    Object.freeze(registration.address);
    Object.freeze(registration.fields);
  }
  freezeAll(input.registrations);
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Run all resolver phases in order
 */
export function resolveEvent(input: ResolverInput): ResolverStats {
  const prunedTracks = pruneRegistrationTracks(input.registrations);
  const synthesized = synthesizeDefaults(input);
  const wired = wireBackReferences(input);
  freezeGraph(input);

  return { prunedTracks, ...synthesized, ...wired };
}
