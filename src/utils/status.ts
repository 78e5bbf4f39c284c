/**
 * Derived properties
 *
 * Pure predicates over the closed status and age-class value sets and over finished graph
 * entities. Nothing here is stored on the entities.
 */

import {
  AgeClasses,
  CourseTrackStatuses,
  RegistrationPartStatuses,
  type AgeClass,
  type RegistrationPartStatus,
} from '../constants/export.js';
import type { Course, Registration, RegistrationTrack } from '../types/graph.js';

// ============================================================================
// Registration part statuses
// ============================================================================

const PRESENT_STATUSES: ReadonlySet<RegistrationPartStatus> = new Set<RegistrationPartStatus>([
  RegistrationPartStatuses.Participant,
  RegistrationPartStatuses.Guest,
]);

const INVOLVED_STATUSES: ReadonlySet<RegistrationPartStatus> = new Set<RegistrationPartStatus>([
  RegistrationPartStatuses.Applied,
  RegistrationPartStatuses.Participant,
  RegistrationPartStatuses.Waitlist,
  RegistrationPartStatuses.Guest,
]);

/** On site during the part: participant or guest */
export function isPresentStatus(status: RegistrationPartStatus): boolean {
  return PRESENT_STATUSES.has(status);
}

/** Has an open or accepted registration for the part */
export function isInvolvedStatus(status: RegistrationPartStatus): boolean {
  return INVOLVED_STATUSES.has(status);
}

export function isPresent(registration: Registration): boolean {
  return [...registration.parts.values()].some((part) => isPresentStatus(part.status));
}

export function isParticipant(registration: Registration): boolean {
  return [...registration.parts.values()].some((part) => part.status === RegistrationPartStatuses.Participant);
}

export function isInvolved(registration: Registration): boolean {
  return [...registration.parts.values()].some((part) => isInvolvedStatus(part.status));
}

// ============================================================================
// Age classes
// ============================================================================

/**
 * Lower-bound age bands, checked from the top
 */
export function ageClass(age: number): AgeClass {
  if (age >= 18) return AgeClasses.Full;
  if (age >= 16) return AgeClasses.U18;
  if (age >= 14) return AgeClasses.U16;
  return AgeClasses.U14;
}

export function isMinor(cls: AgeClass): boolean {
  return cls !== AgeClasses.Full;
}

export function isMinorRegistration(registration: Registration): boolean {
  return isMinor(ageClass(registration.age));
}

// ============================================================================
// Courses
// ============================================================================

export function isCourseActive(course: Course): boolean {
  return [...course.tracks.values()].some((track) => track.status === CourseTrackStatuses.Active);
}

/**
 * True only when the registration instructs the very course it is assigned to
 */
export function isInstructor(track: RegistrationTrack): boolean {
  return track.instructorCourseId !== null && track.instructorCourseId === track.courseId;
}
