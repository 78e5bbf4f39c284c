/**
 * Query helpers for render targets
 *
 * Read-only filters and aggregations over a loaded Event. Results keep the graph's sort orders.
 */

import { CourseTrackStatuses, RegistrationPartStatuses, type RegistrationPartStatus } from '../constants/export.js';
import type { Event } from '../graph/event.js';
import type { Course, EventPart, EventTrack, FieldValue, Registration } from '../types/graph.js';
import { compareRegistrations } from './sorting.js';
import { isInstructor, isMinorRegistration, isPresentStatus } from './status.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Registration filters
// ============================================================================

export interface RegistrationFilter {
  /** Parts to look at; defaults to all parts of the event */
  parts?: readonly EventPart[];
  /** Statuses counted as a match in any of the parts; defaults to participant only */
  statuses?: readonly RegistrationPartStatus[];
  listConsentOnly?: boolean;
  minorsOnly?: boolean;
}

/**
 * Registrations with one of the given statuses in at least one of the given parts
 */
export function filterRegistrations(event: Event, filter: RegistrationFilter = {}): Registration[] {
  const parts = filter.parts ?? event.parts;
  const statuses = new Set(filter.statuses ?? [RegistrationPartStatuses.Participant]);

  return event.registrations.filter((registration) => {
    const matchesStatus = parts.some((part) => {
      const registrationPart = registration.parts.get(part.id);
      return registrationPart !== undefined && statuses.has(registrationPart.status);
    });
    return (
      matchesStatus &&
      (!filter.listConsentOnly || registration.listConsent) &&
      (!filter.minorsOnly || isMinorRegistration(registration))
    );
  });
}

export interface ActiveRegistrationOptions {
  parts?: readonly EventPart[];
  /** Count guests as active too */
  includeGuests?: boolean;
  listConsentOnly?: boolean;
  minorsOnly?: boolean;
}

/**
 * Participants (and optionally guests) of the given parts
 */
export function getActiveRegistrations(event: Event, options: ActiveRegistrationOptions = {}): Registration[] {
  const statuses: RegistrationPartStatus[] = [RegistrationPartStatuses.Participant];
  if (options.includeGuests) {
    statuses.push(RegistrationPartStatuses.Guest);
  }
  return filterRegistrations(event, {
    parts: options.parts,
    statuses,
    listConsentOnly: options.listConsentOnly,
    minorsOnly: options.minorsOnly,
  });
}

// ============================================================================
// Tracks and days
// ============================================================================

/**
 * Tracks belonging to one of the given parts, in track order
 */
export function filterTracks(event: Event, parts: readonly EventPart[]): EventTrack[] {
  const partIds = new Set(parts.map((part) => part.id));
  return event.tracks.filter((track) => partIds.has(track.partId));
}

/**
 * Calendar days from begin to end of the part, both included
 */
export function partDays(part: EventPart): Date[] {
  const days: Date[] = [];
  for (let time = part.begin.getTime(); time <= part.end.getTime(); time += DAY_MS) {
    days.push(new Date(time));
  }
  return days;
}

/**
 * Calendar days covered by any part of the event, sorted and without duplicates
 */
export function eventDays(event: Event): Date[] {
  const times = new Set<number>();
  for (const part of event.parts) {
    for (const day of partDays(part)) {
      times.add(day.getTime());
    }
  }
  return [...times].sort((a, b) => a - b).map((time) => new Date(time));
}

// ============================================================================
// Courses
// ============================================================================

export interface CourseAttendance {
  registration: Registration;
  tracks: EventTrack[];
}

/**
 * Regular attendees of a course over all its active tracks
 *
 * Instructors and registrations that are not participants in the track's part are left out.
 * Each registration appears once, with the tracks it attends the course in.
 */
export function gatherCourseAttendees(event: Event, course: Course): CourseAttendance[] {
  const attendances = new Map<number, CourseAttendance>();

  for (const courseTrack of course.tracks.values()) {
    if (courseTrack.status !== CourseTrackStatuses.Active) continue;
    const track = event.track(courseTrack.trackId);

    for (const attendee of courseTrack.attendees) {
      if (attendee.isInstructor) continue;
      const registration = event.registration(attendee.registrationId);
      if (registration.parts.get(track.partId)?.status !== RegistrationPartStatuses.Participant) continue;

      const attendance = attendances.get(registration.id);
      if (attendance) {
        attendance.tracks.push(track);
      } else {
        attendances.set(registration.id, { registration, tracks: [track] });
      }
    }
  }

  return [...attendances.values()].sort((a, b) => compareRegistrations(a.registration, b.registration));
}

/**
 * Value of the course room field for a course, or null when the event has none
 */
export function courseRoom(event: Event, course: Course): FieldValue {
  if (event.courseRoomField === null) {
    return null;
  }
  return course.fields[event.courseRoomField] ?? null;
}

export interface NametagCourseOptions {
  /** Show a course once when it is the same in the first two tracks */
  merge?: boolean;
  /** Keep an empty slot for a track whose part the registration is not present in */
  secondAlwaysRight?: boolean;
}

export interface NametagCourses {
  courses: (Course | null)[];
  merged: boolean;
}

/**
 * Courses to print on a registration's nametag for the given tracks
 */
export function getNametagCourses(
  event: Event,
  registration: Registration,
  tracks: readonly EventTrack[],
  options: NametagCourseOptions = {}
): NametagCourses {
  const { merge = true, secondAlwaysRight = false } = options;
  const courses: (Course | null)[] = [];

  for (const track of tracks) {
    const registrationTrack = registration.tracks.get(track.id);
    const registrationPart = registration.parts.get(track.partId);
    if (registrationTrack && registrationPart && isPresentStatus(registrationPart.status)) {
      courses.push(event.courseOf(registrationTrack));
    } else if (secondAlwaysRight) {
      courses.push(null);
    }
  }

  const [first, second] = courses;
  if (merge && courses.length > 1 && first !== null && first !== undefined && first === second) {
    return { courses: [first], merged: true };
  }
  return { courses, merged: false };
}

/**
 * Tracks in which the registration instructs the course it is assigned to
 */
export function instructedTracks(event: Event, registration: Registration): EventTrack[] {
  return [...registration.tracks.values()].filter(isInstructor).map((track) => event.track(track.trackId));
}

// ============================================================================
// Job names
// ============================================================================

// Reserved filename characters (and space); dots are allowed
const FILENAME_UNSAFE = /[/\\?%*:|"<> ]/g;

/**
 * Replace characters that are unsafe in file names with '_'
 */
export function sanitizeFilename(name: string): string {
  return name.replace(FILENAME_UNSAFE, '_');
}

/**
 * Filename suffix per part, built from the sanitized shortname. Suffixes shared by several
 * parts get `_<part id>` appended on each of those parts.
 *
 * @returns Map from part id to suffix, in part order
 */
export function generatePartJobnames(event: Event): Map<number, string> {
  const suffixes = new Map(event.parts.map((part) => [part.id, sanitizeFilename(part.shortname)]));

  const counts = new Map<string, number>();
  for (const suffix of suffixes.values()) {
    counts.set(suffix, (counts.get(suffix) ?? 0) + 1);
  }

  for (const [partId, suffix] of suffixes) {
    if ((counts.get(suffix) ?? 0) > 1) {
      suffixes.set(partId, `${suffix}_${partId}`);
    }
  }
  return suffixes;
}
