/**
 * Sort orders of the event graph
 *
 * Every comparator falls back to the entity id, so each order is total and sorting an already
 * sorted list leaves it unchanged. Strings compare by UTF-16 code units, independent of locale.
 */

import type { Course, EventPart, EventTrack, Registration } from '../types/graph.js';

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareParts(a: EventPart, b: EventPart): number {
  return a.begin.getTime() - b.begin.getTime() || a.id - b.id;
}

export function compareTracks(a: Pick<EventTrack, 'id' | 'sortkey'>, b: Pick<EventTrack, 'id' | 'sortkey'>): number {
  return a.sortkey - b.sortkey || a.id - b.id;
}

/**
 * Course number padded on the left with NUL to `width`, so "2" sorts before "10"
 * and courses without number come first
 */
export function courseSortKey(nr: string, width: number): string {
  return nr.padStart(width, '\0');
}

export function courseNumberWidth(courses: readonly Pick<Course, 'nr'>[]): number {
  return courses.reduce((width, course) => Math.max(width, course.nr.length), 0);
}

export function compareCourses(width: number): (a: Course, b: Course) => number {
  return (a, b) => compareStrings(courseSortKey(a.nr, width), courseSortKey(b.nr, width)) || a.id - b.id;
}

export function compareByTitle(a: { id: number; title: string }, b: { id: number; title: string }): number {
  return compareStrings(a.title, b.title) || a.id - b.id;
}

/**
 * Registration order: given names, then family name
 */
export function compareRegistrations(a: Registration, b: Registration): number {
  return (
    compareStrings(a.name.givenNames, b.name.givenNames) ||
    compareStrings(a.name.familyName, b.name.familyName) ||
    a.id - b.id
  );
}
