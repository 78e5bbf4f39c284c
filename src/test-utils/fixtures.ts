/**
 * Partial export fixtures
 *
 * `scenarioExport()` returns a fresh document on every call, so tests may mutate it freely.
 *
 * Scenario:
 * - parts 1 (2020-03-01..05, track 1) and 2 (2020-03-06..10, track 2)
 * - courses 1 "10" (active in both tracks), 2 "2" (active in track 1, cancelled in track 2),
 *   3 without number and without segments
 * - lodgements 1 "Room B" and 2 "Room A" in group 1
 * - registrations 1..5, sorted as 5, 2, 4, 3, 1; registration 3 only in part 1, registration 4 in no part
 */

import type { PartialExportInput } from '../schemas/export.js';
import { buildEvent } from '../loader/index.js';
import type { Event } from '../graph/event.js';

export type RegistrationInput = NonNullable<PartialExportInput['registrations']>[string];
export type PersonaInput = RegistrationInput['persona'];

export function persona(id: number, givenNames: string, familyName: string, birthday: string): PersonaInput {
  return {
    id,
    given_names: givenNames,
    family_name: familyName,
    gender: 20,
    birthday,
    username: `${givenNames.toLowerCase()}@example.com`,
  };
}

export function scenarioRegistrations(): Record<string, RegistrationInput> {
  return {
    '1': {
      persona: { ...persona(101, 'Emil', 'Example', '2000-03-01'), gender: 2 },
      list_consent: true,
      parts: {
        '1': { status: 2, lodgement_id: 1, is_camping_mat: false },
        '2': { status: 2, lodgement_id: 1, is_camping_mat: false },
      },
      tracks: {
        '1': { course_id: 1, course_instructor: null, choices: [1, 2] },
        '2': { course_id: 1, course_instructor: null, choices: [1] },
      },
      fields: { level: 3, arrival: '2020-03-01', unknown: 'dropped' },
    },
    '2': {
      persona: { ...persona(102, 'Anna', 'Sample', '2004-07-15'), gender: 1 },
      list_consent: false,
      parts: {
        '1': { status: 2, lodgement_id: 2, is_camping_mat: false },
        '2': { status: 4, lodgement_id: 2, is_camping_mat: true },
      },
      tracks: {
        '1': { course_id: 2, course_instructor: 2, choices: [] },
        '2': { course_id: 1, course_instructor: null, choices: [] },
      },
    },
    '3': {
      persona: { ...persona(103, 'Carla', 'Test', '1990-01-01'), display_name: 'Carly' },
      parts: {
        '1': { status: 2, lodgement_id: 1, is_camping_mat: false },
      },
      tracks: {
        '1': { course_id: 2, course_instructor: null, choices: [2, 99] },
        '2': { course_id: 1, course_instructor: null, choices: [] },
      },
    },
    '4': {
      persona: persona(104, 'Bert', 'Placeholder', '2010-05-05'),
    },
    '5': {
      persona: persona(105, 'Anna', 'Other', '1985-12-31'),
      parts: {
        '1': { status: 3, lodgement_id: null, is_camping_mat: false },
        '2': { status: 5, lodgement_id: 42, is_camping_mat: false },
      },
    },
  };
}

export function scenarioExport(): PartialExportInput {
  return {
    kind: 'partial',
    EVENT_SCHEMA_VERSION: [15, 4],
    id: 1,
    timestamp: '2020-02-20T12:00:00+01:00',
    event: {
      title: 'Test Academy',
      shortname: 'ta20',
      course_room_field: 'room',
      fields: {
        room: { kind: 1, association: 2 },
        level: { kind: 3, association: 1 },
        arrival: { kind: 5, association: 1 },
      },
      parts: {
        '2': {
          title: 'Second half',
          shortname: 'H2',
          part_begin: '2020-03-06',
          part_end: '2020-03-10',
          tracks: { '2': { title: 'Morning', shortname: 'M2', sortkey: 2, num_choices: 3, min_choices: 1 } },
        },
        '1': {
          title: 'First half',
          shortname: 'H1',
          part_begin: '2020-03-01',
          part_end: '2020-03-05',
          tracks: { '1': { title: 'Morning', shortname: 'M1', sortkey: 1, num_choices: 2, min_choices: 1 } },
        },
      },
    },
    courses: {
      '1': { nr: '10', title: 'Juggling', shortname: 'Jugg', fields: { room: 'Hall' }, segments: { '1': true, '2': true } },
      '2': { nr: '2', title: 'Choir', shortname: 'Choir', fields: { room: 'Chapel' }, segments: { '1': true, '2': false } },
      '3': { nr: null, title: 'Planned', shortname: 'Plan', fields: {}, segments: {} },
    },
    lodgement_groups: {
      '1': { title: 'Main house' },
    },
    lodgements: {
      '1': { title: 'Room B', group_id: 1, regular_capacity: 4, fields: {} },
      '2': { title: 'Room A', group_id: 1, regular_capacity: 2, camping_mat_capacity: 1, fields: {} },
    },
    registrations: scenarioRegistrations(),
  };
}

export function scenarioEvent(): Event {
  return buildEvent(scenarioExport());
}
