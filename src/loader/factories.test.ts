import { describe, it, expect } from 'vitest';
import { ExportDataError } from '../errors.js';
import { RegistrationSchema, type RegistrationData } from '../schemas/export.js';
import { persona, type RegistrationInput } from '../test-utils/fixtures.js';
import type { EventPart, EventTrack, Lodgement, LodgementGroup } from '../types/graph.js';
import {
  createCourse,
  createEventPart,
  createEventTrack,
  createLodgement,
  createLodgementGroup,
  createRegistration,
  parseId,
  type RegistrationContext,
} from './factories.js';

function registrationData(input: RegistrationInput): RegistrationData {
  return RegistrationSchema.parse(input);
}

describe('entity factories', () => {
  const part: EventPart = createEventPart(1, {
    title: 'First half',
    shortname: 'H1',
    part_begin: '2020-03-01',
    part_end: '2020-03-05',
    tracks: {},
  });
  const track: EventTrack = createEventTrack(
    7,
    { title: 'Morning', shortname: 'M', sortkey: 1, num_choices: 3, min_choices: null },
    part
  );

  it('parses integer object keys', () => {
    expect(parseId('42')).toBe(42);
    expect(parseId('-1')).toBe(-1);
  });

  it('registers tracks with their part', () => {
    expect(part.trackIds).toEqual([7]);
    expect(track.partId).toBe(1);
    expect(track.minChoices).toBe(0);
  });

  it('rejects malformed part dates', () => {
    expect(() =>
      createEventPart(3, { title: 'x', shortname: 'x', part_begin: '2020-3-1', part_end: '2020-03-05', tracks: {} })
    ).toThrow('event.parts.3.part_begin: Invalid date "2020-3-1", expected YYYY-MM-DD');
  });

  it('maps course segments to track statuses and skips unknown tracks', () => {
    const course = createCourse(
      5,
      {
        nr: '1',
        title: 'Juggling',
        shortname: 'Jugg',
        description: '',
        instructors: '',
        min_size: null,
        max_size: 12,
        notes: '',
        fields: {},
        segments: { '7': false, '99': true },
      },
      new Map([[7, track]]),
      new Map()
    );
    expect([...course.tracks.keys()]).toEqual([7]);
    expect(course.tracks.get(7)?.status).toBe('cancelled');
    expect(course.minSize).toBeNull();
    expect(course.maxSize).toBe(12);
  });

  describe('lodgements', () => {
    it('joins a known group and gets one empty entry per part', () => {
      const group: LodgementGroup = createLodgementGroup(2, { title: 'Main house' });
      const lodgement = createLodgement(
        9,
        { title: 'Room A', group_id: 2, regular_capacity: null, camping_mat_capacity: 1, notes: '', fields: {} },
        [part],
        new Map([[2, group]]),
        new Map()
      );
      expect(group.lodgementIds).toEqual([9]);
      expect(lodgement.groupId).toBe(2);
      expect(lodgement.regularCapacity).toBe(0);
      expect(lodgement.parts.get(1)).toEqual({ lodgementId: 9, partId: 1, inhabitants: [] });
    });

    it('stays ungrouped when the group is unknown', () => {
      const lodgement = createLodgement(
        9,
        { title: 'Room A', group_id: 3, regular_capacity: 2, camping_mat_capacity: null, notes: '', fields: {} },
        [part],
        new Map(),
        new Map()
      );
      expect(lodgement.groupId).toBeNull();
    });
  });

  describe('createRegistration', () => {
    const lodgement: Lodgement = createLodgement(
      4,
      { title: 'Room B', group_id: null, regular_capacity: 2, camping_mat_capacity: 0, notes: '', fields: {} },
      [part],
      new Map(),
      new Map()
    );
    const context: RegistrationContext = {
      referenceDate: part.begin,
      partsById: new Map([[1, part]]),
      tracksById: new Map([[7, track]]),
      coursesById: new Map([
        [
          5,
          createCourse(
            5,
            {
              nr: '1',
              title: 'Juggling',
              shortname: 'Jugg',
              description: '',
              instructors: '',
              min_size: null,
              max_size: null,
              notes: '',
              fields: {},
              segments: {},
            },
            new Map(),
            new Map()
          ),
        ],
      ]),
      lodgementsById: new Map([[4, lodgement]]),
      fieldDefinitions: new Map(),
    };

    it('builds person data and computes the age at the reference date', () => {
      const registration = createRegistration(
        3,
        registrationData({
          persona: { ...persona(30, 'Emil', 'Example', '2000-03-01'), gender: 2, is_orga: true },
          payment: '2020-01-15',
          checkin: '2020-03-01T18:30:00+01:00',
          amount_paid: 120.5,
        }),
        context
      );
      expect(registration.personaId).toBe(30);
      expect(registration.gender).toBe('male');
      expect(registration.age).toBe(20);
      expect(registration.email).toBe('emil@example.com');
      expect(registration.isOrga).toBe(true);
      expect(registration.payment?.toISOString()).toBe('2020-01-15T00:00:00.000Z');
      expect(registration.checkin?.toISOString()).toBe('2020-03-01T17:30:00.000Z');
      expect(registration.amountPaid).toBe(120.5);
      expect(registration.listConsent).toBe(false);
    });

    it('leaves unknown references unset and pads choices to the track size', () => {
      const registration = createRegistration(
        3,
        registrationData({
          persona: persona(30, 'Emil', 'Example', '2000-03-01'),
          parts: {
            '1': { status: 2, lodgement_id: 77, is_camping_mat: false },
            '8': { status: 2, lodgement_id: 4, is_camping_mat: false },
          },
          tracks: {
            '7': { course_id: 6, course_instructor: 5, choices: [5, 6] },
            '9': { course_id: 5, course_instructor: null, choices: [] },
          },
        }),
        context
      );
      expect([...registration.parts.keys()]).toEqual([1]);
      expect(registration.parts.get(1)).toEqual({ partId: 1, status: 'participant', lodgementId: null, isCampingMat: false });
      expect([...registration.tracks.keys()]).toEqual([7]);
      expect(registration.tracks.get(7)).toEqual({
        trackId: 7,
        partId: 1,
        courseId: null,
        instructorCourseId: 5,
        choices: [5, null, null],
      });
    });

    it('rejects unknown gender and status codes', () => {
      expect(() =>
        createRegistration(3, registrationData({ persona: { ...persona(30, 'A', 'B', '2000-01-01'), gender: 3 } }), context)
      ).toThrow(ExportDataError);
      expect(() =>
        createRegistration(
          3,
          registrationData({
            persona: persona(30, 'A', 'B', '2000-01-01'),
            parts: { '1': { status: 9, lodgement_id: null, is_camping_mat: false } },
          }),
          context
        )
      ).toThrow('registrations.3.parts.1.status: Unknown registration status code 9');
    });
  });
});
