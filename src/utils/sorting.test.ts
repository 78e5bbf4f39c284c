import { describe, it, expect } from 'vitest';
import { scenarioEvent } from '../test-utils/fixtures.js';
import {
  compareByTitle,
  compareCourses,
  compareParts,
  compareRegistrations,
  compareStrings,
  compareTracks,
  courseNumberWidth,
  courseSortKey,
} from './sorting.js';

describe('sorting', () => {
  it('compares strings by code units', () => {
    expect(compareStrings('B', 'a')).toBe(-1);
    expect(compareStrings('a', 'a')).toBe(0);
  });

  it('pads course numbers so shorter numbers sort first', () => {
    const width = courseNumberWidth([{ nr: '2' }, { nr: '10' }, { nr: '' }]);
    expect(width).toBe(2);
    const keys = ['10', '2', ''].map((nr) => courseSortKey(nr, width)).sort(compareStrings);
    expect(keys).toEqual(['\0\0', '\u00002', '10']);
  });

  it('leaves sorted collections unchanged', () => {
    const event = scenarioEvent();
    const width = courseNumberWidth(event.courses);
    expect([...event.parts].sort(compareParts)).toEqual(event.parts);
    expect([...event.tracks].sort(compareTracks)).toEqual(event.tracks);
    expect([...event.courses].sort(compareCourses(width))).toEqual(event.courses);
    expect([...event.lodgements].sort(compareByTitle)).toEqual(event.lodgements);
    expect([...event.registrations].sort(compareRegistrations)).toEqual(event.registrations);
  });

  it('breaks ties by id', () => {
    expect(compareByTitle({ id: 2, title: 'Room' }, { id: 1, title: 'Room' })).toBe(1);
  });
});
