/**
 * Event graph loader
 *
 * One synchronous pass: version gate → schema validation → entity factories → cross-link resolver.
 * Either the complete, frozen Event comes out or an ExportError is thrown; no partial graph is
 * ever returned.
 */

import fs from 'fs';
import type { ZodIssue } from 'zod';
import { Event } from '../graph/event.js';
import { ExportFormatError } from '../errors.js';
import { PartialExportSchema, type PartialExport } from '../schemas/export.js';
import type { Course, EventPart, EventTrack, Lodgement, LodgementGroup, Registration } from '../types/graph.js';
import {
  compareByTitle,
  compareCourses,
  compareParts,
  compareRegistrations,
  compareTracks,
  courseNumberWidth,
} from '../utils/sorting.js';
import { TraceAttributes, buildGraphAttributes, setSpanAttributes, withSpanSync } from '../utils/tracing.js';
import {
  createCourse,
  createEventPart,
  createEventTrack,
  createLodgement,
  createLodgementGroup,
  createRegistration,
  parseId,
} from './factories.js';
import { parseDateTime, parseFieldDefinitions } from './parsers.js';
import { resolveEvent } from './resolver.js';
import { checkExportVersion } from './versionGate.js';

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .slice(0, 10)
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate the document structure against the export schema
 */
export function parseExportDocument(document: unknown): PartialExport {
  const result = PartialExportSchema.safeParse(document);
  if (!result.success) {
    const more = result.error.issues.length > 10 ? `\n  ... and ${result.error.issues.length - 10} more` : '';
    throw new ExportFormatError(`Export does not match the partial export format:\n${formatIssues(result.error.issues)}${more}`);
  }
  return result.data;
}

/**
 * Build the entity graph from a parsed JSON document
 *
 * @throws ExportFormatError, ExportVersionError or ExportDataError; all of them fatal
 */
export function buildEvent(document: unknown): Event {
  return withSpanSync('loader.build', {}, () => {
    const exportVersion = withSpanSync('loader.versionGate', {}, () => checkExportVersion(document));
    const data = parseExportDocument(document);
    const fieldDefinitions = parseFieldDefinitions(data.event.fields);

    const entities = withSpanSync('loader.factories', {}, () => {
      const parts: EventPart[] = Object.entries(data.event.parts)
        .map(([key, partData]) => createEventPart(parseId(key), partData))
        .sort(compareParts);
      const partsById = new Map(parts.map((part) => [part.id, part]));

      // Created in sort order so every part's trackIds come out sorted as well
      const tracks: EventTrack[] = Object.entries(data.event.parts)
        .flatMap(([partKey, partData]) => {
          const part = partsById.get(parseId(partKey));
          return part
            ? Object.entries(partData.tracks).map(([trackKey, trackData]) => ({
                part,
                id: parseId(trackKey),
                sortkey: trackData.sortkey,
                trackData,
              }))
            : [];
        })
        .sort(compareTracks)
        .map(({ part, id, trackData }) => createEventTrack(id, trackData, part));
      const tracksById = new Map(tracks.map((track) => [track.id, track]));

      const unsortedCourses = Object.entries(data.courses).map(([key, courseData]) =>
        createCourse(parseId(key), courseData, tracksById, fieldDefinitions)
      );
      const courses: Course[] = unsortedCourses.sort(compareCourses(courseNumberWidth(unsortedCourses)));
      const coursesById = new Map(courses.map((course) => [course.id, course]));

      const lodgementGroups: LodgementGroup[] = Object.entries(data.lodgement_groups)
        .map(([key, groupData]) => createLodgementGroup(parseId(key), groupData))
        .sort(compareByTitle);
      const groupsById = new Map(lodgementGroups.map((group) => [group.id, group]));

      // Sorted before creation so the groups' lodgementIds follow lodgement order
      const lodgements: Lodgement[] = Object.entries(data.lodgements)
        .map(([key, lodgementData]) => ({ id: parseId(key), title: lodgementData.title, lodgementData }))
        .sort(compareByTitle)
        .map(({ id, lodgementData }) => createLodgement(id, lodgementData, parts, groupsById, fieldDefinitions));
      const lodgementsById = new Map(lodgements.map((lodgement) => [lodgement.id, lodgement]));

      const timestamp = parseDateTime(data.timestamp, 'timestamp');
      const firstPart = parts[0];
      const referenceDate = firstPart
        ? firstPart.begin
        : new Date(Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), timestamp.getUTCDate()));

      const registrations: Registration[] = Object.entries(data.registrations)
        .map(([key, registrationData]) =>
          createRegistration(parseId(key), registrationData, {
            referenceDate,
            partsById,
            tracksById,
            coursesById,
            lodgementsById,
            fieldDefinitions,
          })
        )
        .sort(compareRegistrations);

      setSpanAttributes(
        buildGraphAttributes({
          parts: parts.length,
          tracks: tracks.length,
          courses: courses.length,
          lodgements: lodgements.length,
          registrations: registrations.length,
        })
      );

      return { timestamp, parts, tracks, courses, lodgementGroups, lodgements, registrations };
    });

    withSpanSync('loader.resolver', {}, () => {
      const stats = resolveEvent(entities);
      setSpanAttributes({
        [TraceAttributes.PRUNED_COUNT]: stats.prunedTracks,
        [TraceAttributes.SYNTHESIZED_COUNT]:
          stats.synthesizedRegistrationParts + stats.synthesizedRegistrationTracks + stats.synthesizedCourseTracks,
        [TraceAttributes.ATTENDEE_COUNT]: stats.attendees,
        [TraceAttributes.INHABITANT_COUNT]: stats.inhabitants,
      });
    });

    setSpanAttributes({
      [TraceAttributes.EXPORT_VERSION]: `${exportVersion[0]}.${exportVersion[1]}`,
      [TraceAttributes.EVENT_SHORTNAME]: data.event.shortname,
    });

    return new Event({
      title: data.event.title,
      shortname: data.event.shortname,
      courseRoomField: data.event.course_room_field ?? null,
      exportVersion,
      fieldDefinitions,
      ...entities,
    });
  });
}

/**
 * Parse export JSON text and build the entity graph
 *
 * @throws ExportFormatError if the text is not valid JSON
 */
export function loadEvent(text: string): Event {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExportFormatError(`Export is not valid JSON: ${reason}`);
  }
  return buildEvent(document);
}

/**
 * Read an export file and build the entity graph
 *
 * @returns The event, or null if the file cannot be read
 * @throws ExportError if the file was read but is not a usable export
 */
export function loadInputFile(filename: string): Event | null {
  let text: string;
  try {
    text = fs.readFileSync(filename, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  Could not read export file '${filename}': ${reason}`);
    return null;
  }

  return withSpanSync('loader.loadInputFile', { [TraceAttributes.INPUT_PATH]: filename }, () => loadEvent(text));
}
