/**
 * Zod Validation Schemas for the Partial Export
 *
 * Structural validation of the JSON document written by the registration database. The schemas check
 * JSON types and required keys only; integer codes (gender, status, field kinds), dates and custom
 * field values stay raw here and are decoded by the loader's parsers and factories.
 *
 * Collections are JSON objects keyed by the entity's id as a string.
 */

import { z } from 'zod';

// ============================================================================
// Shared building blocks
// ============================================================================

/** Object key holding a canonical string-encoded integer id (no leading zeros, no "-0") */
export const IdKeySchema = z.string().regex(/^(0|-?[1-9]\d*)$/, 'Expected an integer id as object key');

const idMap = <T extends z.ZodTypeAny>(value: T) => z.record(IdKeySchema, value);

/** Free-text attribute; absent and null both read as '' */
const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const OptionalIdSchema = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? null);

const OptionalFlagSchema = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

/** Raw custom field values; coerced later against the field definitions */
const RawFieldsSchema = z.record(z.string(), z.unknown()).default({});

export const ExportVersionTagSchema = z.union([
  z.tuple([z.number().int(), z.number().int()]),
  z.number().int(),
]);

// ============================================================================
// Event descriptor
// ============================================================================

export const FieldDefinitionSchema = z.object({
  kind: z.number().int(),
  association: z.number().int().nullish(),
});

export const TrackSchema = z.object({
  title: z.string(),
  shortname: z.string(),
  sortkey: z.number(),
  num_choices: z.number().int().min(0),
  min_choices: z.number().int().min(0).nullish(),
});

export const PartSchema = z.object({
  title: z.string(),
  shortname: z.string(),
  part_begin: z.string(),
  part_end: z.string(),
  tracks: idMap(TrackSchema).default({}),
});

export const EventDescriptorSchema = z.object({
  title: z.string(),
  shortname: z.string(),
  course_room_field: z.string().nullish(),
  fields: z.record(z.string(), FieldDefinitionSchema).default({}),
  parts: idMap(PartSchema),
});

// ============================================================================
// Courses and lodgements
// ============================================================================

export const CourseSchema = z.object({
  nr: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  title: z.string(),
  shortname: z.string(),
  description: OptionalTextSchema,
  instructors: OptionalTextSchema,
  min_size: z.number().int().nullish(),
  max_size: z.number().int().nullish(),
  notes: OptionalTextSchema,
  fields: RawFieldsSchema,
  segments: idMap(z.boolean()).default({}),
});

export const LodgementGroupSchema = z.object({
  title: z.string(),
});

export const LodgementSchema = z.object({
  title: z.string(),
  group_id: OptionalIdSchema,
  regular_capacity: z.number().int().nullish(),
  camping_mat_capacity: z.number().int().nullish(),
  notes: OptionalTextSchema,
  fields: RawFieldsSchema,
});

// ============================================================================
// Registrations
// ============================================================================

export const PersonaSchema = z.object({
  id: z.number().int(),
  title: OptionalTextSchema,
  given_names: z.string(),
  family_name: z.string(),
  name_supplement: OptionalTextSchema,
  display_name: OptionalTextSchema,
  gender: z.number().int(),
  birthday: z.string(),
  username: OptionalTextSchema,
  telephone: OptionalTextSchema,
  mobile: OptionalTextSchema,
  address: OptionalTextSchema,
  address_supplement: OptionalTextSchema,
  postal_code: OptionalTextSchema,
  location: OptionalTextSchema,
  country: OptionalTextSchema,
  is_orga: OptionalFlagSchema,
});

export const RegistrationPartSchema = z.object({
  status: z.number().int(),
  lodgement_id: OptionalIdSchema,
  is_camping_mat: OptionalFlagSchema,
});

export const RegistrationTrackSchema = z.object({
  course_id: OptionalIdSchema,
  course_instructor: OptionalIdSchema,
  choices: z.array(z.number().int().nullable()).default([]),
});

export const RegistrationSchema = z.object({
  persona: PersonaSchema,
  list_consent: OptionalFlagSchema,
  notes: OptionalTextSchema,
  orga_notes: OptionalTextSchema,
  payment: z.string().nullish(),
  amount_paid: z
    .number()
    .nullish()
    .transform((value) => value ?? 0),
  checkin: z.string().nullish(),
  parental_agreement: OptionalFlagSchema,
  mixed_lodging: OptionalFlagSchema,
  fields: RawFieldsSchema,
  parts: idMap(RegistrationPartSchema).default({}),
  tracks: idMap(RegistrationTrackSchema).default({}),
});

// ============================================================================
// Document
// ============================================================================

export const PartialExportSchema = z.object({
  kind: z.string(),
  EVENT_SCHEMA_VERSION: ExportVersionTagSchema,
  id: z.number().int().nullish(),
  timestamp: z.string(),
  event: EventDescriptorSchema,
  courses: idMap(CourseSchema).default({}),
  lodgement_groups: idMap(LodgementGroupSchema).default({}),
  lodgements: idMap(LodgementSchema).default({}),
  registrations: idMap(RegistrationSchema).default({}),
});

export type PartialExport = z.infer<typeof PartialExportSchema>;
export type PartialExportInput = z.input<typeof PartialExportSchema>;
export type FieldDefinitionData = z.infer<typeof FieldDefinitionSchema>;
export type PartData = z.infer<typeof PartSchema>;
export type TrackData = z.infer<typeof TrackSchema>;
export type CourseData = z.infer<typeof CourseSchema>;
export type LodgementGroupData = z.infer<typeof LodgementGroupSchema>;
export type LodgementData = z.infer<typeof LodgementSchema>;
export type PersonaData = z.infer<typeof PersonaSchema>;
export type RegistrationData = z.infer<typeof RegistrationSchema>;
export type RegistrationPartData = z.infer<typeof RegistrationPartSchema>;
export type RegistrationTrackData = z.infer<typeof RegistrationTrackSchema>;
