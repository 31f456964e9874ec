// Session observation validation
//
// The observation is the raw record submitted for one surf session. This
// module owns its zod schema and turns zod issues into flat, path-addressed
// validation errors that callers can report field by field.

import { z } from 'zod';

/**
 * Maximum length of a stored cardinal direction string
 */
export const MAX_CARDINAL_LENGTH = 5;

/**
 * Maximum length of the free-text session notes
 */
export const MAX_NOTES_LENGTH = 500;

/**
 * Bounds of a Postgres integer column (rating and bearings are stored as int4)
 */
export const INT4_MIN = -2147483648;
export const INT4_MAX = 2147483647;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

/**
 * Check that a YYYY-MM-DD string names a real calendar day (rejects 2024-02-30).
 * Year 0000 does not exist in Postgres dates and is rejected too.
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return false;

  // setUTCFullYear keeps years 1-99 as given; Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Expand HH:MM to HH:MM:SS so both storage backends hold the same text.
 */
export function normalizeTime(value: string): string {
  return value.length === 5 ? `${value}:00` : value;
}

const requiredName = (label: string) =>
  z
    .string()
    .min(1, `${label} is required`)
    .refine((value) => value.trim() !== '', `${label} cannot be blank`);

const reading = z.number().finite();
const int4 = z.number().int().min(INT4_MIN).max(INT4_MAX);
const bearing = int4;
const cardinal = z.string().min(1).max(MAX_CARDINAL_LENGTH);

export const SessionDateSchema = z
  .string()
  .refine(isCalendarDate, 'date must be a calendar date in YYYY-MM-DD form');

export const SessionTimeSchema = z
  .string()
  .regex(TIME_PATTERN, 'time must be HH:MM or HH:MM:SS');

/**
 * Schema for one submitted surf session.
 *
 * Swell and wind readings are required; temperatures are nullable; every tide
 * field may be omitted or null. No ordering between timeIn and timeOut is
 * enforced, and any integer rating is accepted.
 */
export const SessionObservationSchema = z.object({
  spotName: requiredName('spotName'),
  username: requiredName('username'),

  date: SessionDateSchema,
  timeIn: SessionTimeSchema,
  timeOut: SessionTimeSchema,
  rating: int4,
  notes: z.string().max(MAX_NOTES_LENGTH).nullable().optional(),

  airTemp: reading.nullable(),
  waterTemp: reading.nullable(),

  meanWaveDir: bearing,
  meanWaveDirCardinal: cardinal,
  meanWaveHeight: reading,
  domPeriod: reading,

  meanWindDir: bearing,
  meanWindDirCardinal: cardinal,
  meanWindSpeed: reading,
  gustSpeed: reading,

  tideIncoming: z.boolean().nullable().optional(),
  tideMaxHeight: reading.nullable().optional(),
  tideMinHeight: reading.nullable().optional(),
  tideMedianHeight: reading.nullable().optional(),
});

/**
 * One submitted surf session with its environmental readings.
 */
export type SessionObservation = z.infer<typeof SessionObservationSchema>;

/**
 * Validation error codes
 */
export type ObservationValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_VALUE';

/**
 * A single problem found in an observation
 */
export type ObservationValidationError = {
  /** Dotted path to the offending field, or "observation" for the record itself */
  path: string;
  message: string;
  code: ObservationValidationErrorCode;
};

export type ObservationValidationResult =
  | { success: true; observation: SessionObservation }
  | { success: false; errors: ObservationValidationError[] };

function issueCode(issue: z.ZodIssue): ObservationValidationErrorCode {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === z.ZodParsedType.undefined ? 'MISSING_FIELD' : 'INVALID_TYPE';
  }
  return 'INVALID_VALUE';
}

/**
 * Validate an unknown value as a session observation.
 */
export function validateSessionObservation(input: unknown): ObservationValidationResult {
  const parsed = SessionObservationSchema.safeParse(input);

  if (parsed.success) {
    return { success: true, observation: parsed.data };
  }

  return {
    success: false,
    errors: parsed.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : 'observation',
      message: issue.message,
      code: issueCode(issue),
    })),
  };
}
