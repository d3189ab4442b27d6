/**
 * Zod Validation Schemas
 *
 * Runtime validation for everything the pipeline accepts from outside:
 * roster rows, the transcript text and pipeline options.
 *
 * Roster rows usually come from a spreadsheet, so cells arrive as strings
 * or numbers and blank optional cells arrive as empty strings. The schemas
 * accept those shapes and hand back clean, typed values.
 *
 * Usage:
 *   import { rosterSchema, type RosterRow } from './schemas';
 *   const result = rosterSchema.safeParse(rows);
 *   const roster: RosterRow[] = result.success ? result.data : [];
 */

import { z } from 'zod';

// ============================================================
// Cell Helpers
// ============================================================

/** Text cell that must not be blank */
const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(200, `${label} cannot exceed 200 characters`);

/** Blank cells (undefined, null, "") become null */
const blankToNull = (value: unknown) =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '')
    ? null
    : value;

// ============================================================
// Roster Schemas
// ============================================================

/**
 * One drafted competitor.
 *
 * - owner: fantasy team that drafted the competitor
 * - wrestler_name: competitor name as it should appear in transcripts
 * - weight_class: "125", 125, "125 lbs" or "HWT"
 * - seed: optional tournament seed, numeric or numeric string
 * - school: optional, kept for display
 */
export const rosterRowSchema = z.object({
  owner: requiredText('Owner'),
  wrestler_name: requiredText('Wrestler name'),
  weight_class: z.union([
    z.number().int('Weight class must be a whole number').positive('Weight class must be positive'),
    requiredText('Weight class'),
  ]),
  seed: z.preprocess(
    blankToNull,
    z.coerce
      .number()
      .int('Seed must be an integer')
      .min(1, 'Seed must be at least 1')
      .max(64, 'Seed cannot exceed 64')
      .nullable()
  ).optional(),
  school: z.preprocess(blankToNull, z.string().trim().max(200).nullable()).optional(),
});

/** The roster must name at least one competitor */
export const rosterSchema = z
  .array(rosterRowSchema)
  .min(1, 'Roster must contain at least one competitor');

// ============================================================
// Transcript Schema
// ============================================================

/** Transcript text must contain something other than whitespace */
export const transcriptSchema = z
  .string({
    required_error: 'Transcript is required',
    invalid_type_error: 'Transcript must be text',
  })
  .refine((text) => text.trim().length > 0, { message: 'Transcript is empty' });

// ============================================================
// Pipeline Options
// ============================================================

export const pipelineOptionsSchema = z
  .object({
    /** Names flagged whenever a transcript line mentions them */
    watchList: z.array(z.string().trim().min(1)).default([]),
    /** Accepted weight headers; empty accepts any two- or three-digit header */
    weightClasses: z.array(z.union([z.string().trim().min(1), z.number().int().positive()])).default([]),
    /** Report roster entries that never appear in the transcript */
    reportUnseenRosterEntries: z.boolean().default(true),
  })
  .strict();

export type RosterRow = z.output<typeof rosterRowSchema>;
export type PipelineOptionsInput = z.input<typeof pipelineOptionsSchema>;
