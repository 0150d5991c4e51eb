/**
 * Zod schemas for request validation
 */

import { z } from 'zod';

export const dayOfWeekSchema = z.enum(['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN']);

export const timeSlotSchema = z.object({
  day: dayOfWeekSchema,
  period: z.number().int().min(1, 'Period must be a positive integer'),
  room: z.string().trim().min(1).optional(),
});

// A slot is either an object or slot notation such as "Fri / 6,7 / B 312"
export const slotInputSchema = z.union([timeSlotSchema, z.string()]);

export const categorySchema = z.enum(['REQUIRED', 'ELECTIVE']);

export const rankingPolicySchema = z.enum(['CONFLICT_FIRST', 'PRIORITY_FIRST']);

export const offeringInputSchema = z.object({
  name: z.string().trim().min(1, 'Course name is required'),
  category: categorySchema,
  sectionId: z.string().trim().min(1, 'Section id is required'),
  credits: z.number().int('Credits must be an integer').min(0, 'Credits must be non-negative'),
  priority: z.number().int('Priority must be an integer').min(1).max(5).default(3),
  timeSlots: z.array(slotInputSchema).default([]),
  mandatory: z.boolean().default(false),
  excluded: z.boolean().default(false),
  teacher: z.string().default(''),
  notes: z.string().default(''),
});

// name and sectionId identify an offering inside a catalog and cannot be patched
export const offeringPatchSchema = offeringInputSchema
  .omit({ name: true, sectionId: true })
  .partial()
  .strict();

export const evaluateOptionsSchema = z.object({
  policy: rankingPolicySchema.default('CONFLICT_FIRST'),
  // Falls back to DEFAULT_MAX_CANDIDATES at the HTTP layer; the engine itself requires it
  maxCandidates: z.number().int().positive('maxCandidates must be a positive integer').optional(),
});

export const evaluateRequestSchema = evaluateOptionsSchema.extend({
  offerings: z.array(offeringInputSchema),
});

export const createCatalogSchema = z.object({
  offerings: z.array(offeringInputSchema).default([]),
});

export type OfferingInput = z.input<typeof offeringInputSchema>;
export type ParsedOfferingInput = z.infer<typeof offeringInputSchema>;
export type OfferingPatch = z.infer<typeof offeringPatchSchema>;
export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;
export type EvaluateOptionsInput = z.infer<typeof evaluateOptionsSchema>;
export type SlotInput = z.infer<typeof slotInputSchema>;
