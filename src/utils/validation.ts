import { z } from 'zod';
import { Offering, TimeSlot } from '../types';
import { offeringInputSchema, OfferingInput, SlotInput } from '../schemas/request';
import { InvalidParameterError } from './errors';
import { dedupeSlots, parseSlotString } from './slotParser';

/**
 * Resolve mixed slot input (objects and slot notation) into deduplicated, ordered slots
 */
export function resolveSlots(inputs: SlotInput[]): TimeSlot[] {
  const slots: TimeSlot[] = [];

  for (const input of inputs) {
    if (typeof input === 'string') {
      const parsed = parseSlotString(input);
      if (parsed.length === 0 && input.trim()) {
        throw new InvalidParameterError(`Invalid time slot notation: "${input}"`, { slot: input });
      }
      slots.push(...parsed);
    } else {
      slots.push(input.room ? { day: input.day, period: input.period, room: input.room } : { day: input.day, period: input.period });
    }
  }

  return dedupeSlots(slots);
}

export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Build a validated Offering with explicit defaults
 * Out-of-range priority or credits are rejected, never clamped
 */
export function createOffering(input: OfferingInput): Offering {
  const result = offeringInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidParameterError('Invalid offering', formatIssues(result.error));
  }

  const data = result.data;
  return {
    name: data.name,
    category: data.category,
    sectionId: data.sectionId,
    credits: data.credits,
    priority: data.priority,
    timeSlots: resolveSlots(data.timeSlots),
    mandatory: data.mandatory,
    excluded: data.excluded,
    teacher: data.teacher,
    notes: data.notes,
  };
}

export function validateMaxCandidates(maxCandidates: number, limit?: number): number {
  if (!Number.isInteger(maxCandidates) || maxCandidates < 1) {
    throw new InvalidParameterError('maxCandidates must be a positive integer', { maxCandidates });
  }
  if (limit !== undefined && maxCandidates > limit) {
    throw new InvalidParameterError(`maxCandidates must not exceed ${limit}`, { maxCandidates, limit });
  }
  return maxCandidates;
}
