import { Offering } from '../../types';
import { OfferingInput } from '../../schemas/request';
import { createOffering } from '../../utils/validation';

/**
 * Build a validated offering for tests; slots use slot notation, e.g. "Mon/1"
 */
export function makeOffering(
  name: string,
  sectionId: string,
  timeSlots: string[] = [],
  overrides: Partial<OfferingInput> = {}
): Offering {
  return createOffering({
    name,
    sectionId,
    category: 'REQUIRED',
    credits: 3,
    timeSlots,
    ...overrides,
  });
}
