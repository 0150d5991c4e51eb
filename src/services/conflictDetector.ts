import { Offering, SlotConflict } from '../types';
import { compareSlots, slotKey } from '../utils/slotParser';

/**
 * Map every occupied (day, period) to the offerings of the tuple that meet in it
 */
export function buildSlotMap(tuple: readonly Offering[]): Map<string, SlotConflict> {
  const slotMap = new Map<string, SlotConflict>();

  for (const offering of tuple) {
    for (const slot of offering.timeSlots) {
      const key = slotKey(slot);
      const entry = slotMap.get(key);
      if (entry) {
        // Guard against un-normalised input repeating a slot inside one offering
        if (!entry.offerings.includes(offering)) {
          entry.offerings.push(offering);
        }
      } else {
        slotMap.set(key, { day: slot.day, period: slot.period, offerings: [offering] });
      }
    }
  }

  return slotMap;
}

/**
 * Slot collisions of a tuple, ordered by day then period.
 * The number of conflicts is the number of colliding slots, not of colliding offering pairs.
 */
export function detectConflicts(tuple: readonly Offering[]): SlotConflict[] {
  return Array.from(buildSlotMap(tuple).values())
    .filter((entry) => entry.offerings.length > 1)
    .sort(compareSlots);
}
