/**
 * Bounded Cartesian product over offering groups
 *
 * Order is odometer order: the first group varies slowest and the last group fastest.
 * Within a group, offerings are visited in the group's own order.
 */

import { Offering, OfferingGroup } from '../types';
import { validateMaxCandidates } from '../utils/validation';

export interface EnumerationPlan {
  totalCombinations: number;
  willTruncate: boolean;
}

/**
 * Product of group sizes, saturating at limit + 1 so very large catalogs never overflow.
 * An empty group list has no combinations.
 */
export function countCombinations(groups: readonly OfferingGroup[], limit: number = Number.MAX_SAFE_INTEGER): number {
  if (groups.length === 0) return 0;

  let product = 1;
  for (const group of groups) {
    product *= group.offerings.length;
    if (product === 0) return 0;
    if (product > limit) return limit + 1;
  }
  return product;
}

export function planEnumeration(groups: readonly OfferingGroup[], maxCandidates: number): EnumerationPlan {
  validateMaxCandidates(maxCandidates);
  const totalCombinations = countCombinations(groups);
  return {
    totalCombinations,
    willTruncate: totalCombinations > maxCandidates,
  };
}

function* odometer(groups: readonly OfferingGroup[], maxCandidates: number): Generator<Offering[], void, undefined> {
  if (groups.length === 0 || groups.some((group) => group.offerings.length === 0)) {
    return;
  }

  const indices: number[] = new Array<number>(groups.length).fill(0);
  let emitted = 0;

  while (emitted < maxCandidates) {
    yield groups.map((group, i) => group.offerings[indices[i]]);
    emitted++;

    // Advance from the last group
    let position = groups.length - 1;
    while (position >= 0) {
      indices[position]++;
      if (indices[position] < groups[position].offerings.length) break;
      indices[position] = 0;
      position--;
    }
    if (position < 0) return;
  }
}

/**
 * Lazily yield one offering per group, stopping after maxCandidates tuples.
 * maxCandidates is validated eagerly, before the first tuple is requested.
 */
export function enumerateCombinations(
  groups: readonly OfferingGroup[],
  maxCandidates: number
): Generator<Offering[], void, undefined> {
  validateMaxCandidates(maxCandidates);
  return odometer(groups, maxCandidates);
}
