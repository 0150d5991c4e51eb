/**
 * Grouping and feasibility pre-check
 * Partitions a catalog into one group per course name and verifies mandatory names are satisfiable
 */

import { Offering, OfferingGroup } from '../types';
import { MandatoryUnsatisfiableError } from '../utils/errors';

export interface PrecheckResult {
  groups: OfferingGroup[];
  mandatoryNames: string[];
}

/**
 * Mandatory offerings first, then priority descending.
 * Array.prototype.sort is stable, so catalog order breaks remaining ties.
 */
function compareWithinGroup(a: Offering, b: Offering): number {
  if (a.mandatory !== b.mandatory) {
    return a.mandatory ? -1 : 1;
  }
  return b.priority - a.priority;
}

/**
 * Group non-excluded offerings by name, in order of first appearance
 */
export function groupOfferings(offerings: readonly Offering[]): OfferingGroup[] {
  const byName = new Map<string, Offering[]>();

  for (const offering of offerings) {
    if (offering.excluded) continue;
    const group = byName.get(offering.name);
    if (group) {
      group.push(offering);
    } else {
      byName.set(offering.name, [offering]);
    }
  }

  return Array.from(byName, ([name, members]) => ({
    name,
    offerings: [...members].sort(compareWithinGroup),
  }));
}

/**
 * Names flagged mandatory on any offering, excluded ones included:
 * excluding every section of a mandatory course must not silently drop it.
 */
export function collectMandatoryNames(offerings: readonly Offering[]): string[] {
  const names = new Set<string>();
  for (const offering of offerings) {
    if (offering.mandatory) {
      names.add(offering.name);
    }
  }
  return Array.from(names);
}

/**
 * Build groups and fail fast when a mandatory course has no available offering
 */
export function precheck(offerings: readonly Offering[]): PrecheckResult {
  if (offerings.length === 0) {
    return { groups: [], mandatoryNames: [] };
  }

  const groups = groupOfferings(offerings);
  const available = new Set(groups.map((group) => group.name));
  const mandatoryNames = collectMandatoryNames(offerings);

  for (const name of mandatoryNames) {
    if (!available.has(name)) {
      throw new MandatoryUnsatisfiableError(name);
    }
  }

  return { groups, mandatoryNames };
}
