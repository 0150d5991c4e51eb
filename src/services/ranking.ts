/**
 * Candidate metrics and ranking policies
 */

import { CandidateMetrics, Offering, RankingPolicy, ScheduleCandidate } from '../types';
import { detectConflicts } from './conflictDetector';

export interface RankedCandidates {
  clean: ScheduleCandidate[];
  conflicting: ScheduleCandidate[];
}

export function computeMetrics(tuple: readonly Offering[]): CandidateMetrics {
  let requiredCredits = 0;
  let electiveCredits = 0;
  let totalPriority = 0;

  for (const offering of tuple) {
    if (offering.category === 'REQUIRED') {
      requiredCredits += offering.credits;
    } else {
      electiveCredits += offering.credits;
    }
    totalPriority += offering.priority;
  }

  return {
    totalCredits: requiredCredits + electiveCredits,
    requiredCredits,
    electiveCredits,
    totalPriority,
  };
}

export function buildCandidate(tuple: readonly Offering[]): ScheduleCandidate {
  const conflicts = detectConflicts(tuple);
  return {
    offerings: [...tuple],
    ...computeMetrics(tuple),
    conflicts,
    conflictCount: conflicts.length,
  };
}

/**
 * Total order for a policy:
 * - CONFLICT_FIRST: fewer conflicts, then higher total priority
 * - PRIORITY_FIRST: higher total priority, then fewer conflicts
 * Ties fall back to higher total credits; a stable sort keeps enumeration order after that.
 */
export function compareCandidates(policy: RankingPolicy): (a: ScheduleCandidate, b: ScheduleCandidate) => number {
  return (a, b) => {
    const byConflicts = a.conflictCount - b.conflictCount;
    const byPriority = b.totalPriority - a.totalPriority;
    const primary = policy === 'CONFLICT_FIRST' ? byConflicts : byPriority;
    const secondary = policy === 'CONFLICT_FIRST' ? byPriority : byConflicts;

    if (primary !== 0) return primary;
    if (secondary !== 0) return secondary;
    return b.totalCredits - a.totalCredits;
  };
}

/**
 * Split into conflict-free and conflicting candidates, each ordered under the policy
 */
export function rankCandidates(candidates: readonly ScheduleCandidate[], policy: RankingPolicy): RankedCandidates {
  const comparator = compareCandidates(policy);
  const clean = candidates.filter((candidate) => candidate.conflictCount === 0).sort(comparator);
  const conflicting = candidates.filter((candidate) => candidate.conflictCount > 0).sort(comparator);
  return { clean, conflicting };
}
