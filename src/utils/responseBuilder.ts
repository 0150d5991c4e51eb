import { EvaluationResult, Offering, ScheduleCandidate, TimeSlot } from '../types';
import { formatSlot } from './slotParser';

interface OfferingSummary {
  name: string;
  sectionId: string;
  category: Offering['category'];
  credits: number;
  priority: number;
  mandatory: boolean;
  teacher: string;
  notes: string;
  timeSlots: TimeSlot[];
  slotText: string;
}

interface ConflictSummary {
  day: TimeSlot['day'];
  period: number;
  offerings: Array<{ name: string; sectionId: string }>;
}

export interface CandidateResponse {
  rank: number;
  totalCredits: number;
  requiredCredits: number;
  electiveCredits: number;
  totalPriority: number;
  conflictCount: number;
  offerings: OfferingSummary[];
  conflicts: ConflictSummary[];
}

export interface EvaluationResponse {
  ok: true;
  policy: EvaluationResult['policy'];
  truncated: boolean;
  warnings: string[];
  clean: CandidateResponse[];
  conflicting: CandidateResponse[];
  debug: {
    candidatesGenerated: number;
    totalCombinations: number;
    maxCandidates: number;
    executionTime: number;
  };
}

function summarizeOffering(offering: Offering): OfferingSummary {
  return {
    name: offering.name,
    sectionId: offering.sectionId,
    category: offering.category,
    credits: offering.credits,
    priority: offering.priority,
    mandatory: offering.mandatory,
    teacher: offering.teacher,
    notes: offering.notes,
    timeSlots: offering.timeSlots,
    slotText: offering.timeSlots.map(formatSlot).join('; '),
  };
}

export function serializeCandidate(candidate: ScheduleCandidate, rank: number): CandidateResponse {
  return {
    rank,
    totalCredits: candidate.totalCredits,
    requiredCredits: candidate.requiredCredits,
    electiveCredits: candidate.electiveCredits,
    totalPriority: candidate.totalPriority,
    conflictCount: candidate.conflictCount,
    offerings: candidate.offerings.map(summarizeOffering),
    conflicts: candidate.conflicts.map((conflict) => ({
      day: conflict.day,
      period: conflict.period,
      offerings: conflict.offerings.map(({ name, sectionId }) => ({ name, sectionId })),
    })),
  };
}

/**
 * Build the API response; ranks are 1-based and restart in each result set
 */
export function buildEvaluationResponse(
  result: EvaluationResult,
  maxCandidates: number,
  executionTime: number
): EvaluationResponse {
  const warnings: string[] = [];
  if (result.truncated) {
    warnings.push(
      `Only the first ${maxCandidates} of ${result.totalCombinations} combinations were evaluated; raise maxCandidates to see more`
    );
  }

  return {
    ok: true,
    policy: result.policy,
    truncated: result.truncated,
    warnings,
    clean: result.clean.map((candidate, idx) => serializeCandidate(candidate, idx + 1)),
    conflicting: result.conflicting.map((candidate, idx) => serializeCandidate(candidate, idx + 1)),
    debug: {
      candidatesGenerated: result.candidatesGenerated,
      totalCombinations: result.totalCombinations,
      maxCandidates,
      executionTime,
    },
  };
}
