// Core domain types

export type DayOfWeek = 'MON' | 'TUE' | 'WED' | 'THU' | 'FRI' | 'SAT' | 'SUN';

export const DAYS_OF_WEEK: readonly DayOfWeek[] = ['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN'];

export interface TimeSlot {
  day: DayOfWeek;
  period: number; // 1-based class period
  room?: string; // informational only, never part of slot identity
}

export type CourseCategory = 'REQUIRED' | 'ELECTIVE';

export interface Offering {
  name: string;
  category: CourseCategory;
  sectionId: string;
  credits: number;
  priority: number; // 1 (lowest) .. 5 (highest)
  timeSlots: TimeSlot[];
  mandatory: boolean;
  excluded: boolean;
  teacher: string;
  notes: string;
}

export interface OfferingGroup {
  name: string;
  offerings: Offering[];
}

export interface SlotConflict {
  day: DayOfWeek;
  period: number;
  offerings: Offering[];
}

export interface CandidateMetrics {
  totalCredits: number;
  requiredCredits: number;
  electiveCredits: number;
  totalPriority: number;
}

export interface ScheduleCandidate extends CandidateMetrics {
  offerings: Offering[];
  conflicts: SlotConflict[];
  conflictCount: number;
}

export type RankingPolicy = 'CONFLICT_FIRST' | 'PRIORITY_FIRST';

export interface EvaluationOptions {
  policy: RankingPolicy;
  maxCandidates: number;
  signal?: AbortSignal;
}

export interface EvaluationResult {
  policy: RankingPolicy;
  clean: ScheduleCandidate[];
  conflicting: ScheduleCandidate[];
  truncated: boolean;
  totalCombinations: number;
  candidatesGenerated: number;
}

export type EvaluationState = 'IDLE' | 'EVALUATING' | 'DONE' | 'FAILED';
