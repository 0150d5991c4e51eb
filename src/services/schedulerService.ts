import {
  EvaluationOptions,
  EvaluationResult,
  EvaluationState,
  Offering,
  ScheduleCandidate,
} from '../types';
import { logger, LogContext } from '../utils/logger';
import { EvaluationAbortedError, InvalidStateError } from '../utils/errors';
import { validateMaxCandidates } from '../utils/validation';
import { precheck } from './grouping';
import { enumerateCombinations, planEnumeration } from './enumerator';
import { buildCandidate, rankCandidates } from './ranking';

/**
 * One run of the engine over an immutable catalog snapshot.
 *
 * IDLE -> EVALUATING -> DONE | FAILED. A run cannot be restarted; a failed
 * run needs a new evaluation with a corrected catalog.
 */
export class ScheduleEvaluation {
  private currentState: EvaluationState = 'IDLE';
  private outcome: EvaluationResult | null = null;
  private failure: Error | null = null;
  private readonly offerings: readonly Offering[];

  constructor(
    offerings: readonly Offering[],
    private readonly options: EvaluationOptions,
    private readonly logContext: LogContext = {}
  ) {
    this.offerings = Object.freeze([...offerings]);
  }

  get state(): EvaluationState {
    return this.currentState;
  }

  get result(): EvaluationResult | null {
    return this.outcome;
  }

  get error(): Error | null {
    return this.failure;
  }

  run(): EvaluationResult {
    if (this.currentState !== 'IDLE') {
      throw new InvalidStateError(`Evaluation already ${this.currentState.toLowerCase()}`);
    }

    this.currentState = 'EVALUATING';
    try {
      this.outcome = this.evaluate();
      this.currentState = 'DONE';
      return this.outcome;
    } catch (error) {
      this.failure = error instanceof Error ? error : new Error(String(error));
      this.currentState = 'FAILED';
      throw error;
    }
  }

  private checkAborted(): void {
    if (this.options.signal?.aborted) {
      throw new EvaluationAbortedError();
    }
  }

  private evaluate(): EvaluationResult {
    const { policy, signal } = this.options;
    const maxCandidates = validateMaxCandidates(this.options.maxCandidates);
    const startTime = Date.now();

    this.checkAborted();
    const { groups, mandatoryNames } = precheck(this.offerings);
    const plan = planEnumeration(groups, maxCandidates);

    logger.debug('Enumeration planned', {
      ...this.logContext,
      offerings: this.offerings.length,
      groups: groups.length,
      mandatory: mandatoryNames.length,
      totalCombinations: plan.totalCombinations,
      maxCandidates,
    });

    if (plan.willTruncate) {
      logger.warn('Candidate cap reached, results are partial', {
        ...this.logContext,
        totalCombinations: plan.totalCombinations,
        maxCandidates,
      });
    }

    const candidates: ScheduleCandidate[] = [];
    for (const tuple of enumerateCombinations(groups, maxCandidates)) {
      if (signal) this.checkAborted();
      candidates.push(buildCandidate(tuple));
    }

    const { clean, conflicting } = rankCandidates(candidates, policy);

    logger.info('Schedule evaluation finished', {
      ...this.logContext,
      policy,
      candidatesGenerated: candidates.length,
      clean: clean.length,
      conflicting: conflicting.length,
      truncated: plan.willTruncate,
      duration: Date.now() - startTime,
    });

    return {
      policy,
      clean,
      conflicting,
      truncated: plan.willTruncate,
      totalCombinations: plan.totalCombinations,
      candidatesGenerated: candidates.length,
    };
  }
}

class SchedulerService {
  /**
   * Enumerate and rank every combination of one offering per course name.
   * Throws MandatoryUnsatisfiableError before any enumeration work when a mandatory course is unavailable.
   */
  evaluateSchedules(
    offerings: readonly Offering[],
    options: EvaluationOptions,
    logContext: LogContext = {}
  ): EvaluationResult {
    return new ScheduleEvaluation(offerings, options, logContext).run();
  }
}

export default new SchedulerService();
