import { Request, Response, NextFunction } from 'express';
import '../types/express';
import schedulerService from '../services/schedulerService';
import { evaluateOptionsSchema, evaluateRequestSchema, EvaluateOptionsInput } from '../schemas/request';
import { createOffering, validateMaxCandidates } from '../utils/validation';
import { buildEvaluationResponse } from '../utils/responseBuilder';
import { Offering } from '../types';
import { config } from '../config';

/**
 * Run the engine and send the ranked result; shared by the inline and stored-catalog endpoints
 */
export function respondWithEvaluation(
  req: Request,
  res: Response,
  offerings: Offering[],
  options: EvaluateOptionsInput
): void {
  const startTime = Date.now();
  const maxCandidates = validateMaxCandidates(
    options.maxCandidates ?? config.DEFAULT_MAX_CANDIDATES,
    config.MAX_CANDIDATES_LIMIT
  );

  const result = schedulerService.evaluateSchedules(
    offerings,
    { policy: options.policy, maxCandidates },
    { requestId: req.requestId }
  );
  res.json(buildEvaluationResponse(result, maxCandidates, Date.now() - startTime));
}

/**
 * POST /api/schedules
 * Body: { offerings: [...], policy?: "CONFLICT_FIRST" | "PRIORITY_FIRST", maxCandidates?: number }
 */
export function evaluateSchedules(req: Request, res: Response, next: NextFunction): void {
  try {
    const { offerings, ...options } = evaluateRequestSchema.parse(req.body);
    respondWithEvaluation(req, res, offerings.map((input) => createOffering(input)), options);
  } catch (error) {
    next(error);
  }
}

export function parseEvaluateOptions(body: unknown): EvaluateOptionsInput {
  return evaluateOptionsSchema.parse(body ?? {});
}
