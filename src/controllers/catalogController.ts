import { Request, Response, NextFunction } from 'express';
import catalogService from '../services/catalogService';
import { createCatalogSchema, offeringInputSchema, offeringPatchSchema } from '../schemas/request';
import { parseEvaluateOptions, respondWithEvaluation } from './scheduleController';

/**
 * POST /api/catalogs
 */
export function createCatalog(req: Request, res: Response, next: NextFunction): void {
  try {
    const { offerings } = createCatalogSchema.parse(req.body ?? {});
    const catalog = catalogService.createCatalog(offerings);
    res.status(201).json({ ok: true, id: catalog.id, offerings: catalog.listOfferings() });
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/catalogs/:id
 */
export function deleteCatalog(req: Request, res: Response, next: NextFunction): void {
  try {
    catalogService.deleteCatalog(req.params.id);
    res.status(204).end();
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/catalogs/:id/offerings
 */
export function listOfferings(req: Request, res: Response, next: NextFunction): void {
  try {
    const offerings = catalogService.getCatalog(req.params.id).listOfferings();
    res.json({ ok: true, offerings, count: offerings.length });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/catalogs/:id/offerings
 */
export function addOffering(req: Request, res: Response, next: NextFunction): void {
  try {
    const catalog = catalogService.getCatalog(req.params.id);
    const offering = catalog.addOffering(offeringInputSchema.parse(req.body));
    res.status(201).json({ ok: true, offering });
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/catalogs/:id/offerings/:name/:sectionId
 */
export function updateOffering(req: Request, res: Response, next: NextFunction): void {
  try {
    const catalog = catalogService.getCatalog(req.params.id);
    const patch = offeringPatchSchema.parse(req.body);
    const offering = catalog.updateOffering(req.params.name, req.params.sectionId, patch);
    res.json({ ok: true, offering });
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/catalogs/:id/offerings/:name/:sectionId
 */
export function removeOffering(req: Request, res: Response, next: NextFunction): void {
  try {
    const catalog = catalogService.getCatalog(req.params.id);
    const offering = catalog.removeOffering(req.params.name, req.params.sectionId);
    res.json({ ok: true, offering });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/catalogs/:id/schedules
 * Body: { policy?, maxCandidates? }
 */
export function evaluateCatalog(req: Request, res: Response, next: NextFunction): void {
  try {
    const catalog = catalogService.getCatalog(req.params.id);
    respondWithEvaluation(req, res, catalog.listOfferings(), parseEvaluateOptions(req.body));
  } catch (error) {
    next(error);
  }
}
