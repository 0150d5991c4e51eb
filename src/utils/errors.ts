/**
 * Application error types
 * Every error carries an HTTP status and a stable machine-readable code
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;
  readonly isOperational = true;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/**
 * A mandatory course name has no available (non-excluded) offering
 */
export class MandatoryUnsatisfiableError extends AppError {
  readonly courseName: string;

  constructor(courseName: string) {
    super(
      `Mandatory course "${courseName}" has no available offering (all offerings are excluded or missing)`,
      422,
      'MANDATORY_UNSATISFIABLE',
      { courseName }
    );
    this.courseName = courseName;
  }
}

export class InvalidParameterError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'INVALID_PARAMETER', details);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'INVALID_STATE');
  }
}

export class EvaluationAbortedError extends AppError {
  constructor() {
    super('Schedule evaluation was aborted', 499, 'EVALUATION_ABORTED');
  }
}

export class DuplicateOfferingError extends AppError {
  constructor(name: string, sectionId: string) {
    super(`Offering "${name}" (section ${sectionId}) already exists`, 409, 'DUPLICATE_OFFERING', {
      name,
      sectionId,
    });
  }
}

export class OfferingNotFoundError extends AppError {
  constructor(name: string, sectionId: string) {
    super(`Offering "${name}" (section ${sectionId}) not found`, 404, 'OFFERING_NOT_FOUND', {
      name,
      sectionId,
    });
  }
}

export class CatalogNotFoundError extends AppError {
  constructor(catalogId: string) {
    super(`Catalog "${catalogId}" not found`, 404, 'CATALOG_NOT_FOUND', { catalogId });
  }
}
