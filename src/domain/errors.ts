// src/domain/errors.ts

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_AUTHENTICATED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "DUPLICATE_APPLICATION"
  | "INVALID_SALARY_RANGE"
  | "INVALID_TRANSITION"
  | "INTERNAL";

/**
 * Base class for every failure a handler may surface to a client.
 * Anything thrown that is not an AppError is treated as an internal failure.
 */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code: ErrorCode = "VALIDATION_ERROR";
  readonly status: number = 400;
}

export class NotAuthenticatedError extends AppError {
  readonly code: ErrorCode = "NOT_AUTHENTICATED";
  readonly status: number = 401;
}

export class ForbiddenError extends AppError {
  readonly code: ErrorCode = "FORBIDDEN";
  readonly status: number = 403;
}

export class NotFoundError extends AppError {
  readonly code: ErrorCode = "NOT_FOUND";
  readonly status: number = 404;
}

export class ConflictError extends AppError {
  readonly code: ErrorCode = "CONFLICT";
  readonly status: number = 409;
}

export class DuplicateApplicationError extends ConflictError {
  readonly code: ErrorCode = "DUPLICATE_APPLICATION";

  constructor(message = "You have already applied to this job") {
    super(message);
  }
}

export class InvalidSalaryRangeError extends ConflictError {
  readonly code: ErrorCode = "INVALID_SALARY_RANGE";
  readonly status: number = 400;

  constructor(message = "Maximum salary must be greater than minimum salary") {
    super(message);
  }
}

export class InvalidTransitionError extends AppError {
  readonly code: ErrorCode = "INVALID_TRANSITION";
  readonly status: number = 400;
}

export class InternalError extends AppError {
  readonly code: ErrorCode = "INTERNAL";
  readonly status: number = 500;
}
