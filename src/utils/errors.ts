import { DatabaseError } from 'pg';

// PostgreSQL SQLSTATE codes the API maps to client errors
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_CHECK_VIOLATION = '23514';

/**
 * Base class for errors that are the caller's fault and map to a 4xx response
 */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input: bad email, bad phone, non-positive price, negative stock */
export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';
}

/** A required list was supplied empty */
export class EmptyInputError extends AppError {
  readonly statusCode = 400;
  readonly code = 'EMPTY_INPUT';
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}

/** Uniqueness clash, e.g. an email that is already registered */
export class ConflictError extends AppError {
  readonly statusCode = 409;
  readonly code = 'CONFLICT';
}

export const isDatabaseError = (error: unknown, code: string): error is DatabaseError =>
  error instanceof DatabaseError && error.code === code;
