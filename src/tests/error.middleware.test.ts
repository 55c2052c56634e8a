import { DatabaseError } from 'pg';
import { z } from 'zod';
import { describeError } from '../middlewares/error.middleware';
import {
  ConflictError,
  EmptyInputError,
  NotFoundError,
  PG_CHECK_VIOLATION,
  PG_UNIQUE_VIOLATION,
  ValidationError,
} from '../utils/errors';

const databaseError = (code: string, constraint: string): DatabaseError => {
  const error = new DatabaseError('constraint violated', 0, 'error');
  error.code = code;
  error.constraint = constraint;
  return error;
};

describe('describeError', () => {
  it.each([
    [new ValidationError('Invalid email format'), 400, 'VALIDATION_ERROR'],
    [new EmptyInputError('At least one product must be provided'), 400, 'EMPTY_INPUT'],
    [new NotFoundError('Invalid customer ID'), 404, 'NOT_FOUND'],
    [new ConflictError('Email already exists'), 409, 'CONFLICT'],
  ])('maps %p onto its status and code', (error, statusCode, code) => {
    expect(describeError(error)).toEqual({
      statusCode,
      message: error.message,
      error: { code, details: undefined },
    });
  });

  it('keeps application error details', () => {
    const error = new ConflictError('Email already exists', { email: 'a@example.com' });

    expect(describeError(error).error).toEqual({ code: 'CONFLICT', details: { email: 'a@example.com' } });
  });

  it('reports the first zod issue', () => {
    const result = z.object({ name: z.string({ required_error: 'Name is required' }) }).safeParse({});
    if (result.success) {
      throw new Error('expected the parse to fail');
    }

    const description = describeError(result.error);

    expect(description.statusCode).toBe(400);
    expect(description.message).toBe('Name is required');
    expect(description.error.code).toBe('VALIDATION_ERROR');
  });

  it('maps a unique violation onto a conflict', () => {
    expect(describeError(databaseError(PG_UNIQUE_VIOLATION, 'customers_email_key'))).toEqual({
      statusCode: 409,
      message: 'Resource already exists',
      error: { code: 'CONFLICT', details: 'customers_email_key' },
    });
  });

  it('maps a check violation onto a validation error', () => {
    expect(describeError(databaseError(PG_CHECK_VIOLATION, 'products_price_check'))).toEqual({
      statusCode: 400,
      message: 'Value violates a data constraint',
      error: { code: 'VALIDATION_ERROR', details: 'products_price_check' },
    });
  });

  it('hides unexpected errors behind a 500', () => {
    const description = describeError(new Error('socket hang up'));

    expect(description.statusCode).toBe(500);
    expect(description.message).toBe('Internal server error');
    expect(description.error.code).toBe('INTERNAL_ERROR');
  });
});
