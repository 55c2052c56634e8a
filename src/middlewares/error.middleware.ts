import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import {
  AppError,
  PG_CHECK_VIOLATION,
  PG_FOREIGN_KEY_VIOLATION,
  PG_UNIQUE_VIOLATION,
  isDatabaseError,
} from '../utils/errors';
import { ApiErrorBody, ResponseHandler } from '../utils/response';

export interface ErrorDescription {
  statusCode: number;
  message: string;
  error: ApiErrorBody;
}

// express.json() marks malformed bodies with status 400 and this type
const isMalformedBody = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

/**
 * Map any thrown value onto a status code and response error body
 */
export const describeError = (err: unknown): ErrorDescription => {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      message: err.message,
      error: { code: err.code, details: err.details },
    };
  }

  if (err instanceof ZodError) {
    const [first] = err.issues;
    return {
      statusCode: 400,
      message: first ? first.message : 'Invalid input',
      error: { code: 'VALIDATION_ERROR', details: err.issues },
    };
  }

  if (isMalformedBody(err)) {
    return { statusCode: 400, message: 'Malformed JSON body', error: { code: 'BAD_REQUEST' } };
  }

  if (isDatabaseError(err, PG_UNIQUE_VIOLATION)) {
    return {
      statusCode: 409,
      message: 'Resource already exists',
      error: { code: 'CONFLICT', details: err.constraint },
    };
  }

  if (isDatabaseError(err, PG_FOREIGN_KEY_VIOLATION)) {
    return {
      statusCode: 400,
      message: 'Referenced record does not exist',
      error: { code: 'FOREIGN_KEY_VIOLATION', details: err.constraint },
    };
  }

  if (isDatabaseError(err, PG_CHECK_VIOLATION)) {
    return {
      statusCode: 400,
      message: 'Value violates a data constraint',
      error: { code: 'VALIDATION_ERROR', details: err.constraint },
    };
  }

  return {
    statusCode: 500,
    message: 'Internal server error',
    error: {
      code: 'INTERNAL_ERROR',
      details: appConfig.nodeEnv === 'development' && err instanceof Error ? err.stack : undefined,
    },
  };
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const description = describeError(err);

  if (description.statusCode >= 500) {
    logger.error('[Error Handler]', {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      url: req.originalUrl,
      method: req.method,
      ip: req.ip,
      userAgent: req.get('user-agent'),
      params: req.params,
      query: req.query,
    });
  }

  return ResponseHandler.error(res, description.message, description.statusCode, description.error);
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
