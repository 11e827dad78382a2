import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { formatZodError } from './validation.middleware';
import { logger } from '../config/logger';

// body-parser marks malformed JSON with this type
const isBodyParseError = (err: Error): boolean =>
  err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  // AppError (known application errors)
  if (err instanceof AppError) {
    logger.log(err.statusCode >= 500 ? 'error' : 'warn', 'Request failed', {
      code: err.code,
      error: err.message,
      path: req.path,
      method: req.method,
    });

    return res.status(err.statusCode).json(createErrorResponse(err.code, err.message, err.details));
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    logger.warn('Validation failed', { path: req.path, method: req.method });
    return res.status(400).json(
      createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
        errors: formatZodError(err),
      })
    );
  }

  if (isBodyParseError(err)) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body'));
  }

  // Unknown errors - don't expose internals
  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse(ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`));
};
