import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { SqliteError } from 'better-sqlite3';
import { AppError, ErrorCode } from '../types/error.types';
import { createErrorResponse, toErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';

const isBodyParseError = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction) => {
  // Response already streaming (e.g. a failed sendFile); let Express close it
  if (res.headersSent) {
    return next(err);
  }

  // AppError (known application errors)
  if (err instanceof AppError) {
    logger.log(err.statusCode >= 500 ? 'error' : 'warn', 'Request rejected', {
      code: err.code,
      error: err.message,
      details: err.details,
      path: req.path,
      method: req.method,
    });
    return res.status(err.statusCode).json(toErrorResponse(err));
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    return res.status(400).json(
      createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
        errors: err.errors.map((issue) => ({ field: issue.path.join('.'), message: issue.message })),
      })
    );
  }

  // Malformed JSON body
  if (isBodyParseError(err)) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.INVALID_INPUT, 'Request body is not valid JSON'));
  }

  // Log unexpected errors with context
  logger.error('Error occurred', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // SQLite errors
  if (err instanceof SqliteError) {
    if (err.code === 'SQLITE_BUSY') {
      return res
        .status(503)
        .json(createErrorResponse(ErrorCode.DATABASE_ERROR, 'Database is busy, retry the request'));
    }
    if (err.code.startsWith('SQLITE_CONSTRAINT')) {
      return res.status(409).json(createErrorResponse(ErrorCode.DATABASE_ERROR, 'Conflicting write'));
    }
  }

  // PostgreSQL/Supabase errors
  if (err.message.includes('duplicate key')) {
    return res.status(409).json(createErrorResponse(ErrorCode.DATABASE_ERROR, 'Conflicting write'));
  }

  // Unknown errors - don't expose internals
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
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};
