import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError, z } from 'zod';
import { createErrorResponse } from '../utils/response-factory';
import { ErrorCode } from '../types/error.types';

const requestParts = (req: Request) => ({
  body: req.body,
  params: req.params,
  query: req.query,
});

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema
 *
 * Usage:
 * ```typescript
 * router.post('/submit', validate(submitSchema), queueController.submit);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await schema.parseAsync(requestParts(req));
      next();
      return;
    } catch (error) {
      if (error instanceof ZodError) {
        const errorDetails = error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        }));

        res.status(400).json(
          createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
            errors: errorDetails,
          })
        );
        return;
      }
      next(error);
      return;
    }
  };
};

/**
 * Typed view of a request that `validate(schema)` already accepted
 */
export const parseRequest = <T extends AnyZodObject>(schema: T, req: Request): z.infer<T> =>
  schema.parse(requestParts(req));
