import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Async handler wrapper
 *
 * Forwards a rejected handler promise to the Express error middleware, where
 * AppErrors (409 reservation conflicts, 400 validation failures) become
 * error responses.
 *
 * Usage:
 * ```typescript
 * next = asyncHandler(async (_req, res) => {
 *   const result = await this.queueService.next();
 *   res.json(createSuccessResponse(result));
 * });
 * ```
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};
