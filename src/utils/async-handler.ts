import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper
 *
 * Wraps async route handlers and middleware so a rejected promise reaches the
 * Express error middleware instead of going unhandled.
 *
 * Usage:
 * ```typescript
 * checkoutItem = asyncHandler(async (req, res) => {
 *   const item = await this.itemService.checkoutItem(requireSubject(req), id, input);
 *   res.json(createSuccessResponse(item));
 * });
 * ```
 */
export const asyncHandler = (fn: RequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
