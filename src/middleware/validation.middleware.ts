import { Request } from 'express';
import { z, ZodError } from 'zod';

/**
 * Request validation
 *
 * Parses request data (body, params, query) against a Zod schema and returns
 * the typed, coerced result. A ZodError propagates to the error middleware,
 * which answers 400 with per-field details.
 *
 * Usage:
 * ```typescript
 * const { params, body } = parseRequest(custodySchema, req);
 * ```
 */
export const parseRequest = <S extends z.ZodTypeAny>(schema: S, req: Request): z.infer<S> =>
  schema.parse({
    body: req.body,
    params: req.params,
    query: req.query,
  });

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Flatten Zod issues to `{ field, message }`, dropping the body/params/query
 * prefix from the path.
 */
export const formatZodError = (error: ZodError): FieldError[] =>
  error.errors.map((issue) => ({
    field: issue.path.slice(1).join('.') || String(issue.path[0] ?? ''),
    message: issue.message,
  }));
