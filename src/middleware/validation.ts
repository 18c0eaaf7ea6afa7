import type { Request, Response, NextFunction } from 'express';
import type { ZodSchema, ZodError } from 'zod';
import { errorBody } from './error-handler.js';

/**
 * First message per field, keyed by the top-level property name.
 * Errors on the object itself land under `_root`.
 */
export function formatValidationErrors(error: ZodError): Record<string, string> {
  const errors: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '_root';
    if (!(field in errors)) {
      errors[field] = issue.message;
    }
  }
  return errors;
}

/**
 * Validate request body against a Zod schema.
 * Returns 422 with one message per invalid field if validation fails.
 */
export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return res.status(422).json(errorBody(422, 'Validation failed', formatValidationErrors(result.error)));
    }
    req.body = result.data;
    next();
  };
}
