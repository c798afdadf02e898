import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodSchema } from 'zod';

/** Validate `req.query` and hand the parsed value to `handler`; 400 on mismatch. */
export function validateQuery<T>(
  schema: ZodSchema<T>,
  handler: (query: T, req: Request, res: Response, next: NextFunction) => void,
): RequestHandler {
  return (req, res, next) => {
    const parsed = schema.safeParse(req.query);
    if (!parsed.success) {
      const flat = parsed.error.flatten();
      res.status(400).json({
        ok: false,
        error: 'Validation failed',
        fieldErrors: flat.fieldErrors,
        formErrors: flat.formErrors,
      });
      return;
    }
    handler(parsed.data, req, res, next);
  };
}
