import { Request, Response, NextFunction } from 'express';
import { AnyZodObject } from 'zod';

interface ValidateConfig {
  body?: AnyZodObject;
  query?: AnyZodObject;
  params?: AnyZodObject;
}

/** Replaces each configured request part with its parsed value; a ZodError goes to the error handler. */
export function validate(config: ValidateConfig) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (config.params) {
      const parsed = config.params.safeParse(req.params);
      if (!parsed.success) return next(parsed.error);
      req.params = parsed.data;
    }
    if (config.query) {
      const parsed = config.query.safeParse(req.query);
      if (!parsed.success) return next(parsed.error);
      req.query = parsed.data;
    }
    if (config.body) {
      const parsed = config.body.safeParse(req.body);
      if (!parsed.success) return next(parsed.error);
      req.body = parsed.data;
    }
    next();
  };
}
