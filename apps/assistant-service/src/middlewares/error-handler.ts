import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError, fail } from '@helpdesk/shared-kernel';
import { createLogger } from '@helpdesk/observability';
import { ZodError } from 'zod';

const log = createLogger('assistant-error-handler');

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    const ve = new ValidationError(err.flatten().fieldErrors);
    res.status(ve.statusCode).json(fail(ve.code, ve.message, ve.details));
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) log.error({ err, requestId: req.requestId }, err.message);
    res.status(err.statusCode).json(fail(err.code, err.message, err.details));
    return;
  }

  log.error({ err, requestId: req.requestId }, 'Unhandled error');
  res.status(500).json(fail('INTERNAL_ERROR', 'Internal server error'));
}
