import type { NextFunction, Request, Response } from 'express';
import { AppError, ValidationError, fail } from '@admissions/shared-kernel';
import { createLogger } from '@admissions/observability';
import { ZodError } from 'zod';

const log = createLogger('admissions-error-handler');

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    const ve = new ValidationError(err.flatten().fieldErrors);
    res.status(ve.statusCode).json(fail(ve.code, ve.message, ve.details));
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json(fail(err.code, err.message, err.details));
    return;
  }

  log.error({ err }, 'Unhandled error');
  res.status(500).json(fail('INTERNAL_ERROR', 'Internal server error'));
}
