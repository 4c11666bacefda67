import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '@/shared/errors/app-error';
import { defaultErrorMap } from '@/shared/errors/error-map';
import { logger } from '@/utils/logger';
import { HttpStatus } from '@/utils/http-status';

const detailsOf = (err: Error): unknown => {
  if (err instanceof AppError) {
    return err.details;
  }
  if (err instanceof ZodError) {
    return err.flatten();
  }
  return undefined;
};

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const status = err instanceof AppError
    ? err.statusCode
    : defaultErrorMap[err.name] || HttpStatus.INTERNAL_SERVER_ERROR;

  if (status >= 500) {
    logger.error({ err, path: req.path }, err.message);
  }

  res.status(status).json({
    message: status >= 500 ? 'Internal server error' : err.message,
    details: detailsOf(err),
  });
};
