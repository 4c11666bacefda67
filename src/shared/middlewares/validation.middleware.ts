import { NextFunction, Request, Response } from 'express';
import { ZodTypeAny } from 'zod';
import { HttpStatus } from '@/utils/http-status';

export const validate = (schema: ZodTypeAny) => async (
  req: Request,
  res: Response,
  next: NextFunction,
): Promise<void> => {
  const result = await schema.safeParseAsync({
    body: req.body,
    query: req.query,
    params: req.params,
  });
  if (!result.success) {
    res.status(HttpStatus.UNPROCESSABLE_ENTITY).json({ message: 'Validation failed', issues: result.error.issues });
    return;
  }
  next();
};
