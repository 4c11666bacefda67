import { NextFunction, Request, Response } from 'express';
import { verifyAccessToken } from '@/config/security';
import { AppError } from '@/shared/errors/app-error';
import { HttpStatus } from '@/utils/http-status';

export interface AuthenticatedRequest extends Request {
  user?: {
    id: string;
    roles: string[];
  };
}

export const authenticate = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    res.status(HttpStatus.UNAUTHORIZED).json({ message: 'Missing authorization header' });
    return;
  }

  const token = header.slice('Bearer '.length).trim();

  try {
    const payload = verifyAccessToken(token);
    req.user = { id: payload.sub, roles: payload.roles };
  } catch {
    res.status(HttpStatus.UNAUTHORIZED).json({ message: 'Invalid token' });
    return;
  }
  next();
};

export const requireUser = (req: AuthenticatedRequest): { id: string; roles: string[] } => {
  if (!req.user) {
    throw new AppError('Unauthorized', HttpStatus.UNAUTHORIZED);
  }
  return req.user;
};
