import { Request, Response } from 'express';
import { AuthenticatedRequest, requireUser } from '@/shared/middlewares/auth.middleware';
import { findUserById, toPublic } from '@/features/users/users.service';
import { AppError } from '@/shared/errors/app-error';
import { HttpStatus } from '@/utils/http-status';
import { register, login } from './auth.service';
import { loginSchema, registerSchema } from './auth.schema';

export const registerHandler = async (req: Request, res: Response): Promise<void> => {
  const { body } = registerSchema.parse({ body: req.body });
  const result = await register(body);
  res.status(HttpStatus.CREATED).json(result);
};

export const loginHandler = async (req: Request, res: Response): Promise<void> => {
  const { body } = loginSchema.parse({ body: req.body });
  const result = await login(body);
  res.json(result);
};

export const getMe = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = await findUserById(requireUser(req).id);
  if (!user) {
    throw new AppError('User not found', HttpStatus.NOT_FOUND);
  }
  res.json({ user: toPublic(user) });
};
