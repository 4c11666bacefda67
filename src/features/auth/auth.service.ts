import bcrypt from 'bcryptjs';
import { AppError } from '@/shared/errors/app-error';
import { HttpStatus } from '@/utils/http-status';
import { signAccessToken, signRefreshToken } from '@/config/security';
import { UserModel } from '@/features/users/users.model';
import { toPublic, findUserByEmail } from '@/features/users/users.service';
import { RegisterPayload, LoginPayload, AuthTokens } from './auth.types';

const SALT_ROUNDS = 10;

const issueTokens = (userId: string, roles: string[]): AuthTokens => ({
  accessToken: signAccessToken({ sub: userId, roles }),
  refreshToken: signRefreshToken({ sub: userId, roles }),
});

export const register = async (payload: RegisterPayload) => {
  const existingUser = await findUserByEmail(payload.email);
  if (existingUser) {
    throw new AppError('Email already in use', HttpStatus.CONFLICT);
  }

  const user = await UserModel.create({
    name: payload.name,
    email: payload.email.toLowerCase(),
    password: await bcrypt.hash(payload.password, SALT_ROUNDS),
  });

  return {
    user: toPublic(user),
    tokens: issueTokens(user.id, user.roles),
  };
};

export const login = async (payload: LoginPayload) => {
  const user = await findUserByEmail(payload.email);
  if (!user || !(await bcrypt.compare(payload.password, user.password))) {
    throw new AppError('Invalid credentials', HttpStatus.UNAUTHORIZED);
  }

  return {
    user: toPublic(user),
    tokens: issueTokens(user.id, user.roles),
  };
};
