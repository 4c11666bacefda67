import type { z } from 'zod';
import type { loginSchema, registerSchema } from './auth.schema';

export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
}

export type RegisterPayload = z.infer<typeof registerSchema>['body'];

export type LoginPayload = z.infer<typeof loginSchema>['body'];
