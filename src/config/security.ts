import { sign, verify, JwtPayload, Secret, SignOptions } from 'jsonwebtoken';
import { envConfig } from '@/config/env';

export interface TokenPayload extends JwtPayload {
  sub: string;
  roles: string[];
}

const isTokenPayload = (value: string | JwtPayload): value is TokenPayload =>
  typeof value === 'object' && typeof value.sub === 'string' && Array.isArray(value.roles);

const signToken = (payload: TokenPayload, secret: Secret, expiresIn: string): string => {
  const options: SignOptions = { expiresIn: expiresIn as SignOptions['expiresIn'] };
  return sign(payload, secret, options);
};

const verifyToken = (token: string, secret: Secret): TokenPayload => {
  const decoded = verify(token, secret);
  if (!isTokenPayload(decoded)) {
    throw new Error('Malformed token payload');
  }
  return decoded;
};

export const signAccessToken = (payload: TokenPayload): string =>
  signToken(payload, envConfig.JWT_SECRET, envConfig.JWT_EXPIRES_IN);

export const signRefreshToken = (payload: TokenPayload): string =>
  signToken(payload, envConfig.REFRESH_TOKEN_SECRET, envConfig.REFRESH_TOKEN_EXPIRES_IN);

export const verifyAccessToken = (token: string): TokenPayload => verifyToken(token, envConfig.JWT_SECRET);

export const verifyRefreshToken = (token: string): TokenPayload =>
  verifyToken(token, envConfig.REFRESH_TOKEN_SECRET);
