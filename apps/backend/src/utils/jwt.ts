import jwt, { JwtPayload as VerifiedClaims } from 'jsonwebtoken';
import { AppConfig } from '../config';
import { AuthenticatedUser, Role, ROLES } from '../types';
import { UnauthorizedError } from './errors';

type JwtConfig = AppConfig['jwt'];

function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}

export const generateToken = (user: AuthenticatedUser, config: JwtConfig): string => {
  if (!config.secret) {
    throw new Error('JWT secret is not defined');
  }

  return jwt.sign(
    { role: user.role },
    config.secret,
    {
      subject: user.userId,
      issuer: config.issuer,
      audience: config.audience,
      expiresIn: config.expiresInSeconds,
      algorithm: 'HS256'
    }
  );
};

export const verifyToken = (token: string, config: JwtConfig): AuthenticatedUser => {
  let claims: string | VerifiedClaims;
  try {
    claims = jwt.verify(token, config.secret, {
      issuer: config.issuer,
      audience: config.audience,
      algorithms: ['HS256']
    });
  } catch (error) {
    throw new UnauthorizedError('Invalid token');
  }

  if (typeof claims === 'string' || !claims.sub || !isRole(claims.role)) {
    throw new UnauthorizedError('Invalid token claims');
  }

  return { userId: claims.sub, role: claims.role };
};
