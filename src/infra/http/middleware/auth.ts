import { Request, Response, NextFunction } from 'express';
import { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { AuthenticatedUser } from '../../../domain/auth/user.js';

export interface AuthRequest extends Request {
  user?: AuthenticatedUser;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function authMiddleware(authenticate: AuthenticateUseCase) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const match = BEARER_PATTERN.exec(req.headers.authorization ?? '');
    if (!match) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    try {
      req.user = authenticate.execute(match[1]);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Identity set by authMiddleware. Throws if the route was mounted without it.
 */
export function requireUser(req: AuthRequest): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
