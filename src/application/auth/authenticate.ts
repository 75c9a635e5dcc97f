import jwt from 'jsonwebtoken';
import { AuthenticatedUser } from '../../domain/auth/user.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { UnauthorizedError } from '../errors.js';
import { parseTokenClaims, TOKEN_ALGORITHM } from './token.js';

/**
 * Resolve a bearer token to the identity it was issued for.
 * The token itself is stateless, but its subject must still be a stored user.
 */
export class AuthenticateUseCase {
  constructor(
    private userRepo: UserRepo,
    private jwtSecret: string
  ) {}

  execute(token: string): AuthenticatedUser {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.jwtSecret, { algorithms: [TOKEN_ALGORITHM] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError('Token has expired');
      }
      throw new UnauthorizedError('Invalid token');
    }

    const claims = parseTokenClaims(decoded);
    if (!claims) {
      throw new UnauthorizedError('Invalid token');
    }

    // e.g. the database file was replaced while JWT_SECRET stayed the same
    const user = this.userRepo.findById(Number(claims.sub));
    if (!user) {
      throw new UnauthorizedError('Invalid token');
    }

    return {
      userId: user.id,
      username: user.username,
    };
  }
}
