import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticatedUser } from '../../domain/auth/user.js';

export const TOKEN_ALGORITHM = 'HS256';

const tokenClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  username: z.string().min(1),
  exp: z.number(),
});

export interface TokenSettings {
  jwtSecret: string;
  accessTokenExpireMinutes: number;
}

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

/**
 * Sign an access token carrying the user identity and an expiry.
 */
export function issueToken(user: AuthenticatedUser, settings: TokenSettings): string {
  return jwt.sign({ username: user.username }, settings.jwtSecret, {
    algorithm: TOKEN_ALGORITHM,
    subject: String(user.userId),
    expiresIn: settings.accessTokenExpireMinutes * 60,
  });
}

/**
 * Check the claim set of a verified token. Returns null when a claim is
 * missing or has the wrong shape.
 */
export function parseTokenClaims(decoded: unknown): TokenClaims | null {
  const result = tokenClaimsSchema.safeParse(decoded);
  return result.success ? result.data : null;
}
