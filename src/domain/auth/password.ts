import { argon2id, hash, verify } from 'argon2';

export const MIN_PASSWORD_LENGTH = 3;
export const MAX_PASSWORD_LENGTH = 128;

/**
 * Password hashing using Argon2id (salted, memory-hard).
 */
export class Password {
  /**
   * Hash a plain text password. Each call uses a fresh random salt.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id });
  }

  /**
   * Verify a plain password against a stored hash.
   * A malformed hash counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
