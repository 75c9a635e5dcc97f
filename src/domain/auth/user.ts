/**
 * Registered user as stored in the users table.
 * Users are immutable after registration.
 */
export interface User {
  readonly id: number;
  readonly username: string;
  readonly passwordHash: string;
  readonly createdAt: string;
}

/**
 * Identity carried by an access token and attached to authenticated requests.
 */
export interface AuthenticatedUser {
  readonly userId: number;
  readonly username: string;
}
