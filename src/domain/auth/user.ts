/**
 * Registered user. The email is the identity a session token asserts;
 * users are never updated or deleted through the application.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}
