import type { User } from '../../domain/auth/user.js';
import type { LoginAttempt, NewLoginAttempt } from '../../domain/auth/loginAttempt.js';

export interface UserStore {
  findByEmail(email: string): Promise<User | null>;
  /** Throws DuplicateIdentityError when the email is already taken. */
  create(email: string, passwordHash: string): Promise<User>;
}

export interface LoginAttemptStore {
  record(attempt: NewLoginAttempt): Promise<LoginAttempt>;
  /** Newest first. */
  listRecentByEmail(email: string, limit: number): Promise<LoginAttempt[]>;
}
