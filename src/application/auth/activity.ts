import type { LoginAttempt } from '../../domain/auth/loginAttempt.js';
import type { LoginAttemptStore } from './credentialStore.js';

export const RECENT_ATTEMPTS_LIMIT = 5;

export class LoginActivityQueries {
  constructor(private loginAttempts: LoginAttemptStore) {}

  async getRecentAttempts(
    email: string,
    limit: number = RECENT_ATTEMPTS_LIMIT
  ): Promise<LoginAttempt[]> {
    return this.loginAttempts.listRecentByEmail(email, limit);
  }
}
