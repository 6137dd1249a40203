import type { UserStore } from './credentialStore.js';
import { NotFoundError } from '../errors.js';

export interface ForgotPasswordResult {
  email: string;
}

/**
 * Mocked password reset: nothing is sent, the caller only learns whether a
 * reset would have been issued.
 */
export class ForgotPasswordUseCase {
  constructor(private userRepo: UserStore) {}

  async execute(email: string): Promise<ForgotPasswordResult> {
    const user = await this.userRepo.findByEmail(email);
    if (!user) {
      throw new NotFoundError('No user registered with this email');
    }
    return { email: user.email };
  }
}
