import { Password } from '../../domain/auth/password.js';
import type { UserStore } from './credentialStore.js';
import { DuplicateIdentityError } from '../errors.js';

export interface RegisterCommand {
  email: string;
  password: string;
}

export interface RegisterResult {
  userId: string;
  email: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserStore) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    // Check if user already exists. A concurrent registration can still slip
    // past this check; the store's unique constraint raises the same error.
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new DuplicateIdentityError();
    }

    const passwordHash = await Password.hash(command.password);
    const user = await this.userRepo.create(command.email, passwordHash);

    return {
      userId: user.id,
      email: user.email,
    };
  }
}
