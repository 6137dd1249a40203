import { randomUUID } from 'crypto';
import { Password } from '../../domain/auth/password.js';
import type { LoginOutcome } from '../../domain/auth/loginAttempt.js';
import type { LoginAttemptStore, UserStore } from './credentialStore.js';
import type { TokenService } from './tokenService.js';
import { AuthenticationError } from '../errors.js';

export interface LoginCommand {
  email: string;
  password: string;
  ipAddress: string | null;
}

export interface LoginResult {
  token: string;
  email: string;
}

let decoyHash: Promise<string> | undefined;

/** Stands in for the stored hash of an unknown email. Computed on first use. */
function getDecoyHash(): Promise<string> {
  decoyHash ??= Password.hash(randomUUID());
  return decoyHash;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserStore,
    private loginAttempts: LoginAttemptStore,
    private tokens: TokenService
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userRepo.findByEmail(command.email);
    // Unknown emails go through the same argon2 verification as wrong passwords.
    const passwordHash = user?.passwordHash ?? (await getDecoyHash());
    const isValid = await Password.verify(command.password, passwordHash);

    if (!user || !isValid) {
      await this.recordAttempt(command, 'fail');
      throw new AuthenticationError();
    }

    await this.recordAttempt(command, 'success');

    return {
      token: this.tokens.issue(user.email),
      email: user.email,
    };
  }

  private async recordAttempt(command: LoginCommand, outcome: LoginOutcome): Promise<void> {
    await this.loginAttempts.record({
      email: command.email,
      ipAddress: command.ipAddress,
      outcome,
    });
  }
}
