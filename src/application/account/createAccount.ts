import type { Account } from '../../domain/account/account.js';
import type { AccountStore } from './accountStore.js';
import { DuplicateIdentityError } from '../errors.js';

export interface CreateAccountCommand {
  email: string;
  accountType: string;
}

export interface CreateAccountResult {
  account: Account;
  created: boolean;
}

/**
 * Opens the caller's account on first use. Repeating the command returns the
 * existing account unchanged, whatever account type was asked for.
 */
export class CreateAccountUseCase {
  constructor(private accountRepo: AccountStore) {}

  async execute(command: CreateAccountCommand): Promise<CreateAccountResult> {
    const existing = await this.accountRepo.findByEmail(command.email);
    if (existing) {
      return { account: existing, created: false };
    }

    try {
      const account = await this.accountRepo.create({
        email: command.email,
        accountType: command.accountType,
      });
      return { account, created: true };
    } catch (error) {
      // Lost a race with a concurrent create for the same email
      if (error instanceof DuplicateIdentityError) {
        const winner = await this.accountRepo.findByEmail(command.email);
        if (winner) {
          return { account: winner, created: false };
        }
      }
      throw error;
    }
  }
}
