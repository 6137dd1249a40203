import type { Account } from '../../domain/account/account.js';
import type { AccountStore } from './accountStore.js';

export class AccountQueries {
  constructor(private accountRepo: AccountStore) {}

  async getAccount(email: string): Promise<Account | null> {
    return this.accountRepo.findByEmail(email);
  }
}
