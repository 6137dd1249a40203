import type { Account, NewAccount } from '../../domain/account/account.js';

export interface AccountStore {
  findByEmail(email: string): Promise<Account | null>;
  /** Throws DuplicateIdentityError when the email already owns an account. */
  create(account: NewAccount): Promise<Account>;
}
