import type pg from 'pg';
import type { Account, NewAccount } from '../../domain/account/account.js';
import type { AccountStore } from '../../application/account/accountStore.js';
import { DuplicateIdentityError } from '../../application/errors.js';
import { isUniqueViolation } from './pgErrors.js';

type AccountRow = {
  id: string;
  email: string;
  account_type: string;
  balance_cents: string | number;
  created_at: Date;
};

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    email: row.email,
    accountType: row.account_type,
    balanceCents: Number(row.balance_cents),
    createdAt: row.created_at,
  };
}

export class AccountRepo implements AccountStore {
  constructor(private readonly pool: pg.Pool) {}

  async findByEmail(email: string): Promise<Account | null> {
    const result = await this.pool.query<AccountRow>(
      `SELECT id, email, account_type, balance_cents, created_at
       FROM accounts
       WHERE email = $1`,
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toAccount(result.rows[0]);
  }

  // balance_cents takes its column default
  async create(account: NewAccount): Promise<Account> {
    try {
      const result = await this.pool.query<AccountRow>(
        `INSERT INTO accounts (email, account_type)
         VALUES ($1, $2)
         RETURNING id, email, account_type, balance_cents, created_at`,
        [account.email, account.accountType]
      );
      return toAccount(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateIdentityError('An account already exists for this email');
      }
      throw error;
    }
  }
}
