import { Money } from './money.js';

/** Every new account opens with 1000.00. */
export const DEFAULT_BALANCE_CENTS = 100_000;

export const ACCOUNT_TYPE_MAX_LENGTH = 32;

/**
 * The single balance record owned by a user, keyed by email.
 */
export interface Account {
  readonly id: string;
  readonly email: string;
  readonly accountType: string;
  readonly balanceCents: number;
  readonly createdAt: Date;
}

export interface NewAccount {
  readonly email: string;
  readonly accountType: string;
}

export function balanceOf(account: Account): Money {
  return Money.fromCents(account.balanceCents);
}
