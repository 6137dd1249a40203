import type pg from 'pg';
import type { User } from '../../domain/auth/user.js';
import type { UserStore } from '../../application/auth/credentialStore.js';
import { DuplicateIdentityError } from '../../application/errors.js';
import { isUniqueViolation } from './pgErrors.js';

type UserRow = {
  id: string;
  email: string;
  password_hash: string;
  created_at: Date;
};

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo implements UserStore {
  constructor(private readonly pool: pg.Pool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      'SELECT id, email, password_hash, created_at FROM users WHERE email = $1',
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toUser(result.rows[0]);
  }

  async create(email: string, passwordHash: string): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (email, password_hash)
         VALUES ($1, $2)
         RETURNING id, email, password_hash, created_at`,
        [email, passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateIdentityError();
      }
      throw error;
    }
  }
}
