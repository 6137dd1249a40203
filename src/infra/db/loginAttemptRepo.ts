import type pg from 'pg';
import type {
  LoginAttempt,
  LoginOutcome,
  NewLoginAttempt,
} from '../../domain/auth/loginAttempt.js';
import type { LoginAttemptStore } from '../../application/auth/credentialStore.js';

type LoginAttemptRow = {
  id: string;
  email: string;
  ip_address: string | null;
  outcome: LoginOutcome;
  attempted_at: Date;
};

function toLoginAttempt(row: LoginAttemptRow): LoginAttempt {
  return {
    // BIGSERIAL comes back as a string
    id: String(row.id),
    email: row.email,
    ipAddress: row.ip_address,
    outcome: row.outcome,
    attemptedAt: row.attempted_at,
  };
}

/**
 * Append-only audit log of login attempts: insert and read, nothing else.
 */
export class LoginAttemptRepo implements LoginAttemptStore {
  constructor(private readonly pool: pg.Pool) {}

  async record(attempt: NewLoginAttempt): Promise<LoginAttempt> {
    const result = await this.pool.query<LoginAttemptRow>(
      `INSERT INTO login_attempts (email, ip_address, outcome)
       VALUES ($1, $2, $3)
       RETURNING id, email, ip_address, outcome, attempted_at`,
      [attempt.email, attempt.ipAddress, attempt.outcome]
    );
    return toLoginAttempt(result.rows[0]);
  }

  async listRecentByEmail(email: string, limit: number): Promise<LoginAttempt[]> {
    const result = await this.pool.query<LoginAttemptRow>(
      `SELECT id, email, ip_address, outcome, attempted_at
       FROM login_attempts
       WHERE email = $1
       ORDER BY attempted_at DESC, id DESC
       LIMIT $2`,
      [email, limit]
    );
    return result.rows.map(toLoginAttempt);
  }
}
