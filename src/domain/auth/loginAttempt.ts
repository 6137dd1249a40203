export type LoginOutcome = 'success' | 'fail';

/**
 * Audit record written for every login attempt, whatever its outcome.
 * `email` is stored exactly as submitted, including addresses with no user.
 */
export interface LoginAttempt {
  readonly id: string;
  readonly email: string;
  readonly ipAddress: string | null;
  readonly outcome: LoginOutcome;
  readonly attemptedAt: Date;
}

export type NewLoginAttempt = Pick<LoginAttempt, 'email' | 'ipAddress' | 'outcome'>;
