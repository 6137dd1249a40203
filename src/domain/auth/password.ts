import { argon2id, hash, verify } from 'argon2';

/**
 * Fixed work factor. Stored hashes carry their own parameters, so changing
 * these only affects hashes created afterwards.
 */
const HASH_OPTIONS = {
  type: argon2id,
  timeCost: 3,
  memoryCost: 64 * 1024,
  parallelism: 1,
} as const;

/**
 * Password hashing using Argon2id with a random salt per hash.
 */
export class Password {
  /**
   * Hash a plain text password into a self-contained PHC string.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, HASH_OPTIONS);
  }

  /**
   * Verify a plain password against a stored hash.
   * A malformed hash counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
