import jwt from 'jsonwebtoken';
import type { TokenConfig } from '../../config.js';

export type TokenError = 'Malformed' | 'SignatureInvalid' | 'Expired';

export type TokenVerification =
  | { readonly ok: true; readonly subject: string }
  | { readonly ok: false; readonly error: TokenError };

export interface TokenVerifier {
  verify(token: string): TokenVerification;
}

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

// jsonwebtoken reports these when the signature part does not check out.
const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and verifies stateless session tokens (HMAC-signed JWTs).
 * Verification is purely cryptographic and time based; whether the subject
 * still exists is for the caller to check.
 */
export class TokenService implements TokenVerifier {
  constructor(
    private readonly config: TokenConfig,
    private readonly now: Clock = systemClock
  ) {}

  issue(subject: string): string {
    const issuedAt = toEpochSeconds(this.now());
    return jwt.sign(
      { iat: issuedAt, exp: issuedAt + this.config.ttlSeconds },
      this.config.secret,
      { algorithm: this.config.algorithm, subject }
    );
  }

  verify(token: string): TokenVerification {
    try {
      const payload = jwt.verify(token, this.config.secret, {
        algorithms: [this.config.algorithm],
        clockTimestamp: toEpochSeconds(this.now()),
      });

      if (
        typeof payload === 'string' ||
        typeof payload.sub !== 'string' ||
        typeof payload.exp !== 'number'
      ) {
        return { ok: false, error: 'Malformed' };
      }

      return { ok: true, subject: payload.sub };
    } catch (error) {
      // TokenExpiredError extends JsonWebTokenError, so it is checked first.
      // jsonwebtoken only checks expiry after the signature has verified.
      if (error instanceof jwt.TokenExpiredError) {
        return { ok: false, error: 'Expired' };
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return {
          ok: false,
          error: SIGNATURE_FAILURES.has(error.message) ? 'SignatureInvalid' : 'Malformed',
        };
      }
      throw error;
    }
  }
}
