import type { NextFunction, Request, Response } from 'express';
import type { User } from '../../../domain/auth/user.js';
import type { SessionConfig } from '../../../config.js';
import type { TokenVerifier } from '../../../application/auth/tokenService.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { readSessionCookie } from '../sessionCookie.js';
import type { PathAllowList } from './publicPaths.js';

export const SESSION_EXPIRED_PARAM = 'session_expired';

export interface SessionRequest extends Request {
  /** Email asserted by a verified session token. Set by the session gate. */
  subject?: string;
  /** Set by requireUser once the subject has been resolved. */
  user?: User;
}

export interface SessionGateOptions {
  tokens: TokenVerifier;
  publicPaths: PathAllowList;
  session: SessionConfig;
  /** Absolute or relative; the account service points at the login service. */
  loginUrl: string;
}

function withQueryFlag(url: string, flag: string): string {
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${flag}=1`;
}

/**
 * Authentication stage run before any route handler. Allow-listed paths pass
 * through; every other request needs a verifiable session cookie or is
 * redirected to the login page. Only expiry is reported back to the user.
 */
export function sessionGate(options: SessionGateOptions) {
  const expiredUrl = withQueryFlag(options.loginUrl, SESSION_EXPIRED_PARAM);

  return (req: SessionRequest, res: Response, next: NextFunction): void => {
    if (options.publicPaths.allows(req.path)) {
      next();
      return;
    }

    const token = readSessionCookie(req, options.session);
    if (!token) {
      res.redirect(302, options.loginUrl);
      return;
    }

    const verification = options.tokens.verify(token);
    if (!verification.ok) {
      res.redirect(302, verification.error === 'Expired' ? expiredUrl : options.loginUrl);
      return;
    }

    req.subject = verification.subject;
    next();
  };
}

export function getSubject(req: SessionRequest): string {
  if (req.subject === undefined) {
    throw new UnauthorizedError('No verified session on this request');
  }
  return req.subject;
}
