import type { NextFunction, Response } from 'express';
import type { User } from '../../../domain/auth/user.js';
import type { SessionConfig } from '../../../config.js';
import type { UserStore } from '../../../application/auth/credentialStore.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { clearSessionCookie } from '../sessionCookie.js';
import { asyncHandler } from './asyncHandler.js';
import { getSubject, type SessionRequest } from './sessionGate.js';

export interface RequireUserOptions {
  session: SessionConfig;
  loginUrl: string;
}

/**
 * Resolve the gate's subject to a stored user. A token can outlive its user,
 * so an unknown subject drops the cookie and sends the client back to login.
 */
export function requireUser(userRepo: UserStore, options: RequireUserOptions) {
  return asyncHandler(async (req: SessionRequest, res: Response, next: NextFunction) => {
    const user = await userRepo.findByEmail(getSubject(req));
    if (!user) {
      clearSessionCookie(res, options.session);
      res.redirect(302, options.loginUrl);
      return;
    }
    req.user = user;
    next();
  });
}

export function getUser(req: SessionRequest): User {
  if (req.user === undefined) {
    throw new UnauthorizedError('No user resolved for this request');
  }
  return req.user;
}
