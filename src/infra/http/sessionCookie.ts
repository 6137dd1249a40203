import type { CookieOptions, Request, Response } from 'express';
import type { SessionConfig } from '../../config.js';

/**
 * No maxAge or expires: the cookie lives for the browser session and the
 * token's own `exp` decides validity.
 */
function cookieOptions(config: SessionConfig): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: config.secureCookie,
    path: '/',
  };
}

export function setSessionCookie(res: Response, config: SessionConfig, token: string): void {
  res.cookie(config.cookieName, token, cookieOptions(config));
}

export function clearSessionCookie(res: Response, config: SessionConfig): void {
  res.clearCookie(config.cookieName, cookieOptions(config));
}

/** Requires cookie-parser upstream. */
export function readSessionCookie(req: Request, config: SessionConfig): string | undefined {
  const value: unknown = req.cookies?.[config.cookieName];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
