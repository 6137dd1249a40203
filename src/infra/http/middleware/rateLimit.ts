import rateLimit from 'express-rate-limit';
import type { RateLimitConfig } from '../../../config.js';

/**
 * Service-wide limiter, keyed by client IP. Counters live in memory and
 * reset on restart; each call creates an independent counter.
 */
export function createApiRateLimiter(config: RateLimitConfig) {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: 'draft-7',
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for credential endpoints (login, password reset).
 */
export function createCredentialRateLimiter(config: RateLimitConfig) {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.loginMax,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many login attempts, please try again later.',
    },
    standardHeaders: 'draft-7',
    legacyHeaders: false,
  });
}
