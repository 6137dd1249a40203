import { Router } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../../../config.js';
import type { LoginAttemptStore, UserStore } from '../../../application/auth/credentialStore.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { ForgotPasswordUseCase } from '../../../application/auth/forgotPassword.js';
import { LoginActivityQueries } from '../../../application/auth/activity.js';
import { createCredentialRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireUser, getUser } from '../middleware/requireUser.js';
import { SESSION_EXPIRED_PARAM, type SessionRequest } from '../middleware/sessionGate.js';
import { clearSessionCookie, setSessionCookie } from '../sessionCookie.js';
import {
  dashboardPage,
  forgotPasswordPage,
  loginPage,
  registerPage,
} from '../views/pages.js';

export const LOGIN_PATH = '/login';
export const LANDING_PATH = '/me';

/**
 * @openapi
 * /register:
 *   get:
 *     tags: [Auth]
 *     summary: Registration form
 *     responses:
 *       200: { description: HTML form }
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 1 }
 *     responses:
 *       302:
 *         description: User created, redirect to /login
 *       400:
 *         description: Validation error or email already registered (DUPLICATE_IDENTITY)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /login:
 *   get:
 *     tags: [Auth]
 *     summary: Login form
 *     parameters:
 *       - in: query
 *         name: session_expired
 *         schema: { type: string }
 *         description: Present when the previous session token expired
 *     responses:
 *       200: { description: HTML form }
 *   post:
 *     tags: [Auth]
 *     summary: Log in and receive the session cookie
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string }
 *               password: { type: string }
 *     responses:
 *       302:
 *         description: Authenticated; sets the access_token cookie and redirects to /me
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       429:
 *         description: Too many attempts
 *
 * /logout:
 *   get:
 *     tags: [Auth]
 *     summary: Clear the session cookie
 *     responses:
 *       302: { description: Redirect to /login }
 *
 * /forgot-password:
 *   get:
 *     tags: [Auth]
 *     summary: Password reset form
 *     responses:
 *       200: { description: HTML form }
 *   post:
 *     tags: [Auth]
 *     summary: Request a (mocked) password reset
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       200: { description: Reset notice }
 *       404:
 *         description: No user with this email
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /me:
 *   get:
 *     tags: [Auth]
 *     summary: Dashboard for the signed-in user
 *     security: [{ cookieAuth: [] }]
 *     responses:
 *       200: { description: HTML dashboard }
 *       302: { description: 'No valid session, redirect to /login' }
 */

const registerBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1).max(1024),
});

// Any strings reach the use case so that every attempt is recorded.
const loginBodySchema = z.object({
  email: z.string(),
  password: z.string(),
});

const forgotPasswordBodySchema = z.object({
  email: z.string().email(),
});

const loginQuerySchema = z.object({
  [SESSION_EXPIRED_PARAM]: z.unknown().optional(),
});

export interface AuthRouteDeps {
  config: AppConfig;
  userRepo: UserStore;
  loginAttempts: LoginAttemptStore;
  tokens: TokenService;
}

export function createAuthRoutes(deps: AuthRouteDeps) {
  const { config } = deps;
  const router = Router();
  const registerUseCase = new RegisterUseCase(deps.userRepo);
  const loginUseCase = new LoginUseCase(deps.userRepo, deps.loginAttempts, deps.tokens);
  const forgotPasswordUseCase = new ForgotPasswordUseCase(deps.userRepo);
  const activity = new LoginActivityQueries(deps.loginAttempts);
  const currentUser = requireUser(deps.userRepo, {
    session: config.session,
    loginUrl: LOGIN_PATH,
  });

  router.get('/register', (_req, res) => {
    res.send(registerPage());
  });

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      await registerUseCase.execute(body);
      res.redirect(302, LOGIN_PATH);
    })
  );

  router.get('/login', validate({ query: loginQuerySchema }), (req, res) => {
    const query = loginQuerySchema.parse(req.query);
    res.send(loginPage({ sessionExpired: query[SESSION_EXPIRED_PARAM] !== undefined }));
  });

  router.post(
    '/login',
    createCredentialRateLimiter(config.rateLimit),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute({
        email: body.email,
        password: body.password,
        ipAddress: req.ip ?? null,
      });
      setSessionCookie(res, config.session, result.token);
      res.redirect(302, LANDING_PATH);
    })
  );

  // The server keeps no session state; dropping the cookie is all there is.
  router.get('/logout', (_req, res) => {
    clearSessionCookie(res, config.session);
    res.redirect(302, LOGIN_PATH);
  });

  router.get('/forgot-password', (_req, res) => {
    res.send(forgotPasswordPage());
  });

  router.post(
    '/forgot-password',
    createCredentialRateLimiter(config.rateLimit),
    validate({ body: forgotPasswordBodySchema }),
    asyncHandler(async (req, res) => {
      const body = forgotPasswordBodySchema.parse(req.body);
      const result = await forgotPasswordUseCase.execute(body.email);
      res.send(forgotPasswordPage({ sentTo: result.email }));
    })
  );

  router.get(
    LANDING_PATH,
    currentUser,
    asyncHandler(async (req: SessionRequest, res) => {
      const user = getUser(req);
      const recentAttempts = await activity.getRecentAttempts(user.email);
      res.send(
        dashboardPage({
          email: user.email,
          recentAttempts,
          accountUrl: `${config.http.accountServiceUrl}/ui/account`,
        })
      );
    })
  );

  return router;
}
