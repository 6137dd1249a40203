import { Router } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../../../config.js';
import type { UserStore } from '../../../application/auth/credentialStore.js';
import type { AccountStore } from '../../../application/account/accountStore.js';
import { CreateAccountUseCase } from '../../../application/account/createAccount.js';
import { AccountQueries } from '../../../application/account/queries.js';
import { ACCOUNT_TYPE_MAX_LENGTH } from '../../../domain/account/account.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { validate } from '../middleware/validate.js';
import { requireUser, getUser } from '../middleware/requireUser.js';
import type { SessionRequest } from '../middleware/sessionGate.js';
import { accountPage } from '../views/pages.js';

export const ACCOUNT_PATH = '/ui/account';

/**
 * @openapi
 * /ui/account:
 *   get:
 *     tags: [Account]
 *     summary: View the caller's account, or the form to open one
 *     security: [{ cookieAuth: [] }]
 *     responses:
 *       200: { description: HTML account page }
 *       302: { description: 'No valid session, redirect to the login service' }
 *   post:
 *     tags: [Account]
 *     summary: Open the caller's account (no-op when it already exists)
 *     security: [{ cookieAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [account_type]
 *             properties:
 *               account_type: { type: string, maxLength: 32, example: checking }
 *     responses:
 *       302: { description: Redirect to /ui/account }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const createAccountBodySchema = z.object({
  account_type: z.string().trim().min(1).max(ACCOUNT_TYPE_MAX_LENGTH),
});

export interface AccountRouteDeps {
  config: AppConfig;
  userRepo: UserStore;
  accountRepo: AccountStore;
  loginUrl: string;
}

export function createAccountRoutes(deps: AccountRouteDeps) {
  const { config } = deps;
  const router = Router();
  const createAccountUseCase = new CreateAccountUseCase(deps.accountRepo);
  const queries = new AccountQueries(deps.accountRepo);
  const currentUser = requireUser(deps.userRepo, {
    session: config.session,
    loginUrl: deps.loginUrl,
  });
  const logoutUrl = `${config.http.loginServiceUrl}/logout`;

  router.get(
    ACCOUNT_PATH,
    currentUser,
    asyncHandler(async (req: SessionRequest, res) => {
      const user = getUser(req);
      const account = await queries.getAccount(user.email);
      res.send(accountPage({ email: user.email, account, logoutUrl }));
    })
  );

  router.post(
    ACCOUNT_PATH,
    currentUser,
    validate({ body: createAccountBodySchema }),
    asyncHandler(async (req: SessionRequest, res) => {
      const user = getUser(req);
      const body = createAccountBodySchema.parse(req.body);
      await createAccountUseCase.execute({
        email: user.email,
        accountType: body.account_type,
      });
      res.redirect(302, ACCOUNT_PATH);
    })
  );

  return router;
}
