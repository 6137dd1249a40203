import express from 'express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from '../../config.js';
import type { UserStore } from '../../application/auth/credentialStore.js';
import type { AccountStore } from '../../application/account/accountStore.js';
import { TokenService } from '../../application/auth/tokenService.js';
import { NotFoundError } from '../../application/errors.js';
import { createAccountRoutes } from './routes/account.js';
import { createHealthRoutes, type Ping } from './routes/health.js';
import { sessionGate } from './middleware/sessionGate.js';
import { PathAllowList, exactPath, pathPrefix } from './middleware/publicPaths.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { staticAssets } from './static.js';

export const ACCOUNT_PUBLIC_PATHS = new PathAllowList([
  exactPath('/'),
  exactPath('/healthz'),
  pathPrefix('/static'),
]);

export interface AccountAppDeps {
  config: AppConfig;
  userRepo: UserStore;
  accountRepo: AccountStore;
  ping: Ping;
}

export function createAccountApp(deps: AccountAppDeps): express.Express {
  const { config } = deps;
  // Login lives on the other service; both share the signing key.
  const loginUrl = `${config.http.loginServiceUrl}/login`;
  const app = express();

  app.set('trust proxy', config.http.trustProxy);

  app.use(createApiRateLimiter(config.rateLimit));
  app.use(cookieParser());
  app.use(
    sessionGate({
      tokens: new TokenService(config.token),
      publicPaths: ACCOUNT_PUBLIC_PATHS,
      session: config.session,
      loginUrl,
    })
  );

  app.use('/static', staticAssets());
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use(createHealthRoutes('Account Service', deps.ping));
  app.use(
    createAccountRoutes({
      config,
      userRepo: deps.userRepo,
      accountRepo: deps.accountRepo,
      loginUrl,
    })
  );

  app.use((req, _res, next) => {
    next(new NotFoundError(`Cannot ${req.method} ${req.path}`));
  });

  app.use(errorHandler);

  return app;
}
