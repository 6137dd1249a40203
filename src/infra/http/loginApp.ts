import express from 'express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from '../../config.js';
import type { LoginAttemptStore, UserStore } from '../../application/auth/credentialStore.js';
import { TokenService } from '../../application/auth/tokenService.js';
import { NotFoundError } from '../../application/errors.js';
import { createAuthRoutes, LOGIN_PATH } from './routes/auth.js';
import { createHealthRoutes, type Ping } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { sessionGate } from './middleware/sessionGate.js';
import { PathAllowList, exactPath, pathPrefix } from './middleware/publicPaths.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { staticAssets } from './static.js';

export const LOGIN_PUBLIC_PATHS = new PathAllowList([
  exactPath('/'),
  exactPath('/healthz'),
  exactPath(LOGIN_PATH),
  exactPath('/register'),
  exactPath('/forgot-password'),
  exactPath('/logout'),
  pathPrefix('/static'),
  pathPrefix('/docs'),
]);

export interface LoginAppDeps {
  config: AppConfig;
  userRepo: UserStore;
  loginAttempts: LoginAttemptStore;
  ping: Ping;
}

export function createLoginApp(deps: LoginAppDeps): express.Express {
  const { config } = deps;
  const tokens = new TokenService(config.token);
  const app = express();

  app.set('trust proxy', config.http.trustProxy);

  app.use(createApiRateLimiter(config.rateLimit));
  app.use(cookieParser());

  // Runs before every route below; the allow-list is the only way past it.
  app.use(
    sessionGate({
      tokens,
      publicPaths: LOGIN_PUBLIC_PATHS,
      session: config.session,
      loginUrl: LOGIN_PATH,
    })
  );

  app.use('/static', staticAssets());
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use(createHealthRoutes('Login Service', deps.ping));
  app.use(createSwaggerRoutes());
  app.use(
    createAuthRoutes({
      config,
      userRepo: deps.userRepo,
      loginAttempts: deps.loginAttempts,
      tokens,
    })
  );

  app.use((req, _res, next) => {
    next(new NotFoundError(`Cannot ${req.method} ${req.path}`));
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
