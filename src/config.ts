import { z } from 'zod';
import type { Algorithm } from 'jsonwebtoken';

export const TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const satisfies readonly Algorithm[];
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export interface TokenConfig {
  readonly secret: string;
  readonly algorithm: TokenAlgorithm;
  readonly ttlSeconds: number;
}

export interface SessionConfig {
  readonly cookieName: string;
  readonly secureCookie: boolean;
}

export interface HttpConfig {
  readonly loginPort: number;
  readonly accountPort: number;
  readonly loginServiceUrl: string;
  readonly accountServiceUrl: string;
  readonly trustProxy: number;
}

export interface RateLimitConfig {
  readonly windowMs: number;
  readonly max: number;
  readonly loginMax: number;
}

export interface DatabaseConfig {
  readonly connectionString: string | undefined;
}

export interface AppConfig {
  readonly token: TokenConfig;
  readonly session: SessionConfig;
  readonly http: HttpConfig;
  readonly rateLimit: RateLimitConfig;
  readonly database: DatabaseConfig;
}

export const SESSION_COOKIE_NAME = 'access_token';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const envSchema = z.object({
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET environment variable is required' })
    .min(1, 'JWT_SECRET environment variable is required'),
  JWT_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default('HS256'),
  TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  DATABASE_URL: optionalString,
  DB_USER: optionalString,
  DB_PASS: optionalString,
  DB_HOST: optionalString,
  DB_NAME: optionalString,
  LOGIN_PORT: z.coerce.number().int().positive().default(8000),
  ACCOUNT_PORT: z.coerce.number().int().positive().default(8001),
  LOGIN_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  ACCOUNT_SERVICE_URL: z.string().url().default('http://localhost:8001'),
  COOKIE_SECURE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  TRUST_PROXY: z.coerce.number().int().min(0).default(0),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
});

const databaseEnvSchema = envSchema.pick({
  DATABASE_URL: true,
  DB_USER: true,
  DB_PASS: true,
  DB_HOST: true,
  DB_NAME: true,
});

type DatabaseEnv = z.infer<typeof databaseEnvSchema>;

/**
 * Build the PostgreSQL connection string. `DATABASE_URL` wins; otherwise it is
 * assembled from `DB_USER`, `DB_PASS`, `DB_HOST` and `DB_NAME` when all are set.
 */
function resolveConnectionString(env: DatabaseEnv): string | undefined {
  if (env.DATABASE_URL) {
    return env.DATABASE_URL;
  }
  if (env.DB_USER && env.DB_PASS && env.DB_HOST && env.DB_NAME) {
    const user = encodeURIComponent(env.DB_USER);
    const pass = encodeURIComponent(env.DB_PASS);
    return `postgresql://${user}:${pass}@${env.DB_HOST}/${env.DB_NAME}`;
  }
  // Left undefined so that code paths without a database (tests, docs) still load.
  return undefined;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

type Environment = Record<string, string | undefined>;

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Environment): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}

/**
 * Parse process-wide configuration once at startup.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const values = parseEnv(envSchema, env);

  return Object.freeze({
    token: Object.freeze({
      secret: values.JWT_SECRET,
      algorithm: values.JWT_ALGORITHM,
      ttlSeconds: values.TOKEN_TTL_MINUTES * 60,
    }),
    session: Object.freeze({
      cookieName: SESSION_COOKIE_NAME,
      secureCookie: values.COOKIE_SECURE,
    }),
    http: Object.freeze({
      loginPort: values.LOGIN_PORT,
      accountPort: values.ACCOUNT_PORT,
      loginServiceUrl: stripTrailingSlash(values.LOGIN_SERVICE_URL),
      accountServiceUrl: stripTrailingSlash(values.ACCOUNT_SERVICE_URL),
      trustProxy: values.TRUST_PROXY,
    }),
    rateLimit: Object.freeze({
      windowMs: values.RATE_LIMIT_WINDOW_MS,
      max: values.RATE_LIMIT_MAX,
      loginMax: values.LOGIN_RATE_LIMIT_MAX,
    }),
    database: Object.freeze({
      connectionString: resolveConnectionString(values),
    }),
  });
}

/**
 * Database settings alone, for tooling such as migrations that never signs tokens.
 */
export function loadDatabaseConfig(env: Environment = process.env): DatabaseConfig {
  const values = parseEnv(databaseEnvSchema, env);
  return Object.freeze({ connectionString: resolveConnectionString(values) });
}
