import { loadConfig, type AppConfig } from '../config.js';

export const TEST_SECRET = 'test-secret';

export const TEST_LOGIN_SERVICE_URL = 'http://login.test';
export const TEST_ACCOUNT_SERVICE_URL = 'http://account.test';

/**
 * Configuration for in-process tests. Rate limits are high enough not to
 * interfere unless a test lowers them.
 */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    JWT_SECRET: TEST_SECRET,
    LOGIN_SERVICE_URL: TEST_LOGIN_SERVICE_URL,
    ACCOUNT_SERVICE_URL: TEST_ACCOUNT_SERVICE_URL,
    RATE_LIMIT_MAX: '1000',
    LOGIN_RATE_LIMIT_MAX: '1000',
    ...overrides,
  });
}
