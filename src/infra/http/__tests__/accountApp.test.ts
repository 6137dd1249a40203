import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { createAccountApp } from '../accountApp.js';
import { TokenService } from '../../../application/auth/tokenService.js';
import { MemoryAccountStore, MemoryUserStore } from '../../../testing/memoryStores.js';
import { testConfig } from '../../../testing/testConfig.js';
import { setCookieHeaders } from '../../../testing/cookies.js';

describe('account service', () => {
  const config = testConfig();
  const tokens = new TokenService(config.token);
  let userRepo: MemoryUserStore;
  let accountRepo: MemoryAccountStore;
  let app: express.Express;
  let cookie: string;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    userRepo = new MemoryUserStore();
    accountRepo = new MemoryAccountStore();
    app = createAccountApp({
      config,
      userRepo,
      accountRepo,
      ping: () => Promise.resolve(),
    });

    await userRepo.create('a@b.com', 'hash');
    cookie = `access_token=${tokens.issue('a@b.com')}`;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createAccount(accountType: string) {
    return request(app)
      .post('/ui/account')
      .set('Cookie', cookie)
      .type('form')
      .send({ account_type: accountType });
  }

  it('should report the service status at the root', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.text).toBe('<h3>Account Service is up!</h3>');
  });

  it('should send anonymous clients to the login service', async () => {
    const res = await request(app).get('/ui/account');

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('http://login.test/login');
  });

  it('should flag an expired session on the login service URL', async () => {
    const pastIssuer = new TokenService(config.token, () => new Date(Date.now() - 2 * 60 * 60 * 1000));

    const res = await request(app)
      .get('/ui/account')
      .set('Cookie', `access_token=${pastIssuer.issue('a@b.com')}`);

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('http://login.test/login?session_expired=1');
  });

  it('should accept tokens from the login service signed with the shared key', async () => {
    const res = await request(app).get('/ui/account').set('Cookie', cookie);

    expect(res.status).toBe(200);
    expect(res.text).toContain('Account for a@b.com');
    expect(res.text).toContain('You do not have an account yet.');
    expect(res.text).toContain('<a href="http://login.test/logout">Log out</a>');
  });

  it('should open an account with the default balance', async () => {
    const res = await createAccount('checking');

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/ui/account');

    const page = await request(app).get('/ui/account').set('Cookie', cookie);
    expect(page.text).toContain('<dd>checking</dd>');
    expect(page.text).toContain('<dd class="balance">1000.00</dd>');
    expect(page.text).not.toContain('<form');
  });

  it('should keep the first account on a repeated create', async () => {
    await createAccount('checking');
    const res = await createAccount('savings');

    expect(res.status).toBe(302);
    expect(accountRepo.size).toBe(1);
    const account = await accountRepo.findByEmail('a@b.com');
    expect(account?.accountType).toBe('checking');
  });

  it('should trim the account type', async () => {
    await createAccount('  savings  ');

    const account = await accountRepo.findByEmail('a@b.com');
    expect(account?.accountType).toBe('savings');
  });

  it.each([
    ['blank', '   '],
    ['too long', 'x'.repeat(33)],
  ])('should reject a %s account type', async (_label, accountType) => {
    const res = await createAccount(accountType);

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('VALIDATION_ERROR');
    expect(accountRepo.size).toBe(0);
  });

  it('should escape the account type when rendering', async () => {
    await createAccount('<b>gold</b>');

    const page = await request(app).get('/ui/account').set('Cookie', cookie);
    expect(page.text).toContain('<dd>&lt;b&gt;gold&lt;/b&gt;</dd>');
  });

  it('should not create an account for a removed user', async () => {
    userRepo.remove('a@b.com');

    const res = await createAccount('checking');

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('http://login.test/login');
    expect(setCookieHeaders(res)[0]).toMatch(/^access_token=; Path=\/; Expires=/);
    expect(accountRepo.size).toBe(0);
  });

  it('should keep accounts apart per identity', async () => {
    await userRepo.create('c@d.com', 'hash');
    await createAccount('checking');

    const other = await request(app)
      .get('/ui/account')
      .set('Cookie', `access_token=${tokens.issue('c@d.com')}`);

    expect(other.text).toContain('You do not have an account yet.');
  });
});
