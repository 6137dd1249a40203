import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { loadDatabaseConfig } from '../../../config.js';
import { createPool } from '../pool.js';
import { UserRepo } from '../userRepo.js';
import { DuplicateIdentityError } from '../../../application/errors.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('UserRepo', () => {
  const pool = createPool(loadDatabaseConfig());
  const repo = new UserRepo(pool);
  const testEmail = `vitest-user-${Date.now()}-${Math.random().toString(16).slice(2)}@example.com`;

  beforeAll(async () => {
    await pool.query('SELECT 1');
  });

  afterEach(async () => {
    await pool.query('DELETE FROM users WHERE email = $1', [testEmail]);
  });

  afterAll(async () => {
    await pool.end();
  });

  it('should create and find a user', async () => {
    const created = await repo.create(testEmail, 'hash');

    const found = await repo.findByEmail(testEmail);
    expect(found).toEqual(created);
    expect(found?.passwordHash).toBe('hash');
  });

  it('should return null for an unknown email', async () => {
    expect(await repo.findByEmail(`missing-${testEmail}`)).toBeNull();
  });

  it('should reject a second user with the same email', async () => {
    await repo.create(testEmail, 'hash');

    await expect(repo.create(testEmail, 'other')).rejects.toBeInstanceOf(DuplicateIdentityError);
  });

  it('should let exactly one of two concurrent registrations win', async () => {
    const results = await Promise.allSettled([
      repo.create(testEmail, 'first'),
      repo.create(testEmail, 'second'),
    ]);

    const reasons = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(DuplicateIdentityError);
  });
});
