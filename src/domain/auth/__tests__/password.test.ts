import { describe, it, expect } from 'vitest';
import { Password } from '../password.js';

describe('Password', () => {
  it('should produce a self-contained argon2id hash with the fixed cost', async () => {
    const hash = await Password.hash('pw1');

    expect(hash.startsWith('$argon2id$v=19$m=65536,t=3,p=1$')).toBe(true);
  });

  it('should verify the original password', async () => {
    const hash = await Password.hash('correct horse');

    expect(await Password.verify('correct horse', hash)).toBe(true);
  });

  it('should reject a wrong password', async () => {
    const hash = await Password.hash('correct horse');

    expect(await Password.verify('correct horsE', hash)).toBe(false);
    expect(await Password.verify('', hash)).toBe(false);
  });

  it('should salt every hash', async () => {
    const first = await Password.hash('same-password');
    const second = await Password.hash('same-password');

    expect(first).not.toBe(second);
    expect(await Password.verify('same-password', first)).toBe(true);
    expect(await Password.verify('same-password', second)).toBe(true);
  });

  it('should treat a malformed stored hash as a mismatch', async () => {
    expect(await Password.verify('pw1', 'not-a-hash')).toBe(false);
    expect(await Password.verify('pw1', '')).toBe(false);
  });
});
