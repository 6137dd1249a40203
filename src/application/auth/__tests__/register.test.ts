import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUseCase } from '../register.js';
import { ForgotPasswordUseCase } from '../forgotPassword.js';
import { Password } from '../../../domain/auth/password.js';
import type { User } from '../../../domain/auth/user.js';
import { DuplicateIdentityError, NotFoundError } from '../../errors.js';
import { MemoryUserStore } from '../../../testing/memoryStores.js';

/** Existence check always misses, as when two registrations race. */
class RacingUserStore extends MemoryUserStore {
  async findByEmail(_email: string): Promise<User | null> {
    return null;
  }
}

describe('RegisterUseCase', () => {
  let userRepo: MemoryUserStore;
  let useCase: RegisterUseCase;

  beforeEach(() => {
    userRepo = new MemoryUserStore();
    useCase = new RegisterUseCase(userRepo);
  });

  it('should store a hashed password', async () => {
    const result = await useCase.execute({ email: 'a@b.com', password: 'pw1' });

    expect(result.email).toBe('a@b.com');
    const user = await userRepo.findByEmail('a@b.com');
    expect(user?.id).toBe(result.userId);
    expect(user?.passwordHash).not.toBe('pw1');
    expect(await Password.verify('pw1', user?.passwordHash ?? '')).toBe(true);
  });

  it('should reject a duplicate email and leave the first user unchanged', async () => {
    await useCase.execute({ email: 'a@b.com', password: 'pw1' });
    const before = await userRepo.findByEmail('a@b.com');

    await expect(
      useCase.execute({ email: 'a@b.com', password: 'pw2' })
    ).rejects.toBeInstanceOf(DuplicateIdentityError);

    const after = await userRepo.findByEmail('a@b.com');
    expect(after).toEqual(before);
    expect(userRepo.size).toBe(1);
    expect(await Password.verify('pw1', after?.passwordHash ?? '')).toBe(true);
    expect(await Password.verify('pw2', after?.passwordHash ?? '')).toBe(false);
  });

  it('should map a storage-level duplicate to the same error', async () => {
    const racing = new RegisterUseCase(new RacingUserStore());
    await racing.execute({ email: 'a@b.com', password: 'pw1' });

    await expect(
      racing.execute({ email: 'a@b.com', password: 'pw1' })
    ).rejects.toBeInstanceOf(DuplicateIdentityError);
  });

  it('should keep emails that differ only in case apart', async () => {
    await useCase.execute({ email: 'a@b.com', password: 'pw1' });
    await useCase.execute({ email: 'A@b.com', password: 'pw2' });

    expect(userRepo.size).toBe(2);
  });
});

describe('ForgotPasswordUseCase', () => {
  it('should reject an unknown email with NotFoundError', async () => {
    const useCase = new ForgotPasswordUseCase(new MemoryUserStore());

    await expect(useCase.execute('x@y.com')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should confirm a registered email', async () => {
    const userRepo = new MemoryUserStore();
    await userRepo.create('a@b.com', 'hash');

    await expect(new ForgotPasswordUseCase(userRepo).execute('a@b.com')).resolves.toEqual({
      email: 'a@b.com',
    });
  });
});
