import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { PasswordHasher } from '../../../domain/auth/password.js';
import jwt from 'jsonwebtoken';
import { AuthenticateUseCase } from '../authenticate.js';
import { LoginUseCase } from '../login.js';
import { RegisterUseCase } from '../register.js';
import { AuthError, UnauthorizedError } from '../../errors.js';
import { InMemoryUserRepo } from '../../../test/inMemoryUserRepo.js';
import { createTestHasher } from '../../../test/hasher.js';

const JWT_SECRET = 'test-secret';

describe('AuthenticateUseCase', () => {
  let userRepo: InMemoryUserRepo;
  const hasher = createTestHasher();
  let useCase: AuthenticateUseCase;
  let aliceId: string;

  beforeEach(async () => {
    userRepo = new InMemoryUserRepo();
    useCase = new AuthenticateUseCase(userRepo, hasher);
    const alice = await new RegisterUseCase(userRepo, hasher).execute({
      username: 'alice',
      email: 'a@x.com',
      password: 'Abc123',
    });
    aliceId = alice.id;
  });

  it('should authenticate by username', async () => {
    const user = await useCase.execute({ username: 'alice', password: 'Abc123' });
    expect(user.id).toBe(aliceId);
  });

  it('should authenticate by email, ignoring case', async () => {
    const user = await useCase.execute({ username: 'A@X.com', password: 'Abc123' });
    expect(user.id).toBe(aliceId);
  });

  it('should give the same error for unknown user and wrong password', async () => {
    const unknown = await useCase.execute({ username: 'mallory', password: 'Abc123' }).catch((e: unknown) => e);
    const wrong = await useCase.execute({ username: 'alice', password: 'Abc124' }).catch((e: unknown) => e);

    expect(unknown).toBeInstanceOf(AuthError);
    expect(wrong).toBeInstanceOf(AuthError);
    expect(unknown).toEqual(wrong);
    expect(unknown instanceof Error ? unknown.message : '').toBe('Invalid username or password');
  });

  it('should still run a verification for unknown users', async () => {
    const verifySpy = vi.spyOn(hasher, 'verify');

    await expect(useCase.execute({ username: 'mallory', password: 'Abc123' })).rejects.toThrow(AuthError);

    expect(verifySpy).toHaveBeenCalledTimes(1);
    verifySpy.mockRestore();
  });

  it('should reject an inactive user with the generic error', async () => {
    userRepo.setActive(aliceId, false);

    await expect(useCase.execute({ username: 'alice', password: 'Abc123' })).rejects.toThrow(
      'Invalid username or password'
    );
  });

  it('should be an UnauthorizedError', async () => {
    await expect(useCase.execute({ username: 'alice', password: 'Wrong1' })).rejects.toBeInstanceOf(
      UnauthorizedError
    );
  });

  describe('dummy hash', () => {
    function stubHasher(): PasswordHasher & {
      hash: Mock<(plain: string) => Promise<string>>;
      verify: Mock<(plain: string, hash: string) => Promise<boolean>>;
    } {
      return {
        hash: vi.fn(async (_plain: string) => 'dummy-hash'),
        verify: vi.fn(async (_plain: string, _hash: string) => false),
      };
    }

    it('should be computed when the use case is built, before any login', () => {
      const stub = stubHasher();

      new AuthenticateUseCase(new InMemoryUserRepo(), stub);

      expect(stub.hash).toHaveBeenCalledTimes(1);
      expect(stub.verify).not.toHaveBeenCalled();
    });

    it('should be reused across unknown-user logins', async () => {
      const stub = stubHasher();
      const auth = new AuthenticateUseCase(new InMemoryUserRepo(), stub);

      await expect(auth.execute({ username: 'mallory', password: 'Abc123' })).rejects.toThrow(AuthError);
      await expect(auth.execute({ username: 'trudy', password: 'Abc123' })).rejects.toThrow(AuthError);

      expect(stub.hash).toHaveBeenCalledTimes(1);
      expect(stub.verify).toHaveBeenNthCalledWith(2, 'Abc123', 'dummy-hash');
    });

    it('should be retried after a failed computation', async () => {
      const stub = stubHasher();
      stub.hash.mockRejectedValueOnce(new Error('out of memory'));
      const auth = new AuthenticateUseCase(new InMemoryUserRepo(), stub);
      await new Promise((resolve) => setTimeout(resolve, 0));

      await expect(auth.execute({ username: 'mallory', password: 'Abc123' })).rejects.toThrow(AuthError);

      expect(stub.hash).toHaveBeenCalledTimes(2);
      expect(stub.verify).toHaveBeenCalledWith('Abc123', 'dummy-hash');
    });
  });
});

describe('LoginUseCase', () => {
  it('should issue a bearer token for the user', async () => {
    const userRepo = new InMemoryUserRepo();
    const hasher = createTestHasher();
    const alice = await new RegisterUseCase(userRepo, hasher).execute({
      username: 'alice',
      email: 'a@x.com',
      password: 'Abc123',
    });
    const useCase = new LoginUseCase(new AuthenticateUseCase(userRepo, hasher), {
      secret: JWT_SECRET,
      expiresInSeconds: 3600,
    });

    const result = await useCase.execute({ username: 'alice', password: 'Abc123' });

    expect(result.tokenType).toBe('bearer');
    expect(result.expiresIn).toBe(3600);
    expect(result.user).toEqual(alice);

    const decoded = jwt.verify(result.accessToken, JWT_SECRET);
    expect(decoded).toMatchObject({ userId: alice.id, username: 'alice' });
    expect(typeof decoded === 'object' ? (decoded.exp ?? 0) - (decoded.iat ?? 0) : 0).toBe(3600);
  });
});
