import { describe, it, expect } from 'vitest';
import { PgUserRepo } from '../userRepo.js';
import { ConflictError, NotFoundError } from '../../../application/errors.js';
import { FakePool, pgError } from '../../../test/fakePool.js';

const USER_ID = '4f8c2a9e-3b1d-4c6a-9e2f-1a2b3c4d5e6f';

function userRow(overrides: Record<string, unknown> = {}) {
  return {
    id: USER_ID,
    username: 'alice',
    email: 'a@x.com',
    password_hash: '$argon2id$v=19$m=1024,t=2,p=4$c2FsdA$aGFzaA',
    first_name: 'Alice',
    last_name: null,
    is_active: true,
    is_verified: false,
    created_at: new Date('2024-01-01T10:00:00.000Z'),
    updated_at: new Date('2024-01-01T10:00:00.000Z'),
    ...overrides,
  };
}

const newUser = {
  username: 'alice',
  email: 'a@x.com',
  passwordHash: '$argon2id$v=19$m=1024,t=2,p=4$c2FsdA$aGFzaA',
  firstName: 'Alice',
};

describe('PgUserRepo', () => {
  describe('create', () => {
    it('should insert inside a transaction and map the returned row', async () => {
      const pool = new FakePool(({ text }) => (text.startsWith('INSERT') ? [userRow()] : []));
      const repo = new PgUserRepo(pool);

      const user = await repo.create(newUser);

      expect(user).toEqual({
        id: USER_ID,
        username: 'alice',
        email: 'a@x.com',
        passwordHash: newUser.passwordHash,
        firstName: 'Alice',
        lastName: null,
        isActive: true,
        isVerified: false,
        createdAt: new Date('2024-01-01T10:00:00.000Z'),
        updatedAt: new Date('2024-01-01T10:00:00.000Z'),
      });
      expect(pool.statements()).toEqual(['BEGIN', 'INSERT', 'COMMIT']);
      expect(pool.queries[1].values).toEqual(['alice', 'a@x.com', newUser.passwordHash, 'Alice', null]);
      expect(pool.clients[0].releaseCount).toBe(1);
    });

    it('should map a username unique violation to ConflictError and roll back', async () => {
      const pool = new FakePool(({ text }) =>
        text.startsWith('INSERT') ? pgError('23505', 'users_username_key') : []
      );
      const repo = new PgUserRepo(pool);

      const error = await repo.create(newUser).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ message: 'Username already exists', field: 'username' });
      expect(pool.statements()).toEqual(['BEGIN', 'INSERT', 'ROLLBACK']);
      expect(pool.clients[0].releaseCount).toBe(1);
    });

    it('should map an email unique violation to ConflictError', async () => {
      const pool = new FakePool(({ text }) =>
        text.startsWith('INSERT') ? pgError('23505', 'users_email_key') : []
      );

      await expect(new PgUserRepo(pool).create(newUser)).rejects.toMatchObject({
        name: 'ConflictError',
        message: 'Email already exists',
        field: 'email',
      });
    });

    it('should map an unknown unique constraint to a generic conflict', async () => {
      const pool = new FakePool(({ text }) => (text.startsWith('INSERT') ? pgError('23505') : []));

      await expect(new PgUserRepo(pool).create(newUser)).rejects.toMatchObject({
        name: 'ConflictError',
        message: 'User already exists',
        field: undefined,
      });
    });

    it('should rethrow other database errors unchanged', async () => {
      const failure = pgError('08006');
      const pool = new FakePool(({ text }) => (text.startsWith('INSERT') ? failure : []));

      await expect(new PgUserRepo(pool).create(newUser)).rejects.toBe(failure);
      expect(pool.clients[0].releaseCount).toBe(1);
    });
  });

  describe('findById / getById', () => {
    it('should return the mapped user', async () => {
      const pool = new FakePool(() => [userRow()]);

      const user = await new PgUserRepo(pool).findById(USER_ID);

      expect(user?.username).toBe('alice');
      expect(pool.queries[0].values).toEqual([USER_ID]);
    });

    it('should return null when no row matches', async () => {
      const pool = new FakePool(() => []);
      expect(await new PgUserRepo(pool).findById(USER_ID)).toBeNull();
    });

    it('should not query for a malformed id', async () => {
      const pool = new FakePool(() => [userRow()]);

      expect(await new PgUserRepo(pool).findById('not-a-uuid')).toBeNull();
      expect(pool.queries).toHaveLength(0);
    });

    it('should throw NotFoundError from getById', async () => {
      const pool = new FakePool(() => []);
      await expect(new PgUserRepo(pool).getById(USER_ID)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject rows that do not match the user shape', async () => {
      const pool = new FakePool(() => [userRow({ is_active: 'yes' })]);
      await expect(new PgUserRepo(pool).findById(USER_ID)).rejects.toThrow();
    });
  });

  describe('findByLogin', () => {
    it('should look up by username or lower-cased email', async () => {
      const pool = new FakePool(() => [userRow()]);

      const user = await new PgUserRepo(pool).findByLogin('A@X.com');

      expect(user?.id).toBe(USER_ID);
      expect(pool.queries[0].text).toContain('username = $1 OR email = lower($1)');
      expect(pool.queries[0].values).toEqual(['A@X.com']);
    });

    it('should return null when nobody matches', async () => {
      const pool = new FakePool(() => []);
      expect(await new PgUserRepo(pool).findByLogin('mallory')).toBeNull();
    });
  });
});
