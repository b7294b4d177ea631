import { z } from 'zod';
import { ConflictError, ConflictField, NotFoundError } from '../../application/errors.js';
import type { NewUser, User } from '../../domain/auth/user.js';
import type { UserRepository } from '../../domain/auth/userRepository.js';
import type { ConnectionPool } from './pool.js';
import { withTransaction } from './transaction.js';

const USER_COLUMNS = `id, username, email, password_hash, first_name, last_name,
       is_active, is_verified, created_at, updated_at`;

const userRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  password_hash: z.string(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  is_active: z.boolean(),
  is_verified: z.boolean(),
  created_at: z.date(),
  updated_at: z.date(),
});

const pgErrorSchema = z.object({
  code: z.string(),
  constraint: z.string().optional(),
});

const UNIQUE_VIOLATION = '23505';

const CONFLICT_BY_CONSTRAINT: Record<string, ConflictField> = {
  users_username_key: 'username',
  users_email_key: 'email',
};

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function toUser(row: unknown): User {
  const r = userRowSchema.parse(row);
  return {
    id: r.id,
    username: r.username,
    email: r.email,
    passwordHash: r.password_hash,
    firstName: r.first_name,
    lastName: r.last_name,
    isActive: r.is_active,
    isVerified: r.is_verified,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/**
 * Map a unique-constraint violation to ConflictError; anything else is
 * returned unchanged.
 */
function toConflict(error: unknown): unknown {
  const parsed = pgErrorSchema.safeParse(error);
  if (!parsed.success || parsed.data.code !== UNIQUE_VIOLATION) {
    return error;
  }

  const field = parsed.data.constraint ? CONFLICT_BY_CONSTRAINT[parsed.data.constraint] : undefined;
  if (field === 'username') {
    return new ConflictError('Username already exists', field);
  }
  if (field === 'email') {
    return new ConflictError('Email already exists', field);
  }
  return new ConflictError('User already exists');
}

export class PgUserRepo implements UserRepository {
  constructor(private readonly pool: ConnectionPool) {}

  async create(user: NewUser): Promise<User> {
    try {
      return await withTransaction(this.pool, async (client) => {
        const result = await client.query(
          `INSERT INTO users (username, email, password_hash, first_name, last_name)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${USER_COLUMNS}`,
          [user.username, user.email, user.passwordHash, user.firstName ?? null, user.lastName ?? null]
        );
        return toUser(result.rows[0]);
      });
    } catch (error) {
      throw toConflict(error);
    }
  }

  async findById(id: string): Promise<User | null> {
    // Postgres rejects malformed uuids outright; treat them as unknown ids
    if (!UUID_PATTERN.test(id)) {
      return null;
    }

    const result = await this.pool.query(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async getById(id: string): Promise<User> {
    const user = await this.findById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  async findByLogin(identifier: string): Promise<User | null> {
    const result = await this.pool.query(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE username = $1 OR email = lower($1)
       ORDER BY (username = $1) DESC
       LIMIT 1`,
      [identifier]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }
}
