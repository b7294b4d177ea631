import type { NewUser, User } from './user.js';

/**
 * Persistence port for user records.
 *
 * create() must be atomic: when the username or email is already taken it
 * rejects with ConflictError and leaves no partial record behind.
 * getById() rejects with NotFoundError.
 */
export interface UserRepository {
  create(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  getById(id: string): Promise<User>;
  /** Match on username, or on email (case-insensitive). */
  findByLogin(identifier: string): Promise<User | null>;
}
