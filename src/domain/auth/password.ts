import { argon2id, hash, verify } from 'argon2';

/**
 * One-way credential hashing. Implementations must salt every call and
 * fail closed on hashes they cannot parse.
 */
export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, passwordHash: string): Promise<boolean>;
}

export interface Argon2Options {
  /** Memory cost in KiB. */
  memoryCost?: number;
  timeCost?: number;
}

/**
 * Password hashing using Argon2id.
 */
export class Password {
  /**
   * Hash a plain text password.
   */
  static async hash(plainPassword: string, options: Argon2Options = {}): Promise<string> {
    return await hash(plainPassword, { type: argon2id, ...options });
  }

  /**
   * Verify a plain password against a hash.
   * A malformed hash counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}

export class Argon2PasswordHasher implements PasswordHasher {
  constructor(private readonly options: Argon2Options = {}) {}

  async hash(plainPassword: string): Promise<string> {
    return Password.hash(plainPassword, this.options);
  }

  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    return Password.verify(plainPassword, passwordHash);
  }
}
