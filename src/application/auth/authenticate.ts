import type { PasswordHasher } from '../../domain/auth/password.js';
import type { User } from '../../domain/auth/user.js';
import type { UserRepository } from '../../domain/auth/userRepository.js';
import { AuthError } from '../errors.js';

export interface LoginCommand {
  /** Username or email. */
  username: string;
  password: string;
}

// Verified against when the user does not exist, so both failures cost the same.
const DUMMY_PASSWORD = 'Dummy-password-0';

export class AuthenticateUseCase {
  private dummyHash?: Promise<string>;

  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher
  ) {
    // Computed up front so the first unknown-user login costs no extra hash
    void this.getDummyHash();
  }

  async execute(command: LoginCommand): Promise<User> {
    const user = await this.userRepo.findByLogin(command.username);

    if (!user) {
      await this.hasher.verify(command.password, await this.getDummyHash());
      throw new AuthError();
    }

    const isValid = await this.hasher.verify(command.password, user.passwordHash);
    if (!isValid || !user.isActive) {
      throw new AuthError();
    }

    return user;
  }

  private getDummyHash(): Promise<string> {
    if (this.dummyHash) {
      return this.dummyHash;
    }
    const pending = this.hasher.hash(DUMMY_PASSWORD);
    this.dummyHash = pending;
    // A failed hash is not cached: the next call retries
    void pending.catch(() => {
      if (this.dummyHash === pending) {
        this.dummyHash = undefined;
      }
    });
    return pending;
  }
}
