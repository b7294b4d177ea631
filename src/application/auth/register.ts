import type { PasswordHasher } from '../../domain/auth/password.js';
import { checkPasswordPolicy, passwordRuleMessage } from '../../domain/auth/passwordPolicy.js';
import { toUserResponse, UserResponse } from '../../domain/auth/user.js';
import type { UserRepository } from '../../domain/auth/userRepository.js';
import { ValidationError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
  firstName?: string | null;
  lastName?: string | null;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher
  ) {}

  /**
   * Uniqueness of username and email is left to the store: create()
   * rejects with ConflictError, so two racing registrations cannot both win.
   */
  async execute(command: RegisterCommand): Promise<UserResponse> {
    // A password that fails the policy is never hashed
    const policy = checkPasswordPolicy(command.password);
    if (!policy.valid) {
      throw new ValidationError(
        policy.violations.map((rule) => ({ path: 'password', message: passwordRuleMessage(rule) }))
      );
    }

    const passwordHash = await this.hasher.hash(command.password);

    const user = await this.userRepo.create({
      username: command.username,
      email: command.email.trim().toLowerCase(),
      passwordHash,
      firstName: command.firstName ?? null,
      lastName: command.lastName ?? null,
    });

    return toUserResponse(user);
  }
}
