import { toUserResponse, User, UserResponse } from '../../domain/auth/user.js';
import type { UserRepository } from '../../domain/auth/userRepository.js';
import { NotFoundError, UnauthorizedError } from '../errors.js';

/**
 * Resolves the user behind a verified token. A token that outlived its
 * user, or whose user was deactivated, no longer authenticates.
 */
export class GetCurrentUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(userId: string): Promise<UserResponse> {
    let user: User;
    try {
      user = await this.userRepo.getById(userId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new UnauthorizedError('User no longer exists');
      }
      throw error;
    }

    if (!user.isActive) {
      throw new UnauthorizedError('User is inactive');
    }
    return toUserResponse(user);
  }
}
