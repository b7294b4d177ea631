import jwt from 'jsonwebtoken';
import { toUserResponse, UserResponse } from '../../domain/auth/user.js';
import { AuthenticateUseCase, LoginCommand } from './authenticate.js';

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
  /** Token lifetime in seconds. */
  expiresIn: number;
  user: UserResponse;
}

export interface TokenOptions {
  secret: string;
  expiresInSeconds: number;
}

export class LoginUseCase {
  constructor(
    private authenticate: AuthenticateUseCase,
    private tokenOptions: TokenOptions
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.authenticate.execute(command);

    // Generate JWT
    const accessToken = jwt.sign(
      {
        userId: user.id,
        username: user.username,
      },
      this.tokenOptions.secret,
      {
        algorithm: 'HS256',
        expiresIn: this.tokenOptions.expiresInSeconds,
      }
    );

    return {
      accessToken,
      tokenType: 'bearer',
      expiresIn: this.tokenOptions.expiresInSeconds,
      user: toUserResponse(user),
    };
  }
}
