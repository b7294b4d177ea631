import express from 'express';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { UserRepository } from '../../domain/auth/userRepository.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { AuthenticateUseCase } from '../../application/auth/authenticate.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { GetCurrentUserUseCase } from '../../application/auth/getCurrentUser.js';
import { createAuthRoutes } from './routes/auth.js';
import { createUserRoutes } from './routes/users.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler, ErrorResponse } from './middleware/errorHandler.js';

export interface AppDeps {
  userRepo: UserRepository;
  hasher: PasswordHasher;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  /** Resolves when the database answers; used by the readiness check. */
  pingDatabase: () => Promise<unknown>;
}

/**
 * Build the Express application. No listening, no globals: the server
 * entry point and the tests both call this with their own dependencies.
 */
export function createApp(deps: AppDeps): express.Application {
  const app = express();

  const registerUseCase = new RegisterUseCase(deps.userRepo, deps.hasher);
  const loginUseCase = new LoginUseCase(new AuthenticateUseCase(deps.userRepo, deps.hasher), {
    secret: deps.jwtSecret,
    expiresInSeconds: deps.jwtExpiresInSeconds,
  });
  const getCurrentUserUseCase = new GetCurrentUserUseCase(deps.userRepo);

  // Middleware
  app.disable('x-powered-by');
  app.use(express.json({ limit: '10kb' }));

  app.use(createHealthRoutes(deps.pingDatabase));
  app.use(createSwaggerRoutes());
  app.use(createAuthRoutes({ registerUseCase, loginUseCase }));
  app.use(createUserRoutes({ jwtSecret: deps.jwtSecret, getCurrentUserUseCase }));

  app.use((req, res) => {
    const response: ErrorResponse = {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    };
    res.status(404).json(response);
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
