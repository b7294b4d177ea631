import { Router } from 'express';
import { GetCurrentUserUseCase } from '../../../application/auth/getCurrentUser.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { authMiddleware, AuthRequest } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /users/me:
 *   get:
 *     tags: [Users]
 *     summary: Profile of the authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserResponse'
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export interface UserRouteDeps {
  jwtSecret: string;
  getCurrentUserUseCase: GetCurrentUserUseCase;
}

export function createUserRoutes({ jwtSecret, getCurrentUserUseCase }: UserRouteDeps) {
  const router = Router();

  router.get(
    '/users/me',
    authMiddleware(jwtSecret),
    asyncHandler(async (req: AuthRequest, res) => {
      if (!req.userId) {
        throw new UnauthorizedError();
      }
      const user = await getCurrentUserUseCase.execute(req.userId);
      res.status(200).json(user);
    })
  );

  return router;
}
