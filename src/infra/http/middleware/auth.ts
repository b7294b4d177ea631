import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  userId?: string;
}

const jwtPayloadSchema = z.object({
  userId: z.string(),
  username: z.string(),
});

/**
 * Require a `Bearer <jwt>` Authorization header and expose its claims
 * on the request. Failures are forwarded to the error handler as 401s.
 */
export function authMiddleware(jwtSecret: string) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix

    let decoded: unknown;
    try {
      decoded = jwt.verify(token, jwtSecret, { algorithms: ['HS256'] });
    } catch {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    const payload = jwtPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    req.userId = payload.data.userId;
    next();
  };
}
