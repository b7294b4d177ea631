import { Router } from 'express';

/**
 * @openapi
 * /health:
 *   get:
 *     tags: [Health]
 *     summary: Liveness check
 *     responses:
 *       200:
 *         description: Process is up
 *
 * /health/ready:
 *   get:
 *     tags: [Health]
 *     summary: Readiness check (pings the database)
 *     responses:
 *       200:
 *         description: Database reachable
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const READINESS_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createHealthRoutes(pingDatabase: () => Promise<unknown>) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/health/ready', (_req, res, next) => {
    withTimeout(pingDatabase(), READINESS_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok', database: 'up' });
      })
      .catch((error: unknown) => {
        console.error('Readiness check failed:', error);
        res.status(503).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
