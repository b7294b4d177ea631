import { loadConfig } from '../config.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { Argon2PasswordHasher } from '../../domain/auth/password.js';
import { createApp } from './app.js';

const config = loadConfig();
const pool = createPool(config.databaseUrl);

const app = createApp({
  userRepo: new PgUserRepo(pool),
  hasher: new Argon2PasswordHasher(config.argon2),
  jwtSecret: config.jwtSecret,
  jwtExpiresInSeconds: config.jwtExpiresInSeconds,
  pingDatabase: () => pool.query('SELECT 1'),
});

const server = app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port} (${config.nodeEnv})`);
  console.log(`Health check: http://localhost:${config.port}/health`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    pool
      .end()
      .then(() => {
        console.log('Database pool closed');
      })
      .catch((error: unknown) => {
        console.error('Error closing database pool:', error);
        process.exitCode = 1;
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
