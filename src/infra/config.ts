import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
});

const ConfigSchema = DatabaseConfigSchema.extend({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().positive().default(3000),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

  // Argon2id work factor
  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).max(10).default(3),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export interface DatabaseConfig {
  databaseUrl: string;
}

export interface AppConfig extends DatabaseConfig {
  nodeEnv: NodeEnv;
  port: number;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  argon2: {
    memoryCost: number;
    timeCost: number;
  };
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = parseEnv(DatabaseConfigSchema, env);
  return { databaseUrl: parsed.DATABASE_URL };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(ConfigSchema, env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    jwtSecret: parsed.JWT_SECRET,
    jwtExpiresInSeconds: parsed.JWT_EXPIRES_IN_SECONDS,
    argon2: {
      memoryCost: parsed.ARGON2_MEMORY_COST,
      timeCost: parsed.ARGON2_TIME_COST,
    },
  };
}
