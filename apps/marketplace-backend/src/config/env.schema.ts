import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, { message: 'DATABASE_URL is required' }),
  DATABASE_POOL_SIZE: z.coerce.number().int().min(1).max(100).default(10),
  JWT_SECRET: z.string().min(1, { message: 'JWT_SECRET is required' }),
  REDIS_URL: z.string().url().optional(),
  SWAGGER_ENABLED: booleanFlag.optional(),
  TRUST_PROXY: booleanFlag.optional(),
  THROTTLE_TTL_MS: z.coerce.number().int().positive().default(60000),
  THROTTLE_LIMIT: z.coerce.number().int().positive().default(100),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
});

export type Env = z.infer<typeof envSchema>;

/** `validate` hook for ConfigModule; fails startup on a bad environment. */
export const validateEnv = (config: Record<string, unknown>): Env => {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return result.data;
};
