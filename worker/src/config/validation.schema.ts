import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/**
 * Environment accepted by the worker. Unknown variables pass through untouched.
 */
export const EnvSchema = z
  .object({
    PORT: positiveInt(3001),
    REDIS_HOST: z.string().min(1).default('localhost'),
    REDIS_PORT: positiveInt(6379),
    REDIS_PASSWORD: z.string().optional(),
    MARKETPLACE_BASE_URL: z.string().url().default('https://bandcamp.com'),
    MARKETPLACE_COOKIE: z.string().optional(),
    MARKETPLACE_USER_AGENT: z.string().min(1).optional(),
    FETCH_TIMEOUT_MS: positiveInt(30000),
    FETCH_MAX_WORKERS: positiveInt(15),
    COLLECTION_PAGE_SIZE: positiveInt(10000),
    RECOMMENDATIONS_QUEUE_CONCURRENCY: positiveInt(2),
    RANDOM_SEED: z.coerce.number().int().optional(),
  })
  .passthrough();

export type Env = z.infer<typeof EnvSchema>;

/**
 * ConfigModule validate hook; throws with every offending variable listed
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
