import { z } from 'zod';

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Listener
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),

  // Jobs
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  QUEUE_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  MAX_DOCUMENT_SIZE_MB: z.coerce.number().positive().default(50),

  // Worker Pool
  WORKER_COUNT: z.coerce.number().int().min(1).max(16).default(1),
  MAX_QUEUED_JOBS: z.coerce.number().int().min(0).default(16),
  DOCUMENT_PROCESSOR: z.string().min(1).default('passthrough'),
  WORKER_MAX_MEMORY_MB: z.coerce.number().int().positive().optional(),
  SHUTDOWN_GRACE_SECONDS: z.coerce.number().min(0).default(30),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
