import { z } from 'zod';

// Node timers overflow past 2^31-1 ms and fire after 1 ms instead
export const MAX_TIMEOUT_SECONDS = Math.floor(2147483647 / 1000);

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // Validator
  VALIDATOR_COMMAND: z.string().min(1).default('/opt/validation/validate.sh'),
  VALIDATOR_TIMEOUT_SECONDS: z.coerce
    .number()
    .positive()
    .max(MAX_TIMEOUT_SECONDS, `Must be at most ${MAX_TIMEOUT_SECONDS} seconds`)
    .default(600),
  VALIDATOR_MAX_OUTPUT_MB: z.coerce.number().positive().default(64),

  // Scratch space (empty means the OS temp dir)
  SCRATCH_DIR: z.string().optional(),

  // Local dispatch runner
  DISPATCH_TABLE_PATH: z.string().default('data/sample_dispatch.csv'),
  RESULTS_PATH: z.string().default('results/results.csv'),
  MINI_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
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
