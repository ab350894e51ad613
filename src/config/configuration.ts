/**
 * Application Configuration
 *
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the worker.
 *
 * ## Configuration Sources:
 * 1. Environment variables (system environment of the job runtime)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const timeout = this.configService.get('validator.timeoutSeconds', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { tmpdir } from 'os';
import { validateEnv, EnvConfig } from './validation.schema';

export type AppConfig = {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  /**
   * External validator invocation.
   *
   * ### command (Environment: VALIDATOR_COMMAND)
   * - Executable called as `<command> <sequence> <label> <third-data>`
   * - Lives in the worker image, `/opt/validation/validate.sh` by default
   *
   * ### timeoutSeconds (Environment: VALIDATOR_TIMEOUT_SECONDS)
   * - Wall-clock bound for one invocation; the process is killed past it
   *   and the row is reported as failed with exit code -1
   *
   * ### maxOutputBytes (Environment: VALIDATOR_MAX_OUTPUT_MB)
   * - Capture limit for stdout and stderr each
   */
  validator: {
    command: string;
    timeoutSeconds: number;
    maxOutputBytes: number;
  };
  scratch: {
    rootDir: string;
  };
  dispatch: {
    tablePath: string;
    resultsPath: string;
    miniBatchSize: number;
  };
};

export function buildConfiguration(source: Record<string, unknown>): AppConfig {
  const env: EnvConfig = validateEnv(source);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    validator: {
      command: env.VALIDATOR_COMMAND,
      timeoutSeconds: env.VALIDATOR_TIMEOUT_SECONDS,
      maxOutputBytes: env.VALIDATOR_MAX_OUTPUT_MB * 1024 * 1024,
    },
    scratch: {
      rootDir: env.SCRATCH_DIR || tmpdir(),
    },
    dispatch: {
      tablePath: env.DISPATCH_TABLE_PATH,
      resultsPath: env.RESULTS_PATH,
      miniBatchSize: env.MINI_BATCH_SIZE,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfiguration(process.env);
