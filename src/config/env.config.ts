import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const intWithDefault = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().nonnegative());

// Every variable has a default so a bare checkout can resolve seasons from local files
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Local data
  DATA_DIR: z.string().min(1).default('data/processed'),
  FORMAT_CATALOG_PATH: z.string().optional(),
  COHORT_OVERRIDES_PATH: z.string().optional(),

  // Starter-score service (only needed for seasons with synthesized bowl games)
  SCORE_API_BASE_URL: z.string().url().optional(),
  SCORE_API_LEAGUE_ID: z.string().min(1).optional(),
  SCORE_REQUESTS_PER_MINUTE: intWithDefault('30'),
  SCORE_MIN_DELAY_MS: intWithDefault('1000'),
  SCORE_MAX_CONCURRENCY: intWithDefault('3'),
  SCORE_MAX_RETRIES: intWithDefault('3'),
  SCORE_RETRY_BASE_DELAY_MS: intWithDefault('1000'),
  SCORE_JITTER_FACTOR: z
    .string()
    .default('0.1')
    .transform((val) => parseFloat(val))
    .pipe(z.number().min(0).max(1)),
  SCORE_TIMEOUT_MS: intWithDefault('30000'),

  // Parallel season resolution
  SEASON_CONCURRENCY: intWithDefault('4'),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationException(`Invalid environment configuration: ${details.join('; ')}`);
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
