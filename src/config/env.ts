import { z } from 'zod';
import type { EnvConfig } from '../types';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug', 'silent']).default('info'),
  SCORING_CONFIG_PATH: z.string().min(1).optional(),
});

/**
 * Parses environment variables once at load.
 * Invalid values fail fast instead of surfacing mid-evaluation.
 */
function loadEnv(): EnvConfig {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
}

export const env: EnvConfig = loadEnv();
