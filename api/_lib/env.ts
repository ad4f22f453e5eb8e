// api/_lib/env.ts - Environment configuration for the analytics core
import { z } from 'zod';

const flag = z
  .string()
  .optional()
  .transform(v => v === '1' || v === 'true');

export const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().default('info'),
  LOG_SILENT: flag,
  PRETTY_LOGS: flag,
  SERVICE_NAME: z.string().min(1).default('emotion-analytics'),
  SERVICE_VERSION: z.string().default('0.0.0'),
  // Capacity of the trend buffer (most recent N primary emotions)
  TREND_WINDOW_SIZE: z.coerce.number().int().positive().default(10),
  DEFAULT_CULTURAL_CONTEXT: z.string().min(1).default('default'),
  // 0 disables the classifier timeout
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  EMOTION_DATA_PATH: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join(', ')}`);
    this.name = 'EnvValidationError';
  }
}

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new EnvValidationError(
      result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}

export const env: Env = loadEnv();
