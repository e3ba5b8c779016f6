import { z } from 'zod';

import { AppError } from '@/shared/errors/app-error.js';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  LOG_FILE: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw AppError.validation('config.invalid-environment', { issues: parsed.error.issues });
  }

  return parsed.data;
}
