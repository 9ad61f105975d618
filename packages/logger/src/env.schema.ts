import { z } from 'zod';

import type { LogLevel } from './logger.js';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);

export const loggerEnvSchema = z.object({
  CUSTOMERIO_LOG_COLOR: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  CUSTOMERIO_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(logLevelSchema)
    .default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Reads logger settings from the environment. Unknown levels fail loudly
 * rather than silently falling back to `info`.
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${issues}`);
  }
  return result.data;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return validateLoggerEnv(env).CUSTOMERIO_LOG_LEVEL;
}
