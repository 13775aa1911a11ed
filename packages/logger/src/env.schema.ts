import { z } from 'zod';

import type { LogLevel } from './logger.js';

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .or(z.literal('').transform(() => undefined))
    .optional(),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Picks the log level from LOG_LEVEL, falling back to 'debug' in development
 * and 'info' elsewhere. Unknown values throw with the offending variable named.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }

  return result.data.LOG_LEVEL ?? (result.data.NODE_ENV === 'development' ? 'debug' : 'info');
}
