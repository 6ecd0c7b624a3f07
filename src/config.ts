/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('WARN'),

  // Sieve growth policy
  PRIMES_GROWTH_FACTOR: z.coerce
    .number()
    .gt(1)
    .default(2)
    .describe('Factor the sieve bound is multiplied by on each retry'),
  PRIMES_INITIAL_BOUND: z.coerce
    .number()
    .int()
    .min(2)
    .default(100)
    .describe('First bound tried when nothing is cached yet'),
});

/**
 * Type for the parsed configuration object.
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      'Configuration validation failed:',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
