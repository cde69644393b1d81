/**
 * Application Configuration
 * Environment variables parsed and validated once per process
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const loggingEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

const envSchema = loggingEnvSchema.extend({
  // Pooled SEND data store
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),

  // CDISC controlled terminology version, latest loaded version when unset
  CT_VERSION: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof envSchema>;
export type LoggingConfig = z.infer<typeof loggingEnvSchema>;

let cachedConfig: AppConfig | null = null;

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const result = schema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError('Invalid environment configuration', {
      issues: result.error.errors.map((e) => ({
        field: e.path.join('.'),
        message: e.message,
      })),
    });
  }

  return result.data;
}

/**
 * Parse configuration from an environment object
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return parseEnv(envSchema, env);
}

/**
 * Logging settings only; other settings are not read
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return parseEnv(loggingEnvSchema, env);
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
