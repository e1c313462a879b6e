/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the service reads (port, environment, log level) is funnelled
 * through this file. Other modules import `config` instead of touching
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * ("3000" → 3000) at startup. Anything missing or invalid stops the process
 * before the server binds a port. The result is a nested `config` object
 * exported with `as const`.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** `silent` turns logging off entirely (used by the test setup). */
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },
} as const;

export type AppConfig = typeof config;
