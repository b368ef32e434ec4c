/**
 * Environment variable validation with Zod
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from './timeout.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent'])),
  MONITOR_HOST: z.string().default('0.0.0.0'),
  MONITOR_PORT: z.coerce.number().int().min(1).max(65535).default(3100),
  ADMIN_API_KEYS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    ),
  STORE_DRIVER: z.enum(['file', 'redis', 'memory']).default('file'),
  STORE_PATH: z.string().min(1).default('./data/lazarus.json'),
  REDIS_URL: z.string().min(1).default('redis://127.0.0.1:6379'),
  REDIS_NAMESPACE: z.string().min(1).default('lazarus'),
  PROBE_POOL_SIZE: z.coerce.number().int().min(1).max(100).default(5),
  SCHEDULER_TICK_MS: z.coerce.number().int().min(10).default(1000),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_TIMEOUTS.PROVIDER_CALL),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(15000),
  REDEPLOY_HISTORY_SIZE: z.coerce.number().int().min(1).max(1000).default(20),
  NOTIFY_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  RENDER_API_KEY: optionalString,
  KOYEB_API_TOKEN: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse environment variables without touching the cache
 * @throws {z.ZodError} If environment variables are invalid
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

/**
 * Load and validate environment variables
 * @throws {z.ZodError} If environment variables are invalid
 */
export function loadEnv(): Env {
  if (cachedEnv) return cachedEnv;

  try {
    cachedEnv = parseEnv(process.env);
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Invalid environment configuration:');
      error.errors.forEach((err) => {
        console.error(`  ${err.path.join('.')}: ${err.message}`);
      });
    }
    throw error;
  }
}

/**
 * Get the cached env or load if not cached
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return loadEnv();
  }
  return cachedEnv;
}

/**
 * Reset cached env (useful for testing)
 */
export function resetEnv(): void {
  cachedEnv = null;
}
