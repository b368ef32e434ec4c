/**
 * Configuration management for the Lazarus monitor
 */

import type { Config } from './types.js';
import { getEnv, type Env } from './env.js';
import { createLogger } from './logger.js';

const configLogger = createLogger('config');

/**
 * Map validated environment variables onto the typed Config
 */
export function configFromEnv(env: Env): Config {
  const config: Config = {
    monitor: {
      host: env.MONITOR_HOST,
      port: env.MONITOR_PORT,
    },
    store: {
      driver: env.STORE_DRIVER,
      path: env.STORE_PATH,
      redisUrl: env.REDIS_URL,
      redisNamespace: env.REDIS_NAMESPACE,
    },
    scheduler: {
      poolSize: env.PROBE_POOL_SIZE,
      tickMs: env.SCHEDULER_TICK_MS,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    },
    redeploy: {
      providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
      historySize: env.REDEPLOY_HISTORY_SIZE,
    },
    providers: {},
    notify: {},
    adminApiKeys: env.ADMIN_API_KEYS,
  };

  if (env.RENDER_API_KEY) {
    config.providers.renderApiKey = env.RENDER_API_KEY;
  }
  if (env.KOYEB_API_TOKEN) {
    config.providers.koyebApiToken = env.KOYEB_API_TOKEN;
  }
  if (env.NOTIFY_WEBHOOK_URL) {
    config.notify.webhookUrl = env.NOTIFY_WEBHOOK_URL;
  }
  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    config.notify.telegram = {
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
    };
  }

  return config;
}

/**
 * Load configuration from environment variables
 * Automatically validates the config on load
 * @throws {Error} If configuration is invalid in production
 */
export function loadConfig(): Config {
  const env = getEnv();
  const config = configFromEnv(env);

  const { errors, warnings } = validateConfig(config, env.NODE_ENV === 'production');
  for (const problem of [...errors, ...warnings]) {
    configLogger.warn(problem);
  }

  return config;
}

/**
 * Validate configuration
 * In production, throws if any problem is found; elsewhere returns the problems
 */
export function validateConfig(config: Config, production: boolean): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.store.driver === 'file' && !config.store.path) {
    errors.push('STORE_PATH is required for the file store');
  }

  if (config.store.driver === 'memory' && production) {
    errors.push('STORE_DRIVER=memory loses all targets on restart and is not allowed in production');
  }

  if (config.adminApiKeys.length === 0) {
    if (production) {
      errors.push('ADMIN_API_KEYS must contain at least one key in production');
    } else {
      warnings.push('ADMIN_API_KEYS is empty: configuration endpoints are open');
    }
  }

  if (config.scheduler.tickMs > 60000) {
    warnings.push('SCHEDULER_TICK_MS above one minute delays every probe');
  }

  const result = {
    valid: errors.length === 0,
    errors,
    warnings,
  };

  if (!result.valid && production) {
    throw new Error(
      `Invalid configuration:\n${errors.map(e => `  - ${e}`).join('\n')}`
    );
  }

  return result;
}
