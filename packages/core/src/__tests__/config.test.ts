/**
 * Tests for config utilities
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { configFromEnv, loadConfig, validateConfig } from '../config.js';
import { parseEnv, resetEnv } from '../env.js';

describe('Config Utilities', () => {
  beforeEach(() => {
    resetEnv();
    vi.stubEnv('NODE_ENV', 'development');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  describe('configFromEnv', () => {
    it('should map defaults into sections', () => {
      const config = configFromEnv(parseEnv({}));

      expect(config.monitor).toEqual({ host: '0.0.0.0', port: 3100 });
      expect(config.store).toEqual({
        driver: 'file',
        path: './data/lazarus.json',
        redisUrl: 'redis://127.0.0.1:6379',
        redisNamespace: 'lazarus',
      });
      expect(config.scheduler).toEqual({ poolSize: 5, tickMs: 1000, shutdownTimeoutMs: 15000 });
      expect(config.redeploy).toEqual({ providerTimeoutMs: 60000, historySize: 20 });
      expect(config.providers).toEqual({});
      expect(config.notify).toEqual({});
      expect(config.adminApiKeys).toEqual([]);
    });

    it('should include provider credentials and sinks when set', () => {
      const config = configFromEnv(
        parseEnv({
          RENDER_API_KEY: 'test-render-key',
          KOYEB_API_TOKEN: 'test-koyeb-token',
          NOTIFY_WEBHOOK_URL: 'https://hooks.example.com/lazarus',
          TELEGRAM_BOT_TOKEN: 'test-bot-token',
          TELEGRAM_CHAT_ID: '-100123',
        })
      );

      expect(config.providers).toEqual({
        renderApiKey: 'test-render-key',
        koyebApiToken: 'test-koyeb-token',
      });
      expect(config.notify).toEqual({
        webhookUrl: 'https://hooks.example.com/lazarus',
        telegram: { botToken: 'test-bot-token', chatId: '-100123' },
      });
    });

    it('should skip Telegram when the chat id is missing', () => {
      const config = configFromEnv(parseEnv({ TELEGRAM_BOT_TOKEN: 'test-bot-token' }));

      expect(config.notify.telegram).toBeUndefined();
    });
  });

  describe('loadConfig', () => {
    it('should read the process environment', () => {
      vi.stubEnv('MONITOR_PORT', '4100');
      vi.stubEnv('ADMIN_API_KEYS', 'test-secret');

      const config = loadConfig();

      expect(config.monitor.port).toBe(4100);
      expect(config.adminApiKeys).toEqual(['test-secret']);
    });

    it('should throw in production without admin keys', () => {
      vi.stubEnv('NODE_ENV', 'production');

      expect(() => loadConfig()).toThrow('ADMIN_API_KEYS must contain at least one key in production');
    });
  });

  describe('validateConfig', () => {
    it('should warn outside production when no admin keys are set', () => {
      const result = validateConfig(configFromEnv(parseEnv({})), false);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['ADMIN_API_KEYS is empty: configuration endpoints are open']);
    });

    it('should reject the memory store in production', () => {
      const config = configFromEnv(parseEnv({ STORE_DRIVER: 'memory', ADMIN_API_KEYS: 'test-secret' }));

      expect(() => validateConfig(config, true)).toThrow(
        'STORE_DRIVER=memory loses all targets on restart and is not allowed in production'
      );
    });

    it('should report errors without throwing outside production', () => {
      const config = configFromEnv(parseEnv({ STORE_DRIVER: 'memory' }));
      config.store.driver = 'file';
      config.store.path = '';

      const result = validateConfig(config, false);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['STORE_PATH is required for the file store']);
    });
  });
});
