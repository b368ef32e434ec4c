/**
 * CLI Configuration Management
 *
 * Loads configuration from ~/.lazarus/config.json (or $LAZARUS_CLI_HOME/config.json)
 *
 * Configuration format:
 * {
 *   "apiEndpoint": "http://localhost:3100",
 *   "apiKey": "<admin key>",
 *   "outputFormat": "table" | "json" | "plain"
 * }
 */

import { homedir } from 'os';
import { join } from 'path';
import { readFileSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { createLogger, formatZodIssues } from '@lazarus/core';

const logger = createLogger('cli:config');

export const OutputFormatSchema = z.enum(['json', 'table', 'plain']);

export const CliConfigSchema = z.object({
  /** Monitor API endpoint */
  apiEndpoint: z.string().url(),
  /** Admin key sent as a bearer token on mutations */
  apiKey: z.string().min(1).optional(),
  /** Output format for CLI commands */
  outputFormat: OutputFormatSchema,
});

export type CliConfig = z.infer<typeof CliConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type CliConfigKey = keyof CliConfig;

export const CONFIG_KEYS: readonly CliConfigKey[] = ['apiEndpoint', 'apiKey', 'outputFormat'];

const DEFAULT_CONFIG: CliConfig = {
  apiEndpoint: 'http://localhost:3100',
  outputFormat: 'table',
};

let cached: { path: string; config: CliConfig } | null = null;

export function isConfigKey(key: string): key is CliConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

function getConfigDir(): string {
  return process.env.LAZARUS_CLI_HOME ?? join(homedir(), '.lazarus');
}

/**
 * Load CLI configuration, falling back to defaults when the file is missing or invalid
 */
export function loadConfig(): CliConfig {
  const configPath = getConfigPath();
  if (cached && cached.path === configPath) {
    return cached.config;
  }

  let config: CliConfig = { ...DEFAULT_CONFIG };
  if (!existsSync(configPath)) {
    logger.debug(`Config file not found at ${configPath}, using defaults`);
  } else {
    try {
      const content: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      const parsed = CliConfigSchema.partial().safeParse(content);
      if (parsed.success) {
        config = { ...DEFAULT_CONFIG, ...parsed.data };
        logger.debug(`Loaded config from ${configPath}`);
      } else {
        logger.warn(`Ignoring invalid config at ${configPath}: ${formatZodIssues(parsed.error).join('; ')}`);
      }
    } catch {
      logger.warn(`Failed to load config from ${configPath}, using defaults`);
    }
  }

  cached = { path: configPath, config };
  return config;
}

/**
 * Get a specific configuration value
 */
export function getConfigValue<K extends CliConfigKey>(key: K): CliConfig[K] {
  return loadConfig()[key];
}

/**
 * Validate a raw value for a key and persist it
 * @throws {Error} When the value is not valid for the key
 */
export function setConfigValue(key: CliConfigKey, value: string): CliConfig {
  const next = CliConfigSchema.safeParse({ ...loadConfig(), [key]: value });
  if (!next.success) {
    throw new Error(`Invalid value for ${key}: ${formatZodIssues(next.error).join('; ')}`);
  }
  saveConfig(next.data);
  return next.data;
}

/**
 * Save configuration to file
 */
export function saveConfig(config: CliConfig): void {
  const configDir = getConfigDir();
  const configPath = getConfigPath();
  try {
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true });
    }

    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
    cached = null;
    logger.debug(`Config saved to ${configPath}`);
  } catch (err) {
    logger.error(`Failed to save config to ${configPath}`);
    throw err;
  }
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  saveConfig({ ...DEFAULT_CONFIG });
}

/**
 * Get the configuration file path
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Check if config file exists
 */
export function configExists(): boolean {
  return existsSync(getConfigPath());
}
