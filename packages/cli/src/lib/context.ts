/**
 * Per-invocation state shared by commands: API client and output format
 */

import type { Command } from 'commander';
import { isLazarusError } from '@lazarus/core';
import { error } from '../utils/format.js';
import { ApiClient } from './api-client.js';
import { loadConfig, type OutputFormat } from './config.js';

export interface CliContext {
  client(): ApiClient;
  format(): OutputFormat;
}

interface GlobalOptions {
  endpoint?: string;
  apiKey?: string;
  json?: boolean;
}

/**
 * Global flags win over ~/.lazarus/config.json
 */
export function createContext(program: Command): CliContext {
  return {
    client: () => {
      const options = program.opts<GlobalOptions>();
      const config = loadConfig();
      return new ApiClient({
        baseUrl: options.endpoint ?? config.apiEndpoint,
        apiKey: options.apiKey ?? config.apiKey,
      });
    },
    format: () => (program.opts<GlobalOptions>().json ? 'json' : loadConfig().outputFormat),
  };
}

export function describeError(err: unknown): string {
  if (isLazarusError(err)) {
    const lines = [`${err.message} (${err.code})`];
    if (Array.isArray(err.details)) {
      for (const detail of err.details) {
        lines.push(`  - ${String(detail)}`);
      }
    }
    return lines.join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a command action so failures print and set a non-zero exit code
 */
export function runAction<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      error(describeError(err));
      process.exitCode = 1;
    }
  };
}
