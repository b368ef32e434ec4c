/**
 * Redis-backed store. Keys live under `<namespace>:` and values are JSON strings.
 */

import { Redis } from 'ioredis';
import { StoreError, createLogger, errorMessage } from '@lazarus/core';
import type { ConfigStore, StoreEntry } from './types.js';

const logger = createLogger('store:redis');

/** The subset of the ioredis client this store uses */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  quit(): Promise<unknown>;
}

export interface RedisConfigStoreOptions {
  namespace: string;
  client: RedisClientLike;
}

export class RedisConfigStore implements ConfigStore {
  private readonly namespace: string;
  private readonly client: RedisClientLike;

  constructor(options: RedisConfigStoreOptions) {
    this.namespace = options.namespace;
    this.client = options.client;
  }

  /**
   * Connect with the monitor's retry policy
   */
  static connect(url: string, namespace: string): RedisConfigStore {
    const client = new Redis(url, {
      retryStrategy: (times) => {
        if (times > 10) {
          return null;
        }
        return Math.min(times * 200, 2000);
      },
      maxRetriesPerRequest: 3,
    });
    client.on('error', (error: Error) => {
      logger.warn('Redis connection error', { message: error.message });
    });
    return new RedisConfigStore({ namespace, client });
  }

  async get(key: string): Promise<unknown> {
    const raw = await this.run('get', key, () => this.client.get(this.fullKey(key)));
    if (raw === null) {
      return undefined;
    }
    return this.decode(key, raw);
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.run('set', key, () => this.client.set(this.fullKey(key), JSON.stringify(value)));
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', key, () => this.client.del(this.fullKey(key)));
  }

  async list(prefix: string): Promise<StoreEntry[]> {
    const fullKeys = await this.run('list', prefix, () => this.client.keys(`${this.fullKey(prefix)}*`));
    const entries: StoreEntry[] = [];

    for (const fullKey of fullKeys.sort()) {
      const key = fullKey.slice(this.namespace.length + 1);
      const raw = await this.run('get', key, () => this.client.get(fullKey));
      // Deleted between KEYS and GET
      if (raw === null) continue;
      entries.push({ key, value: this.decode(key, raw) });
    }

    return entries;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private fullKey(key: string): string {
    return `${this.namespace}:${key}`;
  }

  private decode(key: string, raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Value at '${key}' is not valid JSON: ${errorMessage(error)}`);
    }
  }

  private async run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreError(`Redis ${operation} failed for '${key}': ${errorMessage(error)}`);
    }
  }
}
