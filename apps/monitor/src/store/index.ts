/**
 * Store factory
 */

import type { Config } from '@lazarus/core';
import { FileConfigStore } from './file-store.js';
import { MemoryConfigStore } from './memory-store.js';
import { RedisConfigStore } from './redis-store.js';
import type { ConfigStore } from './types.js';

export function createStore(config: Config['store']): ConfigStore {
  switch (config.driver) {
    case 'file':
      return new FileConfigStore(config.path);
    case 'redis':
      return RedisConfigStore.connect(config.redisUrl, config.redisNamespace);
    case 'memory':
      return new MemoryConfigStore();
  }
}

export { FileConfigStore, MemoryConfigStore, RedisConfigStore };
export type { RedisClientLike } from './redis-store.js';
export type { ConfigStore, StoreEntry } from './types.js';
export { STORE_KEYS } from './types.js';
