/**
 * In-process store for tests and throwaway runs
 */

import type { ConfigStore, StoreEntry } from './types.js';

export class MemoryConfigStore implements ConfigStore {
  private data = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.data.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async set(key: string, value: unknown): Promise<void> {
    // Stored serialized so callers never share references with the store
    this.data.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async list(prefix: string): Promise<StoreEntry[]> {
    return Array.from(this.data.entries())
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, raw]) => ({ key, value: JSON.parse(raw) }));
  }

  async close(): Promise<void> {
    this.data.clear();
  }
}
