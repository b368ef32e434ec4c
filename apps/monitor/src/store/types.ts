/**
 * Configuration store contract
 */

export interface StoreEntry {
  key: string;
  value: unknown;
}

/**
 * Key/value persistence for targets and redeploy history.
 * Values must survive a JSON round trip. A resolved `set` or `delete` is durable.
 */
export interface ConfigStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  /** Entries whose key starts with `prefix`, sorted by key */
  list(prefix: string): Promise<StoreEntry[]>;
  close(): Promise<void>;
}

export const STORE_KEYS = {
  target: (id: string) => `targets/${id}`,
  history: (id: string) => `history/${id}`,
  TARGETS_PREFIX: 'targets/',
  HISTORY_PREFIX: 'history/',
} as const;
