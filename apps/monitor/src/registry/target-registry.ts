/**
 * Target registry: owns target configuration and persists every change
 */

import {
  CreateTargetSchema,
  DuplicateTargetError,
  KeyedMutex,
  NotFoundError,
  StoredTargetRecordSchema,
  TargetTimestampsSchema,
  UpdateTargetSchema,
  createLogger,
  formatZodIssues,
  systemClock,
  toInvalidConfigError,
} from '@lazarus/core';
import type { Clock, Logger, Target, TargetDefinition, TargetUpdate } from '@lazarus/core';
import type { z, ZodTypeAny } from 'zod';
import { STORE_KEYS, type ConfigStore } from '../store/index.js';

export type RegistryChange =
  | { type: 'added'; target: Target }
  | { type: 'updated'; target: Target; previous: Target }
  | { type: 'removed'; target: Target };

export type RegistryListener = (change: RegistryChange) => void;

export interface TargetRegistryOptions {
  store: ConfigStore;
  clock?: Clock;
  logger?: Logger;
}

export class TargetRegistry {
  private targets = new Map<string, Target>();
  private sequence = new Map<string, number>();
  private nextSeq = 0;
  private locks = new KeyedMutex();
  private listeners = new Set<RegistryListener>();
  private readonly store: ConfigStore;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: TargetRegistryOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('registry');
  }

  /**
   * Restore persisted targets in their original insertion order.
   * Records that no longer validate are skipped with a warning.
   */
  async load(): Promise<Target[]> {
    const entries = await this.store.list(STORE_KEYS.TARGETS_PREFIX);
    const restored: Array<{ seq: number; target: Target }> = [];

    for (const entry of entries) {
      const record = StoredTargetRecordSchema.safeParse(entry.value);
      if (!record.success) {
        this.skipStored(entry.key, formatZodIssues(record.error));
        continue;
      }
      const definition = CreateTargetSchema.safeParse(record.data.target);
      if (!definition.success) {
        this.skipStored(entry.key, formatZodIssues(definition.error));
        continue;
      }
      const timestamps = TargetTimestampsSchema.safeParse(record.data.target);
      if (!timestamps.success) {
        this.skipStored(entry.key, formatZodIssues(timestamps.error));
        continue;
      }

      restored.push({
        seq: record.data.seq,
        target: freezeTarget({ ...definition.data, ...timestamps.data }),
      });
    }

    restored.sort((a, b) => a.seq - b.seq);

    this.targets.clear();
    this.sequence.clear();
    for (const { seq, target } of restored) {
      this.targets.set(target.id, target);
      this.sequence.set(target.id, seq);
      this.nextSeq = Math.max(this.nextSeq, seq + 1);
    }

    this.logger.info(`Loaded ${restored.length} target(s)`);
    return this.list();
  }

  /**
   * @throws {InvalidConfigError} When the definition does not validate
   * @throws {DuplicateTargetError} When the id is taken
   */
  async add(input: unknown): Promise<Target> {
    const definition = parseOrThrow(CreateTargetSchema, input, 'Invalid target');

    return this.locks.runExclusive(definition.id, async () => {
      if (this.targets.has(definition.id)) {
        throw new DuplicateTargetError(definition.id);
      }

      const now = this.clock.now().toISOString();
      const target = freezeTarget({ ...definition, createdAt: now, updatedAt: now });
      const seq = this.nextSeq++;

      await this.store.set(STORE_KEYS.target(target.id), { seq, target });

      this.targets.set(target.id, target);
      this.sequence.set(target.id, seq);
      this.logger.info(`Target '${target.id}' added`, { url: target.url, provider: target.provider });
      this.emit({ type: 'added', target });
      return target;
    });
  }

  /**
   * Merge fields into a target and validate the result. `null` clears an optional field.
   * @throws {InvalidConfigError} When the fields or the merged target do not validate
   * @throws {NotFoundError} When the id is unknown
   */
  async update(id: string, fields: unknown): Promise<Target> {
    const patch = parseOrThrow(UpdateTargetSchema, fields, 'Invalid update');

    return this.locks.runExclusive(id, async () => {
      const previous = this.require(id);
      const definition = parseOrThrow(CreateTargetSchema, mergeUpdate(previous, patch), 'Invalid target');
      const target = freezeTarget({
        ...definition,
        createdAt: previous.createdAt,
        updatedAt: this.clock.now().toISOString(),
      });
      const seq = this.sequence.get(id) ?? this.nextSeq++;

      await this.store.set(STORE_KEYS.target(id), { seq, target });

      this.targets.set(id, target);
      this.sequence.set(id, seq);
      this.logger.info(`Target '${id}' updated`, { fields: Object.keys(patch) });
      this.emit({ type: 'updated', target, previous });
      return target;
    });
  }

  /**
   * @throws {NotFoundError} When the id is unknown
   */
  async remove(id: string): Promise<Target> {
    return this.locks.runExclusive(id, async () => {
      const target = this.require(id);

      await this.store.delete(STORE_KEYS.target(id));

      this.targets.delete(id);
      this.sequence.delete(id);
      this.logger.info(`Target '${id}' removed`);
      this.emit({ type: 'removed', target });
      return target;
    });
  }

  get(id: string): Target | undefined {
    return this.targets.get(id);
  }

  has(id: string): boolean {
    return this.targets.has(id);
  }

  /**
   * @throws {NotFoundError} When the id is unknown
   */
  require(id: string): Target {
    const target = this.targets.get(id);
    if (!target) {
      throw new NotFoundError('Target', id);
    }
    return target;
  }

  /** Snapshot in insertion order */
  list(): Target[] {
    return Array.from(this.targets.values());
  }

  get size(): number {
    return this.targets.size;
  }

  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private skipStored(key: string, issues: string[]): void {
    this.logger.warn(`Skipping invalid stored target '${key}'`, { issues });
  }

  private emit(change: RegistryChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        const errorObj = error instanceof Error ? error : new Error(String(error));
        this.logger.error('Error in registry listener', errorObj);
      }
    }
  }
}

function parseOrThrow<T extends ZodTypeAny>(schema: T, input: unknown, context: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toInvalidConfigError(result.error, context);
  }
  return result.data;
}

function mergeUpdate(current: Target, patch: TargetUpdate): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...current };
  delete merged.createdAt;
  delete merged.updatedAt;

  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete merged[key];
    } else if (value !== undefined) {
      merged[key] = value;
    }
  }

  return merged;
}

function freezeTarget(target: TargetDefinition & { createdAt: string; updatedAt: string }): Target {
  if (target.provider === 'WEBHOOK' && target.deploy.headers) {
    Object.freeze(target.deploy.headers);
  }
  Object.freeze(target.deploy);
  return Object.freeze(target);
}
