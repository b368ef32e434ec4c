/**
 * JSON file store. The whole document is rewritten on every mutation
 * through a temp file and rename, so a crash leaves either the old or the new file.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StoreError, errorMessage, isRecord } from '@lazarus/core';
import type { ConfigStore, StoreEntry } from './types.js';

export class FileConfigStore implements ConfigStore {
  private data: Record<string, unknown> | null = null;
  private loading: Promise<Record<string, unknown>> | null = null;
  // Writes are chained so renames never interleave
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async get(key: string): Promise<unknown> {
    const data = await this.load();
    return data[key];
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.mutate((data) => {
      data[key] = JSON.parse(JSON.stringify(value));
    });
  }

  async delete(key: string): Promise<void> {
    await this.mutate((data) => {
      delete data[key];
    });
  }

  async list(prefix: string): Promise<StoreEntry[]> {
    const data = await this.load();
    return Object.keys(data)
      .filter((key) => key.startsWith(prefix))
      .sort()
      .map((key) => ({ key, value: data[key] }));
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private async load(): Promise<Record<string, unknown>> {
    if (this.data) {
      return this.data;
    }
    if (!this.loading) {
      this.loading = this.readFromDisk();
    }
    this.data = await this.loading;
    return this.data;
  }

  private async readFromDisk(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new StoreError(`Failed to read store file ${this.filePath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Store file ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    if (!isRecord(parsed)) {
      throw new StoreError(`Store file ${this.filePath} must contain a JSON object`);
    }
    return parsed;
  }

  private async mutate(change: (data: Record<string, unknown>) => void): Promise<void> {
    const run = this.writeChain.then(async () => {
      const current = await this.load();
      const next = { ...current };
      change(next);
      await this.flush(next);
      this.data = next;
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = run.catch(() => undefined);
    await run;
  }

  private async flush(data: Record<string, unknown>): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new StoreError(`Failed to write store file ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
