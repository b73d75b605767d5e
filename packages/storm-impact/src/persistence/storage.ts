/**
 * Storage Backends
 *
 * Keys are relative POSIX paths such as `reports/ATL_STORM-A_20251109180000.json`.
 * The backend is configured once at process entry and threaded through every
 * component that persists outputs.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join, posix } from 'path';
import { atomicWriteFile } from '../core/utils/atomic-write.js';

export interface StorageBackend {
  readonly description: string;
  exists(key: string): Promise<boolean>;
  /** null when the key does not exist */
  readText(key: string): Promise<string | null>;
  writeText(key: string, content: string): Promise<void>;
  /** Names of the entries directly under a directory key; empty when absent */
  list(directory: string): Promise<string[]>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem storage rooted at a results directory
 */
export class LocalFileStorage implements StorageBackend {
  constructor(private readonly root: string) {}

  get description(): string {
    return `local:${this.root}`;
  }

  async exists(key: string): Promise<boolean> {
    try {
      await stat(this.resolve(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async readText(key: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(key), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async writeText(key: string, content: string): Promise<void> {
    await atomicWriteFile(this.resolve(key), content);
  }

  async list(directory: string): Promise<string[]> {
    try {
      const entries = await readdir(this.resolve(directory));
      return entries.filter((name) => !name.endsWith('.tmp')).sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  private resolve(key: string): string {
    return join(this.root, ...key.split('/'));
  }
}

/**
 * Process-local storage for tests and dry runs
 */
export class InMemoryStorage implements StorageBackend {
  readonly description = 'memory';
  private readonly files = new Map<string, string>();
  /** Number of writes performed, for idempotence checks */
  writes = 0;

  async exists(key: string): Promise<boolean> {
    return this.files.has(posix.normalize(key));
  }

  async readText(key: string): Promise<string | null> {
    return this.files.get(posix.normalize(key)) ?? null;
  }

  async writeText(key: string, content: string): Promise<void> {
    this.writes++;
    this.files.set(posix.normalize(key), content);
  }

  async list(directory: string): Promise<string[]> {
    const prefix = `${posix.normalize(directory).replace(/\/$/, '')}/`;
    const names = new Set<string>();
    for (const key of this.files.keys()) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const name = rest.split('/')[0];
      if (name) names.add(name);
    }
    return [...names].sort();
  }

  /** Snapshot of every stored key and its content */
  snapshot(): ReadonlyMap<string, string> {
    return new Map(this.files);
  }
}
