import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { lock } from 'proper-lockfile';
import type { LockOptions } from 'proper-lockfile';
import { createLogger, errorMessage } from '@mender/core';
import { writeJsonAtomic } from '../utils/json-file.js';
import { MemoryKeyValueStore } from './memory-kv-store.js';
import type { MemoryKeyValueStoreOptions, StoreEntry } from './memory-kv-store.js';

const log = createLogger('FileKeyValueStore');

export interface FileKeyValueStoreOptions extends MemoryKeyValueStoreOptions {
  /** Lock acquisition retries before an operation rejects */
  lockRetries?: number;
  /** A lock untouched for this long is considered abandoned */
  lockStaleMs?: number;
}

function isStoreEntry(value: unknown): value is StoreEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('data' in value) || !('expiresAt' in value)) return false;
  const { data, expiresAt } = value;
  if (expiresAt !== null && typeof expiresAt !== 'number') return false;
  if (typeof data !== 'object' || data === null || !('kind' in data)) return false;
  switch (data.kind) {
    case 'value':
      return 'value' in data;
    case 'list':
      return 'items' in data && Array.isArray(data.items) && data.items.every((item) => typeof item === 'string');
    case 'zset':
      return 'scores' in data && typeof data.scores === 'object' && data.scores !== null;
    default:
      return false;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Key-value store persisted as one compact JSON document, shared by every
 * process pointed at the same directory.
 *
 * Each operation takes an exclusive lock on the document, re-reads it,
 * applies the change and writes it back before releasing, so concurrent
 * `mender` processes never lose each other's updates. Expired keys are
 * dropped on every write.
 */
export class FileKeyValueStore extends MemoryKeyValueStore {
  private readonly filePath: string;
  private readonly lockOptions: LockOptions;
  private queue: Promise<void> = Promise.resolve();

  constructor(baseDir: string, options: FileKeyValueStoreOptions = {}) {
    super(options);
    this.filePath = join(baseDir, 'state', 'store.json');
    this.lockOptions = {
      realpath: false,
      lockfilePath: `${this.filePath}.lock`,
      stale: options.lockStaleMs ?? 10_000,
      retries: { retries: options.lockRetries ?? 100, factor: 1.2, minTimeout: 10, maxTimeout: 200 },
    };
  }

  /** Resolves once every operation issued so far has reached disk. */
  async flush(): Promise<void> {
    await this.queue;
  }

  protected override apply<T>(operation: () => T): Promise<T> {
    // Operations from this instance run one at a time; the file lock covers other instances
    const result = this.queue.then(() => this.underLock(operation));
    this.queue = result.then(
      () => undefined,
      // The failure is delivered to the caller through `result`
      () => undefined,
    );
    return result;
  }

  private async underLock<T>(operation: () => T): Promise<T> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const release = await lock(this.filePath, this.lockOptions);
    try {
      const repaired = await this.reload();
      this.dirty = false;
      const result = operation();
      if (this.dirty || repaired) {
        this.purgeExpired();
        await writeJsonAtomic(this.filePath, Object.fromEntries(this.entries));
      }
      return result;
    } finally {
      await release();
    }
  }

  /**
   * Replace the in-memory view with the document on disk. Read errors other
   * than a missing file propagate. Resolves true when the document was set
   * aside and must be rewritten.
   */
  private async reload(): Promise<boolean> {
    this.entries.clear();

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.setAside(`not valid JSON (${errorMessage(error)})`);
      return true;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      await this.setAside('root is not an object');
      return true;
    }

    let malformed = 0;
    for (const [key, entry] of Object.entries(parsed)) {
      if (isStoreEntry(entry)) {
        this.entries.set(key, entry);
      } else {
        malformed++;
        log.warn(`Skipping malformed entry: ${key}`);
      }
    }
    if (malformed > 0) {
      await this.setAside(`${malformed} malformed entries`);
    }
    this.purgeExpired();
    return malformed > 0;
  }

  /** Copy the unreadable document to `store.json.corrupt-<ms>` before it is overwritten */
  private async setAside(reason: string): Promise<void> {
    const copyPath = `${this.filePath}.corrupt-${this.now()}`;
    await copyFile(this.filePath, copyPath);
    log.warn(`Store document ${reason}; kept a copy at ${copyPath}`);
  }
}
