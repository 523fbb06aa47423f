import type { IKeyValueStore } from '@mender/core';

export type StoredData =
  | { kind: 'value'; value: unknown }
  | { kind: 'list'; items: string[] }
  | { kind: 'zset'; scores: Record<string, number> };

export interface StoreEntry {
  data: StoredData;
  /** Epoch ms; null = never expires */
  expiresAt: number | null;
}

export interface MemoryKeyValueStoreOptions {
  /** Clock in epoch ms, injectable for TTL tests */
  now?: () => number;
}

/** Resolve Redis-style inclusive, possibly negative, range bounds. */
function sliceRange<T>(items: T[], start: number, stop: number): T[] {
  const len = items.length;
  const from = start < 0 ? Math.max(len + start, 0) : start;
  const to = stop < 0 ? len + stop : Math.min(stop, len - 1);
  if (from > to || from >= len) return [];
  return items.slice(from, to + 1);
}

/**
 * In-process key-value store with TTLs, lists and sorted sets.
 * Each operation body is synchronous and runs inside `apply()`, so counters
 * and sorted indexes stay consistent under concurrent callers.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
  protected entries = new Map<string, StoreEntry>();
  protected readonly now: () => number;
  /** Set by any operation that mutated `entries` */
  protected dirty = false;

  constructor(options: MemoryKeyValueStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  get<T = unknown>(key: string): Promise<T | null> {
    return this.apply(() => {
      const entry = this.live(key);
      if (!entry) return null;
      if (entry.data.kind !== 'value') {
        throw new Error(`WRONGTYPE key ${key} holds a ${entry.data.kind}`);
      }
      // Values round-trip through JSON, so callers get a detached copy
      return JSON.parse(JSON.stringify(entry.data.value));
    });
  }

  set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    return this.apply(() => {
      this.entries.set(key, {
        data: { kind: 'value', value: JSON.parse(JSON.stringify(value ?? null)) },
        expiresAt: this.expiryFor(ttlSeconds),
      });
      this.dirty = true;
    });
  }

  delete(key: string): Promise<boolean> {
    return this.apply(() => {
      const existed = this.live(key) !== null;
      if (existed) {
        this.entries.delete(key);
        this.dirty = true;
      }
      return existed;
    });
  }

  incr(key: string): Promise<number> {
    return this.apply(() => {
      const entry = this.live(key);
      this.dirty = true;
      if (!entry) {
        this.entries.set(key, { data: { kind: 'value', value: 1 }, expiresAt: null });
        return 1;
      }
      const current = entry.data.kind === 'value' ? entry.data.value : undefined;
      if (typeof current !== 'number' || !Number.isInteger(current)) {
        throw new Error(`ERR value at ${key} is not an integer`);
      }
      // TTL is preserved, as with Redis INCR
      entry.data = { kind: 'value', value: current + 1 };
      return current + 1;
    });
  }

  expire(key: string, ttlSeconds: number): Promise<boolean> {
    return this.apply(() => {
      const entry = this.live(key);
      if (!entry) return false;
      entry.expiresAt = this.expiryFor(ttlSeconds);
      this.dirty = true;
      return true;
    });
  }

  ttl(key: string): Promise<number> {
    return this.apply(() => {
      const entry = this.live(key);
      if (!entry) return -2;
      if (entry.expiresAt === null) return -1;
      return Math.ceil((entry.expiresAt - this.now()) / 1000);
    });
  }

  rpush(key: string, ...values: string[]): Promise<number> {
    return this.apply(() => {
      const entry = this.live(key);
      if (!entry) {
        this.entries.set(key, { data: { kind: 'list', items: [...values] }, expiresAt: null });
        this.dirty = true;
        return values.length;
      }
      if (entry.data.kind !== 'list') {
        throw new Error(`WRONGTYPE key ${key} holds a ${entry.data.kind}`);
      }
      entry.data.items.push(...values);
      this.dirty = true;
      return entry.data.items.length;
    });
  }

  lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.apply(() => {
      const entry = this.live(key);
      if (!entry) return [];
      if (entry.data.kind !== 'list') {
        throw new Error(`WRONGTYPE key ${key} holds a ${entry.data.kind}`);
      }
      return sliceRange(entry.data.items, start, stop);
    });
  }

  zadd(key: string, score: number, member: string): Promise<void> {
    return this.apply(() => {
      const entry = this.live(key);
      if (!entry) {
        this.entries.set(key, { data: { kind: 'zset', scores: { [member]: score } }, expiresAt: null });
      } else if (entry.data.kind !== 'zset') {
        throw new Error(`WRONGTYPE key ${key} holds a ${entry.data.kind}`);
      } else {
        entry.data.scores[member] = score;
      }
      this.dirty = true;
    });
  }

  zrevrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.apply(() => {
      const scores = this.zsetScores(key);
      // Ties order by member, descending, matching Redis
      const ordered = Object.entries(scores)
        .sort(([ma, sa], [mb, sb]) => (sb - sa) || (ma < mb ? 1 : ma > mb ? -1 : 0))
        .map(([member]) => member);
      return sliceRange(ordered, start, stop);
    });
  }

  zrem(key: string, member: string): Promise<boolean> {
    return this.apply(() => {
      const scores = this.zsetScores(key);
      if (!(member in scores)) return false;
      delete scores[member];
      this.dirty = true;
      return true;
    });
  }

  zcard(key: string): Promise<number> {
    return this.apply(() => Object.keys(this.zsetScores(key)).length);
  }

  /** Run one operation body. Persistent stores wrap it with load and save. */
  protected async apply<T>(operation: () => T): Promise<T> {
    return operation();
  }

  /** Drop every expired entry; returns how many were removed */
  protected purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private live(key: string): StoreEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private zsetScores(key: string): Record<string, number> {
    const entry = this.live(key);
    if (!entry) return {};
    if (entry.data.kind !== 'zset') {
      throw new Error(`WRONGTYPE key ${key} holds a ${entry.data.kind}`);
    }
    return entry.data.scores;
  }

  private expiryFor(ttlSeconds: number | undefined): number | null {
    return ttlSeconds === undefined ? null : this.now() + ttlSeconds * 1000;
  }
}
