import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setLogLevel } from '@mender/core';
import { FileKeyValueStore } from '../stores/file-kv-store.js';

setLogLevel('error');

const NOW = Date.parse('2025-06-01T12:00:00Z');

describe('FileKeyValueStore', () => {
  let baseDir: string;
  let storePath: string;
  let clock: number;

  const open = () => new FileKeyValueStore(baseDir, { now: () => clock });
  const seed = (document: unknown) => {
    mkdirSync(join(baseDir, 'state'), { recursive: true });
    writeFileSync(storePath, typeof document === 'string' ? document : JSON.stringify(document));
  };
  const onDisk = (): Record<string, unknown> => JSON.parse(readFileSync(storePath, 'utf-8'));

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'mender-kv-'));
    storePath = join(baseDir, 'state', 'store.json');
    clock = NOW;
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  describe('loading', () => {
    it('starts empty when no file exists', async () => {
      const store = open();
      expect(await store.get('anything')).toBeNull();
      expect(existsSync(storePath)).toBe(false);
    });

    it('restores persisted entries', async () => {
      seed({
        'mender:attempts:t-1': { data: { kind: 'value', value: 2 }, expiresAt: NOW + 60_000 },
        'hitl:queue': { data: { kind: 'zset', scores: { 't-1': 0.5 } }, expiresAt: null },
      });
      const store = open();

      expect(await store.incr('mender:attempts:t-1')).toBe(3);
      expect(await store.zrevrange('hitl:queue', 0, -1)).toEqual(['t-1']);
    });

    it('drops entries that expired while the process was down', async () => {
      seed({
        stale: { data: { kind: 'value', value: 'old' }, expiresAt: NOW - 1 },
        fresh: { data: { kind: 'value', value: 'new' }, expiresAt: null },
      });
      const store = open();

      expect(await store.get('stale')).toBeNull();
      expect(await store.get('fresh')).toBe('new');
    });

    it('skips malformed entries and keeps a copy of the original document', async () => {
      const original = JSON.stringify({
        bad: { data: { kind: 'mystery' }, expiresAt: null },
        good: { data: { kind: 'list', items: ['a'] }, expiresAt: null },
      });
      seed(original);
      const store = open();

      expect(await store.lrange('good', 0, -1)).toEqual(['a']);
      expect(await store.get('bad')).toBeNull();
      expect(readFileSync(`${storePath}.corrupt-${NOW}`, 'utf-8')).toBe(original);
      expect(onDisk()).toEqual({ good: { data: { kind: 'list', items: ['a'] }, expiresAt: null } });
    });

    it('moves corrupt JSON aside before writing a fresh document', async () => {
      seed('not json {{{');
      const store = open();

      expect(await store.get('k')).toBeNull();
      await store.set('k', 'v');

      expect(readFileSync(`${storePath}.corrupt-${NOW}`, 'utf-8')).toBe('not json {{{');
      expect(onDisk()).toEqual({ k: { data: { kind: 'value', value: 'v' }, expiresAt: null } });
    });

    it('rejects when the document exists but cannot be read', async () => {
      // A directory in place of the file fails with EISDIR rather than ENOENT
      mkdirSync(storePath, { recursive: true });
      const store = open();

      await expect(store.set('k', 'v')).rejects.toThrow();
      expect(readdirSync(storePath)).toEqual([]);
    });

    it('keeps serving after a failed operation', async () => {
      mkdirSync(storePath, { recursive: true });
      const store = open();
      await expect(store.get('k')).rejects.toThrow();

      rmSync(storePath, { recursive: true });
      await store.set('k', 'v');
      expect(await store.get('k')).toBe('v');
    });
  });

  describe('persistence', () => {
    it('writes each mutation through to disk', async () => {
      const store = open();
      await store.incr('c');
      await store.incr('c');
      await store.rpush('l', 'x');

      expect(onDisk()).toEqual({
        c: { data: { kind: 'value', value: 2 }, expiresAt: null },
        l: { data: { kind: 'list', items: ['x'] }, expiresAt: null },
      });
      expect(readdirSync(join(baseDir, 'state'))).toEqual(['store.json']);
    });

    it('records absolute expiry times', async () => {
      const store = open();
      await store.set('k', 'v', 30);
      await store.flush();

      expect(onDisk()).toEqual({ k: { data: { kind: 'value', value: 'v' }, expiresAt: NOW + 30_000 } });
    });

    it('leaves expired keys out of the written document', async () => {
      const store = open();
      await store.set('short', 1, 1);
      await store.set('long', 2);
      clock = NOW + 2_000;
      await store.set('other', 3);

      expect(Object.keys(onDisk())).toEqual(['long', 'other']);
    });

    it('picks up changes another process wrote', async () => {
      seed({ k: { data: { kind: 'value', value: 'v' }, expiresAt: null } });
      const store = open();
      writeFileSync(storePath, JSON.stringify({ k: { data: { kind: 'value', value: 'changed' }, expiresAt: null } }));

      expect(await store.get('k')).toBe('changed');
    });
  });

  describe('several instances on one directory', () => {
    it('applies each instance\'s updates on top of the other\'s', async () => {
      seed({ A: { data: { kind: 'value', value: 2 }, expiresAt: null } });
      const first = open();
      const second = open();

      expect(await first.incr('A')).toBe(3);
      expect(await second.incr('B')).toBe(1);

      const reloaded = open();
      expect(await reloaded.get('A')).toBe(3);
      expect(await reloaded.get('B')).toBe(1);
    });

    it('loses no increments when instances interleave', async () => {
      const first = open();
      const second = open();

      const results = await Promise.all([
        first.incr('counter'),
        second.incr('counter'),
        first.incr('counter'),
        second.incr('counter'),
      ]);

      expect([...results].sort()).toEqual([1, 2, 3, 4]);
      expect(await open().get('counter')).toBe(4);
    });

    it('sees sorted-set members added by another instance', async () => {
      const first = open();
      const second = open();
      await first.zadd('hitl:queue', 0.9, 'task-a');
      await second.zadd('hitl:queue', 0.4, 'task-b');

      expect(await first.zrevrange('hitl:queue', 0, -1)).toEqual(['task-a', 'task-b']);
      expect(await second.zcard('hitl:queue')).toBe(2);
    });
  });
});
