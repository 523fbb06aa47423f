import type { AttemptRecord, IAttemptTracker, IKeyValueStore } from '@mender/core';
import { DAY_SECONDS, StoreKeys, createLogger } from '@mender/core';

const log = createLogger('AttemptTracker');

function isAttemptRecord(value: unknown): value is AttemptRecord {
  return typeof value === 'object' && value !== null &&
    'attempt' in value && typeof value.attempt === 'number' &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'testPath' in value && typeof value.testPath === 'string';
}

/**
 * Durable per-task attempt counters. The counter's TTL starts at the first
 * attempt, so a task gets a fresh budget only after the window lapses.
 */
export class AttemptTracker implements IAttemptTracker {
  constructor(
    private readonly store: IKeyValueStore,
    private readonly ttlSeconds: number = DAY_SECONDS,
  ) {}

  async increment(taskId: string, testPath: string): Promise<number> {
    const key = StoreKeys.attempts(taskId);
    const attempts = await this.store.incr(key);
    if (attempts === 1) {
      await this.store.expire(key, this.ttlSeconds);
    }

    const record: AttemptRecord = {
      attempt: attempts,
      timestamp: new Date().toISOString(),
      testPath,
    };
    const historyKey = StoreKeys.history(taskId);
    await this.store.rpush(historyKey, JSON.stringify(record));
    await this.store.expire(historyKey, this.ttlSeconds);

    return attempts;
  }

  async get(taskId: string): Promise<number> {
    const value = await this.store.get(StoreKeys.attempts(taskId));
    return typeof value === 'number' ? value : 0;
  }

  async history(taskId: string): Promise<AttemptRecord[]> {
    const raw = await this.store.lrange(StoreKeys.history(taskId), 0, -1);
    const records: AttemptRecord[] = [];
    for (const entry of raw) {
      try {
        const parsed: unknown = JSON.parse(entry);
        if (isAttemptRecord(parsed)) {
          records.push(parsed);
          continue;
        }
      } catch {
        // fall through to the warning
      }
      log.warn('Skipping malformed attempt record', { entry: entry.slice(0, 100) }, taskId);
    }
    return records;
  }
}
