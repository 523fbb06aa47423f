/**
 * Port for the durable state the engine keeps between invocations.
 * Shaped after a Redis subset: plain values, counters, lists and a sorted set.
 * Every mutation must be atomic with respect to concurrent callers.
 */
export interface IKeyValueStore {
  get<T = unknown>(key: string): Promise<T | null>;
  /** `ttlSeconds` omitted = no expiry; an existing TTL is replaced */
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Atomically add 1 and return the new value (missing key counts as 0) */
  incr(key: string): Promise<number>;
  /** Returns false when the key does not exist */
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Seconds until expiry; -1 without TTL, -2 when missing */
  ttl(key: string): Promise<number>;

  /** Append to a list, returning its new length */
  rpush(key: string, ...values: string[]): Promise<number>;
  /** Inclusive range; negative indices count from the end */
  lrange(key: string, start: number, stop: number): Promise<string[]>;

  /** Add or re-score members of a sorted set */
  zadd(key: string, score: number, member: string): Promise<void>;
  /** Members by descending score; inclusive range, negative indices from the end */
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  zrem(key: string, member: string): Promise<boolean>;
  zcard(key: string): Promise<number>;
}
