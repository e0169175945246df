/**
 * End of a list. `LEFT` is the head, `RIGHT` is the tail.
 */
export type ListEnd = 'LEFT' | 'RIGHT';

/**
 * Shared store used for cross-process coordination.
 *
 * Every method is atomic on its own; no method is atomic with another. Keys passed in are
 * logical keys: adapters apply their own namespace prefix.
 */
export interface ICoordinationStore {
  // Lists
  lpush(key: string, ...values: string[]): Promise<number>;
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;
  /** Remove up to `count` occurrences of `value` (0 = all). Returns the number removed. */
  lrem(key: string, count: number, value: string): Promise<number>;
  /** Keep only the elements between `start` and `stop` (inclusive, negative counts from the tail). */
  ltrim(key: string, start: number, stop: number): Promise<void>;
  /** Pop from one end of `source` and push onto one end of `destination`, without blocking. */
  lmove(source: string, destination: string, from: ListEnd, to: ListEnd): Promise<string | null>;
  /** Blocking `lmove`: waits up to `timeoutMs` for `source` to become non-empty. */
  blmove(source: string, destination: string, from: ListEnd, to: ListEnd, timeoutMs: number): Promise<string | null>;

  // Hashes
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, values: Record<string, string>): Promise<void>;
  /** Set a field only if it does not exist. Returns true if it was set. */
  hsetnx(key: string, field: string, value: string): Promise<boolean>;
  hdel(key: string, ...fields: string[]): Promise<number>;
  hincrby(key: string, field: string, increment: number): Promise<number>;

  // Sets
  /** Returns the number of members actually added. */
  sadd(key: string, ...members: string[]): Promise<number>;
  srem(key: string, ...members: string[]): Promise<number>;
  sismember(key: string, member: string): Promise<boolean>;
  smembers(key: string): Promise<string[]>;

  // Keys
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<boolean>;
  del(...keys: string[]): Promise<number>;

  // Connection
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
