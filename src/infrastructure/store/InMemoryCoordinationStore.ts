import { ICoordinationStore, ListEnd } from '../../domain/store/ICoordinationStore';
import { IClock } from '../../domain/common/IClock';
import { SystemClock } from '../common/SystemClock';

type Entry =
  | { kind: 'list'; values: string[] }
  | { kind: 'hash'; values: Map<string, string> }
  | { kind: 'set'; values: Set<string> }
  | { kind: 'string'; value: string };

interface Waiter {
  source: string;
  destination: string;
  from: ListEnd;
  to: ListEnd;
  resolve: (value: string | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Single-process coordination store with Redis list/hash/set semantics.
 *
 * Each call mutates state synchronously before its promise settles, so every call is atomic
 * with respect to every other caller in the process. Blocked `blmove` callers are served in
 * arrival order the moment a value is pushed onto their source list.
 */
export class InMemoryCoordinationStore implements ICoordinationStore {
  private data = new Map<string, Entry>();
  private expiries = new Map<string, number>();
  private waiters: Waiter[] = [];

  constructor(private clock: IClock = new SystemClock()) {}

  // ---------- internals ----------

  private evictIfExpired(key: string): void {
    const expiresAt = this.expiries.get(key);
    if (expiresAt !== undefined && expiresAt <= this.clock.now().getTime()) {
      this.data.delete(key);
      this.expiries.delete(key);
    }
  }

  private lookup(key: string): Entry | undefined {
    this.evictIfExpired(key);
    return this.data.get(key);
  }

  private wrongType(key: string, expected: Entry['kind']): Error {
    return new Error(`WRONGTYPE key '${key}' does not hold a ${expected}`);
  }

  private readList(key: string): string[] {
    const entry = this.lookup(key);
    if (!entry) return [];
    if (entry.kind !== 'list') throw this.wrongType(key, 'list');
    return entry.values;
  }

  private writableList(key: string): string[] {
    const entry = this.lookup(key);
    if (!entry) {
      const created: Entry = { kind: 'list', values: [] };
      this.data.set(key, created);
      return created.values;
    }
    if (entry.kind !== 'list') throw this.wrongType(key, 'list');
    return entry.values;
  }

  private readHash(key: string): Map<string, string> {
    const entry = this.lookup(key);
    if (!entry) return new Map();
    if (entry.kind !== 'hash') throw this.wrongType(key, 'hash');
    return entry.values;
  }

  private writableHash(key: string): Map<string, string> {
    const entry = this.lookup(key);
    if (!entry) {
      const created: Entry = { kind: 'hash', values: new Map() };
      this.data.set(key, created);
      return created.values;
    }
    if (entry.kind !== 'hash') throw this.wrongType(key, 'hash');
    return entry.values;
  }

  private readSet(key: string): Set<string> {
    const entry = this.lookup(key);
    if (!entry) return new Set();
    if (entry.kind !== 'set') throw this.wrongType(key, 'set');
    return entry.values;
  }

  private writableSet(key: string): Set<string> {
    const entry = this.lookup(key);
    if (!entry) {
      const created: Entry = { kind: 'set', values: new Set() };
      this.data.set(key, created);
      return created.values;
    }
    if (entry.kind !== 'set') throw this.wrongType(key, 'set');
    return entry.values;
  }

  /** Empty aggregates do not exist, as in Redis. */
  private dropIfEmpty(key: string): void {
    const entry = this.data.get(key);
    if (!entry || entry.kind === 'string') return;
    const size = entry.kind === 'list' ? entry.values.length : entry.values.size;
    if (size === 0) {
      this.data.delete(key);
      this.expiries.delete(key);
    }
  }

  private range(length: number, start: number, stop: number): [number, number] {
    let from = start < 0 ? length + start : start;
    let to = stop < 0 ? length + stop : stop;
    if (from < 0) from = 0;
    if (to >= length) to = length - 1;
    return [from, to];
  }

  private moveNow(source: string, destination: string, from: ListEnd, to: ListEnd): string | null {
    const sourceList = this.readList(source);
    if (sourceList.length === 0) return null;

    const value = from === 'LEFT' ? sourceList.shift() : sourceList.pop();
    if (value === undefined) return null;
    this.dropIfEmpty(source);

    const destinationList = this.writableList(destination);
    if (to === 'LEFT') {
      destinationList.unshift(value);
    } else {
      destinationList.push(value);
    }
    this.wake(destination);
    return value;
  }

  private wake(key: string): void {
    for (const waiter of [...this.waiters]) {
      if (waiter.source !== key) continue;
      if (this.readList(key).length === 0) return;

      this.waiters = this.waiters.filter(w => w !== waiter);
      clearTimeout(waiter.timer);
      waiter.resolve(this.moveNow(waiter.source, waiter.destination, waiter.from, waiter.to));
    }
  }

  // ---------- lists ----------

  async lpush(key: string, ...values: string[]): Promise<number> {
    const list = this.writableList(key);
    for (const value of values) list.unshift(value);
    const length = list.length;
    this.wake(key);
    return length;
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    const list = this.writableList(key);
    list.push(...values);
    const length = list.length;
    this.wake(key);
    return length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.readList(key);
    const [from, to] = this.range(list.length, start, stop);
    return from > to ? [] : list.slice(from, to + 1);
  }

  async llen(key: string): Promise<number> {
    return this.readList(key).length;
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    const list = this.readList(key);
    const limit = count === 0 ? Infinity : Math.abs(count);
    let removed = 0;

    if (count >= 0) {
      for (let i = 0; i < list.length && removed < limit;) {
        if (list[i] === value) {
          list.splice(i, 1);
          removed++;
        } else {
          i++;
        }
      }
    } else {
      for (let i = list.length - 1; i >= 0 && removed < limit; i--) {
        if (list[i] === value) {
          list.splice(i, 1);
          removed++;
        }
      }
    }

    this.dropIfEmpty(key);
    return removed;
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const list = this.readList(key);
    const [from, to] = this.range(list.length, start, stop);
    const kept = from > to ? [] : list.slice(from, to + 1);
    list.splice(0, list.length, ...kept);
    this.dropIfEmpty(key);
  }

  async lmove(source: string, destination: string, from: ListEnd, to: ListEnd): Promise<string | null> {
    return this.moveNow(source, destination, from, to);
  }

  blmove(source: string, destination: string, from: ListEnd, to: ListEnd, timeoutMs: number): Promise<string | null> {
    const immediate = this.moveNow(source, destination, from, to);
    if (immediate !== null || timeoutMs <= 0) {
      return Promise.resolve(immediate);
    }

    return new Promise(resolve => {
      const waiter: Waiter = {
        source,
        destination,
        from,
        to,
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  // ---------- hashes ----------

  async hget(key: string, field: string): Promise<string | null> {
    return this.readHash(key).get(field) ?? null;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.readHash(key));
  }

  async hset(key: string, values: Record<string, string>): Promise<void> {
    const hash = this.writableHash(key);
    for (const [field, value] of Object.entries(values)) {
      hash.set(field, value);
    }
    this.dropIfEmpty(key);
  }

  async hsetnx(key: string, field: string, value: string): Promise<boolean> {
    const hash = this.writableHash(key);
    if (hash.has(field)) return false;
    hash.set(field, value);
    return true;
  }

  async hdel(key: string, ...fields: string[]): Promise<number> {
    const hash = this.readHash(key);
    let removed = 0;
    for (const field of fields) {
      if (hash.delete(field)) removed++;
    }
    this.dropIfEmpty(key);
    return removed;
  }

  async hincrby(key: string, field: string, increment: number): Promise<number> {
    const hash = this.writableHash(key);
    const current = parseInt(hash.get(field) ?? '0', 10);
    if (Number.isNaN(current)) {
      throw new Error(`ERR hash value at '${key}.${field}' is not an integer`);
    }
    const next = current + increment;
    hash.set(field, String(next));
    return next;
  }

  // ---------- sets ----------

  async sadd(key: string, ...members: string[]): Promise<number> {
    const set = this.writableSet(key);
    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    return added;
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    const set = this.readSet(key);
    let removed = 0;
    for (const member of members) {
      if (set.delete(member)) removed++;
    }
    this.dropIfEmpty(key);
    return removed;
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return this.readSet(key).has(member);
  }

  async smembers(key: string): Promise<string[]> {
    return [...this.readSet(key)];
  }

  // ---------- keys ----------

  async get(key: string): Promise<string | null> {
    const entry = this.lookup(key);
    if (!entry) return null;
    if (entry.kind !== 'string') throw this.wrongType(key, 'string');
    return entry.value;
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, { kind: 'string', value });
    this.expiries.delete(key);
  }

  async incr(key: string): Promise<number> {
    let raw = '0';
    const entry = this.lookup(key);
    if (entry) {
      if (entry.kind !== 'string') throw this.wrongType(key, 'string');
      raw = entry.value;
    }
    const current = parseInt(raw, 10);
    if (Number.isNaN(current)) {
      throw new Error(`ERR value at '${key}' is not an integer`);
    }
    const next = current + 1;
    const expiresAt = this.expiries.get(key);
    this.data.set(key, { kind: 'string', value: String(next) });
    if (expiresAt !== undefined) this.expiries.set(key, expiresAt);
    return next;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    if (!this.lookup(key)) return false;
    this.expiries.set(key, this.clock.now().getTime() + seconds * 1000);
    return true;
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.lookup(key)) removed++;
      this.data.delete(key);
      this.expiries.delete(key);
    }
    return removed;
  }

  // ---------- connection ----------

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
    this.waiters = [];
  }
}
