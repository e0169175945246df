import Redis, { RedisOptions } from 'ioredis';
import { ICoordinationStore, ListEnd } from '../../domain/store/ICoordinationStore';
import { TransientStoreError } from '../../domain/common/Errors';
import { ILogger } from '../../domain/common/ILogger';

/** Idle blocking connections kept for reuse; bursts beyond this open and close extra ones. */
const MAX_IDLE_BLOCKING = 4;

export interface RedisStoreOptions {
  url: string;
  keyPrefix: string;
}

/**
 * Coordination store backed by Redis.
 *
 * Each blocking move borrows its own duplicated connection, so concurrent claims wait
 * side by side and never stall other commands issued by the same process. Command errors (WRONGTYPE and friends) propagate
 * unchanged; anything else is treated as a connectivity problem and raised as
 * `TransientStoreError`.
 */
export class RedisCoordinationStore implements ICoordinationStore {
  private client: Redis;
  private idleBlocking: Redis[] = [];
  private busyBlocking = new Set<Redis>();
  private closed = false;

  constructor(options: RedisStoreOptions, private logger: ILogger) {
    const redisOptions: RedisOptions = {
      keyPrefix: options.keyPrefix,
      maxRetriesPerRequest: 2,
      enableOfflineQueue: true,
    };
    this.client = new Redis(options.url, redisOptions);
    this.client.on('error', (err: Error) => {
      this.logger.warn('Redis connection error', { error: err.message });
    });
  }

  private acquireBlocking(): Redis {
    const connection = this.idleBlocking.pop() ?? this.openBlocking();
    this.busyBlocking.add(connection);
    return connection;
  }

  private openBlocking(): Redis {
    const connection = this.client.duplicate();
    connection.on('error', (err: Error) => {
      this.logger.warn('Redis blocking connection error', { error: err.message });
    });
    return connection;
  }

  private releaseBlocking(connection: Redis, healthy: boolean): void {
    this.busyBlocking.delete(connection);
    if (!healthy || this.closed || this.idleBlocking.length >= MAX_IDLE_BLOCKING) {
      connection.disconnect();
      return;
    }
    this.idleBlocking.push(connection);
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (err) {
      if (err instanceof Error && err.name === 'ReplyError') {
        throw err;
      }
      throw new TransientStoreError(operation, err instanceof Error ? err : new Error(String(err)));
    }
  }

  // Lists

  lpush(key: string, ...values: string[]): Promise<number> {
    return this.run('lpush', () => this.client.lpush(key, ...values));
  }

  rpush(key: string, ...values: string[]): Promise<number> {
    return this.run('rpush', () => this.client.rpush(key, ...values));
  }

  lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.run('lrange', () => this.client.lrange(key, start, stop));
  }

  llen(key: string): Promise<number> {
    return this.run('llen', () => this.client.llen(key));
  }

  lrem(key: string, count: number, value: string): Promise<number> {
    return this.run('lrem', () => this.client.lrem(key, count, value));
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.run('ltrim', () => this.client.ltrim(key, start, stop));
  }

  // ioredis types each end combination as its own overload
  lmove(source: string, destination: string, from: ListEnd, to: ListEnd): Promise<string | null> {
    return this.run('lmove', () => {
      const c = this.client;
      if (from === 'LEFT') {
        return to === 'LEFT' ? c.lmove(source, destination, 'LEFT', 'LEFT') : c.lmove(source, destination, 'LEFT', 'RIGHT');
      }
      return to === 'LEFT' ? c.lmove(source, destination, 'RIGHT', 'LEFT') : c.lmove(source, destination, 'RIGHT', 'RIGHT');
    });
  }

  blmove(source: string, destination: string, from: ListEnd, to: ListEnd, timeoutMs: number): Promise<string | null> {
    if (timeoutMs <= 0) {
      return this.lmove(source, destination, from, to);
    }
    const seconds = timeoutMs / 1000;
    return this.run('blmove', async () => {
      const c = this.acquireBlocking();
      let healthy = false;
      try {
        let moved: string | null;
        if (from === 'LEFT') {
          moved = to === 'LEFT'
            ? await c.blmove(source, destination, 'LEFT', 'LEFT', seconds)
            : await c.blmove(source, destination, 'LEFT', 'RIGHT', seconds);
        } else {
          moved = to === 'LEFT'
            ? await c.blmove(source, destination, 'RIGHT', 'LEFT', seconds)
            : await c.blmove(source, destination, 'RIGHT', 'RIGHT', seconds);
        }
        healthy = true;
        return moved;
      } finally {
        this.releaseBlocking(c, healthy);
      }
    });
  }

  // Hashes

  hget(key: string, field: string): Promise<string | null> {
    return this.run('hget', () => this.client.hget(key, field));
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.run('hgetall', () => this.client.hgetall(key));
  }

  async hset(key: string, values: Record<string, string>): Promise<void> {
    if (Object.keys(values).length === 0) return;
    await this.run('hset', () => this.client.hset(key, values));
  }

  async hsetnx(key: string, field: string, value: string): Promise<boolean> {
    const set = await this.run('hsetnx', () => this.client.hsetnx(key, field, value));
    return set === 1;
  }

  hdel(key: string, ...fields: string[]): Promise<number> {
    return this.run('hdel', () => this.client.hdel(key, ...fields));
  }

  hincrby(key: string, field: string, increment: number): Promise<number> {
    return this.run('hincrby', () => this.client.hincrby(key, field, increment));
  }

  // Sets

  sadd(key: string, ...members: string[]): Promise<number> {
    return this.run('sadd', () => this.client.sadd(key, ...members));
  }

  srem(key: string, ...members: string[]): Promise<number> {
    return this.run('srem', () => this.client.srem(key, ...members));
  }

  async sismember(key: string, member: string): Promise<boolean> {
    const found = await this.run('sismember', () => this.client.sismember(key, member));
    return found === 1;
  }

  smembers(key: string): Promise<string[]> {
    return this.run('smembers', () => this.client.smembers(key));
  }

  // Keys

  get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(key));
  }

  async set(key: string, value: string): Promise<void> {
    await this.run('set', () => this.client.set(key, value));
  }

  incr(key: string): Promise<number> {
    return this.run('incr', () => this.client.incr(key));
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    const applied = await this.run('expire', () => this.client.expire(key, seconds));
    return applied === 1;
  }

  del(...keys: string[]): Promise<number> {
    return this.run('del', () => this.client.del(...keys));
  }

  // Connection

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (err) {
      this.logger.warn('Redis ping failed', { error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const connection of [...this.idleBlocking, ...this.busyBlocking]) {
      connection.disconnect();
    }
    this.idleBlocking = [];
    this.busyBlocking.clear();
    await this.client.quit();
  }
}
