import { InMemoryCoordinationStore } from '../../src/infrastructure/store/InMemoryCoordinationStore';
import { FakeClock } from '../helpers';

describe('InMemoryCoordinationStore', () => {
  let clock: FakeClock;
  let store: InMemoryCoordinationStore;

  beforeEach(() => {
    clock = new FakeClock();
    store = new InMemoryCoordinationStore(clock);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('lists', () => {
    it('should push at either end and read ranges with negative indexes', async () => {
      await store.rpush('q', 'b', 'c');
      await store.lpush('q', 'a');

      expect(await store.lrange('q', 0, -1)).toEqual(['a', 'b', 'c']);
      expect(await store.lrange('q', -2, -1)).toEqual(['b', 'c']);
      expect(await store.lrange('q', 5, 10)).toEqual([]);
      expect(await store.llen('q')).toBe(3);
    });

    it('should remove by count from the head or the tail', async () => {
      await store.rpush('q', 'x', 'y', 'x', 'x');

      expect(await store.lrem('q', -1, 'x')).toBe(1);
      expect(await store.lrange('q', 0, -1)).toEqual(['x', 'y', 'x']);
      expect(await store.lrem('q', 0, 'x')).toBe(2);
      expect(await store.lrange('q', 0, -1)).toEqual(['y']);
    });

    it('should trim and drop empty lists', async () => {
      await store.rpush('q', 'a', 'b', 'c');
      await store.ltrim('q', 1, -1);
      expect(await store.lrange('q', 0, -1)).toEqual(['b', 'c']);

      await store.ltrim('q', 5, -1);
      expect(await store.llen('q')).toBe(0);
      await store.set('q', 'now a string');
      expect(await store.get('q')).toBe('now a string');
    });

    it('should move atomically between lists', async () => {
      await store.rpush('src', 'a', 'b');

      expect(await store.lmove('src', 'dst', 'RIGHT', 'LEFT')).toBe('b');
      expect(await store.lmove('src', 'dst', 'LEFT', 'LEFT')).toBe('a');
      expect(await store.lrange('dst', 0, -1)).toEqual(['a', 'b']);
      expect(await store.lmove('src', 'dst', 'LEFT', 'LEFT')).toBeNull();
    });

    it('should return null at once from a non-blocking move on an empty list', async () => {
      expect(await store.blmove('src', 'dst', 'LEFT', 'RIGHT', 0)).toBeNull();
    });

    it('should serve blocked moves in arrival order', async () => {
      const first = store.blmove('src', 'one', 'LEFT', 'RIGHT', 5000);
      const second = store.blmove('src', 'two', 'LEFT', 'RIGHT', 5000);

      await store.rpush('src', 'a', 'b', 'c');

      expect(await first).toBe('a');
      expect(await second).toBe('b');
      expect(await store.lrange('src', 0, -1)).toEqual(['c']);
    });

    it('should time out a blocked move', async () => {
      expect(await store.blmove('src', 'dst', 'LEFT', 'RIGHT', 10)).toBeNull();
    });

    it('should refuse list commands on other types', async () => {
      await store.set('k', 'v');

      await expect(store.rpush('k', 'x')).rejects.toThrow("WRONGTYPE key 'k' does not hold a list");
    });
  });

  describe('hashes and sets', () => {
    it('should set fields only when absent with hsetnx', async () => {
      expect(await store.hsetnx('h', 'f', '1')).toBe(true);
      expect(await store.hsetnx('h', 'f', '2')).toBe(false);
      expect(await store.hget('h', 'f')).toBe('1');
    });

    it('should increment and delete fields', async () => {
      expect(await store.hincrby('h', 'n', 2)).toBe(2);
      expect(await store.hincrby('h', 'n', 3)).toBe(5);
      await store.hset('h', { other: 'x' });

      expect(await store.hdel('h', 'n', 'missing')).toBe(1);
      expect(await store.hgetall('h')).toEqual({ other: 'x' });
    });

    it('should report set membership', async () => {
      expect(await store.sadd('s', 'a', 'b', 'a')).toBe(2);
      expect(await store.sismember('s', 'a')).toBe(true);
      expect(await store.srem('s', 'a')).toBe(1);
      expect(await store.smembers('s')).toEqual(['b']);
    });
  });

  describe('keys', () => {
    it('should count with incr and keep the expiry', async () => {
      expect(await store.incr('c')).toBe(1);
      await store.expire('c', 10);
      expect(await store.incr('c')).toBe(2);

      clock.advance(10_000);
      expect(await store.get('c')).toBeNull();
    });

    it('should hand out distinct values to concurrent incr callers', async () => {
      const values = await Promise.all([store.incr('c'), store.incr('c'), store.incr('c')]);

      expect(values).toEqual([1, 2, 3]);
    });

    it('should delete keys and report how many existed', async () => {
      await store.set('a', '1');
      await store.rpush('b', 'x');

      expect(await store.del('a', 'b', 'c')).toBe(2);
      expect(await store.expire('a', 5)).toBe(false);
    });
  });
});
