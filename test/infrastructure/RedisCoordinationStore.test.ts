import { RedisCoordinationStore } from '../../src/infrastructure/store/RedisCoordinationStore';
import { TransientStoreError } from '../../src/domain/common/Errors';
import { mockLogger } from '../helpers';

interface BlockingConnection {
  on: jest.Mock;
  blmove: jest.Mock;
  disconnect: jest.Mock;
}

const blockingConnections: BlockingConnection[] = [];
const blmoveReply = jest.fn();

const mockClient = {
  on: jest.fn(),
  duplicate: jest.fn(),
  rpush: jest.fn(),
  lmove: jest.fn(),
  hset: jest.fn(),
  ping: jest.fn(),
  quit: jest.fn(),
};

jest.mock('ioredis', () => ({
  __esModule: true,
  default: jest.fn(() => mockClient),
}));

describe('RedisCoordinationStore', () => {
  let logger: ReturnType<typeof mockLogger>;
  let store: RedisCoordinationStore;

  beforeEach(() => {
    jest.clearAllMocks();
    blockingConnections.length = 0;
    mockClient.duplicate.mockImplementation(() => {
      const connection: BlockingConnection = {
        on: jest.fn(),
        blmove: jest.fn((...args: unknown[]) => blmoveReply(...args)),
        disconnect: jest.fn(),
      };
      blockingConnections.push(connection);
      return connection;
    });
    logger = mockLogger();
    store = new RedisCoordinationStore({ url: 'redis://localhost:6379', keyPrefix: 'test_' }, logger);
  });

  it('should raise connection failures as transient store errors', async () => {
    mockClient.rpush.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const attempt = store.rpush('queue:new', 'T1');

    await expect(attempt).rejects.toThrow(TransientStoreError);
    await expect(attempt).rejects.toThrow('Coordination store unavailable during rpush: connect ECONNREFUSED');
  });

  it('should pass command errors through unchanged', async () => {
    const reply = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    reply.name = 'ReplyError';
    mockClient.rpush.mockRejectedValueOnce(reply);

    await expect(store.rpush('queue:new', 'T1')).rejects.toBe(reply);
  });

  it('should use a plain move for a non-blocking claim', async () => {
    mockClient.lmove.mockResolvedValueOnce('T1');

    expect(await store.blmove('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 0)).toBe('T1');
    expect(mockClient.lmove).toHaveBeenCalledWith('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT');
  });

  describe('blocking claims', () => {
    it('should give concurrent claims their own connections', async () => {
      let finishNew: (taskId: string) => void = () => undefined;
      blmoveReply
        .mockReturnValueOnce(new Promise<string>(resolve => { finishNew = resolve; }))
        .mockResolvedValueOnce('T2');

      const first = store.blmove('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 5000);
      const second = store.blmove('queue:dev', 'queue:dev:inflight', 'LEFT', 'RIGHT', 5000);

      expect(await second).toBe('T2');
      expect(blockingConnections).toHaveLength(2);
      expect(blockingConnections[0].blmove).toHaveBeenCalledWith('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 5);
      expect(blockingConnections[1].blmove).toHaveBeenCalledWith('queue:dev', 'queue:dev:inflight', 'LEFT', 'RIGHT', 5);

      finishNew('T1');
      expect(await first).toBe('T1');
    });

    it('should reuse a released connection and close it with the store', async () => {
      blmoveReply.mockResolvedValueOnce('T1').mockResolvedValueOnce(null);

      expect(await store.blmove('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 1000)).toBe('T1');
      expect(await store.blmove('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 1000)).toBeNull();
      expect(blockingConnections).toHaveLength(1);

      await store.close();

      expect(blockingConnections[0].disconnect).toHaveBeenCalledTimes(1);
      expect(mockClient.quit).toHaveBeenCalledTimes(1);
    });

    it('should drop a connection whose claim failed', async () => {
      blmoveReply.mockRejectedValueOnce(new Error('connect ECONNRESET')).mockResolvedValueOnce('T1');

      await expect(store.blmove('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 1000)).rejects.toThrow(TransientStoreError);
      expect(await store.blmove('queue:new', 'queue:new:inflight', 'LEFT', 'RIGHT', 1000)).toBe('T1');

      expect(blockingConnections).toHaveLength(2);
      expect(blockingConnections[0].disconnect).toHaveBeenCalledTimes(1);
    });
  });

  it('should skip empty hash writes', async () => {
    await store.hset('h', {});

    expect(mockClient.hset).not.toHaveBeenCalled();
  });

  it('should report a failed ping as unhealthy', async () => {
    mockClient.ping.mockRejectedValueOnce(new Error('timeout'));

    expect(await store.ping()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Redis ping failed', { error: 'timeout' });
  });
});
