import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { IntervalTicker } from '../../src/infrastructure/common/IntervalTicker';
import { mockLogger } from '../helpers';

describe('InMemoryEventBus', () => {
  it('should run every handler and isolate failures', async () => {
    const logger = mockLogger();
    const bus = new InMemoryEventBus(logger);
    const seen: string[] = [];

    bus.on('queue:enqueued', () => {
      throw new Error('handler broke');
    });
    bus.on('queue:enqueued', async ({ taskId, stage }) => {
      seen.push(`${taskId}@${stage}`);
    });

    await bus.emit('queue:enqueued', { taskId: 'T1', stage: 'new' });

    expect(seen).toEqual(['T1@new']);
    expect(logger.error).toHaveBeenCalledWith('Error in event handler for queue:enqueued:', new Error('handler broke'));
  });

  it('should stop calling removed handlers', async () => {
    const bus = new InMemoryEventBus(mockLogger());
    const handler = jest.fn();

    bus.on('queue:resumed', handler);
    bus.off('queue:resumed', handler);
    await bus.emit('queue:resumed', { stage: 'dev' });

    expect(handler).not.toHaveBeenCalled();
    expect(bus.listenerCount('queue:resumed')).toBe(0);
  });
});

describe('IntervalTicker', () => {
  it('should keep ticking after a failure and stop on abort', async () => {
    const logger = mockLogger();
    const controller = new AbortController();
    let calls = 0;

    await new IntervalTicker(logger).schedule('test', 1, async () => {
      calls++;
      if (calls === 1) throw new Error('first tick fails');
      if (calls === 3) controller.abort();
    }, controller.signal);

    expect(calls).toBe(3);
    expect(logger.error).toHaveBeenCalledWith('Tick failed: test', new Error('first tick fails'));
  });
});
