import { createHarness, TestHarness } from '../helpers';
import { LEDGER_KEY } from '../../src/domain/pipeline/stages';

describe('RecoverySweeper', () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = await createHarness({ pipeline: { inflightMaxAgeMs: 5 * 60_000 } });
    await h.taskService.createTask({ id: 'T1' });
    await h.taskService.createTask({ id: 'T2' });
  });

  it('should finish interrupted moves and requeue stuck claims', async () => {
    await h.queueService.enqueue('T1', 'new');
    await h.queueService.enqueue('T2', 'new');
    await h.queueService.claim('new', { agentId: 'agent-1', timeoutMs: 0 });
    await h.queueService.claim('new', { agentId: 'agent-2', timeoutMs: 0 });
    await h.store.hset(LEDGER_KEY, {
      'T2|queue:new:inflight': JSON.stringify({
        taskId: 'T2',
        source: { list: 'inflight', stage: 'new' },
        target: { list: 'pending', stage: 'dev', end: 'LEFT' },
        at: '2026-03-02T10:00:00.000Z',
      }),
    });
    h.clock.advance(10 * 60_000);

    const result = await h.recoverySweeper.sweep();

    expect(result).toEqual({ reconciled: 1, recovered: [{ taskId: 'T1', stage: 'new', ageMs: 600000 }] });
    expect(await h.queueService.list('new')).toEqual({ pending: ['T1'], inflight: [] });
    expect(await h.queueService.list('dev')).toEqual({ pending: ['T2'], inflight: [] });
  });

  it('should do nothing on a healthy pipeline', async () => {
    await h.queueService.enqueue('T1', 'new');
    await h.queueService.claim('new', { agentId: 'agent-1', timeoutMs: 0 });
    h.clock.advance(60_000);

    expect(await h.recoverySweeper.sweep()).toEqual({ reconciled: 0, recovered: [] });
    expect(h.logger.info).not.toHaveBeenCalledWith('Recovery sweep finished', expect.anything());
  });

  it('should sweep on its schedule until stopped', async () => {
    const controller = new AbortController();
    const running = h.recoverySweeper.run(controller.signal);

    expect(h.ticker.scheduled()).toEqual({ 'recovery:sweep': 60000 });
    await h.ticker.tick('recovery:sweep');

    controller.abort();
    await running;
    expect(h.ticker.scheduled()).toEqual({});
  });
});
